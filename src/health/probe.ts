import type { Logger } from 'pino';
import { joinUrl, type Transport } from '../remote/index.js';
import type { HealthStatus } from '../types/index.js';
import type { DependencyHealthTracker } from './tracker.js';

export const HEALTH_PATHS = ['/health', '/status', '/ping', '/_health'];

export interface ProbeTarget {
  name: string;
  baseUrl: string;
  apiKey?: string;
}

export interface ProbeDeps {
  tracker: DependencyHealthTracker;
  transport: Transport;
  logger: Logger;
}

/**
 * Actively checks a dependency outside of any request. A 200 from one of
 * the usual health endpoints means healthy; a non-5xx answer from the base
 * URL means degraded; anything else is unhealthy.
 */
export async function probeDependency(target: ProbeTarget, deps: ProbeDeps, timeoutMs: number): Promise<HealthStatus> {
  const headers: Record<string, string> = target.apiKey ? { Authorization: `Bearer ${target.apiKey}` } : {};
  let status: HealthStatus = 'unhealthy';

  for (const path of HEALTH_PATHS) {
    const result = await deps.transport.reach(joinUrl(target.baseUrl, path), { timeoutMs, headers });
    if (result.reached && result.status === 200) {
      status = 'healthy';
      break;
    }
  }

  if (status !== 'healthy') {
    const root = await deps.transport.reach(target.baseUrl, { timeoutMs, headers });
    if (root.reached && root.status < 500) {
      status = 'degraded';
    }
  }

  deps.tracker.recordOutcome(target.name, status);

  if (status === 'unhealthy') {
    deps.logger.warn({ dependency: target.name, status }, 'Dependency probe failed');
  } else {
    deps.logger.info({ dependency: target.name, status }, 'Dependency probed');
  }

  return status;
}

export async function probeAll(
  targets: ProbeTarget[],
  deps: ProbeDeps,
  timeoutMs: number
): Promise<Record<string, HealthStatus>> {
  const statuses = await Promise.all(targets.map(target => probeDependency(target, deps, timeoutMs)));
  return Object.fromEntries(targets.map((target, i) => [target.name, statuses[i] ?? 'unknown']));
}
