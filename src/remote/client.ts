import type { Logger } from 'pino';
import { ContractViolation, DependencyUnhealthy } from '../errors/index.js';
import type { DependencyHealthTracker } from '../health/tracker.js';
import type { ServiceResult } from '../types/index.js';
import type { FallbackSynthesizer } from './fallback.js';
import type { Transport } from './transport.js';

export const SKIPPED_UNHEALTHY_REASON = 'marked unhealthy';

export interface RemoteServiceConfig {
  name: string;
  baseUrl: string;
  path: string;
  timeoutMs: number;
  apiKey?: string;
}

export interface RemoteServiceDeps {
  tracker: DependencyHealthTracker;
  transport: Transport;
  logger: Logger;
}

export interface RemoteServiceContract<TPayload, TOutcome> {
  normalize: (raw: unknown) => TOutcome;
  fallback: FallbackSynthesizer<TPayload, TOutcome>;
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  // Request-scoped logger carrying the correlation id
  logger?: Logger;
}

export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * One network-dependent step that always yields a complete outcome.
 *
 * Timeouts, refused connections, non-2xx statuses and unreadable bodies are
 * all the same thing here: the dependency gave no usable answer, so it is
 * marked unhealthy and the fallback is synthesized. A body that parses but
 * fits no known schema is a contract breach and is thrown.
 */
export class RemoteServiceClient<TPayload, TOutcome> {
  constructor(
    protected readonly config: RemoteServiceConfig,
    protected readonly deps: RemoteServiceDeps,
    private readonly contract: RemoteServiceContract<TPayload, TOutcome>
  ) {}

  get name(): string {
    return this.config.name;
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get defaultTimeoutMs(): number {
    return this.config.timeoutMs;
  }

  async call(payload: TPayload, options: CallOptions = {}): Promise<ServiceResult<TOutcome>> {
    const { tracker, transport } = this.deps;
    const logger = (options.logger ?? this.deps.logger).child({ dependency: this.name });

    if (!tracker.shouldAttempt(this.name)) {
      logger.info({ status: tracker.currentStatus(this.name) }, 'Skipping call to unhealthy dependency');
      return this.fallback(payload, SKIPPED_UNHEALTHY_REASON);
    }

    const startTime = Date.now();
    // Throws RequestCancelled if the caller aborts; nothing is recorded then.
    const result = await transport.postJson(joinUrl(this.config.baseUrl, this.config.path), payload, {
      timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
      signal: options.signal,
      headers: this.authHeaders()
    });
    const latencyMs = Date.now() - startTime;

    if (!result.ok) {
      tracker.recordOutcome(this.name, 'unhealthy');
      const err = new DependencyUnhealthy(this.name, result.reason, {
        details: { status: result.status, detail: result.detail }
      });
      logger.warn({ err, latency_ms: latencyMs }, 'Dependency call failed, using fallback');
      return this.fallback(payload, result.reason);
    }

    let outcome: TOutcome;
    try {
      outcome = this.contract.normalize(result.body);
    } catch (error) {
      if (error instanceof ContractViolation) {
        tracker.recordOutcome(this.name, 'degraded');
        logger.error({ err: error, latency_ms: latencyMs }, 'Dependency answered outside its contract');
      }
      throw error;
    }

    tracker.recordOutcome(this.name, 'healthy');
    logger.debug({ latency_ms: latencyMs }, 'Dependency call succeeded');
    return { kind: 'live', outcome };
  }

  protected authHeaders(): Record<string, string> {
    return this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {};
  }

  private fallback(payload: TPayload, reason: string): ServiceResult<TOutcome> {
    return { kind: 'fallback', outcome: this.contract.fallback.synthesize(payload, reason), reason };
  }
}
