import type { DependencyHealthRecord, HealthStatus } from '../types/index.js';

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const DEFAULT_REVALIDATION_WINDOW_MS = 5 * 60 * 1000;

export interface DependencyHealthTrackerOptions {
  revalidationWindowMs?: number;
  clock?: Clock;
}

export interface DependencySnapshot {
  name: string;
  status: HealthStatus;
  lastCheckedAt: string | null;
  available: boolean;
}

/**
 * Last observed reachability of each remote dependency.
 *
 * A fresh `unhealthy` verdict short-circuits the next attempt; any other
 * verdict, or one older than the revalidation window, lets the caller try.
 * Each slot is replaced whole on write, so concurrent requests can only ever
 * cost one redundant probe.
 */
export class DependencyHealthTracker {
  private records: Map<string, DependencyHealthRecord> = new Map();
  private readonly windowMs: number;
  private readonly clock: Clock;

  constructor(options: DependencyHealthTrackerOptions = {}) {
    this.windowMs = options.revalidationWindowMs ?? DEFAULT_REVALIDATION_WINDOW_MS;
    this.clock = options.clock ?? systemClock;

    if (!Number.isFinite(this.windowMs) || this.windowMs < 0) {
      throw new RangeError(`Revalidation window must be a non-negative number, got ${this.windowMs}`);
    }
  }

  get revalidationWindowMs(): number {
    return this.windowMs;
  }

  shouldAttempt(name: string): boolean {
    const record = this.records.get(name);
    if (!record) return true;

    const age = this.clock() - record.lastCheckedAt;
    if (age >= this.windowMs) return true;

    return record.status !== 'unhealthy';
  }

  recordOutcome(name: string, status: HealthStatus, at: number = this.clock()): DependencyHealthRecord {
    const previous = this.records.get(name);
    const record: DependencyHealthRecord = {
      name,
      status,
      lastCheckedAt: previous ? Math.max(previous.lastCheckedAt, at) : at
    };

    this.records.set(name, record);
    return record;
  }

  currentStatus(name: string): HealthStatus {
    return this.records.get(name)?.status ?? 'unknown';
  }

  getRecord(name: string): DependencyHealthRecord | undefined {
    const record = this.records.get(name);
    return record ? { ...record } : undefined;
  }

  snapshot(names: string[] = []): DependencySnapshot[] {
    const all = new Set([...names, ...this.records.keys()]);

    return Array.from(all)
      .sort()
      .map(name => {
        const record = this.records.get(name);
        return {
          name,
          status: record?.status ?? 'unknown',
          lastCheckedAt: record ? new Date(record.lastCheckedAt).toISOString() : null,
          available: this.shouldAttempt(name)
        };
      });
  }
}
