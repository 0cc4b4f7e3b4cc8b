import { describe, expect, it } from 'vitest';

import { DependencyHealthTracker } from '../src/health/index.js';
import { createClock } from './helpers.js';

const WINDOW = 300_000;

function setup() {
  const clock = createClock();
  const tracker = new DependencyHealthTracker({ revalidationWindowMs: WINDOW, clock: clock.now });
  return { clock, tracker };
}

describe('DependencyHealthTracker', () => {
  it('attempts a dependency it has never seen', () => {
    const { tracker } = setup();
    expect(tracker.shouldAttempt('compliance')).toBe(true);
    expect(tracker.currentStatus('compliance')).toBe('unknown');
  });

  it('keeps attempting fresh healthy and degraded dependencies', () => {
    const { tracker } = setup();
    tracker.recordOutcome('compliance', 'healthy');
    tracker.recordOutcome('optimization', 'degraded');

    expect(tracker.shouldAttempt('compliance')).toBe(true);
    expect(tracker.shouldAttempt('optimization')).toBe(true);
  });

  it('blocks an unhealthy dependency until the revalidation window has passed', () => {
    const { clock, tracker } = setup();
    tracker.recordOutcome('compliance', 'unhealthy', clock.now());

    expect(tracker.shouldAttempt('compliance')).toBe(false);
    clock.advance(WINDOW - 1);
    expect(tracker.shouldAttempt('compliance')).toBe(false);
    clock.advance(1);
    expect(tracker.shouldAttempt('compliance')).toBe(true);
  });

  it('answers the same within the window when nothing is recorded in between', () => {
    const { clock, tracker } = setup();
    tracker.recordOutcome('compliance', 'unhealthy');

    const first = tracker.shouldAttempt('compliance');
    clock.advance(1_000);
    const second = tracker.shouldAttempt('compliance');

    expect(first).toBe(false);
    expect(second).toBe(first);
  });

  it('replaces the status but never moves lastCheckedAt backwards', () => {
    const { clock, tracker } = setup();
    const now = clock.now();
    tracker.recordOutcome('compliance', 'unhealthy', now);
    const record = tracker.recordOutcome('compliance', 'healthy', now - 5_000);

    expect(record).toEqual({ name: 'compliance', status: 'healthy', lastCheckedAt: now });
    expect(tracker.getRecord('compliance')).toEqual(record);
  });

  it('lists requested and recorded dependencies in its snapshot', () => {
    const { clock, tracker } = setup();
    tracker.recordOutcome('optimization', 'unhealthy');

    expect(tracker.snapshot(['compliance'])).toEqual([
      { name: 'compliance', status: 'unknown', lastCheckedAt: null, available: true },
      {
        name: 'optimization',
        status: 'unhealthy',
        lastCheckedAt: new Date(clock.now()).toISOString(),
        available: false
      }
    ]);
  });

  it('rejects a negative revalidation window', () => {
    expect(() => new DependencyHealthTracker({ revalidationWindowMs: -1 })).toThrow(RangeError);
  });
});
