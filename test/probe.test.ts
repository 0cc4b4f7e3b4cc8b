import { describe, expect, it } from 'vitest';

import { DependencyHealthTracker, probeAll, probeDependency } from '../src/health/index.js';
import { FakeTransport, createClock, silentLogger } from './helpers.js';

function setup(reachable: Record<string, number>) {
  const clock = createClock();
  const tracker = new DependencyHealthTracker({ clock: clock.now });
  const transport = new FakeTransport({}, reachable);
  return { tracker, transport, deps: { tracker, transport, logger: silentLogger } };
}

const target = { name: 'compliance', baseUrl: 'http://compliance.test/' };

describe('probeDependency', () => {
  it('stops at the first health endpoint answering 200', async () => {
    const { deps, transport, tracker } = setup({
      'http://compliance.test/health': 503,
      'http://compliance.test/status': 200
    });

    expect(await probeDependency(target, deps, 5_000)).toBe('healthy');
    expect(transport.reachCalls).toEqual(['http://compliance.test/health', 'http://compliance.test/status']);
    expect(tracker.currentStatus('compliance')).toBe('healthy');
  });

  it('settles for degraded when only the base URL answers', async () => {
    const { deps, transport } = setup({ 'http://compliance.test/': 404 });

    expect(await probeDependency(target, deps, 5_000)).toBe('degraded');
    expect(transport.reachCalls).toEqual([
      'http://compliance.test/health',
      'http://compliance.test/status',
      'http://compliance.test/ping',
      'http://compliance.test/_health',
      'http://compliance.test/'
    ]);
  });

  it('marks a dependency whose base URL answers 5xx unhealthy', async () => {
    const { deps, tracker } = setup({ 'http://compliance.test/': 502 });

    expect(await probeDependency(target, deps, 5_000)).toBe('unhealthy');
    expect(tracker.shouldAttempt('compliance')).toBe(false);
  });

  it('marks an unreachable dependency unhealthy', async () => {
    const { deps, tracker } = setup({});

    expect(await probeDependency(target, deps, 5_000)).toBe('unhealthy');
    expect(tracker.currentStatus('compliance')).toBe('unhealthy');
  });
});

describe('probeAll', () => {
  it('returns one verdict per target', async () => {
    const { deps } = setup({ 'http://optimization.test/ping': 200 });

    expect(
      await probeAll([target, { name: 'optimization', baseUrl: 'http://optimization.test' }], deps, 5_000)
    ).toEqual({ compliance: 'unhealthy', optimization: 'healthy' });
  });
});
