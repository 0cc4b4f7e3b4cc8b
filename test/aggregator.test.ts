import { describe, expect, it } from 'vitest';

import { ContractViolation } from '../src/errors/index.js';
import { aggregateResult, type AggregationInput } from '../src/pipeline/index.js';
import { sampleArtifact } from './helpers.js';

const START = 1_700_000_000_000;

function input(overrides: Partial<AggregationInput> = {}): AggregationInput {
  return {
    correlationId: 'corr-1',
    artifact: sampleArtifact,
    compliance: { compliant: true, violations: [], usedFallback: false },
    optimization: { optimizedPayload: { floors: 2 }, confidence: 0.8, rewardScore: 0.9, usedFallback: false },
    startTime: START,
    steps: [{ step: 'generate', status: 'ok', elapsedMs: 40 }],
    ...overrides
  };
}

describe('aggregateResult', () => {
  it('assembles the response from its parts', () => {
    const parts = input();

    const response = aggregateResult(parts, START + 250);

    expect(response).toEqual({
      correlationId: 'corr-1',
      designArtifact: sampleArtifact,
      compliance: parts.compliance,
      optimization: parts.optimization,
      elapsedMs: 250,
      producedAt: new Date(START + 250).toISOString(),
      steps: [{ step: 'generate', status: 'ok', elapsedMs: 40 }]
    });
    expect(response.compliance).toBe(parts.compliance);
  });

  it('accepts a missing optimization', () => {
    expect(aggregateResult(input({ optimization: null }), START).optimization).toBeNull();
  });

  it('never reports negative elapsed time', () => {
    expect(aggregateResult(input(), START - 10).elapsedMs).toBe(0);
  });

  it('rejects an empty correlation id', () => {
    expect(() => aggregateResult(input({ correlationId: '' }), START)).toThrow('Aggregation input has no correlation id');
  });

  it('rejects a compliance outcome missing its fields', () => {
    const compliance = JSON.parse('{"compliant": true}');

    expect(() => aggregateResult(input({ compliance }), START)).toThrow(ContractViolation);
    expect(() => aggregateResult(input({ compliance }), START)).toThrow(/^Malformed compliance outcome: violations:/);
  });

  it('rejects an optimization outcome with confidence out of range', () => {
    const optimization = { optimizedPayload: {}, confidence: 2, rewardScore: 0, usedFallback: false };

    expect(() => aggregateResult(input({ optimization }), START)).toThrow(/^Malformed optimization outcome: confidence:/);
  });
});
