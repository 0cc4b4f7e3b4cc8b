import { describe, expect, it } from 'vitest';

import {
  complianceFallback,
  fallbackCaseId,
  jurisdictionSlug,
  optimizationFallback
} from '../src/remote/index.js';
import type { ComplianceOutcome } from '../src/types/index.js';
import { sampleArtifact } from './helpers.js';

const nonCompliant: ComplianceOutcome = {
  compliant: false,
  violations: ['compliance service unavailable: timeout'],
  caseId: 'case_pune_12',
  usedFallback: true
};

describe('compliance fallback', () => {
  it('fills every required field and marks itself as a fallback', () => {
    const outcome = complianceFallback.synthesize({ artifact: sampleArtifact, jurisdiction: 'Mumbai' }, 'timeout');

    expect(outcome.compliant).toBe(false);
    expect(outcome.violations).toEqual(['compliance service unavailable: timeout']);
    expect(outcome.usedFallback).toBe(true);
    expect(outcome.caseId).toMatch(/^case_mumbai_\d{1,4}$/);
    expect('referenceUrl' in outcome).toBe(false);
  });

  it('keeps a case id the caller already has', () => {
    const outcome = complianceFallback.synthesize(
      { artifact: sampleArtifact, jurisdiction: 'Mumbai', caseId: 'case-42' },
      'http 503'
    );
    expect(outcome.caseId).toBe('case-42');
    expect(outcome.violations).toEqual(['compliance service unavailable: http 503']);
  });

  it('mints a case id when the one given is empty', () => {
    const outcome = complianceFallback.synthesize({ artifact: sampleArtifact, jurisdiction: 'Mumbai', caseId: '' }, 'timeout');

    expect(outcome.caseId).toMatch(/^case_mumbai_\d{1,4}$/);
  });

  it('is deterministic regardless of key order in the artifact', () => {
    const reordered = {
      rooms: ['kitchen', 'living', 'bedroom', 'bedroom'],
      dimensions: { height: 7, width: 9, length: 12 },
      stories: 2,
      design_type: 'house'
    };

    const first = complianceFallback.synthesize({ artifact: sampleArtifact, jurisdiction: 'Pune' }, 'timeout');
    const second = complianceFallback.synthesize({ jurisdiction: 'Pune', artifact: reordered }, 'timeout');

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(fallbackCaseId({ artifact: reordered, jurisdiction: 'Pune' })).toBe(
      fallbackCaseId({ artifact: sampleArtifact, jurisdiction: 'Pune' })
    );
  });
});

describe('optimization fallback', () => {
  it('returns the layout unchanged with low confidence and zero reward', () => {
    const outcome = optimizationFallback.synthesize(
      { artifact: sampleArtifact, jurisdiction: 'Pune', constraints: { max_height: 15 }, compliance: nonCompliant },
      'http 500'
    );

    expect(outcome.confidence).toBe(0.3);
    expect(outcome.rewardScore).toBe(0);
    expect(outcome.usedFallback).toBe(true);
    expect(outcome.optimizedPayload.strategy).toBe('unchanged');
    expect(outcome.optimizedPayload.layout).toEqual(sampleArtifact);
    expect(outcome.optimizedPayload.constraints).toEqual({ max_height: 15 });
    expect(outcome.optimizedPayload.complianceBlocking).toBe(1);
    expect(outcome.optimizedPayload.optimizationId).toMatch(/^fallback_pune_[0-9a-f]{8}$/);
  });

  it('is more confident when the compliance context is clean', () => {
    const outcome = optimizationFallback.synthesize(
      {
        artifact: sampleArtifact,
        jurisdiction: 'Pune',
        constraints: {},
        compliance: { compliant: true, violations: [], usedFallback: false }
      },
      'timeout'
    );
    expect(outcome.confidence).toBe(0.5);
    expect(outcome.optimizedPayload.complianceBlocking).toBe(0);
  });

  it('is deterministic for identical input', () => {
    const payload = { artifact: sampleArtifact, jurisdiction: 'Nashik', constraints: {}, compliance: nonCompliant };
    expect(optimizationFallback.synthesize(payload, 'timeout')).toEqual(
      optimizationFallback.synthesize({ ...payload }, 'timeout')
    );
  });
});

describe('jurisdictionSlug', () => {
  it('normalizes free-form jurisdiction tags', () => {
    expect(jurisdictionSlug('  New Delhi / NCR ')).toBe('new-delhi-ncr');
    expect(jurisdictionSlug('en-IN')).toBe('en-in');
    expect(jurisdictionSlug('***')).toBe('unspecified');
  });
});
