import { hashObject } from '../crypto/index.js';
import type { ComplianceRequestBody, OptimizationRequestBody } from '../contracts/index.js';
import type { ComplianceOutcome, OptimizationOutcome } from '../types/index.js';

export const COMPLIANCE_UNAVAILABLE_PREFIX = 'compliance service unavailable';

const FALLBACK_CONFIDENCE_COMPLIANT = 0.5;
const FALLBACK_CONFIDENCE_NON_COMPLIANT = 0.3;
const FALLBACK_REWARD_SCORE = 0;

/**
 * Locally computed stand-ins for a dependency's answer. Both are pure
 * functions of the request body and the failure reason.
 */
export interface FallbackSynthesizer<TPayload, TOutcome> {
  synthesize(payload: TPayload, reason: string): TOutcome;
}

export function jurisdictionSlug(jurisdiction: string): string {
  const slug = jurisdiction
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'unspecified';
}

export function fallbackCaseId(payload: ComplianceRequestBody): string {
  const bucket = parseInt(hashObject(payload).slice(0, 8), 16) % 10000;
  return `case_${jurisdictionSlug(payload.jurisdiction)}_${bucket}`;
}

export const complianceFallback: FallbackSynthesizer<ComplianceRequestBody, ComplianceOutcome> = {
  synthesize(payload, reason) {
    return {
      compliant: false,
      violations: [`${COMPLIANCE_UNAVAILABLE_PREFIX}: ${reason}`],
      caseId: payload.caseId || fallbackCaseId(payload),
      usedFallback: true
    };
  }
};

// Keeps the generated layout unchanged; confidence reflects the compliance context it was handed.
export const optimizationFallback: FallbackSynthesizer<OptimizationRequestBody, OptimizationOutcome> = {
  synthesize(payload) {
    const digest = hashObject({
      artifact: payload.artifact,
      jurisdiction: payload.jurisdiction,
      constraints: payload.constraints
    });

    return {
      optimizedPayload: {
        optimizationId: `fallback_${jurisdictionSlug(payload.jurisdiction)}_${digest.slice(0, 8)}`,
        strategy: 'unchanged',
        layout: payload.artifact,
        constraints: payload.constraints,
        complianceBlocking: payload.compliance.violations.length
      },
      confidence: payload.compliance.compliant ? FALLBACK_CONFIDENCE_COMPLIANT : FALLBACK_CONFIDENCE_NON_COMPLIANT,
      rewardScore: FALLBACK_REWARD_SCORE,
      usedFallback: true
    };
  }
};
