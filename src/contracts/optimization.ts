import { z } from 'zod';
import type { ComplianceOutcome, DesignArtifact, JsonObject, OptimizationOutcome } from '../types/index.js';
import { jsonObjectSchema } from './json.js';
import { defineResponseVersion, normalizeVersioned, type ResponseVersion } from './versioned.js';

export interface OptimizationRequestBody {
  artifact: DesignArtifact;
  jurisdiction: string;
  constraints: JsonObject;
  compliance: ComplianceOutcome;
}

const confidenceSchema = z.number().min(0).max(1);

const optimizationV1 = defineResponseVersion({
  version: 'optimization/v1',
  detect: raw => 'optimizedPayload' in raw,
  schema: z.object({
    optimizedPayload: jsonObjectSchema,
    confidence: confidenceSchema,
    rewardScore: z.number()
  }),
  toOutcome: (parsed): OptimizationOutcome => ({
    optimizedPayload: parsed.optimizedPayload,
    confidence: parsed.confidence,
    rewardScore: parsed.rewardScore,
    usedFallback: false
  })
});

const optimizationLegacy = defineResponseVersion({
  version: 'optimization/legacy',
  detect: raw => 'optimized_layout' in raw,
  schema: z.object({
    optimized_layout: jsonObjectSchema,
    confidence: confidenceSchema,
    reward_score: z.number()
  }),
  toOutcome: (parsed): OptimizationOutcome => ({
    optimizedPayload: parsed.optimized_layout,
    confidence: parsed.confidence,
    rewardScore: parsed.reward_score,
    usedFallback: false
  })
});

export const OPTIMIZATION_RESPONSE_VERSIONS: ReadonlyArray<ResponseVersion<OptimizationOutcome>> = [
  optimizationV1,
  optimizationLegacy
];

export function normalizeOptimizationResponse(raw: unknown): OptimizationOutcome {
  return normalizeVersioned('optimization', OPTIMIZATION_RESPONSE_VERSIONS, raw);
}
