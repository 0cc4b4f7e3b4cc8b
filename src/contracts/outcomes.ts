import { z } from 'zod';
import { jsonObjectSchema } from './json.js';

// Shapes the aggregator accepts from the clients. Anything else is a bug upstream.
export const complianceOutcomeSchema = z.object({
  compliant: z.boolean(),
  violations: z.array(z.string()),
  referenceUrl: z.string().optional(),
  caseId: z.string().optional(),
  usedFallback: z.boolean()
});

export const optimizationOutcomeSchema = z.object({
  optimizedPayload: jsonObjectSchema,
  confidence: z.number().min(0).max(1),
  rewardScore: z.number().finite(),
  usedFallback: z.boolean()
});
