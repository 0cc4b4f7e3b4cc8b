import { complianceOutcomeSchema, isRecord, optimizationOutcomeSchema } from '../contracts/index.js';
import { formatIssues } from '../contracts/versioned.js';
import { ContractViolation } from '../errors/index.js';
import type {
  AggregatedResponse,
  ComplianceOutcome,
  DesignArtifact,
  OptimizationOutcome,
  StepTiming
} from '../types/index.js';

export interface AggregationInput {
  correlationId: string;
  artifact: DesignArtifact;
  compliance: ComplianceOutcome;
  optimization: OptimizationOutcome | null;
  startTime: number;
  steps: StepTiming[];
}

/**
 * Assembles the final response. No I/O and no defaulting: an outcome that
 * does not match its schema means an upstream component is broken, so it
 * throws instead of papering over it.
 */
export function aggregateResult(input: AggregationInput, now: number = Date.now()): AggregatedResponse {
  if (typeof input.correlationId !== 'string' || input.correlationId.length === 0) {
    throw new ContractViolation('Aggregation input has no correlation id');
  }

  if (!isRecord(input.artifact)) {
    throw new ContractViolation('Design artifact is not an object', {
      details: { correlationId: input.correlationId }
    });
  }

  const compliance = complianceOutcomeSchema.safeParse(input.compliance);
  if (!compliance.success) {
    throw new ContractViolation(`Malformed compliance outcome: ${formatIssues(compliance.error)}`, {
      details: { correlationId: input.correlationId }
    });
  }

  if (input.optimization !== null) {
    const optimization = optimizationOutcomeSchema.safeParse(input.optimization);
    if (!optimization.success) {
      throw new ContractViolation(`Malformed optimization outcome: ${formatIssues(optimization.error)}`, {
        details: { correlationId: input.correlationId }
      });
    }
  }

  return {
    correlationId: input.correlationId,
    designArtifact: input.artifact,
    compliance: input.compliance,
    optimization: input.optimization,
    elapsedMs: Math.max(0, now - input.startTime),
    producedAt: new Date(now).toISOString(),
    steps: input.steps
  };
}
