import type { DesignArtifact } from './request.js';
import type { ComplianceOutcome, OptimizationOutcome } from './outcome.js';

export type PipelineStep = 'generate' | 'compliance' | 'optimization';

// 'omitted' only applies to the optional optimization step.
export type StepStatus = 'ok' | 'fallback' | 'omitted';

export interface StepTiming {
  step: PipelineStep;
  status: StepStatus;
  elapsedMs: number;
}

export interface AggregatedResponse {
  correlationId: string;
  designArtifact: DesignArtifact;
  compliance: ComplianceOutcome;
  optimization: OptimizationOutcome | null;
  elapsedMs: number;
  producedAt: string;
  steps: StepTiming[];
}

export type FailureCode = 'GenerationFailure' | 'ContractViolation' | 'RequestCancelled';

export interface FailureResponse {
  correlationId: string;
  code: FailureCode;
  message: string;
  elapsedMs: number;
  producedAt: string;
}

export type CoordinatorResult =
  | { status: 'completed'; response: AggregatedResponse }
  | { status: 'failed'; failure: FailureResponse };
