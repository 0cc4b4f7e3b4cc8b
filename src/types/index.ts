export type { JsonPrimitive, JsonValue, JsonObject, DesignRequest, DesignArtifact } from './request.js';
export type {
  HealthStatus,
  DependencyHealthRecord,
  ComplianceOutcome,
  OptimizationOutcome,
  ServiceResult
} from './outcome.js';
export type {
  PipelineStep,
  StepStatus,
  StepTiming,
  AggregatedResponse,
  FailureCode,
  FailureResponse,
  CoordinatorResult
} from './response.js';
