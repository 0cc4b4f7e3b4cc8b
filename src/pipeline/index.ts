export {
  RequestCoordinator,
  type PipelineStage,
  type CoordinatorSettings,
  type RequestCoordinatorDeps,
  type CoordinateOptions
} from './coordinator.js';
export { aggregateResult, type AggregationInput } from './aggregator.js';
