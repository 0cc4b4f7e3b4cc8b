export { FetchTransport, MAX_TIMEOUT_MS, type Transport, type TransportResult, type ReachResult, type TransportRequestOptions } from './transport.js';
export {
  RemoteServiceClient,
  joinUrl,
  SKIPPED_UNHEALTHY_REASON,
  type RemoteServiceConfig,
  type RemoteServiceDeps,
  type CallOptions
} from './client.js';
export {
  complianceFallback,
  optimizationFallback,
  fallbackCaseId,
  jurisdictionSlug,
  COMPLIANCE_UNAVAILABLE_PREFIX,
  type FallbackSynthesizer
} from './fallback.js';
export { ComplianceClient, COMPLIANCE_DEPENDENCY, type ComplianceCheckInput } from './compliance.js';
export { OptimizationClient, OPTIMIZATION_DEPENDENCY } from './optimization.js';
