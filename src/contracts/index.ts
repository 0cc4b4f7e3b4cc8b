export { jsonValueSchema, jsonObjectSchema, isRecord } from './json.js';
export { defineResponseVersion, normalizeVersioned, formatIssues, type ResponseVersion } from './versioned.js';
export {
  normalizeComplianceResponse,
  COMPLIANCE_RESPONSE_VERSIONS,
  type ComplianceRequestBody
} from './compliance.js';
export {
  normalizeOptimizationResponse,
  OPTIMIZATION_RESPONSE_VERSIONS,
  type OptimizationRequestBody
} from './optimization.js';
export { complianceOutcomeSchema, optimizationOutcomeSchema } from './outcomes.js';
