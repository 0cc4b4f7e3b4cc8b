import type { JsonObject } from './request.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy' | 'unknown';

export interface DependencyHealthRecord {
  name: string;
  status: HealthStatus;
  lastCheckedAt: number;
}

export interface ComplianceOutcome {
  compliant: boolean;
  violations: string[];
  referenceUrl?: string;
  caseId?: string;
  usedFallback: boolean;
}

export interface OptimizationOutcome {
  optimizedPayload: JsonObject;
  confidence: number;
  rewardScore: number;
  usedFallback: boolean;
}

/**
 * What a remote client hands back. Both variants carry a complete outcome;
 * the tag tells the caller whether the dependency actually answered.
 */
export type ServiceResult<T> =
  | { kind: 'live'; outcome: T }
  | { kind: 'fallback'; outcome: T; reason: string };
