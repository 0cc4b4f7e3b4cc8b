import { normalizeComplianceResponse, type ComplianceRequestBody } from '../contracts/index.js';
import type { ComplianceOutcome, DesignArtifact, ServiceResult } from '../types/index.js';
import { RemoteServiceClient, type CallOptions, type RemoteServiceConfig, type RemoteServiceDeps } from './client.js';
import { complianceFallback } from './fallback.js';

export const COMPLIANCE_DEPENDENCY = 'compliance';

export interface ComplianceCheckInput {
  artifact: DesignArtifact;
  jurisdiction: string;
  caseId?: string;
}

export class ComplianceClient extends RemoteServiceClient<ComplianceRequestBody, ComplianceOutcome> {
  constructor(config: Omit<RemoteServiceConfig, 'name'>, deps: RemoteServiceDeps) {
    super({ ...config, name: COMPLIANCE_DEPENDENCY }, deps, {
      normalize: normalizeComplianceResponse,
      fallback: complianceFallback
    });
  }

  check(input: ComplianceCheckInput, options?: CallOptions): Promise<ServiceResult<ComplianceOutcome>> {
    const body: ComplianceRequestBody = { artifact: input.artifact, jurisdiction: input.jurisdiction };
    if (input.caseId !== undefined) body.caseId = input.caseId;
    return this.call(body, options);
  }
}
