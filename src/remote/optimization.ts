import { normalizeOptimizationResponse, type OptimizationRequestBody } from '../contracts/index.js';
import type { OptimizationOutcome, ServiceResult } from '../types/index.js';
import { RemoteServiceClient, type CallOptions, type RemoteServiceConfig, type RemoteServiceDeps } from './client.js';
import { optimizationFallback } from './fallback.js';

export const OPTIMIZATION_DEPENDENCY = 'optimization';

export class OptimizationClient extends RemoteServiceClient<OptimizationRequestBody, OptimizationOutcome> {
  constructor(config: Omit<RemoteServiceConfig, 'name'>, deps: RemoteServiceDeps) {
    super({ ...config, name: OPTIMIZATION_DEPENDENCY }, deps, {
      normalize: normalizeOptimizationResponse,
      fallback: optimizationFallback
    });
  }

  optimize(input: OptimizationRequestBody, options?: CallOptions): Promise<ServiceResult<OptimizationOutcome>> {
    return this.call(input, options);
  }
}
