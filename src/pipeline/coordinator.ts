import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { isRecord } from '../contracts/index.js';
import {
  ContractViolation,
  GenerationFailure,
  OptimizationFailure,
  RequestCancelled,
  describeError,
  isCancellation
} from '../errors/index.js';
import type { Generator } from '../generation/index.js';
import { systemClock, type Clock } from '../health/index.js';
import type { ComplianceClient, OptimizationClient } from '../remote/index.js';
import type {
  ComplianceOutcome,
  CoordinatorResult,
  DesignArtifact,
  DesignRequest,
  FailureResponse,
  JsonObject,
  JsonValue,
  OptimizationOutcome,
  StepTiming
} from '../types/index.js';
import { aggregateResult } from './aggregator.js';

export type PipelineStage =
  | 'created'
  | 'generating'
  | 'checking_compliance'
  | 'optimizing'
  | 'aggregating'
  | 'completed'
  | 'failed';

export interface CoordinatorSettings {
  complianceTimeoutMs: number;
  optimizationTimeoutMs: number;
  // Keep a synthesized optimization instead of answering with null
  includeOptimizationFallback: boolean;
}

export interface RequestCoordinatorDeps {
  generator: Generator;
  compliance: ComplianceClient;
  optimization: OptimizationClient;
  logger: Logger;
  clock?: Clock;
  mintCorrelationId?: () => string;
}

export interface CoordinateOptions {
  signal?: AbortSignal;
}

interface PipelineRun {
  request: DesignRequest;
  correlationId: string;
  startTime: number;
  stage: PipelineStage;
  steps: StepTiming[];
  logger: Logger;
  signal?: AbortSignal;
}

function jsonObjectOrEmpty(value: JsonValue | undefined): JsonObject {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) return value;
  return {};
}

export class RequestCoordinator {
  private readonly clock: Clock;
  private readonly mintCorrelationId: () => string;

  constructor(
    private readonly deps: RequestCoordinatorDeps,
    private readonly settings: CoordinatorSettings
  ) {
    this.clock = deps.clock ?? systemClock;
    this.mintCorrelationId = deps.mintCorrelationId ?? (() => uuidv4());
  }

  async generateDesignWithCompliance(request: DesignRequest, options: CoordinateOptions = {}): Promise<CoordinatorResult> {
    const correlationId = request.correlationId || this.mintCorrelationId();
    const run: PipelineRun = {
      request,
      correlationId,
      startTime: this.clock(),
      stage: 'created',
      steps: [],
      logger: this.deps.logger.child({ correlation_id: correlationId, requester_id: request.requesterId }),
      signal: options.signal
    };

    try {
      this.advance(run, 'generating');
      const artifact = await this.generate(run);

      this.advance(run, 'checking_compliance');
      const compliance = await this.checkCompliance(run, artifact);

      this.advance(run, 'optimizing');
      const optimization = await this.optimize(run, artifact, compliance);

      this.advance(run, 'aggregating');
      const response = aggregateResult(
        { correlationId, artifact, compliance, optimization, startTime: run.startTime, steps: run.steps },
        this.clock()
      );

      this.advance(run, 'completed');
      run.logger.info(
        {
          elapsed_ms: response.elapsedMs,
          compliant: compliance.compliant,
          compliance_fallback: compliance.usedFallback,
          optimization: optimization === null ? 'omitted' : optimization.usedFallback ? 'fallback' : 'live'
        },
        'Design request completed'
      );
      return { status: 'completed', response };
    } catch (error) {
      const failedAt = run.stage;
      this.advance(run, 'failed');
      return { status: 'failed', failure: this.toFailure(run, failedAt, error) };
    }
  }

  private advance(run: PipelineRun, stage: PipelineStage): void {
    run.logger.debug({ from: run.stage, to: stage }, 'Pipeline stage');
    run.stage = stage;
  }

  private async generate(run: PipelineRun): Promise<DesignArtifact> {
    const started = this.clock();
    let artifact: DesignArtifact;

    try {
      artifact = await this.deps.generator.generate(run.request.prompt, run.request.context, { signal: run.signal });
    } catch (error) {
      if (run.signal?.aborted) {
        throw new RequestCancelled('Request cancelled during generation', { cause: error });
      }
      throw new GenerationFailure(`Design generation failed: ${describeError(error)}`, { cause: error });
    }

    if (!isRecord(artifact)) {
      throw new GenerationFailure('Generator returned no design object');
    }

    run.steps.push({ step: 'generate', status: 'ok', elapsedMs: this.clock() - started });
    return artifact;
  }

  // Mandatory, but the client never degrades into an error: a down service yields a fallback outcome.
  private async checkCompliance(run: PipelineRun, artifact: DesignArtifact): Promise<ComplianceOutcome> {
    const started = this.clock();
    const caseId = run.request.context.caseId;

    try {
      const result = await this.deps.compliance.check(
        {
          artifact,
          jurisdiction: run.request.jurisdiction,
          caseId: typeof caseId === 'string' && caseId.length > 0 ? caseId : undefined
        },
        { timeoutMs: this.settings.complianceTimeoutMs, signal: run.signal, logger: run.logger }
      );

      if (result.kind === 'fallback') {
        run.logger.warn({ reason: result.reason }, 'Compliance outcome synthesized locally');
      }
      run.steps.push({
        step: 'compliance',
        status: result.kind === 'live' ? 'ok' : 'fallback',
        elapsedMs: this.clock() - started
      });
      return result.outcome;
    } catch (error) {
      if (error instanceof ContractViolation) {
        run.logger.error({ err: error }, 'Compliance step broke its contract');
      }
      throw error;
    }
  }

  /**
   * Optional step. Everything except cancellation is contained here and
   * turned into `null`, even though the client already falls back itself.
   */
  private async optimize(
    run: PipelineRun,
    artifact: DesignArtifact,
    compliance: ComplianceOutcome
  ): Promise<OptimizationOutcome | null> {
    const started = this.clock();
    const omit = (err: OptimizationFailure): null => {
      run.logger.warn({ err }, 'Continuing without optimization');
      run.steps.push({ step: 'optimization', status: 'omitted', elapsedMs: this.clock() - started });
      return null;
    };

    try {
      const result = await this.deps.optimization.optimize(
        {
          artifact,
          jurisdiction: run.request.jurisdiction,
          constraints: jsonObjectOrEmpty(run.request.context.constraints),
          compliance
        },
        { timeoutMs: this.settings.optimizationTimeoutMs, signal: run.signal, logger: run.logger }
      );

      if (result.kind === 'live') {
        run.steps.push({ step: 'optimization', status: 'ok', elapsedMs: this.clock() - started });
        return result.outcome;
      }

      if (this.settings.includeOptimizationFallback) {
        run.steps.push({ step: 'optimization', status: 'fallback', elapsedMs: this.clock() - started });
        return result.outcome;
      }

      return omit(new OptimizationFailure(`Optimization unavailable: ${result.reason}`));
    } catch (error) {
      if (isCancellation(error)) throw error;
      return omit(new OptimizationFailure(`Optimization step failed: ${describeError(error)}`, { cause: error }));
    }
  }

  private toFailure(run: PipelineRun, failedAt: PipelineStage, error: unknown): FailureResponse {
    const failure = (code: FailureResponse['code'], message: string): FailureResponse => {
      const now = this.clock();
      return {
        correlationId: run.correlationId,
        code,
        message,
        elapsedMs: Math.max(0, now - run.startTime),
        producedAt: new Date(now).toISOString()
      };
    };

    if (error instanceof GenerationFailure) {
      run.logger.error({ err: error, stage: failedAt }, 'Design generation failed');
      return failure('GenerationFailure', error.message);
    }

    if (error instanceof ContractViolation) {
      run.logger.error({ err: error, stage: failedAt, details: error.details }, 'Contract violation, failing request');
      return failure('ContractViolation', error.message);
    }

    if (error instanceof RequestCancelled) {
      run.logger.info({ stage: failedAt }, 'Design request cancelled');
      return failure('RequestCancelled', error.message);
    }

    // Anything else is a bug in this service, not a pipeline outcome.
    throw error;
  }
}
