import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Logger } from 'pino';
import { z } from 'zod';

import { jsonObjectSchema } from './contracts/index.js';
import { formatIssues } from './contracts/versioned.js';
import { probeAll, type DependencyHealthTracker, type ProbeTarget } from './health/index.js';
import type { RequestCoordinator } from './pipeline/index.js';
import type { Transport } from './remote/index.js';
import type { DesignRequest, FailureCode } from './types/index.js';

export const SERVICE_VERSION = '1.0.0';

export const CORRELATION_HEADER = 'x-correlation-id';

const FAILURE_STATUS: Record<FailureCode, number> = {
  GenerationFailure: 502,
  ContractViolation: 500,
  RequestCancelled: 499
};

const designBodySchema = z.object({
  requesterId: z.string().min(1),
  prompt: z.string().min(1),
  jurisdiction: z.string().min(1),
  correlationId: z.string().min(1).optional(),
  context: jsonObjectSchema.default({})
});

export interface AppDeps {
  coordinator: RequestCoordinator;
  tracker: DependencyHealthTracker;
  transport: Transport;
  logger: Logger;
  probeTargets: ProbeTarget[];
  probeTimeoutMs: number;
  generatorBackends: string[];
  allowedOrigins: string[];
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const { coordinator, tracker, logger } = deps;
  const dependencyNames = deps.probeTargets.map(target => target.name);

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: deps.allowedOrigins,
    credentials: true
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      logger.error({ err: error, url: request.url }, 'Unhandled error');
      reply.status(statusCode).send({ error: 'InternalError', message: 'Internal server error' });
      return;
    }
    reply.status(statusCode).send({ error: 'InvalidRequest', message: error.message });
  });

  // Health endpoint
  app.get('/api/health', async () => {
    const dependencies = tracker.snapshot(dependencyNames);
    return {
      status: 'healthy',
      version: SERVICE_VERSION,
      backends: deps.generatorBackends,
      overallStatus: dependencies.some(dependency => dependency.status === 'unhealthy') ? 'degraded' : 'operational',
      dependencies
    };
  });

  app.post('/api/dependencies/probe', async () => {
    const statuses = await probeAll(deps.probeTargets, deps, deps.probeTimeoutMs);
    return { statuses, dependencies: tracker.snapshot(dependencyNames) };
  });

  // Main design endpoint
  app.post('/api/design', async (request, reply) => {
    const parsed = designBodySchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error: 'InvalidRequest', message: formatIssues(parsed.error) };
    }

    const headerId = request.headers[CORRELATION_HEADER];
    const designRequest: DesignRequest = {
      requesterId: parsed.data.requesterId,
      prompt: parsed.data.prompt,
      jurisdiction: parsed.data.jurisdiction,
      correlationId: parsed.data.correlationId ?? (typeof headerId === 'string' && headerId ? headerId : undefined),
      context: parsed.data.context
    };

    // A client that hangs up cancels whatever dependency call is in flight
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) controller.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const result = await coordinator.generateDesignWithCompliance(designRequest, { signal: controller.signal });

      if (result.status === 'completed') {
        reply.header(CORRELATION_HEADER, result.response.correlationId);
        return result.response;
      }

      reply.header(CORRELATION_HEADER, result.failure.correlationId);
      reply.status(FAILURE_STATUS[result.failure.code]);
      return result.failure;
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  return app;
}
