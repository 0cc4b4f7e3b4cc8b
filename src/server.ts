import pino from 'pino';

import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { InferenceRouter } from './generation/index.js';
import { DependencyHealthTracker, probeAll, type ProbeTarget } from './health/index.js';
import { RequestCoordinator } from './pipeline/index.js';
import {
  COMPLIANCE_DEPENDENCY,
  ComplianceClient,
  FetchTransport,
  OPTIMIZATION_DEPENDENCY,
  OptimizationClient
} from './remote/index.js';

async function main() {
  const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
      target: 'pino-pretty',
      options: { colorize: true }
    }
  });

  const config = loadConfig();
  const { compliance, optimization } = config.dependencies;

  logger.info('Design conductor starting...');

  // Initialize components
  const tracker = new DependencyHealthTracker({
    revalidationWindowMs: config.dependencies.revalidation_window_ms
  });
  const transport = new FetchTransport();
  const clientDeps = { tracker, transport, logger };

  const complianceClient = new ComplianceClient(
    { baseUrl: compliance.base_url, path: compliance.path, timeoutMs: compliance.timeout_ms, apiKey: compliance.api_key },
    clientDeps
  );
  const optimizationClient = new OptimizationClient(
    {
      baseUrl: optimization.base_url,
      path: optimization.path,
      timeoutMs: optimization.timeout_ms,
      apiKey: optimization.api_key
    },
    clientDeps
  );

  const generator = new InferenceRouter(
    config.inference.backends.map(backend => ({
      name: backend.name,
      type: backend.type,
      model: backend.model,
      baseUrl: backend.base_url,
      apiKey: backend.api_key
    })),
    config.inference.default,
    { timeoutMs: config.inference.timeout_ms, maxTokens: config.inference.max_tokens }
  );

  const coordinator = new RequestCoordinator(
    { generator, compliance: complianceClient, optimization: optimizationClient, logger },
    {
      complianceTimeoutMs: compliance.timeout_ms,
      optimizationTimeoutMs: optimization.timeout_ms,
      includeOptimizationFallback: optimization.include_fallback
    }
  );

  const probeTargets: ProbeTarget[] = [
    { name: COMPLIANCE_DEPENDENCY, baseUrl: compliance.base_url, apiKey: compliance.api_key },
    { name: OPTIMIZATION_DEPENDENCY, baseUrl: optimization.base_url, apiKey: optimization.api_key }
  ];

  const app = await buildApp({
    coordinator,
    tracker,
    transport,
    logger,
    probeTargets,
    probeTimeoutMs: config.dependencies.probe_timeout_ms,
    generatorBackends: generator.getAvailableBackends(),
    allowedOrigins: config.cors.allowed_origins
  });

  if (config.dependencies.probe_on_start) {
    probeAll(probeTargets, clientDeps, config.dependencies.probe_timeout_ms)
      .then(statuses => logger.info({ statuses }, 'Initial dependency probe finished'))
      .catch(err => logger.error({ err }, 'Initial dependency probe failed'));
  }

  // Start server
  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`Design conductor listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('Design conductor failed to start:', err);
  process.exit(1);
});
