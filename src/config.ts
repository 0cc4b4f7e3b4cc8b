import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { formatIssues } from './contracts/versioned.js';
import { ConfigError, describeError } from './errors/index.js';
import { MAX_TIMEOUT_MS } from './remote/transport.js';

const timeoutSchema = z.number().int().positive().max(MAX_TIMEOUT_MS);

const backendSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['anthropic', 'ollama']),
  model: z.string().min(1),
  base_url: z.string().url().optional(),
  api_key: z.string().optional()
});

const dependencySchema = (defaults: { baseUrl: string; path: string; timeoutMs: number }) =>
  z.object({
    base_url: z.string().url().default(defaults.baseUrl),
    path: z.string().default(defaults.path),
    timeout_ms: timeoutSchema.default(defaults.timeoutMs),
    api_key: z.string().optional()
  });

const configSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(8090),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  cors: z
    .object({
      allowed_origins: z.array(z.string()).default(['http://localhost:3000'])
    })
    .default({}),
  inference: z
    .object({
      backends: z.array(backendSchema).min(1).default([
        { name: 'claude', type: 'anthropic', model: 'claude-3-5-sonnet-20240620' },
        { name: 'local', type: 'ollama', model: 'mistral' }
      ]),
      default: z.string().default('claude'),
      timeout_ms: timeoutSchema.default(120_000),
      max_tokens: z.number().int().positive().default(2048)
    })
    .default({}),
  dependencies: z
    .object({
      revalidation_window_ms: z.number().int().nonnegative().default(300_000),
      probe_timeout_ms: timeoutSchema.default(5_000),
      probe_on_start: z.boolean().default(true),
      compliance: dependencySchema({
        baseUrl: 'http://localhost:8001',
        path: '/compliance/run_case',
        timeoutMs: 60_000
      }).default({}),
      optimization: dependencySchema({
        baseUrl: 'http://localhost:8002',
        path: '/rl/optimize',
        timeoutMs: 180_000
      })
        .extend({ include_fallback: z.boolean().default(false) })
        .default({})
    })
    .default({})
});

export type ConductorConfig = z.output<typeof configSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  home?: string;
  env?: NodeJS.ProcessEnv;
}

export function configSearchPaths(cwd: string, home: string): string[] {
  return [
    resolve(cwd, 'conductor.yaml'),
    resolve(home, '.conductor', 'config.yaml'),
    resolve(home, '.config', 'conductor', 'config.yaml')
  ];
}

export function parseConfig(raw: unknown, source = 'configuration'): ConductorConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }

  const config = result.data;
  if (!config.inference.backends.some(backend => backend.name === config.inference.default)) {
    throw new ConfigError(`Invalid ${source}: inference.default "${config.inference.default}" is not a configured backend`);
  }
  return config;
}

function applyEnv(config: ConductorConfig, env: NodeJS.ProcessEnv): ConductorConfig {
  const { compliance, optimization } = config.dependencies;
  const port = env.PORT ? Number(env.PORT) : undefined;

  return {
    ...config,
    server: {
      port: port !== undefined && Number.isInteger(port) ? port : config.server.port,
      host: env.HOST || config.server.host
    },
    dependencies: {
      ...config.dependencies,
      compliance: {
        ...compliance,
        base_url: env.CONDUCTOR_COMPLIANCE_URL || compliance.base_url,
        api_key: env.CONDUCTOR_COMPLIANCE_API_KEY || compliance.api_key
      },
      optimization: {
        ...optimization,
        base_url: env.CONDUCTOR_OPTIMIZATION_URL || optimization.base_url,
        api_key: env.CONDUCTOR_OPTIMIZATION_API_KEY || optimization.api_key
      }
    }
  };
}

export function loadConfig(options: LoadConfigOptions = {}): ConductorConfig {
  const env = options.env ?? process.env;
  const paths = configSearchPaths(options.cwd ?? process.cwd(), options.home ?? homedir());

  for (const path of paths) {
    if (existsSync(path)) {
      let raw: unknown;
      try {
        raw = parseYaml(readFileSync(path, 'utf-8'));
      } catch (error) {
        throw new ConfigError(`Could not read ${path}: ${describeError(error)}`, { cause: error });
      }
      return applyEnv(parseConfig(raw, path), env);
    }
  }

  // Default configuration
  return applyEnv(parseConfig({}), env);
}
