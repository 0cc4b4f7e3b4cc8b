import type { z } from 'zod';
import { ContractViolation } from '../errors/index.js';
import { isRecord } from './json.js';

type VersionParse<T> = { ok: true; outcome: T } | { ok: false; issues: string };

/**
 * One known wire shape of a dependency's response. `detect` picks the
 * version by the keys present; the schema then has to match in full.
 */
export interface ResponseVersion<T> {
  version: string;
  detect: (raw: Record<string, unknown>) => boolean;
  parse: (raw: Record<string, unknown>) => VersionParse<T>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export function defineResponseVersion<S extends z.ZodTypeAny, T>(definition: {
  version: string;
  detect: (raw: Record<string, unknown>) => boolean;
  schema: S;
  toOutcome: (parsed: z.output<S>) => T;
}): ResponseVersion<T> {
  return {
    version: definition.version,
    detect: definition.detect,
    parse: raw => {
      const result = definition.schema.safeParse(raw);
      if (!result.success) {
        return { ok: false, issues: formatIssues(result.error) };
      }
      return { ok: true, outcome: definition.toOutcome(result.data) };
    }
  };
}

export function normalizeVersioned<T>(
  dependency: string,
  versions: ReadonlyArray<ResponseVersion<T>>,
  raw: unknown
): T {
  if (!isRecord(raw)) {
    throw new ContractViolation(`${dependency} response is not a JSON object`, {
      details: { dependency, received: Array.isArray(raw) ? 'array' : raw === null ? 'null' : typeof raw }
    });
  }

  const version = versions.find(candidate => candidate.detect(raw));
  if (!version) {
    throw new ContractViolation(`${dependency} response matches no known schema version`, {
      details: { dependency, keys: Object.keys(raw).sort() }
    });
  }

  const parsed = version.parse(raw);
  if (!parsed.ok) {
    throw new ContractViolation(
      `${dependency} response does not satisfy schema ${version.version}: ${parsed.issues}`,
      { details: { dependency, version: version.version } }
    );
  }

  return parsed.outcome;
}
