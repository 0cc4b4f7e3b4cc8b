import { z } from 'zod';
import type { ComplianceOutcome, DesignArtifact } from '../types/index.js';
import { defineResponseVersion, normalizeVersioned, type ResponseVersion } from './versioned.js';

export interface ComplianceRequestBody {
  artifact: DesignArtifact;
  jurisdiction: string;
  caseId?: string;
}

function liveOutcome(
  compliant: boolean,
  violations: string[],
  referenceUrl: string | null | undefined,
  caseId: string | null | undefined
): ComplianceOutcome {
  const outcome: ComplianceOutcome = { compliant, violations, usedFallback: false };
  if (typeof referenceUrl === 'string') outcome.referenceUrl = referenceUrl;
  if (typeof caseId === 'string') outcome.caseId = caseId;
  return outcome;
}

const complianceV1 = defineResponseVersion({
  version: 'compliance/v1',
  detect: raw => 'compliant' in raw,
  schema: z.object({
    compliant: z.boolean(),
    violations: z.array(z.string()).default([]),
    referenceUrl: z.string().nullish(),
    caseId: z.string().nullish()
  }),
  toOutcome: parsed => liveOutcome(parsed.compliant, parsed.violations, parsed.referenceUrl, parsed.caseId)
});

const RULE_ENGINE_DEFAULT_CONFIDENCE = 0.75;
const RULE_ENGINE_MIN_CONFIDENCE = 0.5;

function flagsViolation(notes: string): boolean {
  const lowered = notes.toLowerCase();
  return lowered.includes('violation') || lowered.includes('non-compliant');
}

// The rule engine reports per-clause notes instead of a verdict; the verdict is derived here.
const complianceRuleEngine = defineResponseVersion({
  version: 'compliance/rules',
  detect: raw => 'clause_summaries' in raw || 'rules_applied' in raw,
  schema: z.object({
    case_id: z.string().nullish(),
    rules_applied: z.array(z.string()).default([]),
    clause_summaries: z
      .array(
        z.object({
          clause_id: z.string().nullish(),
          quick_summary: z.string().nullish(),
          notes: z.string().nullish()
        })
      )
      .default([]),
    confidence_score: z.number().min(0).max(1).default(RULE_ENGINE_DEFAULT_CONFIDENCE),
    geometry_url: z.string().nullish()
  }),
  toOutcome: parsed => {
    const violations = parsed.clause_summaries
      .filter(clause => flagsViolation(clause.notes ?? ''))
      .map(clause => `${clause.clause_id ?? 'UNKNOWN'}: ${clause.quick_summary ?? 'Compliance violation detected'}`);

    return liveOutcome(
      violations.length === 0 && parsed.confidence_score > RULE_ENGINE_MIN_CONFIDENCE,
      violations,
      parsed.geometry_url,
      parsed.case_id
    );
  }
});

// Older deployments answer in snake_case and may send structured violations.
const complianceLegacy = defineResponseVersion({
  version: 'compliance/legacy',
  detect: raw => 'case_id' in raw || 'geometry_url' in raw,
  schema: z.object({
    compliant: z.boolean(),
    violations: z
      .array(
        z.union([
          z.string(),
          z.object({ rule_id: z.string().optional(), description: z.string() })
        ])
      )
      .default([]),
    geometry_url: z.string().nullish(),
    case_id: z.string().nullish()
  }),
  toOutcome: parsed =>
    liveOutcome(
      parsed.compliant,
      parsed.violations.map(violation =>
        typeof violation === 'string'
          ? violation
          : violation.rule_id
            ? `${violation.rule_id}: ${violation.description}`
            : violation.description
      ),
      parsed.geometry_url,
      parsed.case_id
    )
});

export const COMPLIANCE_RESPONSE_VERSIONS: ReadonlyArray<ResponseVersion<ComplianceOutcome>> = [
  complianceRuleEngine,
  complianceLegacy,
  complianceV1
];

export function normalizeComplianceResponse(raw: unknown): ComplianceOutcome {
  return normalizeVersioned('compliance', COMPLIANCE_RESPONSE_VERSIONS, raw);
}
