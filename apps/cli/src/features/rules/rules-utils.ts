import { getRequiredFieldNames } from '@tapeval/ingestion';
import { createDefaultRegistry, type Rule, type Severity } from '@tapeval/validation';
import type { Result } from 'neverthrow';

export interface RuleListing {
  id: string;
  kind: Rule['kind'];
  severity: Severity;
  description: string;
  fields: string[];
}

export function toRuleListing(rule: Rule): RuleListing {
  return {
    description: rule.description,
    fields: [...rule.fields],
    id: rule.id,
    kind: rule.kind,
    severity: rule.severity,
  };
}

/**
 * Rules a run would evaluate against a tape carrying every catalogue column.
 * Field domain rules depend on the tape's columns and are not listed.
 */
export function listDefaultRules(): Result<RuleListing[], Error> {
  return getRequiredFieldNames().map((requiredFields) =>
    createDefaultRegistry(undefined, { requiredFields }).allRules().map(toRuleListing)
  );
}

/**
 * Fixed-width table: id, severity, description
 */
export function formatRuleTable(rules: readonly RuleListing[]): string[] {
  const idWidth = Math.max(4, ...rules.map((rule) => rule.id.length));
  const severityWidth = Math.max(8, ...rules.map((rule) => rule.severity.length));
  return [
    `${'rule'.padEnd(idWidth)}  ${'severity'.padEnd(severityWidth)}  description`,
    ...rules.map((rule) => `${rule.id.padEnd(idWidth)}  ${rule.severity.padEnd(severityWidth)}  ${rule.description}`),
  ];
}
