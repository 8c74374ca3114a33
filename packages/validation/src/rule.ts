import type { LoanRecord, TapeSchema } from '@tapeval/core';

import type { ValidationConfig } from './validation-config.js';

export const SEVERITIES = ['error', 'warning', 'info'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type RuleVerdict =
  | { readonly status: 'pass' }
  | { readonly status: 'fail'; readonly detail: string; readonly fields?: readonly string[] | undefined }
  | { readonly status: 'not_applicable'; readonly detail?: string | undefined };

export interface RuleContext {
  readonly config: ValidationConfig;
  readonly schema?: TapeSchema | undefined;
}

interface RuleBase {
  readonly id: string;
  readonly version: number;
  readonly severity: Severity;
  readonly description: string;
  /** Every column the rule reads */
  readonly fields: readonly string[];
  /** Columns the rule can run without; the rest must exist on the tape */
  readonly optionalFields?: readonly string[] | undefined;
}

/**
 * Evaluated once per record. `appliesTo` defaults to every record.
 */
export interface RecordRule extends RuleBase {
  readonly kind: 'record';
  appliesTo?(record: LoanRecord, context: RuleContext): boolean;
  evaluate(record: LoanRecord, context: RuleContext): RuleVerdict;
}

/**
 * A verdict from a cross-row rule. No record id means the verdict is about the pool.
 */
export interface DatasetFinding {
  readonly recordId?: string | undefined;
  readonly verdict: RuleVerdict;
}

/**
 * Evaluated once against the full record set. `appliesTo` narrows the
 * records handed to `evaluateAll`.
 */
export interface DatasetRule extends RuleBase {
  readonly kind: 'dataset';
  appliesTo?(record: LoanRecord, context: RuleContext): boolean;
  evaluateAll(records: readonly LoanRecord[], context: RuleContext): readonly DatasetFinding[];
}

export type Rule = RecordRule | DatasetRule;

const PASS: RuleVerdict = Object.freeze({ status: 'pass' });

export function pass(): RuleVerdict {
  return PASS;
}

export function fail(detail: string, fields?: readonly string[]): RuleVerdict {
  const verdict: RuleVerdict = { detail, fields, status: 'fail' };
  return Object.freeze(verdict);
}

export function notApplicable(detail?: string): RuleVerdict {
  const verdict: RuleVerdict = { detail, status: 'not_applicable' };
  return Object.freeze(verdict);
}

type RecordRuleInit = Omit<RecordRule, 'kind' | 'version'> & { version?: number | undefined };
type DatasetRuleInit = Omit<DatasetRule, 'kind' | 'version'> & { version?: number | undefined };

export function defineRecordRule(init: RecordRuleInit): RecordRule {
  const rule: RecordRule = { ...init, kind: 'record', version: init.version ?? 1 };
  return Object.freeze(rule);
}

export function defineDatasetRule(init: DatasetRuleInit): DatasetRule {
  const rule: DatasetRule = { ...init, kind: 'dataset', version: init.version ?? 1 };
  return Object.freeze(rule);
}

/**
 * Columns that must exist on the tape for the rule to run
 */
export function requiredColumns(rule: Rule): string[] {
  const optional = new Set(rule.optionalFields ?? []);
  return rule.fields.filter((field) => !optional.has(field));
}
