import { RuleEvaluationFault, type LoanRecord, type TapeSchema } from '@tapeval/core';
import { getLogger, type Logger } from '@tapeval/logger';

import { requiredColumns, type DatasetRule, type RecordRule, type Rule, type RuleContext, type RuleVerdict } from './rule.js';
import { RuleRegistry } from './rule-registry.js';
import { createValidationConfig, type ValidationConfig } from './validation-config.js';
import {
  ValidationResultSet,
  type FaultedRule,
  type RuleOutcome,
  type SkippedRule,
} from './validation-result-set.js';

export interface ValidateOptions {
  /** When given, rules reading columns the tape lacks are skipped */
  schema?: TapeSchema | undefined;
  config?: ValidationConfig | undefined;
  logger?: Logger | undefined;
}

/**
 * Evaluate every rule against every record.
 *
 * Rules run in registration order; per-record rules visit records in input
 * order. A rule that throws yields failing outcomes flagged as faulted and the
 * run carries on. Same records and registry give the same result set.
 *
 * @throws DuplicateRuleError when given a rule array with repeated ids
 */
export function validate(
  records: readonly LoanRecord[],
  rules: RuleRegistry | readonly Rule[],
  options: ValidateOptions = {}
): ValidationResultSet {
  const logger = options.logger ?? getLogger('validation-engine');
  const registry = rules instanceof RuleRegistry ? rules : new RuleRegistry(rules);
  const context: RuleContext = {
    config: options.config ?? createValidationConfig(),
    schema: options.schema,
  };

  const outcomes: RuleOutcome[] = [];
  const executedRules: Rule[] = [];
  const skippedRules: SkippedRule[] = [];
  const faults = new Map<string, { message: string; occurrences: number }>();
  const recordFault = (ruleId: string, fault: RuleEvaluationFault): void => {
    const existing = faults.get(ruleId);
    if (existing) {
      existing.occurrences += 1;
    } else {
      faults.set(ruleId, { message: fault.message, occurrences: 1 });
    }
  };

  logger.info({ recordCount: records.length, ruleCount: registry.size }, 'Starting validation run');

  for (const rule of registry.allRules()) {
    const missingFields = options.schema ? missingColumns(rule, options.schema) : [];
    if (missingFields.length > 0) {
      logger.debug({ missingFields, ruleId: rule.id }, 'Skipping rule: columns not on tape');
      skippedRules.push({
        description: rule.description,
        missingFields,
        reason: 'missing_columns',
        ruleId: rule.id,
        severity: rule.severity,
      });
      continue;
    }

    executedRules.push(rule);
    const before = outcomes.length;
    if (rule.kind === 'record') {
      evaluateRecordRule(rule, records, context, outcomes, recordFault);
    } else {
      evaluateDatasetRule(rule, records, context, outcomes, recordFault);
    }

    const produced = outcomes.slice(before);
    const failed = produced.filter((outcome) => outcome.status === 'fail' && !outcome.faulted).length;
    if (failed > 0) {
      logger.debug({ failed, outcomes: produced.length, ruleId: rule.id }, 'Rule reported failures');
    }
  }

  const faultedRules: FaultedRule[] = [...faults].map(([ruleId, fault]) => ({ ruleId, ...fault }));
  if (faultedRules.length > 0) {
    logger.error(
      { faultedRules: faultedRules.map((fault) => fault.ruleId) },
      `${faultedRules.length} rule(s) raised errors during evaluation`
    );
  }

  const result = new ValidationResultSet({
    executedRules,
    faultedRules,
    outcomes,
    recordCount: records.length,
    skippedRules,
  });

  logger.info(
    {
      errors: result.countsBySeverity.error,
      executed: executedRules.length,
      info: result.countsBySeverity.info,
      outcomes: result.outcomes.length,
      skipped: skippedRules.length,
      warnings: result.countsBySeverity.warning,
    },
    'Validation run complete'
  );

  return result;
}

function missingColumns(rule: Rule, schema: TapeSchema): string[] {
  return requiredColumns(rule).filter((field) => !schema.has(field));
}

function toOutcome(rule: Rule, recordId: string | undefined, verdict: RuleVerdict): RuleOutcome {
  switch (verdict.status) {
    case 'pass':
      return {
        detail: '',
        faulted: false,
        fields: rule.fields,
        recordId,
        ruleId: rule.id,
        severity: rule.severity,
        status: 'pass',
      };
    case 'fail':
      return {
        detail: verdict.detail,
        faulted: false,
        fields: verdict.fields ?? rule.fields,
        recordId,
        ruleId: rule.id,
        severity: rule.severity,
        status: 'fail',
      };
    case 'not_applicable':
      return {
        detail: verdict.detail ?? '',
        faulted: false,
        fields: rule.fields,
        recordId,
        ruleId: rule.id,
        severity: rule.severity,
        status: 'not_applicable',
      };
  }
}

function faultOutcome(rule: Rule, recordId: string | undefined, fault: RuleEvaluationFault): RuleOutcome {
  return {
    detail: fault.message,
    faulted: true,
    fields: rule.fields,
    recordId,
    ruleId: rule.id,
    severity: rule.severity,
    status: 'fail',
  };
}

function evaluateRecordRule(
  rule: RecordRule,
  records: readonly LoanRecord[],
  context: RuleContext,
  outcomes: RuleOutcome[],
  onFault: (ruleId: string, fault: RuleEvaluationFault) => void
): void {
  for (const record of records) {
    try {
      if (rule.appliesTo && !rule.appliesTo(record, context)) {
        continue;
      }
      outcomes.push(toOutcome(rule, record.id, rule.evaluate(record, context)));
    } catch (error) {
      const fault = new RuleEvaluationFault(rule.id, error);
      onFault(rule.id, fault);
      outcomes.push(faultOutcome(rule, record.id, fault));
    }
  }
}

function evaluateDatasetRule(
  rule: DatasetRule,
  records: readonly LoanRecord[],
  context: RuleContext,
  outcomes: RuleOutcome[],
  onFault: (ruleId: string, fault: RuleEvaluationFault) => void
): void {
  try {
    const applicable = rule.appliesTo ? records.filter((record) => rule.appliesTo?.(record, context) ?? true) : records;
    const knownIds = new Set(applicable.map((record) => record.id));
    const seen = new Set<string>();
    const produced: RuleOutcome[] = [];

    for (const finding of rule.evaluateAll(applicable, context)) {
      if (finding.recordId !== undefined) {
        if (!knownIds.has(finding.recordId)) {
          throw new Error(`finding references unknown record "${finding.recordId}"`);
        }
        if (seen.has(finding.recordId)) {
          throw new Error(`more than one finding for record "${finding.recordId}"`);
        }
        seen.add(finding.recordId);
      }
      produced.push(toOutcome(rule, finding.recordId, finding.verdict));
    }

    outcomes.push(...produced);
  } catch (error) {
    const fault = new RuleEvaluationFault(rule.id, error);
    onFault(rule.id, fault);
    outcomes.push(faultOutcome(rule, undefined, fault));
  }
}
