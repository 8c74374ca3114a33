import { DuplicateRuleError, LoanRecord, TapeSchema } from '@tapeval/core';
import { getLogger } from '@tapeval/logger';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { defineDatasetRule, defineRecordRule, fail, notApplicable, pass, type Rule } from '../rule.js';
import { RuleRegistry } from '../rule-registry.js';
import { validate } from '../validation-engine.js';

function recordsWithAmounts(amounts: (number | undefined)[]): LoanRecord[] {
  return amounts.map((amount, index) =>
    LoanRecord.fromValues(`row-${index + 2}`, { loan_number: `LN-${index}`, original_loan_amount: amount })
  );
}

const amountPositive = defineRecordRule({
  description: 'Original loan amount is positive',
  evaluate: (record) => {
    const amount = record.decimal('original_loan_amount');
    if (amount === undefined) return notApplicable('no amount');
    return amount.greaterThan(0) ? pass() : fail(`original_loan_amount ${amount.toString()} is not positive`);
  },
  fields: ['original_loan_amount'],
  id: 'amount_positive',
  severity: 'error',
});

const largeLoanWarning = defineRecordRule({
  appliesTo: (record) => !record.isMissing('original_loan_amount'),
  description: 'Loan amount above 1,000',
  evaluate: (record) => (record.decimal('original_loan_amount')?.greaterThan(1000) ? fail('large loan') : pass()),
  fields: ['original_loan_amount'],
  id: 'large_loan',
  severity: 'warning',
});

const poolRule = defineDatasetRule({
  description: 'Pool has records',
  evaluateAll: (records) => [{ verdict: records.length > 0 ? pass() : fail('empty pool') }],
  fields: ['loan_number'],
  id: 'pool_not_empty',
  severity: 'info',
});

describe('validate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should produce one outcome per applicable record and rule', () => {
    const records = recordsWithAmounts([500, 2000, undefined]);
    const result = validate(records, [amountPositive, largeLoanWarning, poolRule]);

    // 3 + 2 (large_loan skips the missing amount) + 1 pool outcome
    expect(result.outcomes).toHaveLength(6);
    expect(result.recordCount).toBe(3);
    expect(result.executedRuleCount).toBe(3);
  });

  it('should order outcomes by rule then record', () => {
    const records = recordsWithAmounts([500, 2000]);
    const result = validate(records, [largeLoanWarning, amountPositive]);

    expect(result.outcomes.map((outcome) => `${outcome.ruleId}:${outcome.recordId ?? 'pool'}`)).toEqual([
      'large_loan:row-2',
      'large_loan:row-3',
      'amount_positive:row-2',
      'amount_positive:row-3',
    ]);
  });

  it('should report verdict details and fields', () => {
    const records = recordsWithAmounts([-5, undefined]);
    const result = validate(records, [amountPositive]);

    expect(result.outcomes).toEqual([
      {
        detail: 'original_loan_amount -5 is not positive',
        faulted: false,
        fields: ['original_loan_amount'],
        recordId: 'row-2',
        ruleId: 'amount_positive',
        severity: 'error',
        status: 'fail',
      },
      {
        detail: 'no amount',
        faulted: false,
        fields: ['original_loan_amount'],
        recordId: 'row-3',
        ruleId: 'amount_positive',
        severity: 'error',
        status: 'not_applicable',
      },
    ]);
  });

  it('should count failures by severity', () => {
    const records = recordsWithAmounts([-5, 2000, 3000]);
    const result = validate(records, [amountPositive, largeLoanWarning]);

    expect(result.countsBySeverity).toEqual({ error: 1, info: 0, warning: 2 });
    expect(result.hasFailures('error')).toBe(true);
    expect(result.hasFailures('info')).toBe(false);
  });

  it('should isolate a rule that throws', () => {
    const logger = getLogger('validation-engine-test');
    const errorSpy = vi.spyOn(logger, 'error');
    const exploding = defineRecordRule({
      description: 'Throws on every record',
      evaluate: () => {
        throw new Error('boom');
      },
      fields: ['loan_number'],
      id: 'exploding',
      severity: 'warning',
    });

    const records = recordsWithAmounts([500, 600]);
    const result = validate(records, [exploding, amountPositive], { logger });

    const faulted = result.outcomesFor('row-2').find((outcome) => outcome.ruleId === 'exploding');
    expect(faulted).toEqual({
      detail: 'Rule evaluation fault: boom',
      faulted: true,
      fields: ['loan_number'],
      recordId: 'row-2',
      ruleId: 'exploding',
      severity: 'warning',
      status: 'fail',
    });
    expect(result.faultedRules).toEqual([
      { message: 'Rule evaluation fault: boom', occurrences: 2, ruleId: 'exploding' },
    ]);
    // The other rule still ran on every record
    expect(result.countsByRule.get('amount_positive')).toEqual({
      evaluated: 2,
      failed: 0,
      notApplicable: 0,
      passed: 2,
    });
    expect(errorSpy).toHaveBeenCalledWith(
      { faultedRules: ['exploding'] },
      '1 rule(s) raised errors during evaluation'
    );
  });

  it('should treat a throwing appliesTo as a fault', () => {
    const rule = defineRecordRule({
      appliesTo: () => {
        throw new Error('bad predicate');
      },
      description: 'Broken predicate',
      evaluate: () => pass(),
      fields: ['loan_number'],
      id: 'broken_predicate',
      severity: 'error',
    });

    const result = validate(recordsWithAmounts([1]), [rule]);

    expect(result.outcomes[0]?.detail).toBe('Rule evaluation fault: bad predicate');
    expect(result.outcomes[0]?.faulted).toBe(true);
  });

  it('should be deterministic', () => {
    const registry = new RuleRegistry([amountPositive, largeLoanWarning, poolRule]);
    const records = recordsWithAmounts([-1, 500, 5000, undefined]);

    const first = validate(records, registry);
    const second = validate(records, registry);

    expect(JSON.stringify(second.toJSON())).toBe(JSON.stringify(first.toJSON()));
  });

  it('should reject a rule array with duplicate ids', () => {
    expect(() => validate([], [amountPositive, amountPositive])).toThrow(DuplicateRuleError);
  });

  it('should handle an empty tape', () => {
    const result = validate([], [amountPositive, poolRule]);

    expect(result.recordCount).toBe(0);
    expect(result.outcomes).toEqual([
      {
        detail: 'empty pool',
        faulted: false,
        fields: ['loan_number'],
        recordId: undefined,
        ruleId: 'pool_not_empty',
        severity: 'info',
        status: 'fail',
      },
    ]);
    expect(result.countsByRule.get('amount_positive')).toEqual({
      evaluated: 0,
      failed: 0,
      notApplicable: 0,
      passed: 0,
    });
  });

  describe('with a schema', () => {
    const schema = new TapeSchema([
      { name: 'loan_number', type: 'string' },
      { name: 'original_loan_amount', type: 'decimal' },
    ]);

    it('should skip rules whose columns are not on the tape', () => {
      const needsState = defineRecordRule({
        description: 'State is present',
        evaluate: () => pass(),
        fields: ['state', 'loan_number'],
        id: 'state_present',
        severity: 'error',
      });

      const result = validate(recordsWithAmounts([1]), [needsState, amountPositive], { schema });

      expect(result.skippedRules).toEqual([
        {
          description: 'State is present',
          missingFields: ['state'],
          reason: 'missing_columns',
          ruleId: 'state_present',
          severity: 'error',
        },
      ]);
      expect(result.outcomes.every((outcome) => outcome.ruleId === 'amount_positive')).toBe(true);
      expect(result.countsByRule.has('state_present')).toBe(false);
    });

    it('should run rules whose missing columns are optional', () => {
      const optionalState = defineRecordRule({
        description: 'State when present',
        evaluate: (record) => (record.isMissing('state') ? notApplicable() : pass()),
        fields: ['loan_number', 'state'],
        id: 'optional_state',
        optionalFields: ['state'],
        severity: 'info',
      });

      const result = validate(recordsWithAmounts([1]), [optionalState], { schema });

      expect(result.skippedRules).toEqual([]);
      expect(result.outcomes[0]?.status).toBe('not_applicable');
    });
  });

  describe('dataset rules', () => {
    it('should hand only applicable records to evaluateAll', () => {
      const seen: string[] = [];
      const rule = defineDatasetRule({
        appliesTo: (record) => !record.isMissing('original_loan_amount'),
        description: 'Collects ids',
        evaluateAll: (records) => {
          seen.push(...records.map((record) => record.id));
          return records.map((record) => ({ recordId: record.id, verdict: pass() }));
        },
        fields: ['original_loan_amount'],
        id: 'collects_ids',
        severity: 'info',
      });

      validate(recordsWithAmounts([1, undefined, 3]), [rule]);

      expect(seen).toEqual(['row-2', 'row-4']);
    });

    it('should record pool outcomes without a record id', () => {
      const result = validate(recordsWithAmounts([1]), [poolRule]);

      expect(result.poolOutcomes()).toHaveLength(1);
      expect(result.poolOutcomes()[0]?.status).toBe('pass');
    });

    it('should fault a rule that names an unknown record', () => {
      const rule = defineDatasetRule({
        description: 'Invents a record',
        evaluateAll: () => [{ recordId: 'row-99', verdict: fail('nope') }],
        fields: ['loan_number'],
        id: 'invents_record',
        severity: 'error',
      });

      const result = validate(recordsWithAmounts([1]), [rule]);

      expect(result.outcomes).toEqual([
        {
          detail: 'Rule evaluation fault: finding references unknown record "row-99"',
          faulted: true,
          fields: ['loan_number'],
          recordId: undefined,
          ruleId: 'invents_record',
          severity: 'error',
          status: 'fail',
        },
      ]);
      expect(result.faultedRules).toHaveLength(1);
    });

    it('should fault a rule that reports a record twice', () => {
      const rule = defineDatasetRule({
        description: 'Reports twice',
        evaluateAll: () => [
          { recordId: 'row-2', verdict: pass() },
          { recordId: 'row-2', verdict: pass() },
        ],
        fields: ['loan_number'],
        id: 'reports_twice',
        severity: 'error',
      });

      const result = validate(recordsWithAmounts([1]), [rule]);

      expect(result.outcomes).toHaveLength(1);
      expect(result.outcomes[0]?.detail).toBe('Rule evaluation fault: more than one finding for record "row-2"');
    });
  });

  it('should accept the rule list as a registry or an array', () => {
    const records = recordsWithAmounts([10]);
    const rules: Rule[] = [amountPositive];

    expect(validate(records, rules).toJSON()).toEqual(validate(records, new RuleRegistry(rules)).toJSON());
  });
});
