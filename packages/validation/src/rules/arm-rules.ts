import { defineRecordRule, fail, notApplicable, pass, type RecordRule } from '../rule.js';

import {
  describeValue,
  failUnusable,
  fmt,
  isAdjustableRate,
  isFixedRate,
  isPopulated,
  notApplicableWhenBlank,
} from './rule-utils.js';

/**
 * Columns that only carry meaning on an adjustable-rate loan
 */
export const ARM_FIELDS: readonly string[] = [
  'arm_look_back_days',
  'gross_margin',
  'arm_round_flag',
  'arm_round_factor',
  'index_type',
  'initial_fixed_rate_period',
  'initial_interest_rate_cap_change_up',
  'initial_interest_rate_cap_change_down',
  'subsequent_interest_rate_reset_period',
  'subsequent_interest_rate_cap_change_down',
  'subsequent_interest_rate_cap_change_up',
  'lifetime_maximum_rate_ceiling',
  'lifetime_minimum_rate_floor',
  'negative_amortization_limit',
  'initial_negative_amortization_recast_period',
  'subsequent_negative_amortization_recast_period',
  'initial_fixed_payment_period',
  'subsequent_payment_reset_period',
  'initial_periodic_payment_cap',
  'subsequent_periodic_payment_cap',
  'initial_minimum_payment_reset_period',
  'subsequent_minimum_payment_reset_period',
  'option_arm_indicator',
];

const RESET_PERIOD_FIELDS: readonly string[] = [
  'subsequent_interest_rate_reset_period',
  'initial_fixed_payment_period',
  'subsequent_payment_reset_period',
];

export const armFieldsRequired = defineRecordRule({
  appliesTo: isAdjustableRate,
  description: 'Every ARM field must be populated on an adjustable-rate loan',
  evaluate(record) {
    const blank = ARM_FIELDS.filter((field) => record.isBlank(field));
    if (blank.length > 0) return fail(`ARM fields blank: ${blank.join(', ')}`, blank);
    return pass();
  },
  fields: ['amortization_type', ...ARM_FIELDS],
  id: 'arm_fields_required',
  optionalFields: ARM_FIELDS,
  severity: 'error',
});

export const armFieldsOnFixedRate = defineRecordRule({
  appliesTo: isFixedRate,
  description: 'ARM fields must be blank or zero on a fixed-rate loan',
  evaluate(record) {
    const populated = ARM_FIELDS.filter((field) => isPopulated(record, field));
    if (populated.length > 0) return fail(`ARM fields populated on fixed rate: ${populated.join(', ')}`, populated);
    return pass();
  },
  fields: ['amortization_type', ...ARM_FIELDS],
  id: 'arm_fields_on_fixed_rate',
  optionalFields: ARM_FIELDS,
  severity: 'error',
});

export const grossMarginExceedsCeiling = defineRecordRule({
  appliesTo: isAdjustableRate,
  description: 'Gross margin must not exceed the lifetime maximum rate',
  evaluate(record) {
    const margin = record.decimal('gross_margin');
    const ceiling = record.decimal('lifetime_maximum_rate_ceiling');
    if (margin === undefined) return notApplicableWhenBlank(record, 'gross_margin');
    if (ceiling === undefined) return notApplicableWhenBlank(record, 'lifetime_maximum_rate_ceiling');
    if (margin.greaterThan(ceiling)) {
      return fail(`gross_margin ${fmt(margin)} exceeds lifetime_maximum_rate_ceiling ${fmt(ceiling)}`);
    }
    return pass();
  },
  fields: ['amortization_type', 'gross_margin', 'lifetime_maximum_rate_ceiling'],
  id: 'gross_margin_exceeds_ceiling',
  severity: 'error',
});

export const marginBelowFloor = defineRecordRule({
  description: 'Gross margin below the lifetime minimum rate',
  evaluate(record) {
    const margin = record.decimal('gross_margin');
    const floor = record.decimal('lifetime_minimum_rate_floor');
    if (margin === undefined) return notApplicableWhenBlank(record, 'gross_margin');
    if (floor === undefined) return notApplicableWhenBlank(record, 'lifetime_minimum_rate_floor');
    if (margin.lessThan(floor)) {
      return fail(`gross_margin ${fmt(margin)} is below lifetime_minimum_rate_floor ${fmt(floor)}`);
    }
    return pass();
  },
  fields: ['gross_margin', 'lifetime_minimum_rate_floor'],
  id: 'margin_below_floor',
  severity: 'warning',
});

export const lifetimeFloor = defineRecordRule({
  appliesTo: isAdjustableRate,
  description: 'Lifetime minimum rate must be populated, non-zero and at least the gross margin',
  evaluate(record) {
    const floor = record.decimal('lifetime_minimum_rate_floor');
    if (floor === undefined) return failUnusable(record, 'lifetime_minimum_rate_floor');
    if (floor.isZero()) return fail('lifetime_minimum_rate_floor is zero');
    const margin = record.decimal('gross_margin');
    if (margin !== undefined && margin.greaterThan(floor)) {
      return fail(`gross_margin ${fmt(margin)} exceeds lifetime_minimum_rate_floor ${fmt(floor)}`);
    }
    return pass();
  },
  fields: ['amortization_type', 'gross_margin', 'lifetime_minimum_rate_floor'],
  id: 'lifetime_floor',
  optionalFields: ['gross_margin'],
  severity: 'error',
});

function armIntegerRangeRule(options: {
  id: string;
  field: string;
  min: number;
  max: number;
  description: string;
  blank: 'fail' | 'not_applicable';
}): RecordRule {
  const { field, max, min } = options;
  return defineRecordRule({
    appliesTo: isAdjustableRate,
    description: options.description,
    evaluate(record) {
      if (record.isMissing(field)) {
        return options.blank === 'fail' ? failUnusable(record, field) : notApplicableWhenBlank(record, field);
      }
      const value = record.integer(field);
      if (value === undefined) return fail(`${field} ${describeValue(record, field)} is not a whole number`);
      if (value < min || value > max) return fail(`${field} ${value} is outside ${min}-${max}`);
      return pass();
    },
    fields: ['amortization_type', field],
    id: options.id,
    severity: 'error',
  });
}

export const initialFixedRatePeriodRange = armIntegerRangeRule({
  blank: 'fail',
  description: 'Initial fixed rate period must be 1-240 months on an ARM',
  field: 'initial_fixed_rate_period',
  id: 'initial_fixed_rate_period_range',
  max: 240,
  min: 1,
});

export const armLookBackDaysRange = armIntegerRangeRule({
  blank: 'fail',
  description: 'ARM look-back days must be 0-99 on an ARM',
  field: 'arm_look_back_days',
  id: 'arm_look_back_days_range',
  max: 99,
  min: 0,
});

export const armRoundFlagValue = armIntegerRangeRule({
  blank: 'not_applicable',
  description: 'ARM round flag must be 0 (none), 1 (up), 2 (down) or 3 (nearest)',
  field: 'arm_round_flag',
  id: 'arm_round_flag_value',
  max: 3,
  min: 0,
});

export const resetPeriodRange = defineRecordRule({
  appliesTo: isAdjustableRate,
  description: 'Rate and payment reset periods must be populated and 0-120 months on an ARM',
  evaluate(record, context) {
    const onTape = RESET_PERIOD_FIELDS.filter((field) => context.schema?.has(field) ?? true);
    if (onTape.length === 0) return notApplicable('no reset period columns on tape');

    const problems: string[] = [];
    for (const field of onTape) {
      const value = record.integer(field);
      if (record.isBlank(field)) {
        problems.push(`${field} is blank`);
      } else if (value === undefined || value < 0 || value > 120) {
        problems.push(`${field} ${record.text(field) ?? ''} is outside 0-120`);
      }
    }
    return problems.length > 0 ? fail(problems.join('; ')) : pass();
  },
  fields: ['amortization_type', ...RESET_PERIOD_FIELDS],
  id: 'reset_period_range',
  optionalFields: RESET_PERIOD_FIELDS,
  severity: 'error',
});

export const ARM_RULES: readonly RecordRule[] = [
  armFieldsRequired,
  armFieldsOnFixedRate,
  grossMarginExceedsCeiling,
  marginBelowFloor,
  lifetimeFloor,
  initialFixedRatePeriodRange,
  armLookBackDaysRange,
  armRoundFlagValue,
  resetPeriodRange,
];
