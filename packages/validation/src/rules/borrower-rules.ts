import { sumDecimals, withinTolerance } from '@tapeval/core';
import { Decimal } from 'decimal.js';

import { defineRecordRule, fail, notApplicable, pass, type RecordRule } from '../rule.js';

import { codeRule } from './code-rule.js';
import {
  OCCUPANCY_PRIMARY,
  OCCUPANCY_SECOND_HOME,
  PURPOSE_FIRST_TIME_PURCHASE,
  failUnusable,
  fmt,
  notApplicableWhenBlank,
} from './rule-utils.js';

const DTI_MAX = new Decimal('0.6');
const FICO_MIN = 350;
const FICO_MAX = 950;
const FICO_WATCH_THRESHOLD = 660;

/** FICO score ranges per scoring model code */
const FICO_MODEL_RANGES = new Map<number, readonly [number, number]>([
  [1, [350, 850]],
  [2, [350, 850]],
  [3, [150, 950]],
  [99, [150, 950]],
]);

const INCOME_COMPONENTS = [
  'primary_borrower_wage_income',
  'co_borrower_wage_income',
  'primary_borrower_other_income',
  'co_borrower_other_income',
] as const;

const INCOME_FIELDS = [...INCOME_COMPONENTS, 'all_borrower_wage_income', 'all_borrower_total_income'];

export const originatorDtiRange = defineRecordRule({
  description: 'Originator DTI must be greater than 0 and at most 0.6',
  evaluate(record) {
    const dti = record.decimal('originator_dti');
    if (dti === undefined) return failUnusable(record, 'originator_dti');
    if (dti.lessThanOrEqualTo(0) || dti.greaterThan(DTI_MAX)) {
      return fail(`originator_dti ${fmt(dti)} is outside (0, 0.6]`);
    }
    return pass();
  },
  fields: ['originator_dti'],
  id: 'originator_dti_range',
  severity: 'error',
});

export const dtiConsistency = defineRecordRule({
  description: 'Originator DTI must match monthly debt divided by total income',
  evaluate(record, context) {
    const dti = record.decimal('originator_dti');
    const debt = record.decimal('monthly_debt_all_borrowers');
    const income = record.decimal('all_borrower_total_income');
    if (dti === undefined) return notApplicableWhenBlank(record, 'originator_dti');
    if (debt === undefined) return notApplicableWhenBlank(record, 'monthly_debt_all_borrowers');
    if (income === undefined) return notApplicableWhenBlank(record, 'all_borrower_total_income');
    if (income.isZero()) return notApplicable('all_borrower_total_income is zero');

    const calculated = debt.dividedBy(income).toDecimalPlaces(4);
    if (dti.minus(calculated).abs().greaterThan(context.config.ratioTolerance.dti)) {
      return fail(`originator_dti ${fmt(dti)} differs from monthly debt / total income ${fmt(calculated)}`);
    }
    return pass();
  },
  fields: ['originator_dti', 'monthly_debt_all_borrowers', 'all_borrower_total_income'],
  id: 'dti_consistency',
  severity: 'error',
});

export const monthlyDebtPopulated = defineRecordRule({
  description: 'Monthly debt for all borrowers must be populated and non-zero',
  evaluate(record) {
    const debt = record.decimal('monthly_debt_all_borrowers');
    if (debt === undefined) return failUnusable(record, 'monthly_debt_all_borrowers');
    if (debt.isZero()) return fail('monthly_debt_all_borrowers is zero');
    return pass();
  },
  fields: ['monthly_debt_all_borrowers'],
  id: 'monthly_debt_populated',
  severity: 'error',
});

export const originalFicoRange = defineRecordRule({
  description: `Primary borrower FICO must be between ${FICO_MIN} and ${FICO_MAX}`,
  evaluate(record) {
    const fico = record.decimal('original_primary_borrower_fico');
    if (fico === undefined) return failUnusable(record, 'original_primary_borrower_fico');
    if (fico.isZero() || fico.lessThan(FICO_MIN) || fico.greaterThan(FICO_MAX)) {
      return fail(`original_primary_borrower_fico ${fmt(fico)} is outside ${FICO_MIN}-${FICO_MAX}`);
    }
    return pass();
  },
  fields: ['original_primary_borrower_fico'],
  id: 'original_fico_range',
  severity: 'error',
});

export const ficoAtOrBelow660 = defineRecordRule({
  description: `Primary borrower FICO at or below ${FICO_WATCH_THRESHOLD}`,
  evaluate(record) {
    const fico = record.decimal('original_primary_borrower_fico');
    if (fico === undefined) return notApplicableWhenBlank(record, 'original_primary_borrower_fico');
    if (fico.lessThanOrEqualTo(FICO_WATCH_THRESHOLD)) {
      return fail(`original_primary_borrower_fico ${fmt(fico)} is at or below ${FICO_WATCH_THRESHOLD}`);
    }
    return pass();
  },
  fields: ['original_primary_borrower_fico'],
  id: 'fico_at_or_below_660',
  severity: 'warning',
});

export const ficoRangeByModel = defineRecordRule({
  description: 'Primary borrower FICO must fall in the range of the scoring model used',
  evaluate(record) {
    const model = record.integer('fico_model_used');
    const fico = record.decimal('original_primary_borrower_fico');
    if (fico === undefined) return notApplicableWhenBlank(record, 'original_primary_borrower_fico');
    if (model === undefined) return notApplicableWhenBlank(record, 'fico_model_used');

    const range = FICO_MODEL_RANGES.get(model);
    if (!range) return fail(`fico_model_used ${model} is not a known scoring model`, ['fico_model_used']);
    const [min, max] = range;
    if (fico.lessThan(min) || fico.greaterThan(max)) {
      return fail(`original_primary_borrower_fico ${fmt(fico)} is outside ${min}-${max} for model ${model}`);
    }
    return pass();
  },
  fields: ['fico_model_used', 'original_primary_borrower_fico'],
  id: 'fico_range_by_model',
  severity: 'error',
});

function populatedFlagRule(id: string, field: string, description: string): RecordRule {
  return defineRecordRule({
    description,
    evaluate(record) {
      return record.isMissing(field) ? pass() : fail(`${field} is populated (${record.text(field) ?? 'unparseable'})`);
    },
    fields: [field],
    id,
    severity: 'error',
  });
}

export const monthsBankruptcyPopulated = populatedFlagRule(
  'months_bankruptcy_populated',
  'months_bankruptcy',
  'Months since bankruptcy is populated'
);

export const monthsForeclosurePopulated = populatedFlagRule(
  'months_foreclosure_populated',
  'months_foreclosure',
  'Months since foreclosure is populated'
);

export const totalIncomeMatchesComponents = defineRecordRule({
  description: 'All borrower total income must equal the sum of wage and other incomes',
  evaluate(record, context) {
    const total = record.decimal('all_borrower_total_income');
    if (total === undefined) return failUnusable(record, 'all_borrower_total_income');

    const components: Decimal[] = [];
    for (const field of INCOME_COMPONENTS) {
      if (record.isUnparseable(field)) return failUnusable(record, field);
      components.push(record.decimal(field) ?? new Decimal(0));
    }
    const expected = sumDecimals(components);
    if (!withinTolerance(total, expected, context.config.tolerance)) {
      return fail(`all_borrower_total_income ${fmt(total)} does not match component sum ${fmt(expected)}`);
    }
    return pass();
  },
  fields: [...INCOME_COMPONENTS, 'all_borrower_total_income'],
  id: 'total_income_matches_components',
  optionalFields: ['co_borrower_wage_income', 'primary_borrower_other_income', 'co_borrower_other_income'],
  severity: 'error',
});

export const wageIncomeMatchesComponents = defineRecordRule({
  description: 'All borrower wage income must equal primary plus co-borrower wage income (within 1)',
  evaluate(record) {
    const total = record.decimal('all_borrower_wage_income');
    if (total === undefined) return failUnusable(record, 'all_borrower_wage_income');
    const primary = record.decimal('primary_borrower_wage_income') ?? new Decimal(0);
    const co = record.decimal('co_borrower_wage_income') ?? new Decimal(0);
    const expected = primary.plus(co);
    if (total.minus(expected).abs().greaterThan(1)) {
      return fail(`all_borrower_wage_income ${fmt(total)} does not match wage sum ${fmt(expected)}`);
    }
    return pass();
  },
  fields: ['primary_borrower_wage_income', 'co_borrower_wage_income', 'all_borrower_wage_income'],
  id: 'wage_income_matches_components',
  optionalFields: ['co_borrower_wage_income'],
  severity: 'error',
});

export const totalIncomePositive = defineRecordRule({
  description: 'All borrower total income must be greater than zero',
  evaluate(record) {
    const total = record.decimal('all_borrower_total_income');
    if (total === undefined) return failUnusable(record, 'all_borrower_total_income');
    if (total.lessThanOrEqualTo(0)) return fail(`all_borrower_total_income ${fmt(total)} is not positive`);
    return pass();
  },
  fields: ['all_borrower_total_income'],
  id: 'total_income_positive',
  severity: 'error',
});

export const negativeIncomes = defineRecordRule({
  description: 'One or more income fields are negative',
  evaluate(record) {
    const negative = INCOME_FIELDS.filter((field) => record.decimal(field)?.isNegative() ?? false);
    if (negative.length > 0) {
      const listed = negative.map((field) => `${field} ${record.text(field) ?? ''}`);
      return fail(`Negative income: ${listed.join(', ')}`, negative);
    }
    return pass();
  },
  fields: INCOME_FIELDS,
  id: 'negative_incomes',
  optionalFields: INCOME_FIELDS.filter((field) => field !== 'all_borrower_total_income'),
  severity: 'warning',
});

export const coBorrowerOtherIncomePopulated = defineRecordRule({
  appliesTo: (record) => (record.integer('total_number_of_borrowers') ?? 0) >= 2,
  description: 'Co-borrower other income must be populated when there are two or more borrowers',
  evaluate(record) {
    return record.isBlank('co_borrower_other_income') ? failUnusable(record, 'co_borrower_other_income') : pass();
  },
  fields: ['co_borrower_other_income', 'total_number_of_borrowers'],
  id: 'co_borrower_other_income_populated',
  severity: 'error',
});

export const totalNumberOfBorrowers = defineRecordRule({
  description: 'Total number of borrowers must be at least 1',
  evaluate(record) {
    const count = record.integer('total_number_of_borrowers');
    if (count === undefined) return failUnusable(record, 'total_number_of_borrowers');
    if (count < 1) return fail(`total_number_of_borrowers ${count} is less than 1`);
    return pass();
  },
  fields: ['total_number_of_borrowers'],
  id: 'total_number_of_borrowers',
  severity: 'error',
});

export const borrowersOver4 = defineRecordRule({
  description: 'More than four borrowers on the loan',
  evaluate(record) {
    const count = record.integer('total_number_of_borrowers');
    if (count === undefined) return notApplicableWhenBlank(record, 'total_number_of_borrowers');
    if (count > 4) return fail(`total_number_of_borrowers ${count} is greater than 4`);
    return pass();
  },
  fields: ['total_number_of_borrowers'],
  id: 'borrowers_over_4',
  severity: 'warning',
});

export const numberOfMortgagedProperties = defineRecordRule({
  description: 'Number of mortgaged properties must be at least 1, and exactly 1 for a first-time purchase',
  evaluate(record) {
    const count = record.integer('number_of_mortgaged_properties');
    if (count === undefined) return failUnusable(record, 'number_of_mortgaged_properties');
    if (count < 1) return fail(`number_of_mortgaged_properties ${count} is less than 1`);
    if (record.integer('loan_purpose') === PURPOSE_FIRST_TIME_PURCHASE && count > 1) {
      return fail(`number_of_mortgaged_properties ${count} on a first-time purchase`);
    }
    return pass();
  },
  fields: ['number_of_mortgaged_properties', 'loan_purpose'],
  id: 'number_of_mortgaged_properties',
  optionalFields: ['loan_purpose'],
  severity: 'error',
});

function employmentExceedsIndustryRule(
  id: string,
  employmentField: string,
  industryField: string,
  who: string
): RecordRule {
  return defineRecordRule({
    description: `${who} length of employment must not exceed years in industry`,
    evaluate(record) {
      const employment = record.decimal(employmentField);
      const industry = record.decimal(industryField);
      if (employment === undefined) return notApplicableWhenBlank(record, employmentField);
      if (industry === undefined) return notApplicableWhenBlank(record, industryField);
      if (employment.toDecimalPlaces(2).greaterThan(industry.toDecimalPlaces(2))) {
        return fail(`${employmentField} ${fmt(employment)} exceeds ${industryField} ${fmt(industry)}`);
      }
      return pass();
    },
    fields: [employmentField, industryField],
    id,
    severity: 'error',
  });
}

export const borrowerEmploymentExceedsIndustry = employmentExceedsIndustryRule(
  'borrower_employment_exceeds_industry',
  'length_of_employment_borrower',
  'borrower_years_in_industry',
  'Borrower'
);

export const coborrowerEmploymentExceedsIndustry = employmentExceedsIndustryRule(
  'coborrower_employment_exceeds_industry',
  'length_of_employment_co_borrower',
  'coborrower_years_in_industry',
  'Co-borrower'
);

export const selfEmploymentFlag = codeRule({
  allowed: [0, 1, 99],
  description: 'Self-employment flag must be 0, 1 or 99',
  field: 'self_employment_flag',
  id: 'self_employment_flag',
});

export const negativeReserves = defineRecordRule({
  description: 'Liquid cash reserves must not be negative',
  evaluate(record) {
    const reserves = record.decimal('liquid_cash_reserves');
    if (reserves === undefined) return notApplicableWhenBlank(record, 'liquid_cash_reserves');
    if (reserves.isNegative()) return fail(`liquid_cash_reserves ${fmt(reserves)} is negative`);
    return pass();
  },
  fields: ['liquid_cash_reserves'],
  id: 'negative_reserves',
  severity: 'error',
});

export const zeroReservesPrimaryOrSecond = defineRecordRule({
  description: 'Liquid cash reserves must not be zero for a primary residence or second home',
  evaluate(record) {
    const reserves = record.decimal('liquid_cash_reserves');
    const occupancy = record.integer('occupancy');
    if (reserves === undefined) return notApplicableWhenBlank(record, 'liquid_cash_reserves');
    if (occupancy === undefined) return notApplicableWhenBlank(record, 'occupancy');
    if (reserves.isZero() && (occupancy === OCCUPANCY_PRIMARY || occupancy === OCCUPANCY_SECOND_HOME)) {
      return fail(`liquid_cash_reserves is zero with occupancy ${occupancy}`);
    }
    return pass();
  },
  fields: ['liquid_cash_reserves', 'occupancy'],
  id: 'zero_reserves_primary_or_second',
  severity: 'error',
});

export const liquidReservesPopulated = defineRecordRule({
  description: 'Liquid cash reserves must be populated unless the loan is a closed-end second or agency loan',
  evaluate(record) {
    const loanType = (record.text('loan_type_ls') ?? '').toUpperCase();
    if (loanType.includes('CLOSED END SECOND') || loanType.includes('AGENCY')) {
      return notApplicable(`loan_type_ls is ${loanType}`);
    }
    const reserves = record.decimal('liquid_cash_reserves');
    if (reserves === undefined) return failUnusable(record, 'liquid_cash_reserves');
    if (reserves.isZero()) return fail('liquid_cash_reserves is zero');
    return pass();
  },
  fields: ['liquid_cash_reserves', 'loan_type_ls'],
  id: 'liquid_reserves_populated',
  optionalFields: ['loan_type_ls'],
  severity: 'error',
});

export const BORROWER_RULES: readonly RecordRule[] = [
  originatorDtiRange,
  dtiConsistency,
  monthlyDebtPopulated,
  originalFicoRange,
  ficoAtOrBelow660,
  ficoRangeByModel,
  monthsBankruptcyPopulated,
  monthsForeclosurePopulated,
  totalIncomeMatchesComponents,
  wageIncomeMatchesComponents,
  totalIncomePositive,
  negativeIncomes,
  coBorrowerOtherIncomePopulated,
  totalNumberOfBorrowers,
  borrowersOver4,
  numberOfMortgagedProperties,
  borrowerEmploymentExceedsIndustry,
  coborrowerEmploymentExceedsIndustry,
  selfEmploymentFlag,
  negativeReserves,
  zeroReservesPrimaryOrSecond,
  liquidReservesPopulated,
];
