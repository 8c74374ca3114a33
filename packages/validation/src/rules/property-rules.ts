import type { LoanRecord } from '@tapeval/core';
import { Decimal } from 'decimal.js';

import { defineRecordRule, fail, notApplicable, pass, type RecordRule } from '../rule.js';

import { daysBetween, failUnusable, fmt, isoDate, notApplicableWhenBlank } from './rule-utils.js';

const MIN_APPRAISED_VALUE = new Decimal(10_000);
const HIGH_APPRAISED_VALUE = new Decimal(8_000_000);
const MAX_VALUATION_AGE_DAYS = 180;
const PROPERTY_TYPE_MIN = 1;
const PROPERTY_TYPE_MAX = 15;

/**
 * Lesser of sales price and appraised value; appraised value alone when there is no sales price
 */
function valuationBasis(record: LoanRecord): Decimal | undefined {
  const appraisal = record.decimal('original_appraised_property_value');
  if (appraisal === undefined) return undefined;
  const price = record.decimal('sales_price');
  return price === undefined || price.isZero() ? appraisal : Decimal.min(price, appraisal);
}

export const appraisedValueCoversBalance = defineRecordRule({
  description: 'Original appraised value must be populated and at least the current loan amount',
  evaluate(record) {
    const appraisal = record.decimal('original_appraised_property_value');
    if (appraisal === undefined) return failUnusable(record, 'original_appraised_property_value');
    const balance = record.decimal('current_loan_amount');
    if (balance === undefined) return notApplicableWhenBlank(record, 'current_loan_amount');
    if (appraisal.lessThan(balance)) {
      return fail(
        `original_appraised_property_value ${fmt(appraisal)} is less than current_loan_amount ${fmt(balance)}`
      );
    }
    return pass();
  },
  fields: ['original_appraised_property_value', 'current_loan_amount'],
  id: 'appraised_value_covers_balance',
  severity: 'error',
});

export const appraisedValueAtOrBelow10000 = defineRecordRule({
  description: 'Original appraised value must be above 10,000',
  evaluate(record) {
    const appraisal = record.decimal('original_appraised_property_value');
    if (appraisal === undefined) return notApplicableWhenBlank(record, 'original_appraised_property_value');
    if (appraisal.lessThanOrEqualTo(MIN_APPRAISED_VALUE)) {
      return fail(`original_appraised_property_value ${fmt(appraisal)} is at or below 10,000`);
    }
    return pass();
  },
  fields: ['original_appraised_property_value'],
  id: 'appraised_value_at_or_below_10000',
  severity: 'error',
});

export const appraisedValueOver8000000 = defineRecordRule({
  description: 'Original appraised value above 8,000,000',
  evaluate(record) {
    const appraisal = record.decimal('original_appraised_property_value');
    if (appraisal === undefined) return notApplicableWhenBlank(record, 'original_appraised_property_value');
    if (appraisal.greaterThan(HIGH_APPRAISED_VALUE)) {
      return fail(`original_appraised_property_value ${fmt(appraisal)} is above 8,000,000`);
    }
    return pass();
  },
  fields: ['original_appraised_property_value'],
  id: 'appraised_value_over_8000000',
  severity: 'warning',
});

export const originalLtv = defineRecordRule({
  description: 'Original LTV must be non-zero, at most 1, and match loan amount / lesser of price and appraisal',
  evaluate(record, context) {
    const ltv = record.decimal('original_ltv');
    if (ltv === undefined) return failUnusable(record, 'original_ltv');
    if (ltv.isZero()) return fail('original_ltv is zero');
    if (ltv.greaterThan(1)) return fail(`original_ltv ${fmt(ltv)} is greater than 1`);

    const amount = record.decimal('original_loan_amount');
    if (amount === undefined) return failUnusable(record, 'original_loan_amount');
    const basis = valuationBasis(record);
    if (basis === undefined) return failUnusable(record, 'original_appraised_property_value');
    if (basis.isZero()) return fail('original_appraised_property_value is zero');

    const calculated = amount.dividedBy(basis).toDecimalPlaces(4);
    if (calculated.minus(ltv.toDecimalPlaces(4)).abs().greaterThan(context.config.ratioTolerance.ltv)) {
      return fail(`original_ltv ${fmt(ltv)} differs from calculated ${fmt(calculated)}`);
    }
    return pass();
  },
  fields: ['original_loan_amount', 'sales_price', 'original_appraised_property_value', 'original_ltv'],
  id: 'original_ltv',
  optionalFields: ['sales_price'],
  severity: 'error',
});

export const cltvBelowLtv = defineRecordRule({
  description: 'Original CLTV must be populated and not below the original LTV',
  evaluate(record) {
    const cltv = record.decimal('original_cltv');
    if (cltv === undefined) return failUnusable(record, 'original_cltv');
    const ltv = record.decimal('original_ltv');
    if (ltv === undefined) return notApplicableWhenBlank(record, 'original_ltv');
    if (cltv.toDecimalPlaces(4).lessThan(ltv.toDecimalPlaces(4))) {
      return fail(`original_cltv ${fmt(cltv)} is below original_ltv ${fmt(ltv)}`);
    }
    return pass();
  },
  fields: ['original_cltv', 'original_ltv'],
  id: 'cltv_below_ltv',
  severity: 'error',
});

export const cltvComponents = defineRecordRule({
  description: 'Original CLTV must match (loan amount + junior balance) / lesser of price and appraisal',
  evaluate(record, context) {
    const cltv = record.decimal('original_cltv');
    if (cltv === undefined) return failUnusable(record, 'original_cltv');
    const amount = record.decimal('original_loan_amount');
    if (amount === undefined) return failUnusable(record, 'original_loan_amount');
    if (record.isUnparseable('junior_mortgage_balance')) return failUnusable(record, 'junior_mortgage_balance');
    const junior = record.decimal('junior_mortgage_balance') ?? new Decimal(0);
    const basis = valuationBasis(record);
    if (basis === undefined) return failUnusable(record, 'original_appraised_property_value');
    if (basis.isZero()) return fail('original_appraised_property_value is zero');

    const calculated = amount.plus(junior).dividedBy(basis).toDecimalPlaces(4);
    if (calculated.minus(cltv.toDecimalPlaces(5)).abs().greaterThan(context.config.ratioTolerance.cltv)) {
      return fail(`original_cltv ${fmt(cltv)} differs from calculated ${fmt(calculated)}`);
    }
    return pass();
  },
  fields: [
    'original_loan_amount',
    'junior_mortgage_balance',
    'sales_price',
    'original_appraised_property_value',
    'original_cltv',
  ],
  id: 'cltv_components',
  optionalFields: ['junior_mortgage_balance', 'sales_price'],
  severity: 'error',
});

export const valuationAge = defineRecordRule({
  description: 'Property valuation must be less than 180 days before origination',
  evaluate(record) {
    const valuation = record.date('original_property_valuation_date');
    const origination = record.date('origination_date');
    if (valuation === undefined) return notApplicableWhenBlank(record, 'original_property_valuation_date');
    if (origination === undefined) return notApplicableWhenBlank(record, 'origination_date');
    const age = daysBetween(valuation, origination);
    if (age >= MAX_VALUATION_AGE_DAYS) {
      return fail(`original_property_valuation_date ${isoDate(valuation)} is ${age} days before origination`);
    }
    return pass();
  },
  fields: ['original_property_valuation_date', 'origination_date'],
  id: 'valuation_age',
  severity: 'error',
});

export const valuationAfterOrigination = defineRecordRule({
  description: 'Property valuation must not be dated after origination',
  evaluate(record) {
    const valuation = record.date('original_property_valuation_date');
    const origination = record.date('origination_date');
    if (valuation === undefined) return notApplicableWhenBlank(record, 'original_property_valuation_date');
    if (origination === undefined) return notApplicableWhenBlank(record, 'origination_date');
    if (valuation.getTime() > origination.getTime()) {
      return fail(
        `original_property_valuation_date ${isoDate(valuation)} is after origination_date ${isoDate(origination)}`
      );
    }
    return pass();
  },
  fields: ['original_property_valuation_date', 'origination_date'],
  id: 'valuation_after_origination',
  severity: 'error',
});

export const stateCode = defineRecordRule({
  description: 'State must be a two-letter code',
  evaluate(record) {
    const state = record.text('state');
    if (state === undefined) return failUnusable(record, 'state');
    if (!/^[A-Za-z]{2}$/.test(state.trim())) return fail(`state "${state}" is not a two-letter code`);
    return pass();
  },
  fields: ['state'],
  id: 'state_code',
  severity: 'error',
});

export const postalCode = defineRecordRule({
  description: 'Postal code must be five digits',
  evaluate(record) {
    const value = record.value('postal_code');
    if (value === undefined) return failUnusable(record, 'postal_code');
    // Spreadsheets drop leading zeros from numeric zip codes
    const text = typeof value === 'number' && Number.isInteger(value) ? String(value) : (record.text('postal_code') ?? '');
    const zip = /^\d{1,4}$/.test(text.trim()) ? text.trim().padStart(5, '0') : text.trim();
    if (!/^\d{5}$/.test(zip)) return fail(`postal_code "${zip}" is not five digits`);
    return pass();
  },
  fields: ['postal_code'],
  id: 'postal_code',
  severity: 'error',
});

export const propertyType = defineRecordRule({
  description: 'Property type must be a code from 1 to 15',
  evaluate(record) {
    const type = record.integer('property_type');
    if (type === undefined) return failUnusable(record, 'property_type');
    if (type < PROPERTY_TYPE_MIN || type > PROPERTY_TYPE_MAX) {
      return fail(`property_type ${type} is outside ${PROPERTY_TYPE_MIN}-${PROPERTY_TYPE_MAX}`);
    }
    return pass();
  },
  fields: ['property_type'],
  id: 'property_type',
  severity: 'error',
});

export const juniorDrawnAmount = defineRecordRule({
  description: 'Junior mortgage drawn amount must not exceed the junior mortgage balance',
  evaluate(record) {
    const drawn = record.decimal('junior_mortgage_drawn_amount');
    if (drawn === undefined) return notApplicableWhenBlank(record, 'junior_mortgage_drawn_amount');
    const balance = record.decimal('junior_mortgage_balance');
    if (balance === undefined) return notApplicable('junior_mortgage_balance is blank');
    if (drawn.greaterThan(balance)) {
      return fail(`junior_mortgage_drawn_amount ${fmt(drawn)} exceeds junior_mortgage_balance ${fmt(balance)}`);
    }
    return pass();
  },
  fields: ['junior_mortgage_drawn_amount', 'junior_mortgage_balance'],
  id: 'junior_drawn_amount',
  severity: 'error',
});

export const PROPERTY_RULES: readonly RecordRule[] = [
  appraisedValueCoversBalance,
  appraisedValueAtOrBelow10000,
  appraisedValueOver8000000,
  originalLtv,
  cltvBelowLtv,
  cltvComponents,
  valuationAge,
  valuationAfterOrigination,
  stateCode,
  postalCode,
  propertyType,
  juniorDrawnAmount,
];
