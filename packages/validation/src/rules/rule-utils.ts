import { formatDecimal, type LoanRecord } from '@tapeval/core';
import { Decimal } from 'decimal.js';

import { fail, notApplicable, type RuleVerdict } from '../rule.js';

/** Amortization type codes */
export const FIXED_RATE = 1;
export const ADJUSTABLE_RATE = 2;

/** Loan purpose codes */
export const PURPOSE_CASH_OUT_REFI = 3;
export const PURPOSE_FIRST_TIME_PURCHASE = 6;
export const PURPOSE_PURCHASE = 7;
export const PURPOSE_RATE_TERM_REFI = 9;
export const PURPOSE_OTHER = 10;

export const PURCHASE_PURPOSES: readonly number[] = [PURPOSE_FIRST_TIME_PURCHASE, PURPOSE_PURCHASE];
export const REFINANCE_PURPOSES: readonly number[] = [PURPOSE_CASH_OUT_REFI, PURPOSE_RATE_TERM_REFI];

/** Occupancy codes */
export const OCCUPANCY_PRIMARY = 1;
export const OCCUPANCY_SECOND_HOME = 2;

const MS_PER_DAY = 86_400_000;

/**
 * Cell content for a detail message
 */
export function describeValue(record: LoanRecord, field: string): string {
  const cell = record.cell(field);
  switch (cell.status) {
    case 'missing':
      return 'missing';
    case 'unparseable':
      return `unparseable ("${cell.raw}")`;
    case 'present':
      return record.text(field) ?? '';
  }
}

/**
 * Fail verdict for a field whose value is needed but absent or of the wrong type
 */
export function failUnusable(record: LoanRecord, field: string): RuleVerdict {
  return fail(`${field} is ${describeValue(record, field)}`, [field]);
}

export function notApplicableWhenBlank(record: LoanRecord, field: string): RuleVerdict {
  return notApplicable(`${field} is ${describeValue(record, field)}`);
}

export function fmt(value: Decimal | number): string {
  return value instanceof Decimal ? formatDecimal(value) : String(value);
}

/**
 * True when the field holds a value other than blank or numeric zero
 */
export function isPopulated(record: LoanRecord, field: string): boolean {
  const cell = record.cell(field);
  if (cell.status === 'missing') return false;
  if (cell.status === 'unparseable') return true;

  const value = cell.value;
  if (typeof value === 'string') return value.trim() !== '';
  if (typeof value === 'number') return value !== 0;
  if (value instanceof Decimal) return !value.isZero();
  return true;
}

/**
 * Whole days from `from` to `to`
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.round((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Whole calendar months from `from` to `to`, ignoring the day of month
 */
export function monthsBetween(from: Date, to: Date): number {
  return (to.getUTCFullYear() - from.getUTCFullYear()) * 12 + (to.getUTCMonth() - from.getUTCMonth());
}

export function addYears(date: Date, years: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setUTCFullYear(shifted.getUTCFullYear() + years);
  return shifted;
}

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function isAdjustableRate(record: LoanRecord): boolean {
  return record.integer('amortization_type') === ADJUSTABLE_RATE;
}

export function isFixedRate(record: LoanRecord): boolean {
  return record.integer('amortization_type') === FIXED_RATE;
}

/**
 * Fixed monthly payment that amortizes `principal` over `periods` months at
 * an annual `rate` expressed as a fraction.
 */
export function annuityPayment(principal: Decimal, rate: Decimal, periods: number): Decimal {
  if (rate.isZero()) {
    return principal.dividedBy(periods);
  }
  const monthly = rate.dividedBy(12);
  const growth = monthly.plus(1).pow(periods);
  return principal.times(monthly).times(growth).dividedBy(growth.minus(1));
}
