import { Decimal } from 'decimal.js';

import { defineRecordRule, fail, notApplicable, pass, type RecordRule } from '../rule.js';

import { codeRule } from './code-rule.js';
import {
  ADJUSTABLE_RATE,
  OCCUPANCY_PRIMARY,
  OCCUPANCY_SECOND_HOME,
  PURCHASE_PURPOSES,
  PURPOSE_CASH_OUT_REFI,
  PURPOSE_FIRST_TIME_PURCHASE,
  PURPOSE_OTHER,
  PURPOSE_PURCHASE,
  PURPOSE_RATE_TERM_REFI,
  REFINANCE_PURPOSES,
  addYears,
  annuityPayment,
  daysBetween,
  failUnusable,
  fmt,
  isFixedRate,
  isoDate,
  notApplicableWhenBlank,
} from './rule-utils.js';

const MIN_LOAN_AMOUNT = new Decimal(10_000);
const MAX_LOAN_AMOUNT = new Decimal(10_000_000);
const MIN_TERM = 120;
const MAX_TERM = 480;
const MIN_AMORTIZATION_TERM = 60;
const MIN_SERVICING_FEE = new Decimal('0.0005');
const MAX_SERVICING_FEE = new Decimal('0.005');
const PAYMENT_DEVIATION = new Decimal('0.2');
const CASH_OUT_SHARE = new Decimal('0.01');
const REFI_CASH_OUT_THRESHOLD = new Decimal(2000);
const MIN_LOAN_NUMBER_LENGTH = 5;
const MAX_APPLICATION_AGE_YEARS = 10;
const MAX_APPLICATION_NOTE_GAP_DAYS = 365;

export const amortizationType = codeRule({
  allowed: [1, 2],
  description: 'Amortization type must be 1 (fixed) or 2 (ARM)',
  field: 'amortization_type',
  id: 'amortization_type',
});

export const lienPosition = codeRule({
  allowed: [1, 2],
  description: 'Lien position must be 1 or 2',
  field: 'lien_position',
  id: 'lien_position',
});

export const channel = codeRule({
  allowed: [1, 2, 5],
  description: 'Channel must be 1, 2 or 5',
  field: 'channel',
  id: 'channel',
});

export const loanPurpose = codeRule({
  allowed: [PURPOSE_CASH_OUT_REFI, PURPOSE_FIRST_TIME_PURCHASE, PURPOSE_PURCHASE, PURPOSE_RATE_TERM_REFI, PURPOSE_OTHER],
  description: 'Loan purpose must be 3, 6, 7, 9 or 10',
  field: 'loan_purpose',
  id: 'loan_purpose',
});

export const interestTypeIndicator = codeRule({
  allowed: [2],
  description: 'Interest type indicator must be 2',
  field: 'interest_type_indicator',
  id: 'interest_type_indicator',
});

export const helocIndicatorZero = codeRule({
  allowed: [0],
  description: 'HELOC indicator must be 0',
  field: 'heloc_indicator',
  id: 'heloc_indicator_zero',
});

export const originalLoanAmountRange = defineRecordRule({
  description: 'Original loan amount must be between 10,000 and 10,000,000',
  evaluate(record) {
    const amount = record.decimal('original_loan_amount');
    if (amount === undefined) return failUnusable(record, 'original_loan_amount');
    if (amount.lessThan(MIN_LOAN_AMOUNT) || amount.greaterThan(MAX_LOAN_AMOUNT)) {
      return fail(`original_loan_amount ${fmt(amount)} is outside 10,000-10,000,000`);
    }
    return pass();
  },
  fields: ['original_loan_amount'],
  id: 'original_loan_amount_range',
  severity: 'error',
});

export const currentBalanceExceedsOriginal = defineRecordRule({
  description: 'Current loan amount must not exceed the original loan amount',
  evaluate(record) {
    const current = record.decimal('current_loan_amount');
    const original = record.decimal('original_loan_amount');
    if (current === undefined) return notApplicableWhenBlank(record, 'current_loan_amount');
    if (original === undefined) return notApplicableWhenBlank(record, 'original_loan_amount');
    if (current.greaterThan(original)) {
      return fail(`current_loan_amount ${fmt(current)} exceeds original_loan_amount ${fmt(original)}`);
    }
    return pass();
  },
  fields: ['current_loan_amount', 'original_loan_amount'],
  id: 'current_balance_exceeds_original',
  severity: 'error',
});

export const scheduledUpb = defineRecordRule({
  description: 'Current loan amount must be populated, non-zero and no greater than the original amount',
  evaluate(record) {
    const current = record.decimal('current_loan_amount');
    if (current === undefined) return failUnusable(record, 'current_loan_amount');
    if (current.isZero()) return fail('current_loan_amount is zero');
    const original = record.decimal('original_loan_amount');
    if (original === undefined) return failUnusable(record, 'original_loan_amount');
    if (current.greaterThan(original)) {
      return fail(`current_loan_amount ${fmt(current)} exceeds original_loan_amount ${fmt(original)}`);
    }
    return pass();
  },
  fields: ['current_loan_amount', 'original_loan_amount'],
  id: 'scheduled_upb',
  severity: 'error',
});

export const originalInterestRate = defineRecordRule({
  description: 'Original interest rate must be non-zero and, on an ARM, no higher than the lifetime ceiling',
  evaluate(record) {
    const rate = record.decimal('original_interest_rate');
    if (rate === undefined) return failUnusable(record, 'original_interest_rate');
    if (rate.isZero()) return fail('original_interest_rate is zero');

    const ceiling = record.decimal('lifetime_maximum_rate_ceiling');
    const isArm = record.integer('amortization_type') === ADJUSTABLE_RATE;
    if (isArm && ceiling !== undefined && rate.greaterThan(ceiling)) {
      return fail(`original_interest_rate ${fmt(rate)} exceeds lifetime_maximum_rate_ceiling ${fmt(ceiling)}`);
    }
    return pass();
  },
  fields: ['original_interest_rate', 'lifetime_maximum_rate_ceiling', 'amortization_type'],
  id: 'original_interest_rate',
  optionalFields: ['lifetime_maximum_rate_ceiling'],
  severity: 'error',
});

export const currentRateFixedMismatch = defineRecordRule({
  appliesTo: isFixedRate,
  description: 'On a fixed-rate loan the current interest rate must equal the original rate',
  evaluate(record) {
    const current = record.decimal('current_interest_rate');
    if (current === undefined) return failUnusable(record, 'current_interest_rate');
    if (current.isZero()) return fail('current_interest_rate is zero');
    const original = record.decimal('original_interest_rate');
    if (original === undefined) return failUnusable(record, 'original_interest_rate');
    if (!current.equals(original)) {
      return fail(`current_interest_rate ${fmt(current)} differs from original_interest_rate ${fmt(original)}`);
    }
    return pass();
  },
  fields: ['amortization_type', 'original_interest_rate', 'current_interest_rate'],
  id: 'current_rate_fixed_mismatch',
  severity: 'error',
});

export const originalTermRange = defineRecordRule({
  description: 'Original term to maturity must be 120-480 months and equal the amortization term',
  evaluate(record) {
    const term = record.integer('original_term_to_maturity');
    if (term === undefined) return failUnusable(record, 'original_term_to_maturity');
    if (term < MIN_TERM || term > MAX_TERM) {
      return fail(`original_term_to_maturity ${term} is outside ${MIN_TERM}-${MAX_TERM}`);
    }
    const amortization = record.integer('original_amortization_term');
    if (amortization === undefined) return failUnusable(record, 'original_amortization_term');
    if (term !== amortization) {
      return fail(`original_term_to_maturity ${term} differs from original_amortization_term ${amortization}`);
    }
    return pass();
  },
  fields: ['original_term_to_maturity', 'original_amortization_term'],
  id: 'original_term_range',
  severity: 'error',
});

export const amortizationTermUnder60 = defineRecordRule({
  description: 'Original amortization term must be at least 60 months',
  evaluate(record) {
    const term = record.integer('original_amortization_term');
    if (term === undefined) return notApplicableWhenBlank(record, 'original_amortization_term');
    if (term < MIN_AMORTIZATION_TERM) return fail(`original_amortization_term ${term} is under 60`);
    return pass();
  },
  fields: ['original_amortization_term'],
  id: 'amortization_term_under_60',
  severity: 'error',
});

export const servicingFeeRange = defineRecordRule({
  description: 'Servicing fee must be between 0.0005 and 0.005',
  evaluate(record) {
    const fee = record.decimal('servicing_fee');
    if (fee === undefined) return failUnusable(record, 'servicing_fee');
    if (fee.lessThan(MIN_SERVICING_FEE) || fee.greaterThan(MAX_SERVICING_FEE)) {
      return fail(`servicing_fee ${fmt(fee)} is outside 0.0005-0.005`);
    }
    return pass();
  },
  fields: ['servicing_fee'],
  id: 'servicing_fee_range',
  severity: 'error',
});

export const paymentMatchesAmortization = defineRecordRule({
  description: 'Current P&I payment must be within 20% of the fully amortizing payment',
  evaluate(record) {
    const payment = record.decimal('current_payment_amount_due');
    if (payment === undefined) return failUnusable(record, 'current_payment_amount_due');
    if (payment.isZero()) return fail('current_payment_amount_due is zero');

    const rate = record.decimal('current_interest_rate');
    const term = record.integer('original_amortization_term');
    const principal = record.decimal('original_loan_amount');
    if (rate === undefined) return notApplicableWhenBlank(record, 'current_interest_rate');
    if (term === undefined) return notApplicableWhenBlank(record, 'original_amortization_term');
    if (principal === undefined) return notApplicableWhenBlank(record, 'original_loan_amount');
    if (term <= 0) return notApplicable(`original_amortization_term is ${term}`);

    const expected = annuityPayment(principal, rate, term).toDecimalPlaces(2);
    const actual = payment.toDecimalPlaces(2);
    if (actual.minus(expected).abs().greaterThan(expected.times(PAYMENT_DEVIATION))) {
      return fail(`current_payment_amount_due ${fmt(actual)} deviates more than 20% from expected ${fmt(expected)}`);
    }
    return pass();
  },
  fields: ['current_payment_amount_due', 'current_interest_rate', 'original_amortization_term', 'original_loan_amount'],
  id: 'payment_matches_amortization',
  severity: 'error',
});

export const cashOutConsistency = defineRecordRule({
  description: 'Cash-out refinances need a cash-out amount; other purposes may take at most 1% of the loan',
  evaluate(record) {
    const purpose = record.integer('loan_purpose');
    if (purpose === undefined) return notApplicableWhenBlank(record, 'loan_purpose');
    if (record.isUnparseable('cash_out_amount')) return failUnusable(record, 'cash_out_amount');
    const cashOut = record.decimal('cash_out_amount') ?? new Decimal(0);

    if (purpose === PURPOSE_CASH_OUT_REFI) {
      return cashOut.isZero() ? fail('cash_out_amount is zero or blank on a cash-out refinance') : pass();
    }

    const amount = record.decimal('original_loan_amount');
    if (amount === undefined) return notApplicableWhenBlank(record, 'original_loan_amount');
    if (cashOut.abs().greaterThan(amount.abs().times(CASH_OUT_SHARE))) {
      return fail(`cash_out_amount ${fmt(cashOut)} exceeds 1% of original_loan_amount with loan_purpose ${purpose}`);
    }
    return pass();
  },
  fields: ['cash_out_amount', 'loan_purpose', 'original_loan_amount'],
  id: 'cash_out_consistency',
  severity: 'error',
});

export const refiCashOutThreshold = defineRecordRule({
  appliesTo: (record) => {
    const purpose = record.integer('loan_purpose');
    return purpose !== undefined && REFINANCE_PURPOSES.includes(purpose);
  },
  description: 'Rate/term refinances may take at most 2,000 cash out; cash-out refinances at least 2,000',
  evaluate(record) {
    const cashOut = record.decimal('cash_out_amount');
    if (cashOut === undefined) return failUnusable(record, 'cash_out_amount');
    const purpose = record.integer('loan_purpose');
    if (purpose === PURPOSE_RATE_TERM_REFI && cashOut.greaterThan(REFI_CASH_OUT_THRESHOLD)) {
      return fail(`cash_out_amount ${fmt(cashOut)} exceeds 2,000 on a rate/term refinance`);
    }
    if (purpose === PURPOSE_CASH_OUT_REFI && cashOut.lessThan(REFI_CASH_OUT_THRESHOLD)) {
      return fail(`cash_out_amount ${fmt(cashOut)} is under 2,000 on a cash-out refinance`);
    }
    return pass();
  },
  fields: ['loan_purpose', 'cash_out_amount'],
  id: 'refi_cash_out_threshold',
  severity: 'error',
});

export const largeCashOut = defineRecordRule({
  description: 'Cash-out amount must not exceed the original loan amount',
  evaluate(record) {
    const cashOut = record.decimal('cash_out_amount');
    const amount = record.decimal('original_loan_amount');
    if (cashOut === undefined) return notApplicableWhenBlank(record, 'cash_out_amount');
    if (amount === undefined) return notApplicableWhenBlank(record, 'original_loan_amount');
    if (cashOut.greaterThan(amount)) {
      return fail(`cash_out_amount ${fmt(cashOut)} exceeds original_loan_amount ${fmt(amount)}`);
    }
    return pass();
  },
  fields: ['cash_out_amount', 'original_loan_amount'],
  id: 'large_cash_out',
  severity: 'error',
});

export const sellerLoanNumberLength = defineRecordRule({
  description: 'Seller loan number must be longer than 4 characters',
  evaluate(record) {
    const loanNumber = record.text('loan_number');
    if (loanNumber === undefined) return failUnusable(record, 'loan_number');
    if (loanNumber.length < MIN_LOAN_NUMBER_LENGTH) {
      return fail(`loan_number "${loanNumber}" has ${loanNumber.length} characters`);
    }
    return pass();
  },
  fields: ['loan_number'],
  id: 'seller_loan_number_length',
  severity: 'error',
});

export const firstPaymentDate = defineRecordRule({
  description: 'First payment date must fall on the 1st of the month and after origination',
  evaluate(record) {
    const firstPayment = record.date('first_payment_date_of_loan');
    if (firstPayment === undefined) return failUnusable(record, 'first_payment_date_of_loan');
    if (firstPayment.getUTCDate() !== 1) {
      return fail(`first_payment_date_of_loan ${isoDate(firstPayment)} is not the 1st of the month`);
    }
    const origination = record.date('origination_date');
    if (origination !== undefined && origination.getTime() > firstPayment.getTime()) {
      return fail(
        `origination_date ${isoDate(origination)} is after first_payment_date_of_loan ${isoDate(firstPayment)}`
      );
    }
    return pass();
  },
  fields: ['first_payment_date_of_loan', 'origination_date'],
  id: 'first_payment_date',
  severity: 'error',
});

export const firstPaymentBeforeMaturity = defineRecordRule({
  description: 'First payment date must not be after the maturity date',
  evaluate(record) {
    const firstPayment = record.date('first_payment_date_of_loan');
    const maturity = record.date('maturity_date');
    if (firstPayment === undefined) return notApplicableWhenBlank(record, 'first_payment_date_of_loan');
    if (maturity === undefined) return notApplicableWhenBlank(record, 'maturity_date');
    if (firstPayment.getTime() > maturity.getTime()) {
      return fail(`first_payment_date_of_loan ${isoDate(firstPayment)} is after maturity_date ${isoDate(maturity)}`);
    }
    return pass();
  },
  fields: ['first_payment_date_of_loan', 'maturity_date'],
  id: 'first_payment_before_maturity',
  severity: 'error',
});

export const maturityFirstOfMonth = defineRecordRule({
  description: 'Maturity date must fall on the 1st of the month',
  evaluate(record) {
    const maturity = record.date('maturity_date');
    if (maturity === undefined) return failUnusable(record, 'maturity_date');
    if (maturity.getUTCDate() !== 1) return fail(`maturity_date ${isoDate(maturity)} is not the 1st of the month`);
    return pass();
  },
  fields: ['maturity_date'],
  id: 'maturity_first_of_month',
  severity: 'error',
});

export const applicationDate = defineRecordRule({
  description: 'Application date must not be after origination or more than 10 years before the as-of date',
  evaluate(record, context) {
    const application = record.date('application_received_date');
    if (application === undefined) return failUnusable(record, 'application_received_date');
    const origination = record.date('origination_date');
    if (origination !== undefined && application.getTime() > origination.getTime()) {
      return fail(
        `application_received_date ${isoDate(application)} is after origination_date ${isoDate(origination)}`
      );
    }
    if (addYears(application, MAX_APPLICATION_AGE_YEARS).getTime() < context.config.asOfDate.getTime()) {
      return fail(`application_received_date ${isoDate(application)} is more than 10 years old`);
    }
    return pass();
  },
  fields: ['application_received_date', 'origination_date'],
  id: 'application_date',
  severity: 'error',
});

export const applicationNoteDateGap = defineRecordRule({
  description: 'Application date and note date must be at most 365 days apart',
  evaluate(record) {
    const application = record.date('application_received_date');
    const origination = record.date('origination_date');
    if (application === undefined) return notApplicableWhenBlank(record, 'application_received_date');
    if (origination === undefined) return notApplicableWhenBlank(record, 'origination_date');
    const gap = Math.abs(daysBetween(application, origination));
    if (gap > MAX_APPLICATION_NOTE_GAP_DAYS) {
      return fail(`application_received_date and origination_date are ${gap} days apart`);
    }
    return pass();
  },
  fields: ['application_received_date', 'origination_date'],
  id: 'application_note_date_gap',
  severity: 'error',
});

export const purposeVsSalesPrice = defineRecordRule({
  description: 'Purchases need a sales price; other purposes must not carry one',
  evaluate(record) {
    const purpose = record.integer('loan_purpose');
    if (purpose === undefined) return notApplicableWhenBlank(record, 'loan_purpose');
    if (record.isUnparseable('sales_price')) return failUnusable(record, 'sales_price');
    const price = record.decimal('sales_price');
    const isPurchase = PURCHASE_PURPOSES.includes(purpose);

    if (isPurchase && (price === undefined || price.isZero())) {
      return fail(`sales_price is missing or zero on purchase (loan_purpose ${purpose})`);
    }
    if (!isPurchase && price !== undefined && !price.isZero()) {
      return fail(`sales_price ${fmt(price)} is populated with loan_purpose ${purpose}`);
    }
    return pass();
  },
  fields: ['loan_purpose', 'sales_price'],
  id: 'purpose_vs_sales_price',
  severity: 'error',
});

export const downPaymentPercent = defineRecordRule({
  description: 'Purchases need a down payment share of at most 1; refinances must not have one',
  evaluate(record) {
    const purpose = record.integer('loan_purpose');
    if (purpose === undefined) return notApplicableWhenBlank(record, 'loan_purpose');
    const field = 'percentage_of_down_payment_from_borrower_own_funds';
    const share = record.decimal(field);

    if (PURCHASE_PURPOSES.includes(purpose)) {
      if (share === undefined) return failUnusable(record, field);
      if (share.greaterThan(1)) return fail(`${field} ${fmt(share)} is greater than 1`);
      return pass();
    }
    if (REFINANCE_PURPOSES.includes(purpose) && share !== undefined && share.greaterThan(0)) {
      return fail(`${field} ${fmt(share)} is populated on a refinance`);
    }
    return pass();
  },
  fields: ['loan_purpose', 'percentage_of_down_payment_from_borrower_own_funds'],
  id: 'down_payment_percent',
  severity: 'error',
});

export const yearsInHomeForRefi = defineRecordRule({
  description: 'Years in home must be populated and not negative, except for purchases and second homes',
  evaluate(record) {
    const purpose = record.integer('loan_purpose');
    const occupancy = record.integer('occupancy');
    if (purpose === undefined) return notApplicableWhenBlank(record, 'loan_purpose');
    if (occupancy === undefined) return notApplicableWhenBlank(record, 'occupancy');
    if (PURCHASE_PURPOSES.includes(purpose) || purpose === PURPOSE_OTHER || occupancy === OCCUPANCY_SECOND_HOME) {
      return notApplicable(`loan_purpose ${purpose} with occupancy ${occupancy}`);
    }

    const years = record.decimal('years_in_home');
    if (years === undefined) return failUnusable(record, 'years_in_home');
    if (years.isNegative()) return fail(`years_in_home ${fmt(years)} is negative`);
    return pass();
  },
  fields: ['loan_purpose', 'years_in_home', 'occupancy'],
  id: 'years_in_home_for_refi',
  severity: 'error',
});

export const refiUnder1YearInHome = defineRecordRule({
  description: 'Owner-occupied refinance with less than one year in the home',
  evaluate(record) {
    const purpose = record.integer('loan_purpose');
    const occupancy = record.integer('occupancy');
    const years = record.decimal('years_in_home');
    if (purpose === undefined) return notApplicableWhenBlank(record, 'loan_purpose');
    if (occupancy === undefined) return notApplicableWhenBlank(record, 'occupancy');
    if (years === undefined) return notApplicableWhenBlank(record, 'years_in_home');
    if (REFINANCE_PURPOSES.includes(purpose) && occupancy === OCCUPANCY_PRIMARY && years.lessThan(1)) {
      return fail(`years_in_home ${fmt(years)} on a refinance (loan_purpose ${purpose})`);
    }
    return pass();
  },
  fields: ['loan_purpose', 'years_in_home', 'occupancy'],
  id: 'refi_under_1_year_in_home',
  severity: 'warning',
});

export const purchaseWithYearsInHome = defineRecordRule({
  appliesTo: (record) => record.integer('loan_purpose') === PURPOSE_PURCHASE,
  description: 'A purchase must not report years in home',
  evaluate(record) {
    const years = record.decimal('years_in_home');
    if (years === undefined) return pass();
    if (years.greaterThan(0)) return fail(`years_in_home ${fmt(years)} on a purchase`);
    return pass();
  },
  fields: ['loan_purpose', 'years_in_home'],
  id: 'purchase_with_years_in_home',
  severity: 'error',
});

export const escrowedTaxesAndInsurance = defineRecordRule({
  description: 'Other monthly payment must be populated when taxes and insurance are escrowed',
  evaluate(record) {
    const payment = record.decimal('current_other_monthly_payment');
    if (payment !== undefined && payment.isNegative()) {
      return fail(`current_other_monthly_payment ${fmt(payment)} is negative`);
    }
    const escrow = record.integer('escrow_indicator');
    if (escrow === undefined) return notApplicableWhenBlank(record, 'escrow_indicator');
    if (escrow === 0 || escrow === 99) return pass();
    if (payment === undefined || payment.isZero()) {
      const state = payment === undefined ? 'blank' : 'zero';
      return fail(`current_other_monthly_payment is ${state} with escrow_indicator ${escrow}`);
    }
    return pass();
  },
  fields: ['current_other_monthly_payment', 'escrow_indicator'],
  id: 'escrowed_taxes_and_insurance',
  severity: 'error',
});

export const brokerIndicator = defineRecordRule({
  appliesTo: (record) => record.integer('channel') === 2,
  description: 'Broker indicator must be populated for broker-channel loans',
  evaluate(record) {
    return record.isBlank('broker_indicator') ? failUnusable(record, 'broker_indicator') : pass();
  },
  fields: ['channel', 'broker_indicator'],
  id: 'broker_indicator',
  severity: 'error',
});

export const lienPositionVsLoanType = defineRecordRule({
  appliesTo: (record) => record.integer('lien_position') === 2,
  description: 'Second liens must carry a second-lien loan type',
  evaluate(record) {
    const loanType = record.text('loan_type_ls') ?? '';
    if (!loanType.toUpperCase().includes('SECOND')) {
      return fail(`loan_type_ls "${loanType}" does not describe a second lien`);
    }
    return pass();
  },
  fields: ['lien_position', 'loan_type_ls'],
  id: 'lien_position_vs_loan_type',
  severity: 'error',
});

export const LOAN_TERM_RULES: readonly RecordRule[] = [
  amortizationType,
  lienPosition,
  channel,
  loanPurpose,
  interestTypeIndicator,
  helocIndicatorZero,
  originalLoanAmountRange,
  currentBalanceExceedsOriginal,
  scheduledUpb,
  originalInterestRate,
  currentRateFixedMismatch,
  originalTermRange,
  amortizationTermUnder60,
  servicingFeeRange,
  paymentMatchesAmortization,
  cashOutConsistency,
  refiCashOutThreshold,
  largeCashOut,
  sellerLoanNumberLength,
  firstPaymentDate,
  firstPaymentBeforeMaturity,
  maturityFirstOfMonth,
  applicationDate,
  applicationNoteDateGap,
  purposeVsSalesPrice,
  downPaymentPercent,
  yearsInHomeForRefi,
  refiUnder1YearInHome,
  purchaseWithYearsInHome,
  escrowedTaxesAndInsurance,
  brokerIndicator,
  lienPositionVsLoanType,
];
