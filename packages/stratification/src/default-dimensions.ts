import { defineDimension, type DimensionSpec, type DimensionSpecInput } from './dimension-spec.js';

const BALANCE_FIELD = 'current_loan_amount';

const STANDARD_AGGREGATES: DimensionSpecInput['aggregates'] = [
  { field: BALANCE_FIELD, kind: 'sum', name: 'current_balance' },
  { field: BALANCE_FIELD, kind: 'average', name: 'average_balance' },
  { field: 'current_interest_rate', kind: 'weighted_average', name: 'wa_coupon', weightField: BALANCE_FIELD },
  { field: 'original_primary_borrower_fico', kind: 'weighted_average', name: 'wa_fico', weightField: BALANCE_FIELD },
  { field: 'original_ltv', kind: 'weighted_average', name: 'wa_ltv', weightField: BALANCE_FIELD },
  { field: 'originator_dti', kind: 'weighted_average', name: 'wa_dti', weightField: BALANCE_FIELD },
];

function dimension(input: Omit<DimensionSpecInput, 'aggregates'>): DimensionSpec {
  return defineDimension({ ...input, aggregates: STANDARD_AGGREGATES });
}

/**
 * Strats produced for every tape unless a dimension file replaces them.
 * Rates and ratios are fractions (0.065 is 6.5%).
 */
export const DEFAULT_DIMENSIONS: readonly DimensionSpec[] = [
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 620', max: 620 },
        { label: '620 - 659', max: 660, min: 620 },
        { label: '660 - 699', max: 700, min: 660 },
        { label: '700 - 739', max: 740, min: 700 },
        { label: '740 - 779', max: 780, min: 740 },
        { label: '780+', min: 780 },
      ],
    },
    field: 'original_primary_borrower_fico',
    name: 'fico',
  }),
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 60%', max: 0.6 },
        { label: '60% - 70%', max: 0.7, min: 0.6 },
        { label: '70% - 75%', max: 0.75, min: 0.7 },
        { label: '75% - 80%', max: 0.8, min: 0.75 },
        { label: '80% - 85%', max: 0.85, min: 0.8 },
        { label: '85% - 90%', max: 0.9, min: 0.85 },
        { label: '90%+', min: 0.9 },
      ],
    },
    field: 'original_ltv',
    name: 'original_ltv',
  }),
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 60%', max: 0.6 },
        { label: '60% - 70%', max: 0.7, min: 0.6 },
        { label: '70% - 75%', max: 0.75, min: 0.7 },
        { label: '75% - 80%', max: 0.8, min: 0.75 },
        { label: '80% - 85%', max: 0.85, min: 0.8 },
        { label: '85% - 90%', max: 0.9, min: 0.85 },
        { label: '90%+', min: 0.9 },
      ],
    },
    field: 'original_cltv',
    name: 'original_cltv',
  }),
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 20%', max: 0.2 },
        { label: '20% - 30%', max: 0.3, min: 0.2 },
        { label: '30% - 36%', max: 0.36, min: 0.3 },
        { label: '36% - 43%', max: 0.43, min: 0.36 },
        { label: '43% - 50%', max: 0.5, min: 0.43 },
        { label: '50%+', min: 0.5 },
      ],
    },
    field: 'originator_dti',
    name: 'dti',
  }),
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 100,000', max: 100_000 },
        { label: '100,000 - 199,999', max: 200_000, min: 100_000 },
        { label: '200,000 - 299,999', max: 300_000, min: 200_000 },
        { label: '300,000 - 499,999', max: 500_000, min: 300_000 },
        { label: '500,000 - 749,999', max: 750_000, min: 500_000 },
        { label: '750,000 - 999,999', max: 1_000_000, min: 750_000 },
        { label: '1,000,000 - 1,999,999', max: 2_000_000, min: 1_000_000 },
        { label: '2,000,000+', min: 2_000_000 },
      ],
    },
    field: BALANCE_FIELD,
    name: 'current_balance',
  }),
  dimension({
    buckets: {
      kind: 'range',
      ranges: [
        { label: '< 5.00%', max: 0.05 },
        { label: '5.00% - 5.99%', max: 0.06, min: 0.05 },
        { label: '6.00% - 6.99%', max: 0.07, min: 0.06 },
        { label: '7.00% - 7.99%', max: 0.08, min: 0.07 },
        { label: '8.00% - 8.99%', max: 0.09, min: 0.08 },
        { label: '9.00%+', min: 0.09 },
      ],
    },
    field: 'current_interest_rate',
    name: 'current_rate',
  }),
  dimension({ buckets: { kind: 'distinct' }, field: 'state', name: 'state' }),
  dimension({
    buckets: {
      kind: 'category',
      categories: [
        { label: 'Cash-out refinance', values: [3] },
        { label: 'First-time purchase', values: [6] },
        { label: 'Purchase', values: [7] },
        { label: 'Rate/term refinance', values: [9] },
        { label: 'Other', values: [10] },
      ],
    },
    field: 'loan_purpose',
    name: 'loan_purpose',
  }),
  dimension({
    buckets: {
      kind: 'category',
      categories: [
        { label: 'Primary residence', values: [1] },
        { label: 'Second home', values: [2] },
        { label: 'Investment', values: [3] },
      ],
    },
    field: 'occupancy',
    name: 'occupancy',
  }),
  dimension({
    buckets: {
      kind: 'category',
      categories: [
        { label: 'Fixed', values: [1] },
        { label: 'ARM', values: [2] },
      ],
    },
    field: 'amortization_type',
    name: 'amortization_type',
  }),
];
