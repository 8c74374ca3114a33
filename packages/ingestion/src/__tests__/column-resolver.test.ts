import { describe, expect, it } from 'vitest';

import { canonicalKey, normalizeHeader, resolveColumns } from '../column-resolver.js';
import { FieldCatalogue, loadDefaultCatalogue } from '../field-catalogue.js';

const catalogue = new FieldCatalogue([
  { aliases: [], label: 'Loan Number', name: 'loan_number', required: true, type: 'string' },
  { aliases: [], label: 'Years in Home', name: 'years_in_home', required: true, type: 'decimal' },
  {
    aliases: ['pbw'],
    label: 'Primary Borrower Wage Income',
    name: 'primary_borrower_wage_income',
    required: true,
    type: 'decimal',
  },
  {
    aliases: [],
    label: 'Percentage of Down Payment from Borrower Own Funds',
    name: 'percentage_of_down_payment_from_borrower_own_funds',
    required: false,
    type: 'decimal',
  },
]);

describe('normalizeHeader', () => {
  it('should produce lowercase snake case', () => {
    expect(normalizeHeader('  Loan Number ')).toBe('loan_number');
    expect(normalizeHeader("Current 'Other' Monthly Payment")).toBe('current_other_monthly_payment');
    expect(normalizeHeader('Length of Employment: Borrower')).toBe('length_of_employment_borrower');
    expect(normalizeHeader('__4506-T  Indicator__')).toBe('4506_t_indicator');
  });
});

describe('canonicalKey', () => {
  it('should drop stop words and expand abbreviations', () => {
    expect(canonicalKey('Yrs in Home')).toBe('yearshome');
    expect(canonicalKey('years_in_home')).toBe('yearshome');
    expect(canonicalKey('Pct Down Payment Borrower Own Funds')).toBe('percentdownpaymentborrowerownfunds');
    expect(canonicalKey('Loan Nbr')).toBe('loannumber');
  });
});

describe('resolveColumns', () => {
  it('should match by name, canonical key and alias', () => {
    const columns = resolveColumns(
      ['Loan Nbr', 'Yrs in Home', 'PBW', 'Percentage Down Payment From Borrower Own Funds', 'Notes'],
      catalogue
    );

    expect(columns.map((column) => [column.field, column.matchedBy])).toEqual([
      ['loan_number', 'canonical'],
      ['years_in_home', 'canonical'],
      ['primary_borrower_wage_income', 'alias'],
      ['percentage_of_down_payment_from_borrower_own_funds', 'canonical'],
      ['notes', 'unmatched'],
    ]);
    expect(columns[4]?.entry).toBeUndefined();
  });

  it('should prefer an exact name and keep positions', () => {
    const columns = resolveColumns(['Years In Home', 'Loan Number'], catalogue);

    expect(columns).toEqual([
      expect.objectContaining({ field: 'years_in_home', header: 'Years In Home', index: 0, matchedBy: 'name' }),
      expect.objectContaining({ field: 'loan_number', header: 'Loan Number', index: 1, matchedBy: 'name' }),
    ]);
  });

  it('should give a repeated header its own name', () => {
    const columns = resolveColumns(['Loan Number', 'loan number', 'Comment', 'comment', ''], catalogue);

    expect(columns.map((column) => column.field)).toEqual([
      'loan_number',
      'loan_number_2',
      'comment',
      'comment_2',
      'column_5',
    ]);
  });

  it('should resolve every catalogue label to its own field', () => {
    const standard = loadDefaultCatalogue()._unsafeUnwrap();

    const columns = resolveColumns(standard.entries.map((entry) => entry.label), standard);

    expect(columns.map((column) => column.field)).toEqual(standard.entries.map((entry) => entry.name));
  });
});
