import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { MISSING, unparseable } from '../cell-value.js';
import { LoanRecord } from '../loan-record.js';

describe('LoanRecord', () => {
  const record = LoanRecord.fromValues(
    'row-2',
    {
      loan_number: 'LN-1001',
      current_loan_amount: new Decimal('250000.50'),
      total_number_of_borrowers: 2,
      origination_date: new Date(Date.UTC(2023, 4, 1)),
      self_employed: true,
      sales_price: null,
      original_ltv: unparseable('n/a'),
    },
    2
  );

  it('should keep the id and row number', () => {
    expect(record.id).toBe('row-2');
    expect(record.rowNumber).toBe(2);
  });

  it('should distinguish missing from unparseable values', () => {
    expect(record.isMissing('sales_price')).toBe(true);
    expect(record.isUnparseable('sales_price')).toBe(false);
    expect(record.isMissing('original_ltv')).toBe(false);
    expect(record.isUnparseable('original_ltv')).toBe(true);
    expect(record.isBlank('original_ltv')).toBe(true);
  });

  it('should treat fields outside the tape as missing', () => {
    expect(record.cell('gross_margin')).toEqual(MISSING);
    expect(record.decimal('gross_margin')).toBeUndefined();
  });

  it('should expose typed accessors', () => {
    expect(record.decimal('current_loan_amount')?.toString()).toBe('250000.5');
    expect(record.decimal('total_number_of_borrowers')?.toNumber()).toBe(2);
    expect(record.integer('total_number_of_borrowers')).toBe(2);
    expect(record.integer('current_loan_amount')).toBeUndefined();
    expect(record.text('loan_number')).toBe('LN-1001');
    expect(record.text('origination_date')).toBe('2023-05-01');
    expect(record.boolean('self_employed')).toBe(true);
    expect(record.date('loan_number')).toBeUndefined();
  });

  it('should not let callers mutate stored dates', () => {
    const date = record.date('origination_date');
    date?.setUTCFullYear(1999);

    expect(record.text('origination_date')).toBe('2023-05-01');
  });

  it('should not let callers mutate stored dates through value or cell', () => {
    const noteDate = new Date(Date.UTC(2020, 0, 1));
    const dated = LoanRecord.fromValues('row-3', { note_date: noteDate }, 3);
    noteDate.setUTCFullYear(1990);

    const value = dated.value('note_date');
    if (value instanceof Date) value.setUTCFullYear(1999);
    const cell = dated.cell('note_date');
    if (cell.status === 'present' && cell.value instanceof Date) cell.value.setUTCFullYear(2005);

    expect(dated.date('note_date')?.toISOString()).toBe('2020-01-01T00:00:00.000Z');
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('should serialize cells to plain values', () => {
    expect(record.toJSON().values).toEqual({
      loan_number: 'LN-1001',
      current_loan_amount: '250000.5',
      total_number_of_borrowers: '2',
      origination_date: '2023-05-01',
      self_employed: 'true',
      sales_price: null,
      original_ltv: 'n/a',
    });
  });
});
