import { MISSING, present, unparseable } from '@tapeval/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { coerceCell, parseDate } from '../value-coercion.js';

function utc(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

describe('coerceCell', () => {
  it('should treat blank cells as missing for every type', () => {
    for (const type of ['string', 'integer', 'decimal', 'date', 'boolean'] as const) {
      expect(coerceCell(undefined, type)).toEqual(MISSING);
      expect(coerceCell(null, type)).toEqual(MISSING);
      expect(coerceCell('   ', type)).toEqual(MISSING);
    }
  });

  describe('decimal', () => {
    it('should strip currency symbols, separators and percent signs', () => {
      expect(coerceCell(' 1,234.50 ', 'decimal')).toEqual(present(new Decimal('1234.5')));
      expect(coerceCell('$300,000', 'decimal')).toEqual(present(new Decimal(300000)));
      expect(coerceCell('6.5%', 'decimal')).toEqual(present(new Decimal('6.5')));
    });

    it('should take workbook numbers as they are', () => {
      expect(coerceCell(0.065, 'decimal')).toEqual(present(new Decimal('0.065')));
    });

    it('should keep text that is not a number as unparseable', () => {
      expect(coerceCell('abc', 'decimal')).toEqual(unparseable('abc'));
      expect(coerceCell('0x10', 'decimal')).toEqual(unparseable('0x10'));
      expect(coerceCell('1.2.3', 'decimal')).toEqual(unparseable('1.2.3'));
    });
  });

  describe('integer', () => {
    it('should accept whole numbers only', () => {
      expect(coerceCell('360', 'integer')).toEqual(present(360));
      expect(coerceCell('360.0', 'integer')).toEqual(present(360));
      expect(coerceCell(12, 'integer')).toEqual(present(12));
      expect(coerceCell('360.5', 'integer')).toEqual(unparseable('360.5'));
      expect(coerceCell('N/A', 'integer')).toEqual(unparseable('N/A'));
    });
  });

  describe('date', () => {
    it('should read the supported layouts as UTC midnight', () => {
      expect(coerceCell('2023-04-20', 'date')).toEqual(present(utc('2023-04-20')));
      expect(coerceCell('4/20/2023', 'date')).toEqual(present(utc('2023-04-20')));
      expect(coerceCell('20230420', 'date')).toEqual(present(utc('2023-04-20')));
      expect(coerceCell(45036, 'date')).toEqual(present(utc('2023-04-20')));
      expect(coerceCell('2023-04-20T10:30:00Z', 'date')).toEqual(present(utc('2023-04-20')));
    });

    it('should treat the 1901-01-01 placeholder as missing', () => {
      expect(coerceCell('19010101', 'date')).toEqual(MISSING);
      expect(coerceCell('1901-01-01', 'date')).toEqual(MISSING);
    });

    it('should reject impossible calendar dates', () => {
      expect(coerceCell('2023-02-30', 'date')).toEqual(unparseable('2023-02-30'));
      expect(coerceCell('13/01/2023', 'date')).toEqual(unparseable('13/01/2023'));
      expect(coerceCell('soon', 'date')).toEqual(unparseable('soon'));
    });
  });

  describe('boolean', () => {
    it('should read yes/no style flags', () => {
      expect(coerceCell('Y', 'boolean')).toEqual(present(true));
      expect(coerceCell('no', 'boolean')).toEqual(present(false));
      expect(coerceCell('TRUE', 'boolean')).toEqual(present(true));
      expect(coerceCell(0, 'boolean')).toEqual(present(false));
      expect(coerceCell(true, 'boolean')).toEqual(present(true));
      expect(coerceCell('maybe', 'boolean')).toEqual(unparseable('maybe'));
    });
  });

  describe('string', () => {
    it('should trim text and render numbers as text', () => {
      expect(coerceCell('  CA ', 'string')).toEqual(present('CA'));
      expect(coerceCell(2134, 'string')).toEqual(present('2134'));
    });
  });
});

describe('parseDate', () => {
  it('should drop the time of a Date value', () => {
    expect(parseDate(new Date('2023-04-20T18:45:00.000Z'))).toEqual(utc('2023-04-20'));
  });

  it('should reject serial numbers outside the spreadsheet calendar', () => {
    expect(parseDate(0)).toBeUndefined();
    expect(parseDate(3_000_000)).toBeUndefined();
  });
});
