import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatDecimal, parseDecimal, sumDecimals, tryParseDecimal, withinTolerance } from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse numeric strings and numbers', () => {
      expect(tryParseDecimal('123.456')?.toString()).toBe('123.456');
      expect(tryParseDecimal(42)?.toNumber()).toBe(42);
    });

    it('should return undefined for blanks and garbage', () => {
      expect(tryParseDecimal('')).toBeUndefined();
      expect(tryParseDecimal(null)).toBeUndefined();
      expect(tryParseDecimal('12,000')).toBeUndefined();
      expect(tryParseDecimal(Number.NaN)).toBeUndefined();
    });
  });

  describe('parseDecimal', () => {
    it('should fall back to zero', () => {
      expect(parseDecimal('abc').isZero()).toBe(true);
      expect(parseDecimal('0.25').toString()).toBe('0.25');
    });
  });

  describe('withinTolerance', () => {
    it('should accept differences up to the absolute tolerance', () => {
      const tolerance = { absolute: new Decimal('0.01'), relative: new Decimal(0) };

      expect(withinTolerance('100.01', '100', tolerance)).toBe(true);
      expect(withinTolerance('100.02', '100', tolerance)).toBe(false);
    });

    it('should use the relative tolerance when it is wider', () => {
      const tolerance = { absolute: new Decimal('0.01'), relative: new Decimal('0.001') };

      expect(withinTolerance('1000.9', '1000', tolerance)).toBe(true);
      expect(withinTolerance('1001.1', '1000', tolerance)).toBe(false);
    });

    it('should avoid floating point false positives', () => {
      expect(withinTolerance(0.1 + 0.2, '0.3')).toBe(true);
    });
  });

  describe('sumDecimals', () => {
    it('should add exactly', () => {
      expect(sumDecimals([new Decimal('0.1'), new Decimal('0.2')]).toString()).toBe('0.3');
      expect(sumDecimals([]).isZero()).toBe(true);
    });
  });

  describe('formatDecimal', () => {
    it('should trim trailing zeros', () => {
      expect(formatDecimal(new Decimal('5.66666666'))).toBe('5.6667');
      expect(formatDecimal(new Decimal('12.5000'))).toBe('12.5');
      expect(formatDecimal(new Decimal(100), 0)).toBe('100');
    });
  });
});
