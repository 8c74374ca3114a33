import { Decimal } from 'decimal.js';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';

import { createValidationConfig, DecimalInputSchema } from '../validation-config.js';

describe('createValidationConfig', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should fill in defaults', () => {
    const config = createValidationConfig();

    expect(config.tolerance.absolute.toString()).toBe('0.01');
    expect(config.tolerance.relative.toString()).toBe('0');
    expect(config.asOfDate).toBeInstanceOf(Date);
    expect(config.statedPoolBalance).toBeUndefined();
  });

  it('should default ratio tolerances and accept overrides', () => {
    const defaults = createValidationConfig().ratioTolerance;
    const custom = createValidationConfig({ ratioTolerance: { ltv: '0.005' } }).ratioTolerance;

    expect(defaults.dti.toString()).toBe('0.00006');
    expect(defaults.ltv.toString()).toBe('0.001');
    expect(defaults.cltv.toString()).toBe('0.0001');
    expect(custom.ltv.toString()).toBe('0.005');
    expect(custom.cltv.toString()).toBe('0.0001');
  });

  it('should reject a negative ratio tolerance', () => {
    expect(() => createValidationConfig({ ratioTolerance: { dti: -0.1 } })).toThrow(ZodError);
  });

  it('should default the as-of date to midnight UTC of the current day', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-15T17:42:09.123Z'));
    const morning = createValidationConfig().asOfDate;
    vi.setSystemTime(new Date('2024-03-15T23:59:59.999Z'));
    const evening = createValidationConfig().asOfDate;

    expect(morning.toISOString()).toBe('2024-03-15T00:00:00.000Z');
    expect(evening.getTime()).toBe(morning.getTime());
  });

  it('should parse string inputs', () => {
    const config = createValidationConfig({
      asOfDate: '2024-06-30',
      statedPoolBalance: '1250000.50',
      tolerance: { absolute: '0.5', relative: 0.001 },
    });

    expect(config.asOfDate.toISOString()).toBe('2024-06-30T00:00:00.000Z');
    expect(config.statedPoolBalance?.toString()).toBe('1250000.5');
    expect(config.tolerance.absolute.toString()).toBe('0.5');
    expect(config.tolerance.relative.toString()).toBe('0.001');
  });

  it('should keep the default for a tolerance component left out', () => {
    const config = createValidationConfig({ tolerance: { relative: '0.0001' } });

    expect(config.tolerance.absolute.toString()).toBe('0.01');
  });

  it('should reject a negative tolerance', () => {
    expect(() => createValidationConfig({ tolerance: { absolute: '-1' } })).toThrow(ZodError);
  });

  it('should reject an unparseable date', () => {
    expect(() => createValidationConfig({ asOfDate: 'not a date' })).toThrow(ZodError);
  });

  it('should reject a non-numeric pool balance', () => {
    expect(() => createValidationConfig({ statedPoolBalance: 'lots' })).toThrow('Invalid decimal value: lots');
  });
});

describe('DecimalInputSchema', () => {
  it('should accept decimals, numbers and trimmed strings', () => {
    expect(DecimalInputSchema.parse(new Decimal('1.5')).toString()).toBe('1.5');
    expect(DecimalInputSchema.parse(2).toString()).toBe('2');
    expect(DecimalInputSchema.parse(' 3.25 ').toString()).toBe('3.25');
  });

  it('should reject an empty string', () => {
    expect(DecimalInputSchema.safeParse('').success).toBe(false);
  });
});
