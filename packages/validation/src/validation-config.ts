import { tryParseDecimal } from '@tapeval/core';
import { Decimal } from 'decimal.js';
import { z } from 'zod';

/**
 * Accepts a Decimal, a number, or a numeric string and yields a Decimal
 */
export const DecimalInputSchema = z
  .union([z.instanceof(Decimal), z.number(), z.string().trim()])
  .transform((value, ctx) => {
    const decimal = tryParseDecimal(value);
    if (decimal === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal value: ${String(value)}` });
      return z.NEVER;
    }
    return decimal;
  });

const NonNegativeDecimalSchema = DecimalInputSchema.refine((value) => !value.isNegative(), {
  message: 'Must not be negative',
});

export const ToleranceSchema = z.object({
  absolute: NonNegativeDecimalSchema.default('0.01'),
  relative: NonNegativeDecimalSchema.default('0'),
});

/**
 * Allowed absolute gap between a reported ratio and the one recomputed from its components
 */
export const RatioToleranceSchema = z.object({
  dti: NonNegativeDecimalSchema.default('0.00006'),
  ltv: NonNegativeDecimalSchema.default('0.001'),
  cltv: NonNegativeDecimalSchema.default('0.0001'),
});

/**
 * Start of the current UTC day
 */
export function startOfUtcDay(now: Date = new Date()): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}

/**
 * Run configuration shared by every rule
 */
export const ValidationConfigSchema = z.object({
  tolerance: ToleranceSchema.default({}),
  ratioTolerance: RatioToleranceSchema.default({}),
  /**
   * Reference date for age checks. Defaults to midnight UTC of the day the config is
   * built; pass it explicitly for runs that must give the same result on any day.
   */
  asOfDate: z
    .union([z.date(), z.string()])
    .pipe(z.coerce.date())
    .default(() => startOfUtcDay()),
  /** Pool balance stated by the seller, compared with the sum of current balances */
  statedPoolBalance: DecimalInputSchema.optional(),
});

export type ValidationConfig = z.output<typeof ValidationConfigSchema>;
export type ValidationConfigInput = z.input<typeof ValidationConfigSchema>;

/**
 * Build a config from partial input, filling in defaults.
 *
 * @throws ZodError when a value is not valid
 */
export function createValidationConfig(input: ValidationConfigInput = {}): ValidationConfig {
  return ValidationConfigSchema.parse(input);
}
