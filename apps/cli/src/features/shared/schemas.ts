import { tryParseDecimal } from '@tapeval/core';
import { logLevelSchema } from '@tapeval/logger';
import { z } from 'zod';

export const JsonFlagSchema = z.object({
  json: z.boolean().optional(),
});

/**
 * Comma separated rule ids, e.g. `--skip dti_range,ltv_cltv`
 */
export const RuleIdListSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  )
  .refine((ids) => ids.length > 0, { message: 'Expected at least one rule id' });

const AmountSchema = (flag: string) =>
  z
    .string()
    .trim()
    .refine((value) => tryParseDecimal(value)?.isNegative() === false, {
      message: `${flag} must be a non-negative number`,
    });

const DateFlagSchema = z
  .string()
  .trim()
  .refine((value) => /^\d{4}-\d{2}-\d{2}/.test(value) && !Number.isNaN(Date.parse(value)), {
    message: '--as-of must be a date in YYYY-MM-DD format',
  });

/**
 * Run command options
 */
export const RunCommandOptionsSchema = z
  .object({
    output: z.string().min(1).default('tape-validation-report.xlsx'),
    logLevel: logLevelSchema.optional(),
    only: RuleIdListSchema.optional(),
    skip: RuleIdListSchema.optional(),
    tolerance: AmountSchema('--tolerance').optional(),
    relativeTolerance: AmountSchema('--relative-tolerance').optional(),
    poolBalance: AmountSchema('--pool-balance').optional(),
    asOf: DateFlagSchema.optional(),
    strats: z.string().min(1).optional(),
  })
  .extend(JsonFlagSchema.shape)
  .superRefine((data, ctx) => {
    const skipped = new Set(data.skip ?? []);
    const both = (data.only ?? []).filter((id) => skipped.has(id));
    if (both.length > 0) {
      ctx.addIssue({
        code: 'custom',
        message: `Rule ids cannot be both selected and skipped: ${both.join(', ')}`,
        path: ['skip'],
      });
    }
  });

/**
 * Rules command options
 */
export const RulesCommandOptionsSchema = JsonFlagSchema;
