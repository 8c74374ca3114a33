import fs from 'node:fs';

import { DimensionDefinitionError } from '@tapeval/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

export const AGGREGATE_KINDS = ['sum', 'average', 'weighted_average', 'min', 'max'] as const;

export type AggregateKind = (typeof AGGREGATE_KINDS)[number];

export const DEFAULT_OVERFLOW_LABEL = 'overflow';

const LabelSchema = z.string().trim().min(1);

const RangeSchema = z.object({
  label: LabelSchema,
  /** Inclusive */
  min: z.number().finite().optional(),
  /** Exclusive */
  max: z.number().finite().optional(),
});

const CategorySchema = z.object({
  label: LabelSchema,
  values: z.array(z.union([z.string(), z.number()])).min(1),
});

export const BucketsSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('range'), ranges: z.array(RangeSchema).min(1) }),
  z.object({ kind: z.literal('category'), categories: z.array(CategorySchema).min(1) }),
  z.object({ kind: z.literal('distinct') }),
]);

export const AggregateSpecSchema = z
  .object({
    name: LabelSchema,
    field: LabelSchema,
    kind: z.enum(AGGREGATE_KINDS),
    weightField: LabelSchema.optional(),
  })
  .refine((aggregate) => aggregate.kind !== 'weighted_average' || aggregate.weightField !== undefined, {
    message: 'weighted_average needs a weightField',
    path: ['weightField'],
  });

export const DimensionSpecSchema = z.object({
  name: LabelSchema,
  field: LabelSchema,
  buckets: BucketsSchema,
  aggregates: z.array(AggregateSpecSchema).default([]),
  overflowLabel: LabelSchema.default(DEFAULT_OVERFLOW_LABEL),
});

export const DimensionSpecListSchema = z.array(DimensionSpecSchema);

export type RangeBucket = z.output<typeof RangeSchema>;
export type CategoryBucket = z.output<typeof CategorySchema>;
export type BucketSpec = z.output<typeof BucketsSchema>;
export type AggregateSpec = z.output<typeof AggregateSpecSchema>;
export type DimensionSpec = z.output<typeof DimensionSpecSchema>;
export type DimensionSpecInput = z.input<typeof DimensionSpecSchema>;

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

export function normalizeCategoryValue(value: string | number): string {
  return String(value).trim().toLowerCase();
}

function invalid(spec: { name: string }, message: string): never {
  throw new DimensionDefinitionError(`Dimension "${spec.name}": ${message}`, { context: { dimension: spec.name } });
}

function checkRanges(spec: DimensionSpec, ranges: readonly RangeBucket[]): void {
  ranges.forEach((range, index) => {
    if (range.min !== undefined && range.max !== undefined && range.min >= range.max) {
      invalid(spec, `range "${range.label}" has min ${range.min} not below max ${range.max}`);
    }
    if (range.min === undefined && index > 0) {
      invalid(spec, `only the first range may be open below ("${range.label}")`);
    }
    if (range.max === undefined && index < ranges.length - 1) {
      invalid(spec, `only the last range may be open above ("${range.label}")`);
    }

    const previous = index > 0 ? ranges[index - 1] : undefined;
    if (previous?.max !== undefined && range.min !== undefined) {
      if (range.min < previous.max) {
        invalid(spec, `ranges "${previous.label}" and "${range.label}" overlap`);
      }
      if (range.min > previous.max) {
        invalid(spec, `gap between "${previous.label}" and "${range.label}" (${previous.max} to ${range.min})`);
      }
    }
  });
}

function checkCategories(spec: DimensionSpec, categories: readonly CategoryBucket[]): void {
  const owner = new Map<string, string>();
  for (const category of categories) {
    for (const value of category.values) {
      const key = normalizeCategoryValue(value);
      const existing = owner.get(key);
      if (existing !== undefined) {
        invalid(spec, `value "${String(value)}" appears in both "${existing}" and "${category.label}"`);
      }
      owner.set(key, category.label);
    }
  }
}

function checkUnique(spec: DimensionSpec, names: readonly string[], what: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) invalid(spec, `duplicate ${what} "${name}"`);
    seen.add(name);
  }
}

/**
 * Check bucket structure that the schema alone cannot express
 *
 * @throws DimensionDefinitionError
 */
export function assertValidDimension(spec: DimensionSpec): void {
  const { buckets } = spec;
  switch (buckets.kind) {
    case 'range':
      checkUnique(spec, [...buckets.ranges.map((range) => range.label), spec.overflowLabel], 'bucket label');
      checkRanges(spec, buckets.ranges);
      break;
    case 'category':
      checkUnique(
        spec,
        [...buckets.categories.map((category) => category.label), spec.overflowLabel],
        'bucket label'
      );
      checkCategories(spec, buckets.categories);
      break;
    case 'distinct':
      break;
  }
  checkUnique(
    spec,
    spec.aggregates.map((aggregate) => aggregate.name),
    'aggregate'
  );
}

/**
 * Parse and check a dimension spec, filling in defaults
 *
 * @throws DimensionDefinitionError
 */
export function defineDimension(input: DimensionSpecInput): DimensionSpec {
  const parsed = DimensionSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new DimensionDefinitionError(`Invalid dimension spec:\n${formatIssues(parsed.error.issues)}`, {
      context: { dimension: input.name },
    });
  }
  assertValidDimension(parsed.data);
  return parsed.data;
}

/**
 * Parse a list of dimension specs from already-decoded JSON
 */
export function parseDimensionSpecs(data: unknown): Result<DimensionSpec[], DimensionDefinitionError> {
  const parsed = DimensionSpecListSchema.safeParse(data);
  if (!parsed.success) {
    return err(new DimensionDefinitionError(`Invalid dimension specs:\n${formatIssues(parsed.error.issues)}`));
  }

  try {
    for (const spec of parsed.data) {
      assertValidDimension(spec);
    }
  } catch (error) {
    if (error instanceof DimensionDefinitionError) return err(error);
    throw error;
  }
  return ok(parsed.data);
}

/**
 * Load custom dimensions from a JSON file holding an array of specs
 */
export function loadDimensionSpecs(filePath: string): Result<DimensionSpec[], DimensionDefinitionError> {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    return err(
      new DimensionDefinitionError(
        `Failed to load dimension specs from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error, context: { filePath } }
      )
    );
  }
  return parseDimensionSpecs(data);
}
