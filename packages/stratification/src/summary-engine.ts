import { DimensionDefinitionError, type LoanRecord } from '@tapeval/core';
import { getLogger } from '@tapeval/logger';
import { Decimal } from 'decimal.js';

import { AggregateAccumulator, type AggregateValue } from './aggregates.js';
import { assertValidDimension, normalizeCategoryValue, type DimensionSpec } from './dimension-spec.js';

const logger = getLogger('stratification');

export interface SummaryRow {
  readonly label: string;
  readonly count: number;
  /** count / recordCount; zero for an empty tape */
  readonly share: Decimal;
  readonly aggregates: readonly AggregateValue[];
  readonly overflow: boolean;
}

/**
 * One stratification of the tape: a row per bucket in declaration order, the
 * overflow row last, and a total over every record.
 */
export interface SummaryTable {
  readonly dimension: string;
  readonly field: string;
  readonly rows: readonly SummaryRow[];
  readonly total: SummaryRow;
  readonly recordCount: number;
}

type BucketAssigner = (record: LoanRecord) => string | undefined;

/**
 * Returns the bucket label for a record, or undefined for overflow
 */
function createAssigner(spec: DimensionSpec): BucketAssigner {
  const { buckets, field } = spec;
  switch (buckets.kind) {
    case 'range':
      return (record) => {
        const value = record.decimal(field);
        if (value === undefined) return undefined;
        return buckets.ranges.find(
          (range) =>
            (range.min === undefined || value.greaterThanOrEqualTo(range.min)) &&
            (range.max === undefined || value.lessThan(range.max))
        )?.label;
      };
    case 'category': {
      const byValue = new Map<string, string>();
      for (const category of buckets.categories) {
        for (const value of category.values) {
          byValue.set(normalizeCategoryValue(value), category.label);
        }
      }
      return (record) => {
        const text = record.text(field);
        return text === undefined ? undefined : byValue.get(normalizeCategoryValue(text));
      };
    }
    case 'distinct':
      return (record) => {
        const text = record.text(field)?.trim();
        return text ? text : undefined;
      };
  }
}

function declaredLabels(spec: DimensionSpec, seen: Iterable<string>): string[] {
  const { buckets } = spec;
  switch (buckets.kind) {
    case 'range':
      return buckets.ranges.map((range) => range.label);
    case 'category':
      return buckets.categories.map((category) => category.label);
    case 'distinct':
      return [...seen].sort((a, b) => a.localeCompare(b, undefined, { numeric: true }));
  }
}

/**
 * A distinct value equal to the overflow label is suffixed until it matches no other row
 */
function rowLabel(spec: DimensionSpec, label: string, grouped: ReadonlyMap<string, unknown>): string {
  if (label !== spec.overflowLabel) return label;
  let candidate = `${label} (value)`;
  while (grouped.has(candidate)) {
    candidate = `${candidate} (value)`;
  }
  return candidate;
}

function buildRow(
  spec: DimensionSpec,
  label: string,
  records: readonly LoanRecord[],
  recordCount: number,
  overflow: boolean
): SummaryRow {
  const accumulators = spec.aggregates.map((aggregate) => new AggregateAccumulator(aggregate));
  for (const record of records) {
    for (const accumulator of accumulators) {
      accumulator.add(record);
    }
  }
  return {
    aggregates: accumulators.map((accumulator) => accumulator.result()),
    count: records.length,
    label,
    overflow,
    share: recordCount === 0 ? new Decimal(0) : new Decimal(records.length).dividedBy(recordCount),
  };
}

/**
 * Bucket every record on the dimension's field and aggregate each bucket.
 * Missing, unparseable and out-of-range values land in the overflow row.
 *
 * @throws DimensionDefinitionError when the buckets are malformed
 */
export function summarize(records: readonly LoanRecord[], spec: DimensionSpec): SummaryTable {
  assertValidDimension(spec);

  const assign = createAssigner(spec);
  const grouped = new Map<string, LoanRecord[]>();
  const overflow: LoanRecord[] = [];
  for (const record of records) {
    const label = assign(record);
    if (label === undefined) {
      overflow.push(record);
      continue;
    }
    const members = grouped.get(label);
    if (members) {
      members.push(record);
    } else {
      grouped.set(label, [record]);
    }
  }

  const recordCount = records.length;
  const rows = declaredLabels(spec, grouped.keys()).map((label) =>
    buildRow(spec, rowLabel(spec, label, grouped), grouped.get(label) ?? [], recordCount, false)
  );
  rows.push(buildRow(spec, spec.overflowLabel, overflow, recordCount, true));

  logger.debug(
    { buckets: rows.length, dimension: spec.name, overflow: overflow.length, recordCount },
    'Stratified records'
  );

  return {
    dimension: spec.name,
    field: spec.field,
    recordCount,
    rows,
    total: buildRow(spec, 'total', records, recordCount, false),
  };
}

/**
 * Run each dimension independently over the same records
 *
 * @throws DimensionDefinitionError when two dimensions share a name
 */
export function summarizeAll(records: readonly LoanRecord[], specs: readonly DimensionSpec[]): SummaryTable[] {
  const names = new Set<string>();
  for (const spec of specs) {
    if (names.has(spec.name)) {
      throw new DimensionDefinitionError(`Duplicate dimension "${spec.name}"`, { context: { dimension: spec.name } });
    }
    names.add(spec.name);
  }
  return specs.map((spec) => summarize(records, spec));
}
