import type { LoanRecord } from '@tapeval/core';
import { Decimal } from 'decimal.js';

import type { AggregateKind, AggregateSpec } from './dimension-spec.js';

export interface AggregateValue {
  readonly name: string;
  readonly kind: AggregateKind;
  /** Undefined when no record contributed */
  readonly value: Decimal | undefined;
  /** Records whose value (and weight, for a weighted average) was usable */
  readonly contributors: number;
}

/**
 * Running state of one aggregate over the records of a bucket
 */
export class AggregateAccumulator {
  private contributors = 0;
  private total = new Decimal(0);
  private weightTotal = new Decimal(0);
  private extreme: Decimal | undefined;

  constructor(private readonly spec: AggregateSpec) {}

  add(record: LoanRecord): void {
    const value = record.decimal(this.spec.field);
    if (value === undefined) return;

    switch (this.spec.kind) {
      case 'sum':
      case 'average':
        this.total = this.total.plus(value);
        break;
      case 'weighted_average': {
        const weight = this.spec.weightField === undefined ? undefined : record.decimal(this.spec.weightField);
        // Zero or missing weight: counted in the bucket, left out of the average
        if (weight === undefined || weight.isZero()) return;
        this.total = this.total.plus(value.times(weight));
        this.weightTotal = this.weightTotal.plus(weight);
        break;
      }
      case 'min':
        this.extreme = this.extreme === undefined ? value : Decimal.min(this.extreme, value);
        break;
      case 'max':
        this.extreme = this.extreme === undefined ? value : Decimal.max(this.extreme, value);
        break;
    }
    this.contributors += 1;
  }

  result(): AggregateValue {
    return {
      contributors: this.contributors,
      kind: this.spec.kind,
      name: this.spec.name,
      value: this.contributors === 0 ? undefined : this.compute(),
    };
  }

  private compute(): Decimal | undefined {
    switch (this.spec.kind) {
      case 'sum':
        return this.total;
      case 'average':
        return this.total.dividedBy(this.contributors);
      case 'weighted_average':
        return this.weightTotal.isZero() ? undefined : this.total.dividedBy(this.weightTotal);
      case 'min':
      case 'max':
        return this.extreme;
    }
  }
}
