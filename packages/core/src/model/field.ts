import { IngestionError } from '../errors/index.js';

export const FIELD_TYPES = ['string', 'integer', 'decimal', 'date', 'boolean'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export type AllowedValue = string | number;

/**
 * A named, typed column slot of a loan tape
 */
export interface FieldDefinition {
  readonly name: string;
  readonly type: FieldType;
  readonly label?: string | undefined;
  readonly required?: boolean | undefined;
  /** Inclusive lower bound for numeric fields */
  readonly min?: number | undefined;
  /** Inclusive upper bound for numeric fields */
  readonly max?: number | undefined;
  readonly allowed?: readonly AllowedValue[] | undefined;
}

export function hasDomainConstraints(field: FieldDefinition): boolean {
  return field.min !== undefined || field.max !== undefined || (field.allowed?.length ?? 0) > 0;
}

/**
 * Column layout of one tape. Immutable once built.
 */
export class TapeSchema {
  readonly fields: readonly FieldDefinition[];
  private readonly byName: ReadonlyMap<string, FieldDefinition>;

  /**
   * @throws IngestionError when two fields share a name
   */
  constructor(fields: readonly FieldDefinition[]) {
    const byName = new Map<string, FieldDefinition>();
    for (const field of fields) {
      if (byName.has(field.name)) {
        throw new IngestionError(`Duplicate field "${field.name}" in tape schema`, {
          context: { field: field.name },
        });
      }
      byName.set(field.name, Object.freeze({ ...field }));
    }

    this.byName = byName;
    this.fields = Object.freeze([...byName.values()]);
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.length;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  field(name: string): FieldDefinition | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.fields.map((field) => field.name);
  }

  requiredFields(): FieldDefinition[] {
    return this.fields.filter((field) => field.required === true);
  }
}
