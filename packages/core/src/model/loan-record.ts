import { Decimal } from 'decimal.js';

import { MISSING, copyCell, isCellValue, present, presentValueToString, type CellValue, type PresentValue } from './cell-value.js';

export type RecordValueInput = PresentValue | CellValue | null | undefined;

/**
 * One loan row of a tape. Never mutated after ingestion; date values are
 * handed out as copies.
 *
 * Reading a field the tape does not carry yields a missing cell; the typed
 * accessors return undefined for anything that is not a present value of a
 * compatible type.
 */
export class LoanRecord {
  readonly id: string;
  readonly rowNumber: number;
  private readonly cells: ReadonlyMap<string, CellValue>;

  constructor(init: { cells: Iterable<readonly [string, CellValue]>; id: string; rowNumber: number }) {
    this.id = init.id;
    this.rowNumber = init.rowNumber;
    this.cells = new Map([...init.cells].map(([name, cell]): [string, CellValue] => [name, copyCell(cell)]));
    Object.freeze(this);
  }

  /**
   * Build a record from plain values. null and undefined become missing cells;
   * CellValue objects are taken as they are.
   */
  static fromValues(id: string, values: Record<string, RecordValueInput>, rowNumber = 0): LoanRecord {
    const cells: [string, CellValue][] = Object.entries(values).map(([name, value]): [string, CellValue] => {
      if (value === null || value === undefined) return [name, MISSING];
      if (isCellValue(value)) return [name, value];
      return [name, present(value)];
    });
    return new LoanRecord({ id, rowNumber, cells });
  }

  fieldNames(): string[] {
    return [...this.cells.keys()];
  }

  cell(name: string): CellValue {
    const cell = this.cells.get(name);
    return cell === undefined ? MISSING : copyCell(cell);
  }

  isMissing(name: string): boolean {
    return this.cell(name).status === 'missing';
  }

  isUnparseable(name: string): boolean {
    return this.cell(name).status === 'unparseable';
  }

  /** True when the cell holds no usable value (missing or unparseable) */
  isBlank(name: string): boolean {
    return this.cell(name).status !== 'present';
  }

  value(name: string): PresentValue | undefined {
    const cell = this.cell(name);
    return cell.status === 'present' ? cell.value : undefined;
  }

  text(name: string): string | undefined {
    const value = this.value(name);
    return value === undefined ? undefined : presentValueToString(value);
  }

  decimal(name: string): Decimal | undefined {
    const value = this.value(name);
    if (value instanceof Decimal) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return new Decimal(value);
    return undefined;
  }

  integer(name: string): number | undefined {
    const value = this.value(name);
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    if (value instanceof Decimal && value.isInteger()) return value.toNumber();
    return undefined;
  }

  date(name: string): Date | undefined {
    const value = this.value(name);
    return value instanceof Date ? value : undefined;
  }

  boolean(name: string): boolean | undefined {
    const value = this.value(name);
    return typeof value === 'boolean' ? value : undefined;
  }

  toJSON(): { id: string; rowNumber: number; values: Record<string, string | null> } {
    const values: Record<string, string | null> = {};
    for (const [name, cell] of this.cells) {
      values[name] =
        cell.status === 'present' ? presentValueToString(cell.value) : cell.status === 'unparseable' ? cell.raw : null;
    }
    return { id: this.id, rowNumber: this.rowNumber, values };
  }
}
