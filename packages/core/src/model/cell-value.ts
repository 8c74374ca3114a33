import { Decimal } from 'decimal.js';

/**
 * Typed value of a populated cell: string for string fields, number for
 * integers, Decimal for decimals, Date (UTC midnight) for dates.
 */
export type PresentValue = string | number | boolean | Date | Decimal;

export type CellValue =
  | { readonly status: 'present'; readonly value: PresentValue }
  | { readonly status: 'missing' }
  | { readonly status: 'unparseable'; readonly raw: string };

export type PresentCell = Extract<CellValue, { status: 'present' }>;

export const MISSING: CellValue = Object.freeze({ status: 'missing' });

/**
 * A present cell. Dates are copied so the cell never shares one with its caller.
 */
export function present(value: PresentValue): CellValue {
  return Object.freeze({ status: 'present', value: value instanceof Date ? new Date(value.getTime()) : value });
}

/**
 * The cell itself, or a fresh copy when it holds a mutable Date
 */
export function copyCell(cell: CellValue): CellValue {
  return cell.status === 'present' && cell.value instanceof Date ? present(cell.value) : cell;
}

export function unparseable(raw: string): CellValue {
  return Object.freeze({ status: 'unparseable', raw });
}

export function isPresent(cell: CellValue): cell is PresentCell {
  return cell.status === 'present';
}

export function isCellValue(value: unknown): value is CellValue {
  if (typeof value !== 'object' || value === null || value instanceof Decimal || value instanceof Date) {
    return false;
  }
  return 'status' in value && (value.status === 'present' || value.status === 'missing' || value.status === 'unparseable');
}

/**
 * Render a present value the way it would appear in a report cell
 */
export function presentValueToString(value: PresentValue): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  if (value instanceof Decimal) {
    return value.toString();
  }
  return String(value);
}
