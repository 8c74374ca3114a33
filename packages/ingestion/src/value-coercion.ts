import { MISSING, present, presentValueToString, unparseable, type CellValue, type FieldType } from '@tapeval/core';
import { Decimal } from 'decimal.js';

/**
 * A cell as the file readers hand it over: text from CSV, text or numbers
 * from a workbook
 */
export type RawCell = string | number | boolean | Date | null | undefined;

const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ][\d:.]+Z?)?$/;
const US_DATE_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

const MS_PER_DAY = 86_400_000;
const EXCEL_EPOCH = Date.UTC(1899, 11, 30);
// 9999-12-31
const MAX_EXCEL_SERIAL = 2_958_465;

// Placeholder dates some servicing systems write for "unknown"
const SENTINEL_DATES = new Set(['1901-01-01']);

const TRUE_TOKENS = new Set(['y', 'yes', 'true', '1']);
const FALSE_TOKENS = new Set(['n', 'no', 'false', '0']);

function rawToText(raw: Exclude<RawCell, null | undefined>): string {
  return presentValueToString(raw).trim();
}

function parseNumber(text: string): Decimal | undefined {
  const cleaned = text.replace(/[$,%\s]/g, '');
  if (!NUMBER_PATTERN.test(cleaned)) return undefined;
  const value = new Decimal(cleaned);
  return value.isFinite() ? value : undefined;
}

function utcDate(year: number, month: number, day: number): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function fromExcelSerial(serial: number): Date | undefined {
  if (!Number.isFinite(serial) || serial < 1 || serial > MAX_EXCEL_SERIAL) return undefined;
  return new Date(EXCEL_EPOCH + Math.floor(serial) * MS_PER_DAY);
}

/**
 * Parse a date cell to UTC midnight. Accepts YYYY-MM-DD (with an optional
 * time part), M/D/YYYY, YYYYMMDD and Excel serial day numbers.
 */
export function parseDate(raw: Exclude<RawCell, null | undefined>): Date | undefined {
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime())
      ? undefined
      : new Date(Date.UTC(raw.getUTCFullYear(), raw.getUTCMonth(), raw.getUTCDate()));
  }
  if (typeof raw === 'boolean') return undefined;

  const text = rawToText(raw);
  let match = ISO_DATE_PATTERN.exec(text);
  if (match) return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = US_DATE_PATTERN.exec(text);
  if (match) return utcDate(Number(match[3]), Number(match[1]), Number(match[2]));

  match = COMPACT_DATE_PATTERN.exec(text);
  if (match) return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));

  if (NUMBER_PATTERN.test(text)) return fromExcelSerial(Number(text));
  return undefined;
}

function coerceDecimal(raw: Exclude<RawCell, null | undefined>, text: string): CellValue {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? present(new Decimal(raw)) : unparseable(text);
  }
  const value = parseNumber(text);
  return value === undefined ? unparseable(text) : present(value);
}

function coerceInteger(raw: Exclude<RawCell, null | undefined>, text: string): CellValue {
  const value = typeof raw === 'number' ? (Number.isFinite(raw) ? new Decimal(raw) : undefined) : parseNumber(text);
  if (value === undefined || !value.isInteger()) return unparseable(text);
  return present(value.toNumber());
}

function coerceDate(raw: Exclude<RawCell, null | undefined>, text: string): CellValue {
  const date = parseDate(raw);
  if (date === undefined) return unparseable(text);
  return SENTINEL_DATES.has(date.toISOString().slice(0, 10)) ? MISSING : present(date);
}

function coerceBoolean(raw: Exclude<RawCell, null | undefined>, text: string): CellValue {
  if (typeof raw === 'boolean') return present(raw);
  const token = text.toLowerCase();
  if (TRUE_TOKENS.has(token)) return present(true);
  if (FALSE_TOKENS.has(token)) return present(false);
  return unparseable(text);
}

/**
 * Type one cell for its field. Blank cells are missing; a value that cannot
 * be read as the field's type is kept as unparseable with its original text.
 */
export function coerceCell(raw: RawCell, type: FieldType): CellValue {
  if (raw === null || raw === undefined) return MISSING;
  const text = rawToText(raw);
  if (text === '') return MISSING;

  switch (type) {
    case 'string':
      return present(text);
    case 'decimal':
      return coerceDecimal(raw, text);
    case 'integer':
      return coerceInteger(raw, text);
    case 'date':
      return coerceDate(raw, text);
    case 'boolean':
      return coerceBoolean(raw, text);
  }
}
