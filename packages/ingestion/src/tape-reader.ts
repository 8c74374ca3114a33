import fs from 'node:fs/promises';
import path from 'node:path';

import {
  IngestionError,
  LoanRecord,
  TapeSchema,
  type CellValue,
  type FieldDefinition,
  type LoanTape,
} from '@tapeval/core';
import { getLogger } from '@tapeval/logger';
import { parse } from 'csv-parse/sync';
import { err, ok, ResultAsync, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { resolveColumns, type ResolvedColumn } from './column-resolver.js';
import { loadDefaultCatalogue, type FieldCatalogue } from './field-catalogue.js';
import { coerceCell, type RawCell } from './value-coercion.js';

const logger = getLogger('tape-reader');

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xls']);

export interface ReadTapeOptions {
  catalogue?: FieldCatalogue | undefined;
  /** Rows with this field blank are dropped. Defaults to loan_number. */
  loanNumberField?: string | undefined;
}

export interface LoadedTape extends LoanTape {
  readonly source: string;
  readonly columns: readonly ResolvedColumn[];
  /** Data rows dropped for being blank or having no loan number */
  readonly droppedRows: number;
}

/**
 * A grid of cells with the header in the first row. `firstRowNumber` is the
 * spreadsheet row number of that header.
 */
export interface RawGrid {
  rows: RawCell[][];
  firstRowNumber: number;
}

function toRawCell(value: unknown): RawCell {
  if (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

function toRawRows(data: unknown): RawCell[][] {
  if (!Array.isArray(data)) return [];
  return data.map((row: unknown) => (Array.isArray(row) ? row.map((cell: unknown) => toRawCell(cell)) : []));
}

export function parseCsvGrid(content: string): RawGrid {
  const records: unknown = parse(content.replace(/^\uFEFF/, ''), {
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: false,
  });
  return { firstRowNumber: 1, rows: toRawRows(records) };
}

/**
 * Cells of the first worksheet, read with their stored values (dates arrive as
 * serial day numbers)
 */
export function parseWorkbookGrid(buffer: Buffer): RawGrid {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new Error('Workbook has no worksheets');
  }

  const ref = sheet['!ref'];
  const firstRowNumber = ref === undefined ? 1 : XLSX.utils.decode_range(ref).s.r + 1;
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { blankrows: true, defval: null, header: 1, raw: true });
  return { firstRowNumber, rows: toRawRows(rows) };
}

function isBlankRaw(cell: RawCell): boolean {
  return cell === null || cell === undefined || (typeof cell === 'string' && cell.trim() === '');
}

function headerText(cell: RawCell): string {
  if (cell === null || cell === undefined) return '';
  return cell instanceof Date ? cell.toISOString() : String(cell).trim();
}

/**
 * Type a parsed grid against the field catalogue. Catalogue columns take the
 * catalogue's type; anything else is carried as text.
 */
export function buildTape(
  grid: RawGrid,
  source: string,
  options: ReadTapeOptions = {}
): Result<LoadedTape, IngestionError> {
  const catalogueResult: Result<FieldCatalogue, IngestionError> = options.catalogue
    ? ok(options.catalogue)
    : loadDefaultCatalogue();
  if (catalogueResult.isErr()) return err(catalogueResult.error);
  const catalogue = catalogueResult.value;
  const loanNumberField = options.loanNumberField ?? 'loan_number';

  const [headerRow, ...dataRows] = grid.rows;
  const headers = (headerRow ?? []).map(headerText);
  if (headers.every((header) => header === '')) {
    return err(new IngestionError(`Tape ${source} has no header row`, { context: { source } }));
  }

  const columns = resolveColumns(headers, catalogue);
  const definitions = columns.map(
    (column): FieldDefinition =>
      column.entry
        ? catalogue.toFieldDefinition(column.entry)
        : { label: column.header, name: column.field, type: 'string' }
  );
  const schema = new TapeSchema(definitions);

  const unmatched = columns.filter((column) => column.matchedBy === 'unmatched').map((column) => column.header);
  if (unmatched.length > 0) {
    logger.debug({ headers: unmatched }, 'Columns not in the field catalogue are kept as text');
  }

  const loanNumberColumn = columns.find((column) => column.field === loanNumberField);
  const records: LoanRecord[] = [];
  let droppedRows = 0;

  dataRows.forEach((row, index) => {
    const rowNumber = grid.firstRowNumber + index + 1;
    if (row.every(isBlankRaw)) {
      droppedRows++;
      return;
    }
    if (loanNumberColumn && isBlankRaw(row[loanNumberColumn.index])) {
      logger.warn({ rowNumber }, 'Dropping row without a loan number');
      droppedRows++;
      return;
    }

    const cells = columns.map((column, position): [string, CellValue] => [
      column.field,
      coerceCell(row[column.index], definitions[position]?.type ?? 'string'),
    ]);
    records.push(new LoanRecord({ cells, id: `row-${rowNumber}`, rowNumber }));
  });

  logger.info({ columns: columns.length, droppedRows, records: records.length, source }, 'Loaded tape');
  return ok({ columns, droppedRows, records, schema, source });
}

function parseGrid(filePath: string, content: Buffer): Result<RawGrid, IngestionError> {
  const extension = path.extname(filePath).toLowerCase();
  try {
    return ok(WORKBOOK_EXTENSIONS.has(extension) ? parseWorkbookGrid(content) : parseCsvGrid(content.toString('utf-8')));
  } catch (error) {
    return err(
      new IngestionError(`Failed to parse tape ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        context: { filePath },
      })
    );
  }
}

/**
 * Read a CSV or Excel tape into typed loan records
 */
export function readTape(filePath: string, options: ReadTapeOptions = {}): ResultAsync<LoadedTape, IngestionError> {
  return ResultAsync.fromPromise(
    fs.readFile(filePath),
    (error) =>
      new IngestionError(`Failed to read tape ${filePath}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        context: { filePath },
      })
  ).andThen((content) => parseGrid(filePath, content).andThen((grid) => buildTape(grid, filePath, options)));
}
