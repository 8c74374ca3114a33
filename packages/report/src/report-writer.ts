import fs from 'node:fs';
import path from 'node:path';

import { ReportError } from '@tapeval/core';
import { getLogger } from '@tapeval/logger';
import { err, ok, type Result } from 'neverthrow';
import * as XLSX from 'xlsx';

import { buildReportSheets, type ReportInput, type ReportSheet } from './report-sheets.js';

const logger = getLogger('report-writer');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `report.xlsx` at 2024-03-05 14:07:09 UTC becomes `report_20240305_140709.xlsx`
 */
export function timestampedPath(outputPath: string, at: Date): string {
  const { dir, ext, name } = path.parse(outputPath);
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return path.join(dir, `${name}_${date}_${time}${ext || '.xlsx'}`);
}

/**
 * Widest rendered value per column, plus two characters of padding
 */
export function columnWidths(sheet: ReportSheet): number[] {
  return sheet.header.map((title, index) =>
    sheet.rows.reduce((widest, row) => Math.max(widest, String(row[index] ?? '').length), title.length) + 2
  );
}

export function toWorkbook(sheets: readonly ReportSheet[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  for (const sheet of sheets) {
    const worksheet = XLSX.utils.aoa_to_sheet([[...sheet.header], ...sheet.rows.map((row) => [...row])]);
    worksheet['!cols'] = columnWidths(sheet).map((wch) => ({ wch }));
    XLSX.utils.book_append_sheet(workbook, worksheet, sheet.name);
  }
  return workbook;
}

/**
 * Write the report workbook next to `outputPath`, stamped with the run time.
 * Returns the path actually written.
 */
export function writeReport(outputPath: string, input: ReportInput): Result<string, ReportError> {
  const target = timestampedPath(outputPath, input.generatedAt);
  try {
    const sheets = buildReportSheets(input);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    const content: unknown = XLSX.write(toWorkbook(sheets), { bookType: 'xlsx', type: 'buffer' });
    if (!(content instanceof Uint8Array)) {
      return err(new ReportError('Workbook serialization did not produce binary content', { context: { target } }));
    }
    fs.writeFileSync(target, content);
    logger.info({ sheets: sheets.length, target }, 'Wrote validation report');
    return ok(target);
  } catch (error) {
    return err(
      new ReportError(`Failed to write report ${target}: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
        context: { target },
      })
    );
  }
}
