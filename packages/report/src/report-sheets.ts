import type { LoanRecord } from '@tapeval/core';
import type { SummaryRow, SummaryTable } from '@tapeval/stratification';
import {
  REQUIRED_FIELDS_RULE_ID,
  type RuleOutcome,
  type Severity,
  type ValidationResultSet,
} from '@tapeval/validation';
import type { Decimal } from 'decimal.js';

export type ReportCell = string | number | null;

export interface ReportSheet {
  readonly name: string;
  readonly header: readonly string[];
  readonly rows: readonly (readonly ReportCell[])[];
}

export interface ReportInput {
  /** Path or name of the tape the results came from */
  source: string;
  generatedAt: Date;
  results: ValidationResultSet;
  /** Records of the run, used to show loan numbers and row numbers */
  records: readonly LoanRecord[];
  strats?: readonly SummaryTable[] | undefined;
  loanNumberField?: string | undefined;
}

export const MAX_SHEET_NAME_LENGTH = 31;

const OUTCOME_HEADER = [
  'rule',
  'severity',
  'description',
  'record_id',
  'row_number',
  'loan_number',
  'fields',
  'detail',
];

const SEVERITY_SHEETS: readonly [Severity, string][] = [
  ['error', 'issues'],
  ['warning', 'warnings'],
  ['info', 'info'],
];

/**
 * Excel limits sheet names to 31 characters and rejects a few punctuation marks
 */
export function toSheetName(name: string, taken: ReadonlySet<string> = new Set()): string {
  const base = name.replace(/[[\]:*?/\\]/g, '_').slice(0, MAX_SHEET_NAME_LENGTH);
  let candidate = base;
  for (let n = 2; taken.has(candidate.toLowerCase()); n++) {
    const suffix = `~${n}`;
    candidate = `${base.slice(0, MAX_SHEET_NAME_LENGTH - suffix.length)}${suffix}`;
  }
  return candidate;
}

function round(value: Decimal, places = 4): number {
  return value.toDecimalPlaces(places).toNumber();
}

class RecordLookup {
  private readonly byId: ReadonlyMap<string, LoanRecord>;

  constructor(
    records: readonly LoanRecord[],
    private readonly loanNumberField: string
  ) {
    this.byId = new Map(records.map((record): [string, LoanRecord] => [record.id, record]));
  }

  rowNumber(recordId: string | undefined): number | null {
    return recordId === undefined ? null : (this.byId.get(recordId)?.rowNumber ?? null);
  }

  loanNumber(recordId: string | undefined): string | null {
    return recordId === undefined ? null : (this.byId.get(recordId)?.text(this.loanNumberField) ?? null);
  }
}

function outcomeRow(
  outcome: RuleOutcome,
  lookup: RecordLookup,
  descriptions: ReadonlyMap<string, string>
): ReportCell[] {
  return [
    outcome.ruleId,
    outcome.severity,
    descriptions.get(outcome.ruleId) ?? null,
    outcome.recordId ?? null,
    lookup.rowNumber(outcome.recordId),
    lookup.loanNumber(outcome.recordId),
    outcome.fields.join(', '),
    outcome.detail,
  ];
}

function summarySheet(input: ReportInput): ReportSheet {
  const { results } = input;
  return {
    header: ['metric', 'value'],
    name: 'summary',
    rows: [
      ['input_file', input.source],
      ['generated_at', input.generatedAt.toISOString()],
      ['row_count', results.recordCount],
      ['error_count', results.countsBySeverity.error],
      ['warning_count', results.countsBySeverity.warning],
      ['info_count', results.countsBySeverity.info],
      ['executed_rules', results.executedRuleCount],
      ['skipped_rules', results.skippedRules.length],
      ['faulted_rules', results.faultedRules.length],
    ],
  };
}

function ruleSummarySheet(results: ValidationResultSet): ReportSheet {
  const rows = results
    .ruleSummaries()
    .filter((summary) => summary.failCount > 0)
    .sort((a, b) => b.failCount - a.failCount || a.ruleId.localeCompare(b.ruleId))
    .map((summary): ReportCell[] => [summary.ruleId, summary.severity, summary.description, summary.failCount]);
  return { header: ['rule', 'severity', 'description', 'fail_count'], name: 'rule_summary', rows };
}

function missingRequiredSheet(results: ValidationResultSet, lookup: RecordLookup): ReportSheet {
  const rows = results
    .failures()
    .filter((outcome) => outcome.ruleId === REQUIRED_FIELDS_RULE_ID && !outcome.faulted)
    .flatMap((outcome) =>
      outcome.fields.map((field): ReportCell[] => [
        lookup.loanNumber(outcome.recordId),
        outcome.recordId ?? null,
        field,
      ])
    );
  return { header: ['loan_number', 'record_id', 'missing_field'], name: 'missing_required_fields', rows };
}

function stratRow(row: SummaryRow): ReportCell[] {
  return [
    row.label,
    row.count,
    round(row.share),
    ...row.aggregates.map((aggregate) => (aggregate.value === undefined ? null : round(aggregate.value))),
  ];
}

function stratSheet(table: SummaryTable, name: string): ReportSheet {
  const aggregateNames = table.total.aggregates.map((aggregate) => aggregate.name);
  return {
    header: ['bucket', 'count', 'share', ...aggregateNames],
    name,
    rows: [...table.rows.map(stratRow), stratRow(table.total)],
  };
}

/**
 * Lay out a validation run as report sheets. Every sheet is present even when
 * it has no rows.
 */
export function buildReportSheets(input: ReportInput): ReportSheet[] {
  const { results } = input;
  const lookup = new RecordLookup(input.records, input.loanNumberField ?? 'loan_number');

  const descriptions = new Map(
    results.ruleSummaries().map((summary): [string, string] => [summary.ruleId, summary.description])
  );

  const sheets: ReportSheet[] = [summarySheet(input), ruleSummarySheet(results)];

  for (const [severity, name] of SEVERITY_SHEETS) {
    sheets.push({
      header: OUTCOME_HEADER,
      name,
      rows: results.failuresBySeverity(severity).map((outcome) => outcomeRow(outcome, lookup, descriptions)),
    });
  }

  sheets.push(
    missingRequiredSheet(results, lookup),
    {
      header: ['rule', 'severity', 'reason', 'missing_columns'],
      name: 'skipped_rules',
      rows: results.skippedRules.map((rule): ReportCell[] => [
        rule.ruleId,
        rule.severity,
        rule.reason,
        rule.missingFields.join(', '),
      ]),
    },
    {
      header: ['rule', 'occurrences', 'message'],
      name: 'faulted_rules',
      rows: results.faultedRules.map((rule): ReportCell[] => [rule.ruleId, rule.occurrences, rule.message]),
    }
  );

  const taken = new Set(sheets.map((sheet) => sheet.name.toLowerCase()));
  for (const table of input.strats ?? []) {
    const name = toSheetName(`strat_${table.dimension}`, taken);
    taken.add(name.toLowerCase());
    sheets.push(stratSheet(table, name));
  }

  return sheets;
}
