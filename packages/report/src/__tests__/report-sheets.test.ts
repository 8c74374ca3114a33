import { describe, expect, it } from 'vitest';

import { buildReportSheets, toSheetName, type ReportSheet } from '../report-sheets.js';

import { sampleReportInput } from './test-utils.js';

function sheet(sheets: ReportSheet[], name: string): ReportSheet {
  const found = sheets.find((candidate) => candidate.name === name);
  if (!found) throw new Error(`No sheet ${name}`);
  return found;
}

describe('buildReportSheets', () => {
  const sheets = buildReportSheets(sampleReportInput());

  it('should produce every sheet in order', () => {
    expect(sheets.map((candidate) => candidate.name)).toEqual([
      'summary',
      'rule_summary',
      'issues',
      'warnings',
      'info',
      'missing_required_fields',
      'skipped_rules',
      'faulted_rules',
      'strat_a_really_long_dimension_n',
    ]);
  });

  it('should summarize the run', () => {
    expect(sheet(sheets, 'summary').rows).toEqual([
      ['input_file', 'tape.csv'],
      ['generated_at', '2024-03-05T14:07:09.000Z'],
      ['row_count', 2],
      ['error_count', 4],
      ['warning_count', 1],
      ['info_count', 1],
      ['executed_rules', 4],
      ['skipped_rules', 1],
      ['faulted_rules', 1],
    ]);
  });

  it('should list failing rules by fail count, then id', () => {
    expect(sheet(sheets, 'rule_summary').rows).toEqual([
      ['exploding', 'error', 'Always throws', 2],
      ['required_fields_present', 'error', 'Every required field must be populated', 2],
      ['amount_small', 'warning', 'Amount should be at least 500', 1],
      ['pool_note', 'info', 'Pool note', 1],
    ]);
  });

  it('should split failures by severity with rule descriptions and loan numbers', () => {
    const required = ['required_fields_present', 'error', 'Every required field must be populated'];
    const exploding = ['exploding', 'error', 'Always throws'];

    expect(sheet(sheets, 'issues')).toEqual({
      header: ['rule', 'severity', 'description', 'record_id', 'row_number', 'loan_number', 'fields', 'detail'],
      name: 'issues',
      rows: [
        [...required, 'row-2', 2, 'LN-1', 'state', 'Missing required fields: state'],
        [...required, 'row-3', 3, 'LN-2', 'amount, state', 'Missing required fields: amount, state'],
        [...exploding, 'row-2', 2, 'LN-1', 'amount', 'Rule evaluation fault: boom'],
        [...exploding, 'row-3', 3, 'LN-2', 'amount', 'Rule evaluation fault: boom'],
      ],
    });
    expect(sheet(sheets, 'warnings').rows).toEqual([
      [
        'amount_small',
        'warning',
        'Amount should be at least 500',
        'row-2',
        2,
        'LN-1',
        'amount',
        'amount 100 is small',
      ],
    ]);
    expect(sheet(sheets, 'info').rows).toEqual([
      ['pool_note', 'info', 'Pool note', null, null, null, 'amount', 'pool note'],
    ]);
  });

  it('should give one row per missing required field', () => {
    expect(sheet(sheets, 'missing_required_fields').rows).toEqual([
      ['LN-1', 'row-2', 'state'],
      ['LN-2', 'row-3', 'amount'],
      ['LN-2', 'row-3', 'state'],
    ]);
  });

  it('should list skipped and faulted rules', () => {
    expect(sheet(sheets, 'skipped_rules').rows).toEqual([['needs_state', 'error', 'missing_columns', 'state']]);
    expect(sheet(sheets, 'faulted_rules').rows).toEqual([['exploding', 2, 'Rule evaluation fault: boom']]);
  });

  it('should render strats with a total row', () => {
    expect(sheet(sheets, 'strat_a_really_long_dimension_n')).toEqual({
      header: ['bucket', 'count', 'share', 'total'],
      name: 'strat_a_really_long_dimension_n',
      rows: [
        ['low', 1, 0.5, 100],
        ['high', 0, 0, null],
        ['overflow', 1, 0.5, null],
        ['total', 2, 1, 100],
      ],
    });
  });
});

describe('toSheetName', () => {
  it('should replace characters Excel rejects', () => {
    expect(toSheetName('strat_a/b:c')).toBe('strat_a_b_c');
  });

  it('should keep truncated names distinct', () => {
    expect(toSheetName('strat_a_really_long_dimension_name_here', new Set(['strat_a_really_long_dimension_n']))).toBe(
      'strat_a_really_long_dimension~2'
    );
  });
});
