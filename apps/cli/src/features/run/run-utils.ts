import type { SummaryTable } from '@tapeval/stratification';
import { createValidationConfig, type Severity, type ValidationConfig, type ValidationResultSet } from '@tapeval/validation';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { z } from 'zod';

import type { RunCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Run command options after validation at the CLI boundary
 */
export type RunCommandOptions = z.output<typeof RunCommandOptionsSchema>;

export interface RunHandlerParams {
  tapePath: string;
  /** Report path before the timestamp suffix is added */
  outputPath: string;
  only?: string[] | undefined;
  skip?: string[] | undefined;
  config: ValidationConfig;
  /** JSON file of dimension specs replacing the default strats */
  stratsPath?: string | undefined;
}

export interface RunSummary {
  source: string;
  reportPath: string;
  recordCount: number;
  droppedRows: number;
  counts: Record<Severity, number>;
  executedRules: number;
  skippedRules: string[];
  faultedRules: string[];
  strats: string[];
}

/**
 * Build run parameters from validated CLI flags.
 */
export function buildRunParamsFromFlags(tapePath: string, options: RunCommandOptions): Result<RunHandlerParams, Error> {
  let config: ValidationConfig;
  try {
    config = createValidationConfig({
      asOfDate: options.asOf,
      statedPoolBalance: options.poolBalance,
      tolerance: {
        absolute: options.tolerance,
        relative: options.relativeTolerance,
      },
    });
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  return ok({
    config,
    only: options.only,
    outputPath: options.output,
    skip: options.skip,
    stratsPath: options.strats,
    tapePath,
  });
}

export function summarizeRun(
  source: string,
  reportPath: string,
  droppedRows: number,
  results: ValidationResultSet,
  strats: readonly SummaryTable[]
): RunSummary {
  return {
    counts: { ...results.countsBySeverity },
    droppedRows,
    executedRules: results.executedRuleCount,
    faultedRules: results.faultedRules.map((rule) => rule.ruleId),
    recordCount: results.recordCount,
    reportPath,
    skippedRules: results.skippedRules.map((rule) => rule.ruleId),
    source,
    strats: strats.map((table) => table.dimension),
  };
}

/**
 * Lines printed after a run in text mode
 */
export function formatRunSummary(summary: RunSummary): string[] {
  const lines = [
    `Validated ${summary.recordCount} loan${summary.recordCount === 1 ? '' : 's'} from ${summary.source}`,
    `  errors: ${summary.counts.error}  warnings: ${summary.counts.warning}  info: ${summary.counts.info}`,
    `  rules executed: ${summary.executedRules}  skipped: ${summary.skippedRules.length}  faulted: ${summary.faultedRules.length}`,
  ];
  if (summary.droppedRows > 0) {
    lines.push(`  dropped rows: ${summary.droppedRows}`);
  }
  if (summary.faultedRules.length > 0) {
    lines.push(`  faulted: ${summary.faultedRules.join(', ')}`);
  }
  lines.push(`Report written to ${summary.reportPath}`);
  return lines;
}
