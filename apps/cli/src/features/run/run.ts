import { setLogLevel } from '@tapeval/logger';
import type { Command } from 'commander';
import pc from 'picocolors';

import { displayCliError, exitCodeForError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { RunCommandOptionsSchema } from '../shared/schemas.js';

import { RunHandler } from './run-handler.js';
import { buildRunParamsFromFlags, formatRunSummary, type RunSummary } from './run-utils.js';

/**
 * Register the run command.
 */
export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Validate a loan tape and write the Excel report')
    .argument('<tape>', 'CSV or Excel loan tape')
    .option('-o, --output <path>', 'Report path (a timestamp is added to the name)', 'tape-validation-report.xlsx')
    .option('--log-level <level>', 'Log level (trace|debug|info|warn|error|fatal|silent)')
    .option('--only <ids>', 'Run only these rules (comma separated)')
    .option('--skip <ids>', 'Skip these rules (comma separated)')
    .option('--tolerance <amount>', 'Absolute tolerance for amount comparisons', '0.01')
    .option('--relative-tolerance <ratio>', 'Relative tolerance for amount comparisons', '0')
    .option('--pool-balance <amount>', 'Pool balance stated by the seller')
    .option('--as-of <date>', 'Reference date for age checks (YYYY-MM-DD)')
    .option('--strats <file>', 'JSON file of stratification dimensions')
    .option('--json', 'Output results in JSON format')
    .action(async (tape: string, rawOptions: unknown) => {
      await executeRunCommand(tape, rawOptions);
    });
}

async function executeRunCommand(tape: string, rawOptions: unknown): Promise<void> {
  // Check for --json flag early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
  const format = isJsonMode ? 'json' : 'text';

  const validationResult = RunCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError('run', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, format);
  }

  const options = validationResult.data;
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  const paramsResult = buildRunParamsFromFlags(tape, options);
  if (paramsResult.isErr()) {
    displayCliError('run', paramsResult.error, ExitCodes.INVALID_ARGS, format);
  }

  const startedAt = Date.now();
  const result = await new RunHandler().execute(paramsResult.value);
  if (result.isErr()) {
    displayCliError('run', result.error, exitCodeForError(result.error), format);
  }

  handleRunSuccess(result.value, isJsonMode, Date.now() - startedAt);
}

function handleRunSuccess(summary: RunSummary, isJsonMode: boolean, durationMs: number): void {
  if (isJsonMode) {
    console.log(JSON.stringify(createSuccessResponse('run', summary, { duration_ms: durationMs }), undefined, 2));
    return;
  }

  const [headline, ...details] = formatRunSummary(summary);
  const mark = summary.counts.error > 0 ? pc.yellow('!') : pc.green('✓');
  console.log(`${mark} ${headline ?? ''}`);
  for (const line of details) {
    console.log(line.startsWith('Report') ? pc.cyan(line) : line);
  }
}
