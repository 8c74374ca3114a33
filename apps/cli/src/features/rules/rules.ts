import type { Command } from 'commander';
import pc from 'picocolors';

import { displayCliError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { RulesCommandOptionsSchema } from '../shared/schemas.js';

import { formatRuleTable, listDefaultRules } from './rules-utils.js';

/**
 * Register the rules command.
 */
export function registerRulesCommand(program: Command): void {
  program
    .command('rules')
    .description('List the rules a run evaluates')
    .option('--json', 'Output results in JSON format')
    .action((rawOptions: unknown) => {
      executeRulesCommand(rawOptions);
    });
}

function executeRulesCommand(rawOptions: unknown): void {
  const validationResult = RulesCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const firstError = validationResult.error.issues[0];
    displayCliError('rules', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS, 'text');
  }

  const format = validationResult.data.json ? 'json' : 'text';
  const result = listDefaultRules();
  if (result.isErr()) {
    displayCliError('rules', result.error, ExitCodes.CONFIG_ERROR, format);
  }

  if (format === 'json') {
    console.log(JSON.stringify(createSuccessResponse('rules', result.value), undefined, 2));
    return;
  }

  const [header, ...rows] = formatRuleTable(result.value);
  console.log(pc.bold(header ?? ''));
  for (const row of rows) {
    console.log(row);
  }
}
