#!/usr/bin/env tsx
import { getLogger } from '@tapeval/logger';
import { Command } from 'commander';

import { registerRulesCommand } from './features/rules/rules.js';
import { registerRunCommand } from './features/run/run.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('tapeval').description('Loan tape validation and stratification reports').version('0.1.0');

  registerRunCommand(program);
  registerRulesCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  exitWithCode(ExitCodes.GENERAL_ERROR);
});
