import { DimensionDefinitionError, IngestionError, RuleDefinitionError } from '@tapeval/core';
import pc from 'picocolors';
import { ZodError } from 'zod';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'Check the path and try again.',
  INGESTION_ERROR: 'The tape must be a CSV or Excel file with a header row in its first line.',
  CONFIG_ERROR: 'Run `tapeval rules` to list rule ids, and check the dimension file against the documented format.',
};

/**
 * An error that already knows which exit code it maps to
 */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: ExitCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandError';
  }
}

/**
 * Exit code for an error surfaced by a command handler
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof CommandError) return error.exitCode;
  if (error instanceof ZodError) return ExitCodes.INVALID_ARGS;
  if (error instanceof IngestionError) return ExitCodes.INGESTION_ERROR;
  if (error instanceof RuleDefinitionError || error instanceof DimensionDefinitionError) return ExitCodes.CONFIG_ERROR;
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Display a CLI error and exit.
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: 'json' | 'text'): never {
  const code = exitCodeToErrorCode(exitCode);

  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
  } else {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}
