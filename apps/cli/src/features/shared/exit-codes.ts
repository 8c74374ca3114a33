/**
 * Semantic exit codes for the CLI.
 * A completed run exits with SUCCESS whatever the rules found.
 */
export const ExitCodes = {
  /** Validation ran and the report was written */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Tape or configuration file not found */
  NOT_FOUND: 4,

  /** Tape could not be read or parsed */
  INGESTION_ERROR: 8,

  /** Unknown rule id or malformed dimension file */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
