import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Extra facts about an execution, such as `duration_ms`
 */
export type CLIResponseMetadata = Record<string, unknown>;

export interface CLIErrorBody {
  /** Machine-readable error code */
  code: string;

  /** Additional error details (optional) */
  details?: unknown;

  /** Human-readable error message */
  message: string;

  /** Stack trace (only in development) */
  stack?: string | undefined;
}

/**
 * Envelope printed on stdout in `--json` mode
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 timestamp of when the response was generated */
  timestamp: string;
  /** Only present on success */
  data?: T;
  /** Only present on failure */
  error?: CLIErrorBody | undefined;
  metadata?: CLIResponseMetadata | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponseMetadata): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: CLIErrorBody = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

const ERROR_CODES = new Map<number, string>(
  Object.entries(ExitCodes)
    .filter(([, exitCode]) => exitCode !== ExitCodes.SUCCESS)
    .map(([name, exitCode]): [number, string] => [exitCode, name])
);

/**
 * Map exit code to error code string.
 */
export function exitCodeToErrorCode(exitCode: ExitCode): string {
  return ERROR_CODES.get(exitCode) ?? 'UNKNOWN_ERROR';
}
