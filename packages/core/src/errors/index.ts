/**
 * Error taxonomy for tape validation.
 *
 * Ingestion, rule definition, dimension definition and report errors are
 * fatal and propagate to the caller. A RuleEvaluationFault never leaves the
 * engine: it is converted into a failing outcome.
 */

type ErrorContext = Record<string, unknown>;

/**
 * Base error for everything raised by the validator
 */
export abstract class TapeValidatorError extends Error {
  abstract readonly code: string;

  readonly timestamp: string;
  readonly context?: ErrorContext | undefined;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext | undefined }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = new Date().toISOString();
    this.context = options?.context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Malformed or unreadable input. Aborts before validation.
 */
export class IngestionError extends TapeValidatorError {
  readonly code = 'INGESTION_ERROR';
}

/**
 * Invalid rule catalogue, raised while a registry is built
 */
export class RuleDefinitionError extends TapeValidatorError {
  readonly code: string = 'RULE_DEFINITION_ERROR';
}

export class DuplicateRuleError extends RuleDefinitionError {
  override readonly code: string = 'DUPLICATE_RULE';

  constructor(public readonly ruleId: string) {
    super(`Rule "${ruleId}" is already registered. Each rule must have a unique id.`, { context: { ruleId } });
  }
}

export class UnknownRuleError extends RuleDefinitionError {
  override readonly code: string = 'UNKNOWN_RULE';

  constructor(public readonly ruleIds: readonly string[]) {
    super(`Unknown rule id${ruleIds.length === 1 ? '' : 's'}: ${ruleIds.join(', ')}`, { context: { ruleIds } });
  }
}

/**
 * Stratification dimension whose buckets overlap, leave gaps, or are otherwise malformed
 */
export class DimensionDefinitionError extends TapeValidatorError {
  readonly code = 'DIMENSION_DEFINITION_ERROR';
}

/**
 * A rule threw while being evaluated. Recovered by the engine.
 */
export class RuleEvaluationFault extends TapeValidatorError {
  readonly code = 'RULE_EVALUATION_FAULT';

  constructor(
    public readonly ruleId: string,
    cause: unknown
  ) {
    super(`Rule evaluation fault: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
      context: { ruleId },
    });
  }
}

export class ReportError extends TapeValidatorError {
  readonly code = 'REPORT_ERROR';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
