import { describe, expect, it } from 'vitest';

import {
  DuplicateRuleError,
  IngestionError,
  RuleDefinitionError,
  RuleEvaluationFault,
  TapeValidatorError,
  UnknownRuleError,
} from '../index.js';

describe('error taxonomy', () => {
  it('should expose codes and names', () => {
    const error = new IngestionError('Cannot read tape.csv', { context: { filePath: 'tape.csv' } });

    expect(error).toBeInstanceOf(TapeValidatorError);
    expect(error.code).toBe('INGESTION_ERROR');
    expect(error.name).toBe('IngestionError');
    expect(error.toJSON()).toMatchObject({
      code: 'INGESTION_ERROR',
      context: { filePath: 'tape.csv' },
      message: 'Cannot read tape.csv',
    });
  });

  it('should treat duplicate and unknown rules as definition errors', () => {
    const duplicate = new DuplicateRuleError('state_code');
    const unknown = new UnknownRuleError(['a', 'b']);

    expect(duplicate).toBeInstanceOf(RuleDefinitionError);
    expect(duplicate.code).toBe('DUPLICATE_RULE');
    expect(duplicate.ruleId).toBe('state_code');
    expect(unknown).toBeInstanceOf(RuleDefinitionError);
    expect(unknown.message).toBe('Unknown rule ids: a, b');
  });

  it('should name the internal error of a faulted rule', () => {
    const cause = new TypeError('x is undefined');
    const fault = new RuleEvaluationFault('broken_rule', cause);

    expect(fault.message).toBe('Rule evaluation fault: x is undefined');
    expect(fault.cause).toBe(cause);
    expect(fault.ruleId).toBe('broken_rule');
  });
});
