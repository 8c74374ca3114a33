import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from '../cli-response.js';
import { ExitCodes } from '../exit-codes.js';

describe('cli-response', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  describe('createSuccessResponse', () => {
    it('should create a success response with data', () => {
      const response = createSuccessResponse('rules', { count: 3 });

      expect(response).toEqual({
        success: true,
        command: 'rules',
        timestamp: '2024-01-01T00:00:00.000Z',
        data: { count: 3 },
      });
    });

    it('should attach metadata when given', () => {
      const response = createSuccessResponse('run', { recordCount: 2 }, { duration_ms: 100 });

      expect(response.metadata).toEqual({ duration_ms: 100 });
    });

    it('should leave metadata out when not given', () => {
      expect(createSuccessResponse('run', []).metadata).toBeUndefined();
    });
  });

  describe('createErrorResponse', () => {
    it('should create an error response with code and message', () => {
      const response = createErrorResponse('run', new Error('Tape not found: tape.csv'), 'NOT_FOUND');

      expect(response).toEqual({
        success: false,
        command: 'run',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: {
          code: 'NOT_FOUND',
          message: 'Tape not found: tape.csv',
        },
      });
    });

    it('should include details when given', () => {
      const response = createErrorResponse('run', new Error('bad'), 'INVALID_ARGS', { flag: '--skip' });

      expect(response.error).toEqual({ code: 'INVALID_ARGS', details: { flag: '--skip' }, message: 'bad' });
    });

    it('should include the stack trace in development mode', () => {
      vi.stubEnv('NODE_ENV', 'development');
      const error = new Error('Test error');
      error.stack = 'Error: Test error\n    at test.js:1:1';

      expect(createErrorResponse('run', error, 'GENERAL_ERROR').error?.stack).toBe(
        'Error: Test error\n    at test.js:1:1'
      );
    });

    it('should not include the stack trace in production mode', () => {
      vi.stubEnv('NODE_ENV', 'production');
      const error = new Error('Test error');
      error.stack = 'Error: Test error\n    at test.js:1:1';

      expect(createErrorResponse('run', error, 'GENERAL_ERROR').error?.stack).toBeUndefined();
    });
  });

  describe('exitCodeToErrorCode', () => {
    it('should map exit codes to error code strings', () => {
      expect(exitCodeToErrorCode(ExitCodes.GENERAL_ERROR)).toBe('GENERAL_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.INVALID_ARGS)).toBe('INVALID_ARGS');
      expect(exitCodeToErrorCode(ExitCodes.NOT_FOUND)).toBe('NOT_FOUND');
      expect(exitCodeToErrorCode(ExitCodes.INGESTION_ERROR)).toBe('INGESTION_ERROR');
      expect(exitCodeToErrorCode(ExitCodes.CONFIG_ERROR)).toBe('CONFIG_ERROR');
    });

    it('should not map SUCCESS exit code', () => {
      expect(exitCodeToErrorCode(ExitCodes.SUCCESS)).toBe('UNKNOWN_ERROR');
    });
  });
});
