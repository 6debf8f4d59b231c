/**
 * Tests for error types and helper functions
 */

import { describe, it, expect } from 'vitest';

import {
  RetryKitError,
  ErrorCategory,
  ErrorSeverity,
  ConfigurationError,
  ValidationError,
  ExecutionError,
  toError,
  rootCause,
  extractErrorInfo,
} from '../index.js';

describe('Error Types', () => {
  describe('RetryKitError Base Class', () => {
    class TestError extends RetryKitError {
      constructor(message: string, cause?: Error) {
        super(message, 'TEST_ERROR', ErrorCategory.UNKNOWN, {
          severity: ErrorSeverity.LOW,
          ...(cause && { cause }),
        });
      }
    }

    it('should create error with proper metadata', () => {
      const error = new TestError('Test error message');

      expect(error.message).toBe('Test error message');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('TestError');
      expect(error.category).toBe(ErrorCategory.UNKNOWN);
      expect(error.severity).toBe(ErrorSeverity.LOW);
      expect(error.cause).toBeUndefined();
    });

    it('should have proper prototype chain for instanceof checks', () => {
      const error = new TestError('Test error');

      expect(error instanceof Error).toBe(true);
      expect(error instanceof RetryKitError).toBe(true);
      expect(error instanceof TestError).toBe(true);
    });

    it('should format error for logging', () => {
      const error = new TestError('Test error', new Error('underlying'));

      expect(error.toLogFormat()).toEqual({
        name: 'TestError',
        message: 'Test error',
        code: 'TEST_ERROR',
        severity: ErrorSeverity.LOW,
        category: ErrorCategory.UNKNOWN,
        cause: 'underlying',
      });
    });
  });

  describe('Domain errors', () => {
    it('should default configuration errors to high severity', () => {
      const error = new ConfigurationError('bad file');

      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.category).toBe(ErrorCategory.CONFIGURATION);
      expect(error.severity).toBe(ErrorSeverity.HIGH);
    });

    it('should allow custom codes and data', () => {
      const error = new ValidationError('factor too small', {
        code: 'INVALID_FACTOR',
        data: { factor: 0.5 },
      });

      expect(error.code).toBe('INVALID_FACTOR');
      expect(error.data).toEqual({ factor: 0.5 });
      expect(error.toLogFormat()).toMatchObject({ data: { factor: 0.5 } });
    });

    it('should create execution errors', () => {
      const error = new ExecutionError('exit code 3');

      expect(error.category).toBe(ErrorCategory.EXECUTION);
      expect(error.name).toBe('ExecutionError');
    });
  });
});

describe('Error Utils', () => {
  describe('toError', () => {
    it('should return Error instances unchanged', () => {
      const error = new Error('same');
      expect(toError(error)).toBe(error);
    });

    it('should wrap non-Error values', () => {
      expect(toError('string error').message).toBe('string error');
      expect(toError(42).message).toBe('42');
      expect(toError(undefined).message).toBe('undefined');
    });
  });

  describe('rootCause', () => {
    it('should return the error itself when there is no cause', () => {
      const error = new Error('alone');
      expect(rootCause(error)).toBe(error);
    });

    it('should follow the cause chain', () => {
      const inner = new Error('inner');
      const middle = new Error('middle', { cause: inner });
      const outer = new ExecutionError('outer', { cause: middle });

      expect(rootCause(outer)).toBe(inner);
    });

    it('should stop at non-Error causes', () => {
      const error = new Error('outer', { cause: 'text cause' });
      expect(rootCause(error)).toBe(error);
    });
  });

  describe('extractErrorInfo', () => {
    it('should use log format for retrykit errors', () => {
      const info = extractErrorInfo(new ValidationError('nope'));
      expect(info).toMatchObject({ code: 'VALIDATION_ERROR', category: 'validation' });
    });

    it('should describe plain errors', () => {
      const info = extractErrorInfo(new TypeError('bad type'));
      expect(info).toMatchObject({ name: 'TypeError', message: 'bad type' });
    });

    it('should stringify unknown values', () => {
      expect(extractErrorInfo('oops')).toEqual({ error: 'oops' });
    });
  });
});
