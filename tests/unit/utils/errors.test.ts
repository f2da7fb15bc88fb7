import { describe, it, expect } from 'vitest';
import {
  BenchError,
  ConfigurationError,
  ProcessLostError,
  ServerError,
  ServerUnavailableError,
  isBenchError,
  toError,
  wrapError,
} from '@/utils/errors.js';

describe('Errors', () => {
  it('should carry code and name on subclasses', () => {
    const error = new ServerUnavailableError('Connection refused', 'http://localhost:11434');

    expect(error).toBeInstanceOf(BenchError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ServerUnavailableError');
    expect(error.code).toBe('SERVER_UNAVAILABLE');
    expect(error.host).toBe('http://localhost:11434');
  });

  it('should build the process-lost message from the pid', () => {
    const error = new ProcessLostError(4242);
    expect(error.message).toBe('Process 4242 no longer exists');
    expect(error.pid).toBe(4242);
  });

  it('should serialize for structured logging', () => {
    const cause = new Error('socket hang up');
    const error = new ServerError('HTTP 500: boom', 500, cause);

    expect(error.toJSON()).toEqual({
      name: 'ServerError',
      code: 'SERVER_ERROR',
      message: 'HTTP 500: boom',
      cause: 'socket hang up',
    });
    expect(error.stack).toContain('Caused by:');
  });

  it('should omit cause from JSON when absent', () => {
    expect(new ConfigurationError('missing').toJSON()).toEqual({
      name: 'ConfigurationError',
      code: 'CONFIGURATION_ERROR',
      message: 'missing',
    });
  });

  describe('isBenchError', () => {
    it('should recognize benchmark errors only', () => {
      expect(isBenchError(new ConfigurationError('x'))).toBe(true);
      expect(isBenchError(new Error('x'))).toBe(false);
      expect(isBenchError('x')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('should pass benchmark errors through unchanged', () => {
      const error = new ConfigurationError('x');
      expect(wrapError(error)).toBe(error);
    });

    it('should wrap plain errors and strings', () => {
      const plain = new Error('plain');
      const wrapped = wrapError(plain);
      expect(wrapped.code).toBe('UNKNOWN_ERROR');
      expect(wrapped.message).toBe('plain');
      expect(wrapped.cause).toBe(plain);

      expect(wrapError('text').message).toBe('text');
      expect(wrapError('text', 'override').message).toBe('override');
    });
  });

  describe('toError', () => {
    it('should keep Error instances and wrap other values', () => {
      const error = new Error('a');
      expect(toError(error)).toBe(error);
      expect(toError(42).message).toBe('42');
    });
  });
});
