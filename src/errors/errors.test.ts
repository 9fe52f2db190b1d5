/**
 * Tests for shared error hierarchy.
 */

import { describe, expect, it } from 'vitest';

import {
  AppError,
  CliError,
  formatErrorMessage,
  hasErrorProperty,
  InputError,
  isAppError,
  isOracleError,
  NoisePatternError,
  OracleError,
  ProcessError,
} from './errors.ts';

describe('errors', () => {
  it('constructs AppError with code, message, name, and optional metadata', () => {
    const cause = new Error('root cause');
    const details = { field: 'value' };
    const err = new AppError('CLI_PARSE_ERROR', 'Parse failed', { cause, details });

    expect(err.code).toBe('CLI_PARSE_ERROR');
    expect(err.message).toBe('Parse failed');
    expect(err.name).toBe('AppError');
    expect(err.details).toEqual(details);
    expect(err.cause).toBe(cause);
  });

  it('constructs AppError without metadata', () => {
    const err = new AppError('UNEXPECTED_ERROR', 'Unknown failure');

    expect(err.code).toBe('UNEXPECTED_ERROR');
    expect(err.details).toBeUndefined();
    expect(err.cause).toBeUndefined();
  });

  it('keeps non-Error causes as-is', () => {
    const err = new AppError('ORACLE_CALL_FAILED', 'failed', { cause: 'socket closed' });

    expect(err.cause).toBe('socket closed');
  });

  it('names subclasses after their constructor', () => {
    expect(new CliError('CLI_INVALID_ARGUMENT', 'x').name).toBe('CliError');
    expect(new InputError('INPUT_EMPTY', 'x').name).toBe('InputError');
    expect(new NoisePatternError('NOISE_PATTERNS_UNREADABLE', 'x').name).toBe(
      'NoisePatternError',
    );
    expect(new OracleError('ORACLE_TIMEOUT', 'x').name).toBe('OracleError');
    expect(new ProcessError('PROCESS_FAILED', 'x').name).toBe('ProcessError');
  });

  it('formats AppErrors with their code and other values plainly', () => {
    expect(formatErrorMessage(new OracleError('ORACLE_TIMEOUT', 'took too long'))).toBe(
      'ORACLE_TIMEOUT: took too long',
    );
    expect(formatErrorMessage(new Error('plain'))).toBe('plain');
    expect(formatErrorMessage(42)).toBe('42');
  });

  it('narrows with the type guards', () => {
    const oracleErr = new OracleError('ORACLE_CALL_FAILED', 'x');

    expect(isAppError(oracleErr)).toBe(true);
    expect(isAppError(new Error('x'))).toBe(false);
    expect(isOracleError(oracleErr)).toBe(true);
    expect(isOracleError(new CliError('CLI_PARSE_ERROR', 'x'))).toBe(false);
  });

  it('detects properties on unknown values', () => {
    expect(hasErrorProperty({ code: 'EPIPE' }, 'code')).toBe(true);
    expect(hasErrorProperty({}, 'code')).toBe(false);
    expect(hasErrorProperty(null, 'code')).toBe(false);
    expect(hasErrorProperty('text', 'length')).toBe(false);
  });
});
