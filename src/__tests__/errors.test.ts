import { describe, it, expect } from 'vitest';
import {
  AceError,
  EditConflictError,
  ExitCode,
  IntegrityError,
  InvalidArgsError,
  OperationalError,
  PolicyDenyError,
  errorMessage,
  formatError
} from '../errors.js';

describe('errors', () => {
  it('maps each error kind to its exit code', () => {
    expect(new OperationalError('x').exitCode).toBe(ExitCode.OPERATIONAL_ERROR);
    expect(new PolicyDenyError('x').exitCode).toBe(ExitCode.POLICY_DENY);
    expect(new InvalidArgsError('x').exitCode).toBe(ExitCode.INVALID_ARGS);
    expect(new EditConflictError('x').exitCode).toBe(ExitCode.OPERATIONAL_ERROR);
  });

  it('keeps the file on integrity errors', () => {
    const error = new IntegrityError('src/a.ts', 'mismatch');
    expect(error).toBeInstanceOf(AceError);
    expect(error.name).toBe('IntegrityError');
    expect(error.file).toBe('src/a.ts');
  });

  it('formats known and unknown errors', () => {
    expect(formatError(new PolicyDenyError('dirty tree'))).toBe('Error: dirty tree');
    expect(formatError(new TypeError('bad'))).toBe('Unexpected error: bad');
    expect(formatError('plain')).toBe('Unexpected error: plain');

    const verbose = formatError(new Error('boom'), true);
    expect(verbose.startsWith('Unexpected error: boom\n')).toBe(true);
  });

  it('extracts messages', () => {
    expect(errorMessage(new Error('m'))).toBe('m');
    expect(errorMessage(42)).toBe('42');
  });
});
