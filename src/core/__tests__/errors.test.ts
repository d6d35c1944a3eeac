/**
 * Tests for SdoError and exit code helpers.
 */

import { describe, it, expect } from 'vitest';
import { ExitCode, getExitCodeName, isErrorCode, isRecoverableCode } from '../../types/exit-codes.js';
import { SdoError, describeError } from '../errors.js';

describe('SdoError', () => {
  it('serializes code, name, retryability and fix', () => {
    const error = new SdoError(ExitCode.SCOPE_INVALID, 'Invalid phase: phase_1', { fix: 'Use phase_01' });
    expect(error.toJSON()).toEqual({
      success: false,
      error: {
        code: 10,
        name: 'SCOPE_INVALID',
        message: 'Invalid phase: phase_1',
        retryable: false,
        fix: 'Use phase_01',
      },
    });
  });

  it('omits the fix when none is given and keeps the cause', () => {
    const cause = new Error('EACCES');
    const error = new SdoError(ExitCode.FILE_ERROR, 'Atomic write failed: x.json', { cause });
    expect(error.toJSON()).toEqual({
      success: false,
      error: { code: 3, name: 'FILE_ERROR', message: 'Atomic write failed: x.json', retryable: true },
    });
    expect(error.cause).toBe(cause);
  });
});

describe('exit codes', () => {
  it('classifies codes', () => {
    expect(isErrorCode(ExitCode.SUCCESS)).toBe(false);
    expect(isRecoverableCode(ExitCode.SUCCESS)).toBe(false);
    expect(isRecoverableCode(ExitCode.NOT_FOUND)).toBe(true);
    expect(isRecoverableCode(ExitCode.SIGNAL_MALFORMED)).toBe(false);
    expect(getExitCodeName(ExitCode.CONSUMER_INVALID)).toBe('CONSUMER_INVALID');
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
