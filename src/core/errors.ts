/**
 * Structured error type for construction-time and configuration failures.
 *
 * Dispatch-time outcomes (rejections, dead letters, duplicates) are data and
 * never surface as an SdoError.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/**
 * Error carrying an exit code, a human-readable message and an optional
 * fix suggestion for CLI output.
 */
export class SdoError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SdoError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Whether retrying the failed operation could succeed. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for CLI output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        retryable: this.retryable,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Format any thrown value as a single-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
