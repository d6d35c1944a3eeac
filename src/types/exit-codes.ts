/**
 * Process exit codes for the sdo CLI and SdoError.
 * Ranges: 0 = success, 1-9 = general errors, 10-19 = signal/scope errors,
 * 20-29 = consumer registration errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,

  // === SIGNAL ERRORS (10-19) ===
  SCOPE_INVALID = 10,
  SIGNAL_MALFORMED = 12,

  // === REGISTRATION ERRORS (20-29) ===
  CONSUMER_INVALID = 21,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (retry may succeed). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.SCOPE_INVALID,
    ExitCode.SIGNAL_MALFORMED,
    ExitCode.CONSUMER_INVALID,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
