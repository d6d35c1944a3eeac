/**
 * CLI output helpers.
 *
 * Success results go to stdout as a JSON envelope; SdoError failures go to
 * stderr as the error's JSON form and set the exit code.
 */

import { SdoError } from '../core/errors.js';

export interface CliOutputOptions {
  /** Command name recorded in the envelope. */
  command: string;
}

/** Format a successful result as a JSON envelope. */
export function formatSuccess(data: unknown, opts: CliOutputOptions): string {
  return JSON.stringify({ success: true, command: opts.command, result: data }, null, 2);
}

/** Format an SdoError as a single-line JSON envelope. */
export function formatError(error: SdoError): string {
  return JSON.stringify(error.toJSON());
}

/** Write a successful result to stdout. */
export function cliOutput(data: unknown, opts: CliOutputOptions): void {
  console.log(formatSuccess(data, opts));
}

/**
 * Run a command body. An SdoError is printed and ends the process with its
 * exit code; anything else propagates to commander.
 */
export async function runCommand(body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    if (err instanceof SdoError) {
      console.error(formatError(err));
      process.exit(err.code);
    }
    throw err;
  }
}
