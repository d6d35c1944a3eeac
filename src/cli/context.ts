/**
 * Global CLI options shared by every command.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';

export type GlobalOptions = {
  root?: string;
};

/** Project root from `--root`, defaulting to the working directory. */
export function getProjectRoot(command: Command): string {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return resolve(opts.root ?? process.cwd());
}
