#!/usr/bin/env node
/**
 * `sdo` CLI entry point.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { closeLogger, initLogger } from '../core/logger.js';
import { getProjectRoot } from './context.js';
import { createProgram } from './program.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  try {
    // src/cli/index.ts and dist/cli/index.js both sit two levels below the root
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    process.stderr.write(`Warning: could not read package version: ${describeError(err)}\n`);
  }
  return '0.0.0';
}

const program = createProgram(getPackageVersion());

// Initialize the pino logger before any command runs. If config loading
// fails, commands still work on the stderr fallback logger.
let loggerInitialized = false;
program.hook('preAction', async (_thisCommand, actionCommand) => {
  if (loggerInitialized) return;
  loggerInitialized = true;
  const root = getProjectRoot(actionCommand);
  try {
    const config = await loadConfig(root);
    initLogger(root, config);
  } catch (err) {
    process.stderr.write(`Warning: logger init failed, using stderr: ${describeError(err)}\n`);
  }
});

program.hook('postAction', () => {
  closeLogger();
});

await program.parseAsync();
