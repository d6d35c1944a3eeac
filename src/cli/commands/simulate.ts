/**
 * CLI simulate command - dry-run signals against recording consumers.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { resolveRoutingRules } from '../../core/bootstrap.js';
import { loadConfig } from '../../core/config.js';
import { SdoError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { loadRoutingRules } from '../../core/signals/routing-rules.js';
import { parseConsumerSpecs, parseSignals, simulate } from '../../core/simulation.js';
import { readJson } from '../../store/atomic.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../context.js';
import { cliOutput, runCommand } from '../output.js';

async function readRequiredJson(path: string, label: string): Promise<unknown> {
  const data = await readJson(path);
  if (data === null) {
    throw new SdoError(ExitCode.NOT_FOUND, `${label} file not found: ${path}`);
  }
  return data;
}

export function registerSimulateCommand(program: Command): void {
  program
    .command('simulate <signals>')
    .description('Dispatch serialized signals to recording consumers and summarise the outcome')
    .requiredOption('--consumers <file>', 'JSON array of consumer definitions')
    .option('--rules <file>', 'Routing rules JSON (defaults to the configured rules)')
    .action(async (signalsFile: string, opts: { consumers: string; rules?: string }, command: Command) => {
      await runCommand(async () => {
        const root = getProjectRoot(command);
        const log = getLogger('simulate');

        const rules = opts.rules
          ? await loadRoutingRules(resolve(root, opts.rules), log)
          : await resolveRoutingRules(root, await loadConfig(root, undefined, log), log);
        const signals = parseSignals(await readRequiredJson(resolve(root, signalsFile), 'Signals'));
        const specs = parseConsumerSpecs(await readRequiredJson(resolve(root, opts.consumers), 'Consumers'));

        cliOutput(simulate(signals, specs, { rules, logger: log }), { command: 'simulate' });
      });
    });
}
