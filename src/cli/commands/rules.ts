/**
 * CLI rules command - print the effective routing rules.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { resolveRoutingRules } from '../../core/bootstrap.js';
import { loadConfig } from '../../core/config.js';
import { getLogger } from '../../core/logger.js';
import { loadRoutingRules, routingRulesToJSON } from '../../core/signals/routing-rules.js';
import { getProjectRoot } from '../context.js';
import { cliOutput, runCommand } from '../output.js';

export function registerRulesCommand(program: Command): void {
  program
    .command('rules [file]')
    .description('Show the effective routing rules (file, or the configured rules path)')
    .action(async (file: string | undefined, _opts: Record<string, unknown>, command: Command) => {
      await runCommand(async () => {
        const root = getProjectRoot(command);
        const log = getLogger('rules');
        const rules = file
          ? await loadRoutingRules(resolve(root, file), log)
          : await resolveRoutingRules(root, await loadConfig(root, undefined, log), log);
        cliOutput({ rules: routingRulesToJSON(rules) }, { command: 'rules' });
      });
    });
}
