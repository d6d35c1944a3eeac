/**
 * CLI config command - show resolved configuration with sources.
 */

import type { Command } from 'commander';
import { getConfigValue, listConfigKeys } from '../../core/config.js';
import { SdoError } from '../../core/errors.js';
import type { ConfigSource } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../context.js';
import { cliOutput, runCommand } from '../output.js';

export function registerConfigCommand(program: Command): void {
  program
    .command('config [key]')
    .description('Show resolved configuration values and where each came from')
    .action(async (key: string | undefined, _opts: Record<string, unknown>, command: Command) => {
      await runCommand(async () => {
        const root = getProjectRoot(command);
        const keys = listConfigKeys();

        if (key !== undefined) {
          if (!keys.includes(key)) {
            throw new SdoError(ExitCode.NOT_FOUND, `Unknown config key: ${key}`, {
              fix: `Use one of ${keys.join(', ')}`,
            });
          }
          const resolved = await getConfigValue(key, root);
          cliOutput({ key, value: resolved.value, source: resolved.source }, { command: 'config' });
          return;
        }

        const entries: Array<{ key: string; value: unknown; source: ConfigSource }> = [];
        for (const name of keys) {
          const resolved = await getConfigValue(name, root);
          entries.push({ key: name, value: resolved.value, source: resolved.source });
        }
        cliOutput({ config: entries }, { command: 'config' });
      });
    });
}
