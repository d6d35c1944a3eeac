/**
 * CLI dead-letters command - list persisted dead letters.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { resolveDeadLetterDir, resolveRoutingRules } from '../../core/bootstrap.js';
import { loadConfig } from '../../core/config.js';
import { SdoError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { DeadLetterReason } from '../../core/signals/dead-letter.js';
import { readDeadLetterRecords } from '../../store/dead-letter-store.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getProjectRoot } from '../context.js';
import { cliOutput, runCommand } from '../output.js';

const REASONS: readonly string[] = Object.values(DeadLetterReason);

function isDeadLetterReason(value: string): value is DeadLetterReason {
  return REASONS.includes(value);
}

/** Validate a --reason flag value. */
export function parseReason(value: string | undefined): DeadLetterReason | undefined {
  if (value === undefined) return undefined;
  const upper = value.toUpperCase();
  if (!isDeadLetterReason(upper)) {
    throw new SdoError(ExitCode.INVALID_INPUT, `Unknown dead-letter reason: ${value}`, {
      fix: `Use one of ${REASONS.join(', ')}`,
    });
  }
  return upper;
}

export function registerDeadLettersCommand(program: Command): void {
  program
    .command('dead-letters [dir]')
    .description('List persisted dead letters, oldest first')
    .option('--reason <reason>', 'Only dead letters with this reason')
    .action(async (dir: string | undefined, opts: { reason?: string }, command: Command) => {
      await runCommand(async () => {
        const root = getProjectRoot(command);
        const log = getLogger('dead-letter');
        const reason = parseReason(opts.reason);

        let target: string;
        if (dir) {
          target = resolve(root, dir);
        } else {
          const config = await loadConfig(root, undefined, log);
          target = resolveDeadLetterDir(root, config, await resolveRoutingRules(root, config, log));
        }

        const records = await readDeadLetterRecords(target, { reason, log });
        cliOutput({ directory: target, count: records.length, deadLetters: records }, { command: 'dead-letters' });
      });
    });
}
