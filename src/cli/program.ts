/**
 * Commander program definition for the `sdo` binary.
 */

import { Command } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerDeadLettersCommand } from './commands/dead-letters.js';
import { registerRulesCommand } from './commands/rules.js';
import { registerSimulateCommand } from './commands/simulate.js';

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('sdo')
    .description('Signal Distribution Orchestrator - inspect routing rules, dead letters and dry runs')
    .version(version)
    .option('--root <dir>', 'Project root holding .sdo/config.json (default: working directory)');

  registerRulesCommand(program);
  registerDeadLettersCommand(program);
  registerSimulateCommand(program);
  registerConfigCommand(program);

  return program;
}
