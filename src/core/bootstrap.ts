/**
 * Process-level wiring: config → routing rules → dead-letter sink → orchestrator.
 */

import { isAbsolute, resolve } from 'node:path';
import type { Logger } from 'pino';
import type { SdoConfig } from '../types/config.js';
import { FileDeadLetterSink } from '../store/dead-letter-store.js';
import { loadConfig } from './config.js';
import { getLogger } from './logger.js';
import { DEFAULT_ROUTING_RULES, loadRoutingRules, type RoutingRules } from './signals/routing-rules.js';
import { SignalDistributionOrchestrator } from './signals/orchestrator.js';

export interface BootstrapOptions {
  /** Dotted-path config overrides (CLI flags). */
  overrides?: Record<string, unknown>;
  logger?: Logger;
  clock?: () => number;
}

export interface Bootstrapped {
  orchestrator: SignalDistributionOrchestrator;
  config: SdoConfig;
  rules: RoutingRules;
  /** Null when persistence is off or the rules disable dead letters. */
  sink: FileDeadLetterSink | null;
}

function resolveFrom(root: string, path: string): string {
  return isAbsolute(path) ? path : resolve(root, path);
}

/**
 * Resolve the routing rules named by the config. Relative paths are taken
 * from the project root.
 */
export async function resolveRoutingRules(root: string, config: SdoConfig, log: Logger): Promise<RoutingRules> {
  if (config.routing.rulesPath === null) return DEFAULT_ROUTING_RULES;
  return loadRoutingRules(resolveFrom(root, config.routing.rulesPath), log);
}

/** Directory dead letters are persisted to for this config and rule set. */
export function resolveDeadLetterDir(root: string, config: SdoConfig, rules: RoutingRules): string {
  return resolveFrom(root, config.deadLetter.dir ?? rules.deadLetterPath);
}

/**
 * Build an orchestrator for a project root.
 */
export async function createOrchestrator(root: string, options: BootstrapOptions = {}): Promise<Bootstrapped> {
  const log = options.logger ?? getLogger('sdo');
  const config = await loadConfig(root, options.overrides, log);
  const rules = await resolveRoutingRules(root, config, log);

  const sink = config.deadLetter.persist && rules.deadLetterEnabled
    ? new FileDeadLetterSink(resolveDeadLetterDir(root, config, rules), log)
    : null;

  const orchestrator = new SignalDistributionOrchestrator({
    rules,
    sink: sink ?? undefined,
    logger: log,
    clock: options.clock,
  });

  return { orchestrator, config, rules, sink };
}
