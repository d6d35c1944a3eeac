/**
 * Process logger for the `sdo` CLI and embedders that want one.
 *
 * A single pino root writes JSON lines through a pino-roll transport (size and
 * daily rotation, bounded retention). Every record carries `service` and the
 * project `root`; subsystems log through child loggers. The orchestrator takes
 * its logger by injection and only falls back to getLogger('sdo').
 */

import pino from 'pino';
import { resolve } from 'node:path';
import type { LoggingConfig, SdoConfig } from '../types/config.js';

const SERVICE = 'sdo';

const formatters = {
  level: (label: string) => ({ level: label.toUpperCase() }),
};

let rootLogger: pino.Logger | null = null;
let stderrLogger: pino.Logger | null = null;

/** pino-roll size string ('10m', '512k', ...) for a byte count, rounded down. */
export function toRollSize(bytes: number): string {
  const units: ReadonlyArray<readonly [number, string]> = [
    [1024 ** 3, 'g'],
    [1024 ** 2, 'm'],
    [1024, 'k'],
  ];
  for (const [unit, suffix] of units) {
    if (bytes >= unit) return `${Math.floor(bytes / unit)}${suffix}`;
  }
  return String(bytes);
}

/** Options handed to the pino-roll transport. */
export type RollOptions = {
  file: string;
  size: string;
  frequency: 'daily';
  dateFormat: string;
  mkdir: boolean;
  limit: { count: number; removeOtherLogFiles: boolean };
};

/** pino-roll options for `logging`, with the log file resolved against `root`. */
export function rollOptions(root: string, logging: LoggingConfig): RollOptions {
  return {
    file: resolve(root, logging.filePath),
    size: toRollSize(logging.maxFileSize),
    frequency: 'daily',
    dateFormat: 'yyyy-MM-dd',
    mkdir: true,
    limit: { count: logging.maxFiles, removeOtherLogFiles: true },
  };
}

/**
 * Start file logging for a project. Replaces any earlier root logger, so call
 * closeLogger() first when re-initialising.
 */
export function initLogger(root: string, config: SdoConfig): pino.Logger {
  rootLogger = pino(
    {
      level: config.logging.level,
      base: { service: SERVICE, root },
      formatters,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.transport({ target: 'pino-roll', options: rollOptions(root, config.logging) }),
  );
  return rootLogger;
}

/**
 * Child logger for `subsystem`. Before initLogger it hangs off a shared
 * warn-level stderr logger.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) return rootLogger.child({ subsystem });
  if (!stderrLogger) {
    stderrLogger = pino({ level: 'warn', base: { service: SERVICE }, formatters }, pino.destination(2));
  }
  return stderrLogger.child({ subsystem });
}

/** Flush and drop the root logger; later getLogger calls go to stderr. */
export function closeLogger(): void {
  rootLogger?.flush();
  rootLogger = null;
}
