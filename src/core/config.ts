/**
 * Configuration engine.
 *
 * Resolution priority: CLI overrides > Environment vars > Project config > Defaults
 *
 * The project config lives at `<root>/.sdo/config.json`. A missing file is
 * fine; an invalid one is reported with a warning and ignored.
 */

import { join } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { ConfigSource, ResolvedValue, SdoConfig } from '../types/config.js';
import { readJson } from '../store/atomic.js';
import { describeError } from './errors.js';
import { getLogger } from './logger.js';

/** Default configuration values. */
export const DEFAULTS: SdoConfig = {
  logging: {
    level: 'info',
    filePath: '.sdo/logs/sdo.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
  routing: {
    rulesPath: null,
  },
  deadLetter: {
    persist: true,
    dir: null,
  },
};

/** How an environment variable's text becomes a config value. */
type EnvKind = 'string' | 'nullableString' | 'number' | 'boolean';

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, { path: string; kind: EnvKind }> = {
  'SDO_LOG_LEVEL': { path: 'logging.level', kind: 'string' },
  'SDO_LOG_FILE': { path: 'logging.filePath', kind: 'string' },
  'SDO_LOG_MAX_FILE_SIZE': { path: 'logging.maxFileSize', kind: 'number' },
  'SDO_LOG_MAX_FILES': { path: 'logging.maxFiles', kind: 'number' },
  'SDO_RULES_PATH': { path: 'routing.rulesPath', kind: 'nullableString' },
  'SDO_DEAD_LETTER_PERSIST': { path: 'deadLetter.persist', kind: 'boolean' },
  'SDO_DEAD_LETTER_DIR': { path: 'deadLetter.dir', kind: 'nullableString' },
};

export const SdoConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
  routing: z.object({
    rulesPath: z.string().min(1).nullable(),
  }),
  deadLetter: z.object({
    persist: z.boolean(),
    dir: z.string().min(1).nullable(),
  }),
});

/** Path of the project config file. */
export function getConfigPath(root: string): string {
  return join(root, '.sdo', 'config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const [key, sourceVal] of Object.entries(source)) {
    const targetVal = result[key];
    result[key] = isRecord(sourceVal) && isRecord(targetVal)
      ? deepMerge(targetVal, sourceVal)
      : sourceVal;
  }
  return result;
}

/**
 * Parse an environment variable value for its key's kind. Text that does not
 * fit the kind is passed through for the schema to reject.
 */
function parseEnvValue(value: string, kind: EnvKind): unknown {
  switch (kind) {
    case 'string':
      return value;
    case 'nullableString':
      return value === 'null' ? null : value;
    case 'boolean':
      if (value === 'true') return true;
      if (value === 'false') return false;
      return value;
    case 'number': {
      const num = Number(value);
      return value.trim() !== '' && !isNaN(num) ? num : value;
    }
  }
}

function defaultsRecord(): Record<string, unknown> {
  const copy: unknown = structuredClone(DEFAULTS);
  return isRecord(copy) ? copy : {};
}

async function readProjectConfig(root: string, log: Logger): Promise<Record<string, unknown> | null> {
  const path = getConfigPath(root);
  try {
    const data = await readJson(path);
    if (data === null) return null;
    if (!isRecord(data)) {
      log.warn({ path }, 'Project config is not an object, ignoring');
      return null;
    }
    return data;
  } catch (err) {
    log.warn({ path, err: describeError(err) }, 'Project config unreadable, ignoring');
    return null;
  }
}

/**
 * Load and merge configuration from all sources.
 *
 * @param root      - Project root holding `.sdo/config.json`
 * @param overrides - Dotted-path values from CLI flags (highest priority)
 */
export async function loadConfig(
  root: string,
  overrides?: Record<string, unknown>,
  log: Logger = getLogger('config'),
): Promise<SdoConfig> {
  let merged = defaultsRecord();

  const projectConfig = await readProjectConfig(root, log);
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, { path, kind }] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, path, parseEnvValue(envValue, kind));
    }
  }

  for (const [configPath, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) {
      setNestedValue(merged, configPath, value);
    }
  }

  const parsed = SdoConfigSchema.safeParse(merged);
  if (!parsed.success) {
    log.warn(
      { issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) },
      'Invalid configuration, using defaults',
    );
    return structuredClone(DEFAULTS);
  }
  return parsed.data;
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(
  path: string,
  root: string,
  overrides?: Record<string, unknown>,
  log: Logger = getLogger('config'),
): Promise<ResolvedValue<unknown>> {
  if (overrides && overrides[path] !== undefined) {
    return { value: overrides[path], source: 'cli' };
  }

  for (const [envKey, entry] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (entry.path === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue, entry.kind), source: 'env' };
    }
  }

  const projectConfig = await readProjectConfig(root, log);
  if (projectConfig) {
    const val = getNestedValue(projectConfig, path);
    if (val !== undefined) {
      return { value: val, source: 'project' };
    }
  }

  const source: ConfigSource = 'default';
  return { value: getNestedValue(DEFAULTS, path), source };
}

/** Every dotted config key, in declaration order. */
export function listConfigKeys(): string[] {
  const keys: string[] = [];
  const walk = (value: unknown, prefix: string): void => {
    if (isRecord(value)) {
      for (const [key, child] of Object.entries(value)) {
        walk(child, prefix ? `${prefix}.${key}` : key);
      }
    } else {
      keys.push(prefix);
    }
  };
  walk(DEFAULTS, '');
  return keys;
}
