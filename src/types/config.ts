/**
 * Configuration type definitions.
 * Covers the project config file with env/CLI cascade resolution.
 */

/** Logging configuration (pino + pino-roll). */
export interface LoggingConfig {
  level: string;
  /** Log file path, relative to the project root. */
  filePath: string;
  maxFileSize: number;
  maxFiles: number;
}

/** Routing configuration. */
export interface RoutingConfig {
  /** Routing rules JSON document; null means built-in defaults. */
  rulesPath: string | null;
}

/** Dead-letter persistence configuration. */
export interface DeadLetterConfig {
  /** Write every dead letter to disk. */
  persist: boolean;
  /** Target directory; null means the rules document's dead_letter.path. */
  dir: string | null;
}

/** Complete configuration. */
export interface SdoConfig {
  logging: LoggingConfig;
  routing: RoutingConfig;
  deadLetter: DeadLetterConfig;
}

/** Config source for resolution tracking. */
export type ConfigSource = 'cli' | 'env' | 'project' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
