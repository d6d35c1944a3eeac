/**
 * Signal Distribution Orchestrator - in-process signal bus with scope
 * routing, deduplication, value gating and dead-lettering.
 */

// Types
export { ExitCode, getExitCodeName, isErrorCode, isRecoverableCode } from './types/exit-codes.js';
export {
  PHASES,
  POLICY_AREAS,
  SIGNAL_TYPES,
  WILDCARD,
  isPhase,
  isPolicyArea,
  isScopePhase,
  isSignalType,
  type Phase,
  type PolicyArea,
  type ScopePhase,
  type ScopeRecord,
  type SignalType,
} from './types/signal.js';
export type { ConfigSource, DeadLetterConfig, LoggingConfig, ResolvedValue, RoutingConfig, SdoConfig } from './types/config.js';

// Core
export { SdoError, describeError } from './core/errors.js';
export { closeLogger, getLogger, initLogger, rollOptions, type RollOptions } from './core/logger.js';
export { DEFAULTS as CONFIG_DEFAULTS, getConfigPath, getConfigValue, loadConfig } from './core/config.js';
export { createOrchestrator, type BootstrapOptions, type Bootstrapped } from './core/bootstrap.js';
export {
  parseConsumerSpecs,
  parseSignals,
  simulate,
  type ConsumerSpec,
  type SimulationReport,
} from './core/simulation.js';

// Signal bus
export * from './core/signals/index.js';

// Store
export { FileDeadLetterSink, readDeadLetterRecord, readDeadLetterRecords } from './store/dead-letter-store.js';
