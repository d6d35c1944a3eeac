/**
 * Signal bus barrel export.
 */

export { SignalScope, toScope } from './scope.js';
export {
  canonicalize,
  contentHash,
  createProvenance,
  createSignal,
  deriveSignal,
  deserializeSignal,
  serializeSignal,
  validateSignal,
  SerializedSignalSchema,
  type JsonValue,
  type ProvenanceInit,
  type SerializedSignal,
  type Signal,
  type SignalInit,
  type SignalProvenance,
  type SignalValidation,
} from './signal.js';
export {
  Consumer,
  missingCapabilities,
  type ConsumerRegistration,
  type ConsumerStats,
  type MatchResult,
  type SignalHandler,
  type SignalHandlerFn,
} from './consumer.js';
export {
  DEFAULT_ROUTING_RULES,
  createRoutingRules,
  isGateEnabled,
  isTypeAllowedInPhase,
  loadRoutingRules,
  parseRoutingRules,
  routingRulesToJSON,
  type GateRule,
  type PhaseRouting,
  type RoutingRules,
} from './routing-rules.js';
export { DedupCache, type DedupCacheStats } from './dedup-cache.js';
export {
  DeadLetterQueue,
  DeadLetterReason,
  MemoryDeadLetterSink,
  toDeadLetterRecord,
  type DeadLetter,
  type DeadLetterRecord,
  type DeadLetterSink,
} from './dead-letter.js';
export { AuditAction, AuditTrail, type AuditEntry } from './audit-trail.js';
export {
  MAX_DEAD_LETTER_RATE,
  MAX_ERROR_RATE,
  computeHealth,
  type DispatchCounters,
  type HealthReport,
  type HealthStatus,
  type OrchestratorMetrics,
} from './metrics.js';
export {
  GateName,
  runGates,
  type GateContext,
  type GateReport,
  type GateSeverity,
  type GateViolation,
} from './gates.js';
export { isDelivered, type DeliveryReceipt, type DispatchOutcome, type DispatchStatus } from './receipt.js';
export {
  SignalDistributionOrchestrator,
  type BatchResult,
  type OrchestratorOptions,
} from './orchestrator.js';
