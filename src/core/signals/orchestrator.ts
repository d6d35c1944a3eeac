/**
 * Signal Distribution Orchestrator -- the in-process signal bus.
 *
 * Producers hand fully-formed Signals to dispatch(); the orchestrator
 * validates, deduplicates and value-gates them, then fans each one out to
 * every enabled consumer whose scopes and capabilities match.
 *
 * Flow: validate → phase/type allow-list → dedup → value gate → fan-out
 *
 * Dispatch is synchronous and owns all mutable state (registry, dedup cache,
 * dead letters, audit trail, counters); the event loop is its critical
 * section. Fan-out iterates a snapshot of the registry taken when it starts,
 * so handlers that register or unregister consumers affect only later
 * dispatches.
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { getLogger } from '../logger.js';
import { describeError } from '../errors.js';
import { AuditAction, AuditTrail, type AuditEntry } from './audit-trail.js';
import { Consumer, type ConsumerRegistration, type ConsumerStats } from './consumer.js';
import { DedupCache } from './dedup-cache.js';
import {
  DeadLetterQueue,
  DeadLetterReason,
  MemoryDeadLetterSink,
  type DeadLetter,
  type DeadLetterSink,
} from './dead-letter.js';
import { runGates, type GateReport } from './gates.js';
import {
  computeHealth,
  emptyCounters,
  type DispatchCounters,
  type HealthReport,
  type OrchestratorMetrics,
} from './metrics.js';
import type { DeliveryReceipt, DispatchOutcome } from './receipt.js';
import {
  DEFAULT_ROUTING_RULES,
  isTypeAllowedInPhase,
  type RoutingRules,
} from './routing-rules.js';
import { contentHash, validateSignal, type Signal } from './signal.js';

export interface OrchestratorOptions {
  rules?: RoutingRules;
  /** Receives every dead letter. Defaults to an in-memory sink. */
  sink?: DeadLetterSink;
  logger?: Logger;
  /** Epoch milliseconds. */
  clock?: () => number;
  idFactory?: () => string;
  /** Expired dedup entries are swept every this many dispatches. Default 256. */
  sweepInterval?: number;
  /** Receipts kept; the oldest is dropped past this. Default 10000. */
  maxReceipts?: number;
}

const DEFAULT_SWEEP_INTERVAL = 256;
const DEFAULT_MAX_RECEIPTS = 10_000;

export interface BatchResult {
  delivered: number;
  rejected: number;
  deduplicated: number;
  deadLettered: number;
  outcomes: DispatchOutcome[];
}

export class SignalDistributionOrchestrator {
  readonly rules: RoutingRules;

  private consumers: Map<string, Consumer> = new Map();
  private receipts: Map<string, DeliveryReceipt> = new Map();
  private counters: DispatchCounters = emptyCounters();
  private cache: DedupCache;
  private deadLetters: DeadLetterQueue;
  private audit: AuditTrail;
  private log: Logger;
  private now: () => number;
  private nextId: () => string;
  private sweepInterval: number;
  private maxReceipts: number;

  constructor(options: OrchestratorOptions = {}) {
    this.rules = options.rules ?? DEFAULT_ROUTING_RULES;
    this.log = options.logger ?? getLogger('sdo');
    this.now = options.clock ?? Date.now;
    this.nextId = options.idFactory ?? randomUUID;
    this.sweepInterval = Math.max(1, options.sweepInterval ?? DEFAULT_SWEEP_INTERVAL);
    this.maxReceipts = Math.max(1, options.maxReceipts ?? DEFAULT_MAX_RECEIPTS);

    this.cache = new DedupCache(this.rules.dedupWindowSeconds);
    this.deadLetters = new DeadLetterQueue(options.sink ?? new MemoryDeadLetterSink(), this.log);
    this.audit = new AuditTrail(this.log.child({ subsystem: 'audit' }), this.nextId, this.now);

    this.log.info(
      {
        empiricalMin: this.rules.empiricalAvailabilityMin,
        phasesConfigured: Object.keys(this.rules.phaseRouting).length,
        deadLetterEnabled: this.rules.deadLetterEnabled,
        dedupWindowSeconds: this.rules.dedupWindowSeconds,
      },
      'SignalDistributionOrchestrator initialized',
    );
  }

  // ── Consumer registry ──────────────────────────────────────────────

  /**
   * Register a consumer. An existing registration with the same id is
   * replaced in place: it keeps its fan-out position, not its counters.
   */
  registerConsumer(registration: ConsumerRegistration): { replaced: boolean } {
    const consumer = new Consumer(registration);
    const replaced = this.consumers.has(consumer.consumerId);
    this.consumers.set(consumer.consumerId, consumer);

    if (replaced) {
      this.log.warn({ consumerId: consumer.consumerId }, `Consumer replaced: ${consumer.consumerId}`);
    } else {
      this.log.info(
        {
          consumerId: consumer.consumerId,
          scopes: consumer.scopes.map(scope => scope.toString()),
          capabilities: [...consumer.capabilities],
        },
        `Consumer registered: ${consumer.consumerId}`,
      );
    }

    return { replaced };
  }

  unregisterConsumer(consumerId: string): boolean {
    const removed = this.consumers.delete(consumerId);
    if (removed) {
      this.log.info({ consumerId }, `Consumer unregistered: ${consumerId}`);
    }
    return removed;
  }

  /** Enable or disable a consumer without dropping its counters. */
  setConsumerEnabled(consumerId: string, enabled: boolean): boolean {
    const consumer = this.consumers.get(consumerId);
    if (!consumer) return false;
    consumer.enabled = enabled;
    this.log.info({ consumerId, enabled }, `Consumer ${enabled ? 'enabled' : 'disabled'}: ${consumerId}`);
    return true;
  }

  getConsumer(consumerId: string): Consumer | undefined {
    return this.consumers.get(consumerId);
  }

  /** Registered consumers in fan-out order. */
  listConsumers(): Consumer[] {
    return [...this.consumers.values()];
  }

  // ── Dispatch ───────────────────────────────────────────────────────

  /**
   * Dispatch a signal through the bus.
   *
   * Never throws for business-rule failures: the outcome says what happened
   * and the dead-letter queue and audit trail hold the details.
   */
  dispatch(signal: Signal): DispatchOutcome {
    this.counters.signalsDispatched++;
    this.audit.record(AuditAction.DISPATCHED, signal);
    if (this.counters.signalsDispatched % this.sweepInterval === 0) {
      this.cache.evictExpired(this.now());
    }

    // 1. Structural validation
    const validation = validateSignal(signal);
    if (!validation.valid) {
      return this.reject(
        signal,
        DeadLetterReason.VALIDATION_FAILED,
        validation.errors.join('; '),
        `Validation failed: ${validation.errors.join('; ')}`,
      );
    }

    // 2. Phase/type allow-list
    if (!isTypeAllowedInPhase(this.rules, signal.signalType, signal.scope.phase)) {
      return this.reject(
        signal,
        DeadLetterReason.INVALID_SCOPE,
        `Type ${signal.signalType} not allowed in ${signal.scope.phase}`,
        'Invalid scope/type combination',
      );
    }

    // 3. Deduplication (not an error: no dead letter)
    const hash = contentHash(signal);
    if (this.cache.isDuplicate(hash, this.now())) {
      this.audit.record(AuditAction.DEDUPLICATED, signal, { detail: `Hash collision: ${hash.slice(0, 16)}` });
      this.counters.signalsDeduplicated++;
      return { status: 'deduplicated', signalId: signal.signalId, contentHash: hash };
    }

    // 4. Value gate (enrichment signals are exempt)
    if (!signal.enrichment && signal.empiricalAvailability < this.rules.empiricalAvailabilityMin) {
      return this.reject(
        signal,
        DeadLetterReason.LOW_VALUE,
        `availability=${signal.empiricalAvailability} < ${this.rules.empiricalAvailabilityMin}`,
        'Below empirical threshold',
      );
    }

    // 5. Fan-out
    const deliveredTo: string[] = [];
    const failedConsumers: string[] = [];
    for (const consumer of [...this.consumers.values()]) {
      if (!consumer.enabled || !consumer.canHandle(signal).ok) continue;

      if (this.deliver(consumer, signal)) {
        deliveredTo.push(consumer.consumerId);
      } else {
        failedConsumers.push(consumer.consumerId);
      }
    }

    // 6. No acceptors
    if (deliveredTo.length === 0) {
      const detail = `No consumer for scope=${signal.scope.toString()}`;
      this.deadLetter(signal, DeadLetterReason.NO_CONSUMER, detail);
      this.audit.record(AuditAction.DEAD_LETTERED, signal, { detail: 'No eligible consumers' });
      return {
        status: 'dead_lettered',
        signalId: signal.signalId,
        reason: DeadLetterReason.NO_CONSUMER,
        detail,
        failedConsumers,
      };
    }

    // 7. Success
    const routedAt = this.now();
    this.cache.remember(hash, routedAt);
    const receipt: DeliveryReceipt = Object.freeze({
      signalId: signal.signalId,
      contentHash: hash,
      deliveredTo: Object.freeze(deliveredTo),
      failedConsumers: Object.freeze(failedConsumers),
      routedAt: new Date(routedAt).toISOString(),
    });
    this.receipts.set(signal.signalId, receipt);
    if (this.receipts.size > this.maxReceipts) {
      const oldest = this.receipts.keys().next();
      if (!oldest.done) this.receipts.delete(oldest.value);
    }
    this.counters.signalsDelivered++;

    this.log.debug({ signalId: signal.signalId, deliveredTo }, `Signal ${signal.signalId} delivered`);
    return { status: 'delivered', signalId: signal.signalId, receipt };
  }

  /**
   * Dispatch signals in order. Counts are per outcome status.
   */
  dispatchBatch(signals: Iterable<Signal>): BatchResult {
    const result: BatchResult = { delivered: 0, rejected: 0, deduplicated: 0, deadLettered: 0, outcomes: [] };

    for (const signal of signals) {
      const outcome = this.dispatch(signal);
      result.outcomes.push(outcome);
      switch (outcome.status) {
        case 'delivered': result.delivered++; break;
        case 'rejected': result.rejected++; break;
        case 'deduplicated': result.deduplicated++; break;
        case 'dead_lettered': result.deadLettered++; break;
      }
    }

    return result;
  }

  /** Receipt of a delivered signal, if it was delivered. */
  getReceipt(signalId: string): DeliveryReceipt | undefined {
    return this.receipts.get(signalId);
  }

  /**
   * Invoke one consumer's handler. Returns false when it threw.
   *
   * A handler that returns a promise counts as delivered; a later rejection
   * is recorded the same way as a synchronous throw.
   */
  private deliver(consumer: Consumer, signal: Signal): boolean {
    try {
      const result = consumer.handler.handle(signal);
      if (result instanceof Promise) {
        result.catch(err => {
          this.recordHandlerError(consumer, signal, err);
        });
      }
    } catch (err) {
      this.recordHandlerError(consumer, signal, err);
      return false;
    }

    consumer.processed++;
    this.audit.record(AuditAction.DELIVERED, signal, { consumerId: consumer.consumerId });
    return true;
  }

  private recordHandlerError(consumer: Consumer, signal: Signal, err: unknown): void {
    consumer.errors++;
    this.counters.consumerErrors++;
    const message = describeError(err);
    this.log.error(
      { consumerId: consumer.consumerId, signalId: signal.signalId, err },
      `Consumer ${consumer.consumerId} error: ${message}`,
    );
    this.deadLetter(
      signal,
      DeadLetterReason.HANDLER_ERROR,
      `Consumer ${consumer.consumerId}: ${message}`,
      consumer.consumerId,
    );
  }

  private reject(
    signal: Signal,
    reason: DeadLetterReason,
    detail: string,
    auditDetail: string,
  ): DispatchOutcome {
    this.deadLetter(signal, reason, detail);
    this.audit.record(AuditAction.REJECTED, signal, { detail: auditDetail });
    this.counters.signalsRejected++;
    return { status: 'rejected', signalId: signal.signalId, reason, detail };
  }

  private deadLetter(
    signal: Signal,
    reason: DeadLetterReason,
    detail: string,
    consumerId: string | null = null,
  ): void {
    if (!this.rules.deadLetterEnabled) return;

    const deadLetter: DeadLetter = Object.freeze({
      deadLetterId: this.nextId(),
      signal,
      reason,
      detail,
      consumerId,
      timestamp: new Date(this.now()).toISOString(),
    });
    this.deadLetters.add(deadLetter);
    this.counters.deadLetters++;

    this.log.warn(
      { signalId: signal.signalId, reason, deadLetterId: deadLetter.deadLetterId },
      `Signal ${signal.signalId} dead-lettered: ${reason} - ${detail}`,
    );
  }

  // ── Diagnostics ────────────────────────────────────────────────────

  /**
   * Run the four validation gates against `signal` without dispatching it.
   * Gate 4 (irrigation channel) runs only with `postDispatch`.
   */
  validateAllGates(signal: Signal, options?: { postDispatch?: boolean }): GateReport {
    return runGates(
      signal,
      {
        rules: this.rules,
        consumers: this.listConsumers(),
        receipt: this.receipts.get(signal.signalId),
        hasAuditEntry: this.audit.has(signal.signalId),
      },
      options,
    );
  }

  // ── Dead letters ───────────────────────────────────────────────────

  getDeadLetters(reason?: DeadLetterReason): DeadLetter[] {
    return this.deadLetters.list(reason);
  }

  /**
   * Remove a dead letter and dispatch its signal again.
   * Returns null when no dead letter has that id.
   */
  replayDeadLetter(deadLetterId: string): DispatchOutcome | null {
    const deadLetter = this.deadLetters.take(deadLetterId);
    if (!deadLetter) return null;

    this.log.info(
      { deadLetterId, signalId: deadLetter.signal.signalId, reason: deadLetter.reason },
      `Replaying dead letter ${deadLetterId}`,
    );
    return this.dispatch(deadLetter.signal);
  }

  // ── Audit ──────────────────────────────────────────────────────────

  getAuditLog(signalId?: string): AuditEntry[] {
    return this.audit.list(signalId);
  }

  /** Clear the audit log. Returns the number of entries removed. */
  clearAuditLog(): number {
    return this.audit.clear();
  }

  // ── Metrics & health ───────────────────────────────────────────────

  getMetrics(): OrchestratorMetrics {
    const consumers = this.listConsumers();
    return {
      ...this.counters,
      consumersRegistered: consumers.length,
      consumersEnabled: consumers.filter(consumer => consumer.enabled).length,
      cacheSize: this.cache.size,
      auditLogSize: this.audit.size,
      deadLetterQueueSize: this.deadLetters.size,
    };
  }

  getConsumerStats(): Record<string, ConsumerStats> {
    const stats: Record<string, ConsumerStats> = {};
    for (const consumer of this.consumers.values()) {
      stats[consumer.consumerId] = consumer.toStats();
    }
    return stats;
  }

  healthCheck(): HealthReport {
    const consumers = this.listConsumers();
    return computeHealth(this.getMetrics(), {
      healthy: consumers.filter(consumer => consumer.enabled && consumer.errors === 0).length,
      total: consumers.length,
    });
  }

  // ── Cleanup ────────────────────────────────────────────────────────

  /** Clear the dedup cache. Returns the number of entries cleared. */
  clearCache(): number {
    return this.cache.clear();
  }

  /** Drop dedup entries older than the window. Returns the number evicted. */
  evictExpiredCache(): number {
    return this.cache.evictExpired(this.now());
  }
}
