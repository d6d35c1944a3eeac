/**
 * Offline dry run: register recording consumers described in JSON, dispatch
 * serialized signals through a fresh orchestrator and summarise the outcome.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { ExitCode } from '../types/exit-codes.js';
import { SdoError } from './errors.js';
import type { ConsumerStats } from './signals/consumer.js';
import type { DeadLetterRecord, DeadLetterSink } from './signals/dead-letter.js';
import type { HealthReport, OrchestratorMetrics } from './signals/metrics.js';
import { SignalDistributionOrchestrator } from './signals/orchestrator.js';
import type { DispatchStatus } from './signals/receipt.js';
import type { RoutingRules } from './signals/routing-rules.js';
import { deserializeSignal, ScopeRecordSchema, type Signal } from './signals/signal.js';

export const ConsumerSpecSchema = z.object({
  consumer_id: z.string().min(1),
  scopes: z.array(ScopeRecordSchema.extend({ slot: z.string().min(1).default('ALL') })).min(1),
  capabilities: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  /** When set, the handler throws an Error with this message. */
  fail_with: z.string().optional(),
});
export type ConsumerSpec = z.infer<typeof ConsumerSpecSchema>;

export interface SimulatedOutcome {
  signal_id: string;
  status: DispatchStatus;
  reason?: string;
  delivered_to?: readonly string[];
}

export interface SimulationReport {
  batch: { delivered: number; rejected: number; deduplicated: number; deadLettered: number };
  outcomes: SimulatedOutcome[];
  /** Signal ids each consumer's handler received, in order. */
  received: Record<string, string[]>;
  consumerStats: Record<string, ConsumerStats>;
  deadLetters: DeadLetterRecord[];
  metrics: OrchestratorMetrics;
  health: HealthReport;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Validate a consumers document: a JSON array of consumer specs. */
export function parseConsumerSpecs(data: unknown): ConsumerSpec[] {
  const parsed = z.array(ConsumerSpecSchema).safeParse(data);
  if (!parsed.success) {
    throw new SdoError(ExitCode.CONSUMER_INVALID, `Invalid consumers file: ${formatIssues(parsed.error)}`, {
      fix: 'Provide an array of { consumer_id, scopes, capabilities }',
    });
  }
  return parsed.data;
}

/** Deserialize a signals document: a JSON array of serialized signals. */
export function parseSignals(data: unknown): Signal[] {
  if (!Array.isArray(data)) {
    throw new SdoError(ExitCode.SIGNAL_MALFORMED, 'Signals file must contain a JSON array');
  }
  return data.map((record: unknown, index) => {
    try {
      return deserializeSignal(record);
    } catch (err) {
      if (err instanceof SdoError) {
        throw new SdoError(err.code, `Signal #${index}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  });
}

/**
 * Dispatch `signals` against consumers built from `specs`. Dead letters are
 * collected in memory and returned in the report.
 */
export function simulate(
  signals: readonly Signal[],
  specs: readonly ConsumerSpec[],
  options: { rules?: RoutingRules; logger?: Logger; clock?: () => number } = {},
): SimulationReport {
  const deadLetters: DeadLetterRecord[] = [];
  const sink: DeadLetterSink = { persist: record => { deadLetters.push(record); } };
  const orchestrator = new SignalDistributionOrchestrator({
    rules: options.rules,
    sink,
    logger: options.logger,
    clock: options.clock,
  });

  const received: Record<string, string[]> = {};
  for (const spec of specs) {
    const inbox: string[] = [];
    received[spec.consumer_id] = inbox;
    orchestrator.registerConsumer({
      consumerId: spec.consumer_id,
      scopes: spec.scopes,
      capabilities: spec.capabilities,
      enabled: spec.enabled,
      handler: signal => {
        inbox.push(signal.signalId);
        if (spec.fail_with !== undefined) {
          throw new Error(spec.fail_with);
        }
      },
    });
  }

  const result = orchestrator.dispatchBatch(signals);
  const outcomes = result.outcomes.map((outcome): SimulatedOutcome => {
    switch (outcome.status) {
      case 'delivered':
        return { signal_id: outcome.signalId, status: outcome.status, delivered_to: outcome.receipt.deliveredTo };
      case 'deduplicated':
        return { signal_id: outcome.signalId, status: outcome.status };
      case 'rejected':
      case 'dead_lettered':
        return { signal_id: outcome.signalId, status: outcome.status, reason: outcome.reason };
    }
  });

  return {
    batch: {
      delivered: result.delivered,
      rejected: result.rejected,
      deduplicated: result.deduplicated,
      deadLettered: result.deadLettered,
    },
    outcomes,
    received,
    consumerStats: orchestrator.getConsumerStats(),
    deadLetters,
    metrics: orchestrator.getMetrics(),
    health: orchestrator.healthCheck(),
  };
}
