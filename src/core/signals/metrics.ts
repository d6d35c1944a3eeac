/**
 * Dispatch counters and the health rule derived from them.
 */

export interface DispatchCounters {
  signalsDispatched: number;
  signalsDelivered: number;
  signalsRejected: number;
  signalsDeduplicated: number;
  deadLetters: number;
  consumerErrors: number;
}

export interface OrchestratorMetrics extends DispatchCounters {
  consumersRegistered: number;
  consumersEnabled: number;
  cacheSize: number;
  auditLogSize: number;
  deadLetterQueueSize: number;
}

export type HealthStatus = 'HEALTHY' | 'DEGRADED';

export interface HealthReport {
  status: HealthStatus;
  deadLetterRate: number;
  errorRate: number;
  consumersHealthy: number;
  consumersTotal: number;
  metrics: OrchestratorMetrics;
}

/** Dead letters per dispatched signal above which health degrades. */
export const MAX_DEAD_LETTER_RATE = 0.10;
/** Consumer errors per delivered signal above which health degrades. */
export const MAX_ERROR_RATE = 0.05;

export function emptyCounters(): DispatchCounters {
  return {
    signalsDispatched: 0,
    signalsDelivered: 0,
    signalsRejected: 0,
    signalsDeduplicated: 0,
    deadLetters: 0,
    consumerErrors: 0,
  };
}

function rate(numerator: number, denominator: number): number {
  if (denominator === 0) return 0;
  return Math.round((numerator / denominator) * 10_000) / 10_000;
}

/**
 * HEALTHY iff dead letters stay under 10% of dispatches and consumer errors
 * under 5% of deliveries. An empty denominator counts as a rate of 0.
 */
export function computeHealth(
  metrics: OrchestratorMetrics,
  consumers: { healthy: number; total: number },
): HealthReport {
  const deadLetterRate = rate(metrics.deadLetters, metrics.signalsDispatched);
  const errorRate = rate(metrics.consumerErrors, metrics.signalsDelivered);
  const rawDeadLetterRate = metrics.signalsDispatched === 0 ? 0 : metrics.deadLetters / metrics.signalsDispatched;
  const rawErrorRate = metrics.signalsDelivered === 0 ? 0 : metrics.consumerErrors / metrics.signalsDelivered;

  return {
    status: rawDeadLetterRate < MAX_DEAD_LETTER_RATE && rawErrorRate < MAX_ERROR_RATE ? 'HEALTHY' : 'DEGRADED',
    deadLetterRate,
    errorRate,
    consumersHealthy: consumers.healthy,
    consumersTotal: consumers.total,
    metrics,
  };
}
