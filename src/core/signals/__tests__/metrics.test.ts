/**
 * Tests for the health rule.
 */

import { describe, it, expect } from 'vitest';
import { computeHealth, emptyCounters, type OrchestratorMetrics } from '../metrics.js';

function metrics(overrides: Partial<OrchestratorMetrics>): OrchestratorMetrics {
  return {
    ...emptyCounters(),
    consumersRegistered: 0,
    consumersEnabled: 0,
    cacheSize: 0,
    auditLogSize: 0,
    deadLetterQueueSize: 0,
    ...overrides,
  };
}

describe('computeHealth', () => {
  it('is HEALTHY with zero rates before any traffic', () => {
    const report = computeHealth(metrics({}), { healthy: 0, total: 0 });
    expect(report).toMatchObject({ status: 'HEALTHY', deadLetterRate: 0, errorRate: 0 });
  });

  it('degrades at a dead-letter rate of exactly 10%', () => {
    const report = computeHealth(metrics({ signalsDispatched: 10, deadLetters: 1 }), { healthy: 1, total: 1 });
    expect(report.status).toBe('DEGRADED');
    expect(report.deadLetterRate).toBe(0.1);
  });

  it('degrades at an error rate of exactly 5%', () => {
    const report = computeHealth(metrics({ signalsDispatched: 20, signalsDelivered: 20, consumerErrors: 1 }), {
      healthy: 1,
      total: 2,
    });
    expect(report.status).toBe('DEGRADED');
    expect(report.errorRate).toBe(0.05);
  });

  it('rounds rates to four places', () => {
    const report = computeHealth(metrics({ signalsDispatched: 21, signalsDelivered: 21, consumerErrors: 1 }), {
      healthy: 2,
      total: 2,
    });
    expect(report.status).toBe('HEALTHY');
    expect(report.errorRate).toBe(0.0476);
    expect(report.consumersHealthy).toBe(2);
  });
});
