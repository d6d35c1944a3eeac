/**
 * Tests for the offline simulation used by `sdo simulate`.
 */

import { describe, it, expect } from 'vitest';
import { ExitCode } from '../../types/exit-codes.js';
import { parseConsumerSpecs, parseSignals, simulate } from '../simulation.js';
import { serializeSignal } from '../signals/signal.js';
import { catchError, makeSignal, silentLogger } from '../signals/__tests__/fixtures.js';

describe('parseConsumerSpecs', () => {
  it('defaults slot, capabilities and enabled', () => {
    expect(parseConsumerSpecs([{ consumer_id: 'c1', scopes: [{ phase: 'phase_01', policy_area: 'ALL' }] }])).toEqual([
      {
        consumer_id: 'c1',
        scopes: [{ phase: 'phase_01', policy_area: 'ALL', slot: 'ALL' }],
        capabilities: [],
        enabled: true,
      },
    ]);
  });

  it('rejects a consumer without scopes', () => {
    const error = catchError(() => parseConsumerSpecs([{ consumer_id: 'c1', scopes: [] }]));
    expect(error).toMatchObject({ code: ExitCode.CONSUMER_INVALID });
  });
});

describe('parseSignals', () => {
  it('requires an array', () => {
    expect(catchError(() => parseSignals({}))).toMatchObject({
      code: ExitCode.SIGNAL_MALFORMED,
      message: 'Signals file must contain a JSON array',
    });
  });

  it('names the index of a malformed signal', () => {
    const good = serializeSignal(makeSignal({}, 'ok'));
    const error = catchError(() => parseSignals([good, { signal_id: 'broken' }]));
    expect(error instanceof Error && error.message.startsWith('Signal #1: Malformed signal record: ')).toBe(true);
  });
});

describe('simulate', () => {
  it('dispatches every signal and reports outcomes, receipts and dead letters', () => {
    const signals = parseSignals([
      serializeSignal(makeSignal({}, 's1')),
      serializeSignal(makeSignal({ empiricalAvailability: 0.1, payload: { value: 2 } }, 's2')),
    ]);
    const specs = parseConsumerSpecs([
      { consumer_id: 'ok', scopes: [{ phase: 'phase_01', policy_area: 'ALL', slot: 'ALL' }], capabilities: ['X'] },
      {
        consumer_id: 'flaky',
        scopes: [{ phase: 'phase_01', policy_area: 'PA01', slot: 'Q1' }],
        capabilities: ['X'],
        fail_with: 'parse error',
      },
    ]);

    const report = simulate(signals, specs, { logger: silentLogger() });

    expect(report.batch).toEqual({ delivered: 1, rejected: 1, deduplicated: 0, deadLettered: 0 });
    expect(report.outcomes).toEqual([
      { signal_id: 's1', status: 'delivered', delivered_to: ['ok'] },
      { signal_id: 's2', status: 'rejected', reason: 'LOW_VALUE' },
    ]);
    expect(report.received).toEqual({ ok: ['s1'], flaky: ['s1'] });
    expect(report.deadLetters.map(record => [record.reason, record.consumer_id, record.detail])).toEqual([
      ['HANDLER_ERROR', 'flaky', 'Consumer flaky: parse error'],
      ['LOW_VALUE', null, 'availability=0.1 < 0.3'],
    ]);
    expect(report.consumerStats['flaky']).toEqual({ processed: 0, errors: 1, enabled: true });
    expect(report.health.status).toBe('DEGRADED');
  });
});
