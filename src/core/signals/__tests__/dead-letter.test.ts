/**
 * Tests for the dead-letter queue.
 */

import { describe, it, expect } from 'vitest';
import {
  DeadLetterQueue,
  DeadLetterReason,
  MemoryDeadLetterSink,
  toDeadLetterRecord,
  type DeadLetter,
} from '../dead-letter.js';
import { serializeSignal } from '../signal.js';
import { captureLogger, makeSignal, silentLogger } from './fixtures.js';

function deadLetter(id: string, reason: DeadLetterReason): DeadLetter {
  return {
    deadLetterId: id,
    signal: makeSignal({}, `sig-${id}`),
    reason,
    detail: `detail ${id}`,
    consumerId: null,
    timestamp: '2026-01-01T00:00:00.000Z',
  };
}

describe('DeadLetterQueue', () => {
  it('hands each dead letter to the sink as a record', () => {
    const sink = new MemoryDeadLetterSink();
    const queue = new DeadLetterQueue(sink, silentLogger());
    const entry = deadLetter('d1', DeadLetterReason.LOW_VALUE);
    queue.add(entry);

    expect(sink.records).toEqual([{
      dead_letter_id: 'd1',
      signal: serializeSignal(entry.signal),
      reason: 'LOW_VALUE',
      detail: 'detail d1',
      consumer_id: null,
      timestamp: '2026-01-01T00:00:00.000Z',
    }]);
    expect(sink.records[0]).toEqual(toDeadLetterRecord(entry));
  });

  it('filters by reason and removes by id', () => {
    const queue = new DeadLetterQueue(new MemoryDeadLetterSink(), silentLogger());
    queue.add(deadLetter('d1', DeadLetterReason.LOW_VALUE));
    queue.add(deadLetter('d2', DeadLetterReason.NO_CONSUMER));
    queue.add(deadLetter('d3', DeadLetterReason.LOW_VALUE));

    expect(queue.list(DeadLetterReason.LOW_VALUE).map(entry => entry.deadLetterId)).toEqual(['d1', 'd3']);
    expect(queue.take('d1')?.deadLetterId).toBe('d1');
    expect(queue.take('d1')).toBeUndefined();
    expect(queue.list().map(entry => entry.deadLetterId)).toEqual(['d2', 'd3']);
    expect(queue.size).toBe(2);
  });

  it('keeps the dead letter when the sink throws', () => {
    const { log, messages } = captureLogger();
    const queue = new DeadLetterQueue({ persist: () => { throw new Error('disk full'); } }, log);
    queue.add(deadLetter('d1', DeadLetterReason.HANDLER_ERROR));

    expect(queue.size).toBe(1);
    expect(messages()).toEqual(['Failed to persist dead letter']);
  });
});
