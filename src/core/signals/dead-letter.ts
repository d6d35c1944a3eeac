/**
 * Dead-letter queue: an append-only record of undeliverable or rejected
 * signals, with a pluggable sink for persistence.
 *
 * Dead-lettering must never fail. A sink that throws is logged and ignored.
 */

import type { Logger } from 'pino';
import { describeError } from '../errors.js';
import { serializeSignal, type SerializedSignal, type Signal } from './signal.js';

/**
 * Reasons a signal ends up in the dead-letter queue.
 */
export enum DeadLetterReason {
  INVALID_SCOPE = 'INVALID_SCOPE',
  DUPLICATE = 'DUPLICATE',
  LOW_VALUE = 'LOW_VALUE',
  NO_CONSUMER = 'NO_CONSUMER',
  CAPABILITY_MISMATCH = 'CAPABILITY_MISMATCH',
  HANDLER_ERROR = 'HANDLER_ERROR',
  VALIDATION_FAILED = 'VALIDATION_FAILED',
}

export interface DeadLetter {
  readonly deadLetterId: string;
  readonly signal: Signal;
  readonly reason: DeadLetterReason;
  readonly detail: string;
  /** Set for HANDLER_ERROR: the consumer whose handler failed. */
  readonly consumerId: string | null;
  readonly timestamp: string;
}

/** Persisted form of a dead letter: one independently storable record. */
export interface DeadLetterRecord {
  dead_letter_id: string;
  signal: SerializedSignal;
  reason: DeadLetterReason;
  detail: string;
  consumer_id: string | null;
  timestamp: string;
}

/**
 * Receives every dead letter as it is recorded. Implementations must not
 * block the caller; failures may be thrown and are absorbed by the queue.
 */
export interface DeadLetterSink {
  persist(record: DeadLetterRecord): void;
}

export function toDeadLetterRecord(deadLetter: DeadLetter): DeadLetterRecord {
  return {
    dead_letter_id: deadLetter.deadLetterId,
    signal: serializeSignal(deadLetter.signal),
    reason: deadLetter.reason,
    detail: deadLetter.detail,
    consumer_id: deadLetter.consumerId,
    timestamp: deadLetter.timestamp,
  };
}

/** Sink that keeps records in memory. */
export class MemoryDeadLetterSink implements DeadLetterSink {
  readonly records: DeadLetterRecord[] = [];

  persist(record: DeadLetterRecord): void {
    this.records.push(record);
  }
}

export class DeadLetterQueue {
  private entries: DeadLetter[] = [];

  constructor(
    private readonly sink: DeadLetterSink,
    private readonly log: Logger,
  ) {}

  /** Append a dead letter and hand it to the sink. */
  add(deadLetter: DeadLetter): void {
    this.entries.push(deadLetter);

    try {
      this.sink.persist(toDeadLetterRecord(deadLetter));
    } catch (err) {
      this.log.error(
        { deadLetterId: deadLetter.deadLetterId, err: describeError(err) },
        'Failed to persist dead letter',
      );
    }
  }

  /** Dead letters in insertion order, optionally filtered by reason. */
  list(reason?: DeadLetterReason): DeadLetter[] {
    if (reason === undefined) return [...this.entries];
    return this.entries.filter(entry => entry.reason === reason);
  }

  /** Remove and return a dead letter by id. */
  take(deadLetterId: string): DeadLetter | undefined {
    const index = this.entries.findIndex(entry => entry.deadLetterId === deadLetterId);
    if (index === -1) return undefined;
    const [removed] = this.entries.splice(index, 1);
    return removed;
  }

  get size(): number {
    return this.entries.length;
  }
}
