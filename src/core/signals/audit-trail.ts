/**
 * Append-only audit trail of signal lifecycle events.
 *
 * Every entry is kept in memory and mirrored to the pino logger
 * (subsystem: 'audit') at debug level. clear() is the only deletion path.
 */

import type { Logger } from 'pino';
import type { Signal } from './signal.js';

export enum AuditAction {
  DISPATCHED = 'DISPATCHED',
  DELIVERED = 'DELIVERED',
  REJECTED = 'REJECTED',
  DEDUPLICATED = 'DEDUPLICATED',
  DEAD_LETTERED = 'DEAD_LETTERED',
}

export interface AuditEntry {
  readonly entryId: string;
  readonly action: AuditAction;
  readonly signalId: string;
  readonly signalType: string;
  readonly consumerId: string | null;
  readonly detail: string;
  readonly timestamp: string;
}

export class AuditTrail {
  private entries: AuditEntry[] = [];

  constructor(
    private readonly log: Logger,
    private readonly nextId: () => string,
    private readonly now: () => number,
  ) {}

  record(
    action: AuditAction,
    signal: Signal,
    options?: { consumerId?: string; detail?: string },
  ): AuditEntry {
    const entry: AuditEntry = Object.freeze({
      entryId: this.nextId(),
      action,
      signalId: signal.signalId,
      signalType: signal.signalType,
      consumerId: options?.consumerId ?? null,
      detail: options?.detail ?? '',
      timestamp: new Date(this.now()).toISOString(),
    });
    this.entries.push(entry);

    this.log.debug(
      {
        action: entry.action,
        signalId: entry.signalId,
        signalType: entry.signalType,
        consumerId: entry.consumerId,
      },
      `${entry.action} ${entry.signalType}${entry.detail ? `: ${entry.detail}` : ''}`,
    );

    return entry;
  }

  /** Entries in insertion order, optionally for one signal. */
  list(signalId?: string): AuditEntry[] {
    if (signalId === undefined) return [...this.entries];
    return this.entries.filter(entry => entry.signalId === signalId);
  }

  has(signalId: string): boolean {
    return this.entries.some(entry => entry.signalId === signalId);
  }

  /** Drop every entry. Returns the number removed. */
  clear(): number {
    const count = this.entries.length;
    this.entries = [];
    return count;
  }

  get size(): number {
    return this.entries.length;
  }
}
