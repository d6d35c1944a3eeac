/**
 * Dispatch results.
 *
 * A Signal is never mutated after construction; the routing facts that the
 * bus learns about it (whether it was routed, who received it) are carried
 * by a DeliveryReceipt instead.
 */

import type { DeadLetterReason } from './dead-letter.js';

export interface DeliveryReceipt {
  readonly signalId: string;
  readonly contentHash: string;
  /** Consumers whose handlers accepted the signal, in fan-out order. */
  readonly deliveredTo: readonly string[];
  /** Consumers whose handlers threw during fan-out. */
  readonly failedConsumers: readonly string[];
  readonly routedAt: string;
}

export type DispatchOutcome =
  | { status: 'delivered'; signalId: string; receipt: DeliveryReceipt }
  | { status: 'deduplicated'; signalId: string; contentHash: string }
  | { status: 'rejected'; signalId: string; reason: DeadLetterReason; detail: string }
  | {
    status: 'dead_lettered';
    signalId: string;
    reason: DeadLetterReason;
    detail: string;
    failedConsumers: readonly string[];
  };

export type DispatchStatus = DispatchOutcome['status'];

export function isDelivered(
  outcome: DispatchOutcome,
): outcome is Extract<DispatchOutcome, { status: 'delivered' }> {
  return outcome.status === 'delivered';
}
