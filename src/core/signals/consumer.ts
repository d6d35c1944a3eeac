/**
 * Consumer subscriptions and capability matching.
 */

import { SdoError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ScopeRecord } from '../../types/signal.js';
import { SignalScope, toScope } from './scope.js';
import type { Signal } from './signal.js';

/**
 * Receives signals routed to a consumer. May throw; the orchestrator
 * isolates failures per consumer.
 */
export interface SignalHandler {
  handle(signal: Signal): void | Promise<void>;
}

export type SignalHandlerFn = (signal: Signal) => void | Promise<void>;

export interface ConsumerRegistration {
  consumerId: string;
  /** OR semantics: the consumer is eligible if any scope matches. */
  scopes: ReadonlyArray<SignalScope | ScopeRecord>;
  /** Capability names, as a list or a set. */
  capabilities: readonly string[] | ReadonlySet<string>;
  handler: SignalHandler | SignalHandlerFn;
  enabled?: boolean;
}

export type MatchResult =
  | { ok: true }
  | { ok: false; reason: string };

export interface ConsumerStats {
  processed: number;
  errors: number;
  enabled: boolean;
}

export class Consumer {
  readonly consumerId: string;
  readonly scopes: readonly SignalScope[];
  readonly capabilities: ReadonlySet<string>;
  readonly handler: SignalHandler;
  enabled: boolean;
  processed = 0;
  errors = 0;

  constructor(registration: ConsumerRegistration) {
    if (!registration.consumerId) {
      throw new SdoError(ExitCode.CONSUMER_INVALID, 'Consumer id must be a non-empty string');
    }
    if (registration.scopes.length === 0) {
      throw new SdoError(
        ExitCode.CONSUMER_INVALID,
        `Consumer ${registration.consumerId} must subscribe to at least one scope`,
      );
    }

    this.consumerId = registration.consumerId;
    this.scopes = Object.freeze(registration.scopes.map(toScope));
    this.capabilities = new Set(registration.capabilities);
    this.handler = typeof registration.handler === 'function'
      ? { handle: registration.handler }
      : registration.handler;
    this.enabled = registration.enabled ?? true;
  }

  /**
   * Whether this consumer is eligible for `signal`: its scope must match one
   * of the subscribed scopes and every required capability must be held.
   */
  canHandle(signal: Signal): MatchResult {
    const scopeMatch = this.scopes.some(scope => signal.scope.matches(scope));
    if (!scopeMatch) {
      return { ok: false, reason: 'SCOPE_MISMATCH' };
    }

    const missing = missingCapabilities(signal.capabilitiesRequired, this.capabilities);
    if (missing.length > 0) {
      return { ok: false, reason: `MISSING_CAPABILITIES:{${missing.join(',')}}` };
    }

    return { ok: true };
  }

  toStats(): ConsumerStats {
    return { processed: this.processed, errors: this.errors, enabled: this.enabled };
  }
}

/** Required capabilities not present in `held`, sorted. */
export function missingCapabilities(
  required: readonly string[],
  held: ReadonlySet<string>,
): string[] {
  return required.filter(cap => !held.has(cap)).sort();
}
