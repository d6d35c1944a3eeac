/**
 * Three-axis routing coordinate (phase, policy area, slot).
 *
 * Construction validates every axis against the closed sets in
 * types/signal.ts and throws immediately; a SignalScope that exists is
 * well-formed.
 */

import { SdoError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  PHASES,
  POLICY_AREAS,
  WILDCARD,
  isPolicyArea,
  isScopePhase,
  type PolicyArea,
  type ScopePhase,
  type ScopeRecord,
} from '../../types/signal.js';

export class SignalScope {
  readonly phase: ScopePhase;
  readonly policyArea: PolicyArea;
  readonly slot: string;

  constructor(phase: string, policyArea: string, slot: string = WILDCARD) {
    if (!isScopePhase(phase)) {
      throw new SdoError(
        ExitCode.SCOPE_INVALID,
        `Invalid phase: ${phase}`,
        { fix: `Use one of ${PHASES.join(', ')} or ${WILDCARD}` },
      );
    }
    if (!isPolicyArea(policyArea)) {
      throw new SdoError(
        ExitCode.SCOPE_INVALID,
        `Invalid policy area: ${policyArea}`,
        { fix: `Use one of ${POLICY_AREAS.join(', ')}` },
      );
    }
    if (typeof slot !== 'string' || slot.trim() === '') {
      throw new SdoError(ExitCode.SCOPE_INVALID, 'Scope slot must be a non-empty string');
    }

    this.phase = phase;
    this.policyArea = policyArea;
    this.slot = slot;
    Object.freeze(this);
  }

  /** Build a scope from its wire record. Throws on malformed input. */
  static from(record: ScopeRecord): SignalScope {
    return new SignalScope(record.phase, record.policy_area, record.slot);
  }

  /**
   * Whether this scope falls inside `other`.
   *
   * Phase and policy area accept a wildcard only on `other` (the subscription
   * side). Slot accepts a wildcard on either side.
   */
  matches(other: SignalScope): boolean {
    const phaseMatch = this.phase === other.phase || other.phase === WILDCARD;
    const areaMatch = this.policyArea === other.policyArea || other.policyArea === WILDCARD;
    const slotMatch = this.slot === other.slot || this.slot === WILDCARD || other.slot === WILDCARD;
    return phaseMatch && areaMatch && slotMatch;
  }

  /** A signal scope must name a concrete phase; only subscriptions may use the wildcard. */
  isConcrete(): boolean {
    return this.phase !== WILDCARD;
  }

  equals(other: SignalScope): boolean {
    return this.phase === other.phase
      && this.policyArea === other.policyArea
      && this.slot === other.slot;
  }

  toJSON(): ScopeRecord {
    return { phase: this.phase, policy_area: this.policyArea, slot: this.slot };
  }

  toString(): string {
    return `${this.phase}/${this.policyArea}/${this.slot}`;
  }
}

/** Accept either a constructed scope or its wire record. */
export function toScope(value: SignalScope | ScopeRecord): SignalScope {
  return value instanceof SignalScope ? value : SignalScope.from(value);
}
