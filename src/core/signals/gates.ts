/**
 * Four-gate signal validation.
 *
 * Gate 1: Scope Alignment (closed sets incl. signal type, phase/type allow-list)
 * Gate 2: Value Add (availability range and threshold)
 * Gate 3: Capability (some enabled consumer would accept the signal)
 * Gate 4: Irrigation Channel (post-dispatch: routed, received, audited)
 *
 * This is a diagnostic pre-flight, not the enforcement path: dispatch applies
 * its own checks in a fixed order. Every gate runs; violations are collected
 * per gate, and the report passes when none has error severity.
 */

import { isPhase, isPolicyArea, isSignalType } from '../../types/signal.js';
import { describeError } from '../errors.js';
import type { Consumer } from './consumer.js';
import type { DeliveryReceipt } from './receipt.js';
import { isGateEnabled, isTypeAllowedInPhase, type RoutingRules } from './routing-rules.js';
import type { Signal } from './signal.js';

/**
 * Gate names, as used in reports and in RoutingRules.gateRules.
 */
export enum GateName {
  SCOPE_ALIGNMENT = 'gate_1_scope_alignment',
  VALUE_ADD = 'gate_2_value_add',
  CAPABILITY = 'gate_3_capability',
  IRRIGATION_CHANNEL = 'gate_4_irrigation_channel',
}

export type GateSeverity = 'error' | 'warning';

/**
 * Violation detail for a specific gate
 */
export interface GateViolation {
  gate: GateName;
  severity: GateSeverity;
  code: string;
  message: string;
}

export interface GateReport {
  /** True when no gate reported an error-severity violation. */
  passed: boolean;
  /** Violations per gate; gates without violations are omitted. */
  gates: Partial<Record<GateName, GateViolation[]>>;
}

/** Orchestrator state the gates read. */
export interface GateContext {
  rules: RoutingRules;
  consumers: readonly Consumer[];
  receipt: DeliveryReceipt | undefined;
  hasAuditEntry: boolean;
}

type GateCheck = (signal: Signal, ctx: GateContext) => GateViolation[];

export const validateScopeAlignment: GateCheck = (signal, ctx) => {
  const gate = GateName.SCOPE_ALIGNMENT;
  const violations: GateViolation[] = [];
  const { phase, policyArea } = signal.scope;
  const signalType: string = signal.signalType;

  if (!isSignalType(signalType)) {
    violations.push({ gate, severity: 'error', code: 'UNKNOWN_SIGNAL_TYPE', message: `${signalType} is not a known signal type` });
  }
  if (!isPhase(phase)) {
    violations.push({ gate, severity: 'error', code: 'INVALID_PHASE', message: `${phase} is not a concrete phase` });
  }
  if (!isPolicyArea(policyArea)) {
    violations.push({ gate, severity: 'error', code: 'INVALID_POLICY_AREA', message: `${policyArea} is not a known policy area` });
  }
  if (!isTypeAllowedInPhase(ctx.rules, signal.signalType, phase)) {
    violations.push({
      gate,
      severity: 'error',
      code: 'SIGNAL_TYPE_PHASE_MISMATCH',
      message: `${signal.signalType} not allowed in ${phase}`,
    });
  }

  return violations;
};

export const validateValueAdd: GateCheck = (signal, ctx) => {
  const gate = GateName.VALUE_ADD;
  const availability = signal.empiricalAvailability;

  if (!Number.isFinite(availability) || availability < 0 || availability > 1) {
    return [{
      gate,
      severity: 'error',
      code: 'INVALID_AVAILABILITY_RANGE',
      message: `${availability} not in [0.0, 1.0]`,
    }];
  }

  const threshold = ctx.rules.empiricalAvailabilityMin;
  if (!signal.enrichment && availability < threshold) {
    return [{
      gate,
      severity: 'error',
      code: 'LOW_EMPIRICAL_AVAILABILITY',
      message: `${availability} < ${threshold}`,
    }];
  }

  return [];
};

export const validateCapability: GateCheck = (signal, ctx) => {
  const eligible = ctx.consumers.some(consumer => consumer.enabled && consumer.canHandle(signal).ok);
  if (eligible) return [];
  return [{
    gate: GateName.CAPABILITY,
    severity: 'warning',
    code: 'NO_ELIGIBLE_CONSUMER',
    message: `No consumer can handle signal ${signal.signalId}`,
  }];
};

export const validateIrrigationChannel: GateCheck = (signal, ctx) => {
  const gate = GateName.IRRIGATION_CHANNEL;
  const violations: GateViolation[] = [];

  if (!ctx.receipt) {
    violations.push({ gate, severity: 'warning', code: 'SIGNAL_NOT_ROUTED', message: 'Signal has not been routed' });
  }
  if (!ctx.receipt || ctx.receipt.deliveredTo.length === 0) {
    violations.push({ gate, severity: 'warning', code: 'NO_CONSUMER_RECEIVED', message: 'No consumer has received this signal' });
  }
  if (!ctx.hasAuditEntry) {
    violations.push({
      gate,
      severity: 'error',
      code: 'NO_AUDIT_ENTRY',
      message: `No audit entry for signal ${signal.signalId}`,
    });
  }

  return violations;
};

const GATE_SEQUENCE: ReadonlyArray<[GateName, GateCheck]> = [
  [GateName.SCOPE_ALIGNMENT, validateScopeAlignment],
  [GateName.VALUE_ADD, validateValueAdd],
  [GateName.CAPABILITY, validateCapability],
  [GateName.IRRIGATION_CHANNEL, validateIrrigationChannel],
];

/**
 * Run a single gate, converting an unexpected exception into an error
 * violation on that gate.
 */
function runGate(gate: GateName, check: GateCheck, signal: Signal, ctx: GateContext): GateViolation[] {
  try {
    return check(signal, ctx);
  } catch (err) {
    return [{ gate, severity: 'error', code: 'E_GATE_ERROR', message: describeError(err) }];
  }
}

/**
 * Run every enabled gate. Gate 4 runs only when `postDispatch` is set.
 */
export function runGates(
  signal: Signal,
  ctx: GateContext,
  options?: { postDispatch?: boolean },
): GateReport {
  const gates: Partial<Record<GateName, GateViolation[]>> = {};

  for (const [gate, check] of GATE_SEQUENCE) {
    if (gate === GateName.IRRIGATION_CHANNEL && !options?.postDispatch) continue;
    if (!isGateEnabled(ctx.rules, gate)) continue;

    const violations = runGate(gate, check, signal, ctx);
    if (violations.length > 0) {
      gates[gate] = violations;
    }
  }

  const passed = Object.values(gates).every(
    violations => (violations ?? []).every(violation => violation.severity !== 'error'),
  );

  return { passed, gates };
}
