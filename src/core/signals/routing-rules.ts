/**
 * Routing rules: value threshold, per-phase type allow-lists, dead-letter
 * settings, deduplication window and gate toggles.
 *
 * Rules are resolved once per orchestrator and frozen. Loading never fails:
 * a missing file, unparsable JSON or an invalid field degrades to the
 * documented default with a logged warning.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { readJson } from '../../store/atomic.js';
import { describeError } from '../errors.js';
import { PHASES, SIGNAL_TYPES, isPhase, type Phase, type SignalType } from '../../types/signal.js';

// ── Schemas ──────────────────────────────────────────────────────────

export const GateRuleSchema = z.object({
  enabled: z.boolean().optional(),
});
export type GateRule = z.infer<typeof GateRuleSchema>;

const ThresholdSchema = z.number().min(0).max(1);
const PhaseRoutingSchema = z.record(z.enum(PHASES), z.array(z.enum(SIGNAL_TYPES)));
const CapabilityMapSchema = z.record(z.string(), z.array(z.string()));
const DeadLetterSchema = z.object({
  enabled: z.boolean().optional(),
  path: z.string().min(1).optional(),
});
const WindowSchema = z.number().int().nonnegative();
const GateRulesSchema = z.record(z.string(), GateRuleSchema);

// ── Types ────────────────────────────────────────────────────────────

export type PhaseRouting = Readonly<Partial<Record<Phase, readonly SignalType[]>>>;

export interface RoutingRules {
  /** Minimum empirical availability for non-enrichment signals. */
  readonly empiricalAvailabilityMin: number;
  /** Allowed signal types per phase. A phase without a list allows every type. */
  readonly phaseRouting: PhaseRouting;
  /** Informational: capabilities expected per signal type. */
  readonly capabilitiesRequired: Readonly<Record<string, readonly string[]>>;
  readonly deadLetterEnabled: boolean;
  readonly deadLetterPath: string;
  readonly dedupWindowSeconds: number;
  readonly gateRules: Readonly<Record<string, GateRule>>;
}

export const DEFAULT_ROUTING_RULES: RoutingRules = Object.freeze({
  empiricalAvailabilityMin: 0.30,
  phaseRouting: {},
  capabilitiesRequired: {},
  deadLetterEnabled: true,
  deadLetterPath: '_registry/dead_letter/',
  dedupWindowSeconds: 300,
  gateRules: {},
});

/** Merge overrides over the defaults and freeze the result. */
export function createRoutingRules(overrides?: Partial<RoutingRules>): RoutingRules {
  return Object.freeze({ ...DEFAULT_ROUTING_RULES, ...overrides });
}

// ── Queries ──────────────────────────────────────────────────────────

/** Whether `type` may be dispatched in `phase` under `rules`. */
export function isTypeAllowedInPhase(rules: RoutingRules, type: SignalType, phase: string): boolean {
  if (!isPhase(phase)) return true;
  const allowed = rules.phaseRouting[phase];
  if (!allowed || allowed.length === 0) return true;
  return allowed.includes(type);
}

/** Whether a gate is enabled. Gates default to enabled. */
export function isGateEnabled(rules: RoutingRules, gate: string): boolean {
  return rules.gateRules[gate]?.enabled !== false;
}

// ── Parsing ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** Read a nested value; undefined when any segment is missing. */
function pick(data: unknown, ...path: string[]): unknown {
  let current = data;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** First defined value among the candidates. */
function firstDefined(...values: unknown[]): unknown {
  return values.find(value => value !== undefined);
}

function parseField<T>(
  log: Logger,
  field: string,
  raw: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  fallback: T,
): T {
  if (raw === undefined) return fallback;
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  log.warn(
    { field, issues: result.error.issues.map(issue => issue.message) },
    `Invalid routing rule "${field}", using default`,
  );
  return fallback;
}

/**
 * Build RoutingRules from a rules document.
 *
 * Accepted keys (aliases in order of precedence):
 *   thresholds.empirical_availability_min
 *   phase_signal_alignment | routing
 *   capability_requirements | capabilities_required
 *   routing_rules.dead_letter | dead_letter
 *   routing_rules.deduplication.window_seconds | dedup_window_seconds
 *   gate_rules
 */
export function parseRoutingRules(data: unknown, log: Logger): RoutingRules {
  if (!isRecord(data)) {
    log.warn('Routing rules document is not an object, using defaults');
    return DEFAULT_ROUTING_RULES;
  }

  const d = DEFAULT_ROUTING_RULES;

  const deadLetter = parseField<z.infer<typeof DeadLetterSchema>>(
    log,
    'dead_letter',
    firstDefined(pick(data, 'routing_rules', 'dead_letter'), data['dead_letter']),
    DeadLetterSchema,
    {},
  );

  return createRoutingRules({
    empiricalAvailabilityMin: parseField(
      log,
      'thresholds.empirical_availability_min',
      pick(data, 'thresholds', 'empirical_availability_min'),
      ThresholdSchema,
      d.empiricalAvailabilityMin,
    ),
    phaseRouting: parseField(
      log,
      'phase_signal_alignment',
      firstDefined(data['phase_signal_alignment'], data['routing']),
      PhaseRoutingSchema,
      d.phaseRouting,
    ),
    capabilitiesRequired: parseField(
      log,
      'capability_requirements',
      firstDefined(data['capability_requirements'], data['capabilities_required']),
      CapabilityMapSchema,
      d.capabilitiesRequired,
    ),
    deadLetterEnabled: deadLetter.enabled ?? d.deadLetterEnabled,
    deadLetterPath: deadLetter.path ?? d.deadLetterPath,
    dedupWindowSeconds: parseField(
      log,
      'deduplication.window_seconds',
      firstDefined(pick(data, 'routing_rules', 'deduplication', 'window_seconds'), data['dedup_window_seconds']),
      WindowSchema,
      d.dedupWindowSeconds,
    ),
    gateRules: parseField(log, 'gate_rules', data['gate_rules'], GateRulesSchema, d.gateRules),
  });
}

/**
 * Load routing rules from a JSON file. Never throws.
 */
export async function loadRoutingRules(path: string, log: Logger): Promise<RoutingRules> {
  try {
    const data = await readJson(path);
    if (data === null) {
      log.warn({ path }, 'Routing rules file not found, using defaults');
      return DEFAULT_ROUTING_RULES;
    }
    return parseRoutingRules(data, log);
  } catch (err) {
    log.warn({ path, err: describeError(err) }, 'Failed to load routing rules, using defaults');
    return DEFAULT_ROUTING_RULES;
  }
}

/** Rules as a plain document, the shape `sdo rules` prints. */
export function routingRulesToJSON(rules: RoutingRules): Record<string, unknown> {
  return {
    thresholds: { empirical_availability_min: rules.empiricalAvailabilityMin },
    phase_signal_alignment: rules.phaseRouting,
    capability_requirements: rules.capabilitiesRequired,
    routing_rules: {
      dead_letter: { enabled: rules.deadLetterEnabled, path: rules.deadLetterPath },
      deduplication: { window_seconds: rules.dedupWindowSeconds },
    },
    gate_rules: rules.gateRules,
  };
}
