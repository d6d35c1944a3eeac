/**
 * Signal vocabulary: the closed sets a Signal and its Scope are drawn from.
 *
 * All enumerations are defined here as const arrays; derived unions and type
 * guards follow below. No other module may define its own copy.
 */

// === SIGNAL TYPES ===

export const SIGNAL_TYPES = [
  // Bootstrap
  'STATIC_LOAD', 'SIGNAL_PACK',
  // Structural
  'STRUCTURAL_COMPLETENESS', 'STRUCTURAL_COVERAGE', 'STRUCTURAL_HIERARCHY',
  // Integrity
  'INTEGRITY_HASH', 'INTEGRITY_SCHEMA',
  // Epistemic
  'EPISTEMIC_CONFIDENCE', 'EPISTEMIC_UNCERTAINTY', 'EPISTEMIC_PROVENANCE',
  // Contrast
  'CONTRAST_DIVERGENCE', 'CONTRAST_ALIGNMENT',
  // Operational
  'OPERATIONAL_STATUS', 'OPERATIONAL_TIMING', 'OPERATIONAL_RESOURCE',
  // Consumption
  'CONSUMPTION_INGESTION', 'CONSUMPTION_VALIDATION',
  // Orchestration
  'ORCHESTRATION_PHASE_START', 'ORCHESTRATION_PHASE_COMPLETE', 'ORCHESTRATION_DECISION',
  // Extractors (MC01-MC10)
  'MC01_STRUCTURAL', 'MC02_QUANTITATIVE', 'MC03_NORMATIVE', 'MC04_PROGRAMMATIC',
  'MC05_FINANCIAL', 'MC06_POPULATION', 'MC07_TEMPORAL', 'MC08_CAUSAL',
  'MC09_INSTITUTIONAL', 'MC10_SEMANTIC',
] as const;

// === SCOPE AXES ===

/** Wildcard accepted on every scope axis. */
export const WILDCARD = 'ALL';

export const PHASES = [
  'phase_00', 'phase_01', 'phase_02', 'phase_03', 'phase_04',
  'phase_05', 'phase_06', 'phase_07', 'phase_08', 'phase_09',
] as const;

export const POLICY_AREAS = [
  'PA01', 'PA02', 'PA03', 'PA04', 'PA05', 'PA06', 'PA07', 'PA08', 'PA09', 'PA10',
  'ALL', 'CROSS_CUTTING',
] as const;

// === DERIVED TYPES ===

export type SignalType = typeof SIGNAL_TYPES[number];
export type Phase = typeof PHASES[number];
/** A phase as it may appear in a subscription scope. */
export type ScopePhase = Phase | typeof WILDCARD;
export type PolicyArea = typeof POLICY_AREAS[number];

// === TYPE GUARDS ===

const SIGNAL_TYPE_SET: ReadonlySet<string> = new Set(SIGNAL_TYPES);
const PHASE_SET: ReadonlySet<string> = new Set(PHASES);
const POLICY_AREA_SET: ReadonlySet<string> = new Set(POLICY_AREAS);

export function isSignalType(value: unknown): value is SignalType {
  return typeof value === 'string' && SIGNAL_TYPE_SET.has(value);
}

export function isPhase(value: unknown): value is Phase {
  return typeof value === 'string' && PHASE_SET.has(value);
}

export function isScopePhase(value: unknown): value is ScopePhase {
  return value === WILDCARD || isPhase(value);
}

export function isPolicyArea(value: unknown): value is PolicyArea {
  return typeof value === 'string' && POLICY_AREA_SET.has(value);
}

// === WIRE RECORDS ===

/** Scope as serialized on the wire and in rules/consumer files. */
export interface ScopeRecord {
  phase: string;
  policy_area: string;
  slot: string;
}
