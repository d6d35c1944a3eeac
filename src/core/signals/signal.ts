/**
 * Signal value type: factory, content hashing, structural validation and
 * the serialized wire format.
 *
 * A Signal is frozen at construction (payload included). Routing state lives
 * in the DeliveryReceipt the orchestrator returns, never on the Signal.
 */

import { createHash, randomUUID } from 'node:crypto';
import { z } from 'zod';
import { SdoError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { isSignalType, SIGNAL_TYPES, type ScopeRecord, type SignalType } from '../../types/signal.js';
import { SignalScope, toScope } from './scope.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Where a signal came from. Descriptive only; never drives routing. */
export interface SignalProvenance {
  readonly extractor: string;
  readonly sourceFile: string;
  readonly sourceLocation?: string;
  readonly extractionPattern?: string;
  readonly parentSignalId?: string;
  readonly createdAt: string;
}

export interface Signal {
  readonly signalId: string;
  readonly signalType: SignalType;
  readonly scope: SignalScope;
  readonly payload: JsonValue;
  readonly provenance: SignalProvenance;
  readonly capabilitiesRequired: readonly string[];
  /** Calibrated value score; valid range is [0, 1]. */
  readonly empiricalAvailability: number;
  readonly enrichment: boolean;
  readonly timestamp: string;
}

export type ProvenanceInit = Omit<SignalProvenance, 'createdAt'> & { createdAt?: string };

export interface SignalInit {
  signalType: SignalType;
  scope: SignalScope | ScopeRecord;
  payload: JsonValue;
  provenance: ProvenanceInit;
  capabilitiesRequired: readonly string[];
  empiricalAvailability?: number;
  enrichment?: boolean;
}

export interface SignalValidation {
  valid: boolean;
  errors: string[];
}

// ── Construction ─────────────────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Stamp a provenance record with its creation time. */
export function createProvenance(init: ProvenanceInit, now: Date = new Date()): SignalProvenance {
  return Object.freeze({ ...init, createdAt: init.createdAt ?? now.toISOString() });
}

/**
 * Build a Signal, assigning a fresh id and timestamp.
 *
 * Only a malformed scope throws. Out-of-range availability, an empty
 * capability list or a null payload are left for validateSignal so the
 * orchestrator can dead-letter them.
 */
export function createSignal(
  init: SignalInit,
  options?: { signalId?: string; now?: Date },
): Signal {
  const now = options?.now ?? new Date();
  const signal: Signal = {
    signalId: options?.signalId ?? randomUUID(),
    signalType: init.signalType,
    scope: toScope(init.scope),
    payload: deepFreeze(structuredClone(init.payload)),
    provenance: createProvenance(init.provenance, now),
    capabilitiesRequired: Object.freeze([...new Set(init.capabilitiesRequired)]),
    empiricalAvailability: init.empiricalAvailability ?? 1.0,
    enrichment: init.enrichment ?? false,
    timestamp: now.toISOString(),
  };
  return Object.freeze(signal);
}

/**
 * Build a signal derived from `parent`. The child's provenance records the
 * parent's id so enrichment lineage can be followed back.
 */
export function deriveSignal(
  parent: Signal,
  init: Omit<SignalInit, 'provenance'> & { provenance: Omit<ProvenanceInit, 'parentSignalId'> },
  options?: { signalId?: string; now?: Date },
): Signal {
  return createSignal(
    { ...init, provenance: { ...init.provenance, parentSignalId: parent.signalId } },
    options,
  );
}

// ── Hashing ──────────────────────────────────────────────────────────

/** Recursively sort object keys so equal values serialize identically. */
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, child] of entries) {
      sorted[key] = canonicalize(child);
    }
    return sorted;
  }
  return value;
}

/**
 * SHA-256 over the canonical form of {type, scope, payload}.
 *
 * Provenance, capabilities, value score and timestamps are excluded: two
 * signals with the same content are the same event for deduplication.
 */
export function contentHash(signal: Signal): string {
  const canonical = JSON.stringify(canonicalize({
    type: signal.signalType,
    scope: signal.scope.toJSON(),
    payload: signal.payload,
  }));
  return createHash('sha256').update(canonical).digest('hex');
}

// ── Validation ───────────────────────────────────────────────────────

/** Structural validation. Never throws. */
export function validateSignal(signal: Signal): SignalValidation {
  const errors: string[] = [];

  if (!signal.scope.isConcrete()) {
    errors.push(`INVALID_SCOPE: signal phase must be concrete, got ${signal.scope.phase}`);
  }

  // Typed callers cannot get here; JS callers and casts can.
  const signalType: string = signal.signalType;
  if (!isSignalType(signalType)) {
    errors.push(`UNKNOWN_SIGNAL_TYPE: ${signalType} is not a known signal type`);
  }

  const availability = signal.empiricalAvailability;
  if (!Number.isFinite(availability) || availability < 0 || availability > 1) {
    errors.push(`INVALID_AVAILABILITY_RANGE: ${availability} not in [0.0, 1.0]`);
  }

  if (signal.capabilitiesRequired.length === 0) {
    errors.push('EMPTY_CAPABILITIES: capabilities_required must not be empty');
  }

  if (signal.payload === null || signal.payload === undefined) {
    errors.push('NULL_PAYLOAD: payload must not be null');
  }

  return { valid: errors.length === 0, errors };
}

// ── Wire format ──────────────────────────────────────────────────────

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const ScopeRecordSchema = z.object({
  phase: z.string(),
  policy_area: z.string(),
  slot: z.string(),
});

export const SerializedSignalSchema = z.object({
  signal_id: z.string().min(1),
  signal_type: z.enum(SIGNAL_TYPES),
  scope: ScopeRecordSchema,
  payload: jsonValueSchema,
  provenance: z.object({
    extractor: z.string(),
    source_file: z.string(),
    source_location: z.string().nullable().optional(),
    extraction_pattern: z.string().nullable().optional(),
    parent_signal_id: z.string().nullable().optional(),
    created_at: z.string(),
  }),
  capabilities_required: z.array(z.string()),
  empirical_availability: z.number(),
  enrichment: z.boolean(),
  timestamp: z.string(),
  content_hash: z.string().optional(),
});
export type SerializedSignal = z.infer<typeof SerializedSignalSchema>;

/** Serialize a signal. The content hash is computed now, not stored. */
export function serializeSignal(signal: Signal): SerializedSignal {
  const { provenance } = signal;
  return {
    signal_id: signal.signalId,
    signal_type: signal.signalType,
    scope: signal.scope.toJSON(),
    payload: signal.payload,
    provenance: {
      extractor: provenance.extractor,
      source_file: provenance.sourceFile,
      source_location: provenance.sourceLocation ?? null,
      extraction_pattern: provenance.extractionPattern ?? null,
      parent_signal_id: provenance.parentSignalId ?? null,
      created_at: provenance.createdAt,
    },
    capabilities_required: [...signal.capabilitiesRequired],
    empirical_availability: signal.empiricalAvailability,
    enrichment: signal.enrichment,
    timestamp: signal.timestamp,
    content_hash: contentHash(signal),
  };
}

/**
 * Rebuild a signal from its serialized form, keeping its id and timestamps.
 * Throws SdoError on a malformed record or scope.
 */
export function deserializeSignal(data: unknown): Signal {
  const parsed = SerializedSignalSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SdoError(ExitCode.SIGNAL_MALFORMED, `Malformed signal record: ${issues}`);
  }

  const record = parsed.data;
  const provenance: SignalProvenance = Object.freeze({
    extractor: record.provenance.extractor,
    sourceFile: record.provenance.source_file,
    ...(record.provenance.source_location != null && { sourceLocation: record.provenance.source_location }),
    ...(record.provenance.extraction_pattern != null && { extractionPattern: record.provenance.extraction_pattern }),
    ...(record.provenance.parent_signal_id != null && { parentSignalId: record.provenance.parent_signal_id }),
    createdAt: record.provenance.created_at,
  });

  const signal: Signal = {
    signalId: record.signal_id,
    signalType: record.signal_type,
    scope: SignalScope.from(record.scope),
    payload: deepFreeze(record.payload),
    provenance,
    capabilitiesRequired: Object.freeze([...new Set(record.capabilities_required)]),
    empiricalAvailability: record.empirical_availability,
    enrichment: record.enrichment,
    timestamp: record.timestamp,
  };
  return Object.freeze(signal);
}
