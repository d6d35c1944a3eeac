/**
 * Shared builders for signal bus tests.
 */

import pino from 'pino';
import { createSignal, type Signal, type SignalInit } from '../signal.js';

export const T0 = Date.UTC(2026, 0, 1);

/** A pino logger that writes nothing. */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

/** A pino logger whose JSON lines are kept for assertions. */
export function captureLogger(): { log: pino.Logger; messages: () => string[] } {
  const lines: string[] = [];
  const log = pino({ level: 'debug' }, { write: (line: string) => { lines.push(line); } });
  return {
    log,
    messages: () => lines.map(line => {
      const parsed: unknown = JSON.parse(line);
      return parsed !== null && typeof parsed === 'object' && 'msg' in parsed ? String(parsed.msg) : '';
    }),
  };
}

/** A controllable epoch-millisecond clock. */
export function fakeClock(start: number = T0): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

/** Deterministic id factory: `${prefix}-1`, `${prefix}-2`, ... */
export function sequentialIds(prefix = 'id'): () => string {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

/**
 * A valid MC01_STRUCTURAL signal in phase_01/PA01/Q1 requiring capability X,
 * with availability 0.9.
 */
export function makeSignal(overrides: Partial<SignalInit> = {}, signalId?: string): Signal {
  return createSignal(
    {
      signalType: 'MC01_STRUCTURAL',
      scope: { phase: 'phase_01', policy_area: 'PA01', slot: 'Q1' },
      payload: { value: 1 },
      provenance: { extractor: 'test-extractor', sourceFile: 'plan.md' },
      capabilitiesRequired: ['X'],
      empiricalAvailability: 0.9,
      ...overrides,
    },
    { signalId, now: new Date(T0) },
  );
}

/** Copy of `signal` whose type arrives as unchecked JSON text. */
export function withRawSignalType(signal: Signal, signalType: string): Signal {
  return Object.freeze({ ...signal, signalType: JSON.parse(JSON.stringify(signalType)) });
}

/** Run `fn` and return what it threw, or undefined. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}
