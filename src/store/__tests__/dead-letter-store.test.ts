/**
 * Tests for file-backed dead-letter persistence.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DeadLetterReason, type DeadLetterRecord } from '../../core/signals/dead-letter.js';
import { serializeSignal } from '../../core/signals/signal.js';
import { makeSignal, silentLogger } from '../../core/signals/__tests__/fixtures.js';
import {
  FileDeadLetterSink,
  deadLetterFilePath,
  readDeadLetterRecord,
  readDeadLetterRecords,
} from '../dead-letter-store.js';

function record(id: string, reason: DeadLetterReason, timestamp: string): DeadLetterRecord {
  return {
    dead_letter_id: id,
    signal: serializeSignal(makeSignal({}, `sig-${id}`)),
    reason,
    detail: `detail ${id}`,
    consumer_id: reason === DeadLetterReason.HANDLER_ERROR ? 'c2' : null,
    timestamp,
  };
}

describe('FileDeadLetterSink', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'sdo-dead-letter-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes one file per dead letter, creating the directory', async () => {
    const dir = join(tempDir, 'nested', 'dead');
    const sink = new FileDeadLetterSink(dir, silentLogger());
    const entry = record('d1', DeadLetterReason.HANDLER_ERROR, '2026-01-01T00:00:00.000Z');

    sink.persist(entry);
    await sink.flush();

    expect(deadLetterFilePath(dir, 'd1')).toBe(join(dir, 'd1.json'));
    expect(await readDeadLetterRecord(dir, 'd1')).toEqual(entry);
    expect(sink.failureCount).toBe(0);
  });

  it('counts failed writes instead of throwing', async () => {
    const blocker = join(tempDir, 'not-a-dir');
    await writeFile(blocker, 'file in the way');
    const sink = new FileDeadLetterSink(blocker, silentLogger());

    sink.persist(record('d1', DeadLetterReason.LOW_VALUE, '2026-01-01T00:00:00.000Z'));
    await sink.flush();

    expect(sink.failureCount).toBe(1);
  });
});

describe('readDeadLetterRecords', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'sdo-dead-letter-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('returns records oldest first, skipping malformed files', async () => {
    const sink = new FileDeadLetterSink(tempDir, silentLogger());
    sink.persist(record('late', DeadLetterReason.NO_CONSUMER, '2026-01-02T00:00:00.000Z'));
    sink.persist(record('early', DeadLetterReason.LOW_VALUE, '2026-01-01T00:00:00.000Z'));
    await sink.flush();
    await writeFile(join(tempDir, 'junk.json'), JSON.stringify({ hello: 'world' }));
    await writeFile(join(tempDir, 'notes.txt'), 'ignored');

    const records = await readDeadLetterRecords(tempDir, { log: silentLogger() });
    expect(records.map(entry => entry.dead_letter_id)).toEqual(['early', 'late']);
  });

  it('filters by reason', async () => {
    const sink = new FileDeadLetterSink(tempDir, silentLogger());
    sink.persist(record('a', DeadLetterReason.NO_CONSUMER, '2026-01-01T00:00:00.000Z'));
    sink.persist(record('b', DeadLetterReason.LOW_VALUE, '2026-01-01T00:00:01.000Z'));
    await sink.flush();

    const records = await readDeadLetterRecords(tempDir, { reason: DeadLetterReason.LOW_VALUE, log: silentLogger() });
    expect(records.map(entry => entry.dead_letter_id)).toEqual(['b']);
  });

  it('returns an empty list for a missing directory', async () => {
    expect(await readDeadLetterRecords(join(tempDir, 'absent'), { log: silentLogger() })).toEqual([]);
  });

  it('readDeadLetterRecord returns null for an unknown id and throws on a malformed record', async () => {
    await mkdir(join(tempDir, 'dl'));
    await writeFile(join(tempDir, 'dl', 'bad.json'), JSON.stringify({ dead_letter_id: 'bad' }));

    expect(await readDeadLetterRecord(join(tempDir, 'dl'), 'unknown')).toBeNull();
    await expect(readDeadLetterRecord(join(tempDir, 'dl'), 'bad')).rejects.toThrow(
      `Malformed dead-letter record: ${join(tempDir, 'dl', 'bad.json')}`,
    );
  });
});
