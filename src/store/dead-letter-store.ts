/**
 * File-backed dead-letter persistence: one `<dead_letter_id>.json` record per
 * dead letter under a directory.
 *
 * Writes are fire-and-forget from the dispatch path. Failures are logged to
 * pino and never thrown; flush() lets callers (CLI, tests) wait for pending
 * writes to settle.
 */

import type { Logger } from 'pino';
import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { atomicWriteJson, readJson } from './atomic.js';
import { getLogger } from '../core/logger.js';
import { SdoError, describeError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';
import { SerializedSignalSchema } from '../core/signals/signal.js';
import {
  DeadLetterReason,
  type DeadLetterRecord,
  type DeadLetterSink,
} from '../core/signals/dead-letter.js';

export const DeadLetterRecordSchema = z.object({
  dead_letter_id: z.string().min(1),
  signal: SerializedSignalSchema,
  reason: z.nativeEnum(DeadLetterReason),
  detail: z.string(),
  consumer_id: z.string().nullable().default(null),
  timestamp: z.string(),
});

/** Path of the record file for a dead letter id. */
export function deadLetterFilePath(dir: string, deadLetterId: string): string {
  return join(dir, `${deadLetterId}.json`);
}

export class FileDeadLetterSink implements DeadLetterSink {
  private pending: Set<Promise<void>> = new Set();
  private failures = 0;
  private readonly log: Logger;

  constructor(private readonly dir: string, log?: Logger) {
    this.log = log ?? getLogger('dead-letter');
  }

  persist(record: DeadLetterRecord): void {
    const filePath = deadLetterFilePath(this.dir, record.dead_letter_id);
    const write = atomicWriteJson(filePath, record)
      .catch(err => {
        this.failures++;
        this.log.error(
          { deadLetterId: record.dead_letter_id, filePath, err: describeError(err) },
          'Failed to persist dead letter',
        );
      })
      .finally(() => {
        this.pending.delete(write);
      });
    this.pending.add(write);
  }

  /** Wait for every write started so far to settle. */
  async flush(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  /** Number of writes that failed since construction. */
  get failureCount(): number {
    return this.failures;
  }

  get directory(): string {
    return this.dir;
  }
}

/**
 * Read one persisted dead letter. Returns null when the file is missing.
 */
export async function readDeadLetterRecord(
  dir: string,
  deadLetterId: string,
): Promise<DeadLetterRecord | null> {
  const filePath = deadLetterFilePath(dir, deadLetterId);
  const data = await readJson(filePath);
  if (data === null) return null;
  const parsed = DeadLetterRecordSchema.safeParse(data);
  if (!parsed.success) {
    throw new SdoError(ExitCode.VALIDATION_ERROR, `Malformed dead-letter record: ${filePath}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Read every persisted dead letter in a directory, oldest first.
 *
 * Files that are not valid records are skipped with a warning. A missing
 * directory yields an empty list.
 */
export async function readDeadLetterRecords(
  dir: string,
  options?: { reason?: DeadLetterReason; log?: Logger },
): Promise<DeadLetterRecord[]> {
  const log = options?.log ?? getLogger('dead-letter');

  let files: string[];
  try {
    files = (await readdir(dir)).filter(name => name.endsWith('.json'));
  } catch (err) {
    log.debug({ dir, err: describeError(err) }, 'Dead-letter directory not readable');
    return [];
  }

  const records: DeadLetterRecord[] = [];
  for (const file of files) {
    try {
      const parsed = DeadLetterRecordSchema.safeParse(await readJson(join(dir, file)));
      if (!parsed.success) {
        log.warn({ file }, 'Skipping malformed dead-letter record');
        continue;
      }
      if (options?.reason && parsed.data.reason !== options.reason) continue;
      records.push(parsed.data);
    } catch (err) {
      log.warn({ file, err: describeError(err) }, 'Skipping unreadable dead-letter record');
    }
  }

  return records.sort((a, b) => a.timestamp.localeCompare(b.timestamp));
}
