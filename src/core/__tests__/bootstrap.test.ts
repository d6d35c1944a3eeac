/**
 * Tests for orchestrator wiring from a project root.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createOrchestrator } from '../bootstrap.js';
import { DEFAULT_ROUTING_RULES } from '../signals/routing-rules.js';
import { readDeadLetterRecords } from '../../store/dead-letter-store.js';
import { makeSignal, silentLogger } from '../signals/__tests__/fixtures.js';

describe('createOrchestrator', () => {
  let root: string;
  const savedRules = process.env['SDO_RULES_PATH'];
  const savedDir = process.env['SDO_DEAD_LETTER_DIR'];
  const savedPersist = process.env['SDO_DEAD_LETTER_PERSIST'];

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sdo-bootstrap-'));
    delete process.env['SDO_RULES_PATH'];
    delete process.env['SDO_DEAD_LETTER_DIR'];
    delete process.env['SDO_DEAD_LETTER_PERSIST'];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    if (savedRules !== undefined) process.env['SDO_RULES_PATH'] = savedRules;
    if (savedDir !== undefined) process.env['SDO_DEAD_LETTER_DIR'] = savedDir;
    if (savedPersist !== undefined) process.env['SDO_DEAD_LETTER_PERSIST'] = savedPersist;
  });

  it('uses default rules and the rules dead-letter path without a config file', async () => {
    const { orchestrator, rules, sink } = await createOrchestrator(root, { logger: silentLogger() });

    expect(rules).toBe(DEFAULT_ROUTING_RULES);
    expect(orchestrator.rules).toBe(rules);
    expect(sink?.directory).toBe(join(root, '_registry', 'dead_letter'));
  });

  it('loads configured rules and persists dead letters to the configured directory', async () => {
    await mkdir(join(root, '.sdo'));
    await writeFile(
      join(root, '.sdo', 'config.json'),
      JSON.stringify({ routing: { rulesPath: 'rules.json' }, deadLetter: { dir: 'dead' } }),
    );
    await writeFile(join(root, 'rules.json'), JSON.stringify({ thresholds: { empirical_availability_min: 0.5 } }));

    const { orchestrator, sink } = await createOrchestrator(root, { logger: silentLogger() });
    expect(orchestrator.rules.empiricalAvailabilityMin).toBe(0.5);

    orchestrator.dispatch(makeSignal({ empiricalAvailability: 0.4 }, 'low'));
    await sink?.flush();

    const records = await readDeadLetterRecords(join(root, 'dead'), { log: silentLogger() });
    expect(records.map(record => [record.signal.signal_id, record.reason])).toEqual([['low', 'LOW_VALUE']]);
  });

  it('skips the file sink when persistence is off', async () => {
    const { sink } = await createOrchestrator(root, {
      logger: silentLogger(),
      overrides: { 'deadLetter.persist': false },
    });
    expect(sink).toBeNull();
  });
});
