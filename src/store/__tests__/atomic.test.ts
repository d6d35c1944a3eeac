/**
 * Tests for atomic file operations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SdoError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { atomicWrite, atomicWriteJson, readJson, safeReadFile } from '../atomic.js';

describe('atomic file operations', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'sdo-atomic-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWrite', () => {
    it('creates parent directories if needed', async () => {
      const filePath = join(tempDir, 'nested', 'dir', 'test.txt');
      await atomicWrite(filePath, 'nested content');
      expect(await readFile(filePath, 'utf8')).toBe('nested content');
    });

    it('overwrites existing files', async () => {
      const filePath = join(tempDir, 'test.txt');
      await atomicWrite(filePath, 'first');
      await atomicWrite(filePath, 'second');
      expect(await readFile(filePath, 'utf8')).toBe('second');
    });
  });

  describe('atomicWriteJson', () => {
    it('writes 2-space indented JSON with a trailing newline', async () => {
      const filePath = join(tempDir, 'data.json');
      await atomicWriteJson(filePath, { key: 'value', num: 42 });
      expect(await readFile(filePath, 'utf8')).toBe('{\n  "key": "value",\n  "num": 42\n}\n');
    });
  });

  describe('safeReadFile', () => {
    it('returns null for a missing file', async () => {
      expect(await safeReadFile(join(tempDir, 'nonexistent.txt'))).toBeNull();
    });
  });

  describe('readJson', () => {
    it('parses an existing file', async () => {
      const filePath = join(tempDir, 'rules.json');
      await writeFile(filePath, '{"thresholds":{"empirical_availability_min":0.5}}');
      expect(await readJson(filePath)).toEqual({ thresholds: { empirical_availability_min: 0.5 } });
    });

    it('returns null for a missing file', async () => {
      expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
    });

    it('throws a VALIDATION_ERROR on invalid JSON', async () => {
      const filePath = join(tempDir, 'broken.json');
      await writeFile(filePath, '{ not json');
      const error = await readJson(filePath).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(SdoError);
      expect(error).toMatchObject({ code: ExitCode.VALIDATION_ERROR, message: `Invalid JSON in: ${filePath}` });
    });
  });
});
