/**
 * Tests for the content-hash dedup cache.
 */

import { describe, it, expect } from 'vitest';
import { DedupCache } from '../dedup-cache.js';

describe('DedupCache', () => {
  it('reports a duplicate inside the window', () => {
    const cache = new DedupCache(300);
    cache.remember('h1', 0);
    expect(cache.isDuplicate('h1', 299_999)).toBe(true);
    expect(cache.isDuplicate('h2', 1)).toBe(false);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, evictions: 0, size: 1 });
  });

  it('treats an entry exactly one window old as stale and evicts it', () => {
    const cache = new DedupCache(300);
    cache.remember('h1', 0);
    expect(cache.isDuplicate('h1', 300_000)).toBe(false);
    expect(cache.size).toBe(0);
    expect(cache.getStats()).toEqual({ hits: 0, misses: 1, evictions: 1, size: 0 });
  });

  it('never deduplicates with a zero window', () => {
    const cache = new DedupCache(0);
    cache.remember('h1', 1000);
    expect(cache.isDuplicate('h1', 1000)).toBe(false);
  });

  it('evicts expired entries in bulk', () => {
    const cache = new DedupCache(10);
    cache.remember('old', 0);
    cache.remember('new', 5_000);
    expect(cache.evictExpired(12_000)).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.isDuplicate('new', 12_000)).toBe(true);
  });

  it('clear returns the number of entries dropped', () => {
    const cache = new DedupCache(10);
    cache.remember('a', 0);
    cache.remember('b', 0);
    expect(cache.clear()).toBe(2);
    expect(cache.size).toBe(0);
  });
});
