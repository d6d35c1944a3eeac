/**
 * Content-hash cache for signal deduplication.
 *
 * Entries are written only after a successful delivery, so a signal that was
 * rejected or dead-lettered is never seen as a duplicate of itself on replay.
 * A stale entry is evicted when it is next looked up, or in bulk by
 * evictExpired(), which the orchestrator runs on a dispatch interval.
 */

/** Lookup and eviction counts since construction, plus the live entry count. */
export interface DedupCacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
}

export class DedupCache {
  private store: Map<string, number> = new Map();
  private stats: Omit<DedupCacheStats, 'size'> = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };
  private windowMs: number;

  constructor(windowSeconds: number) {
    this.windowMs = windowSeconds * 1000;
  }

  /**
   * Whether `hash` was delivered less than one window before `now`.
   * A stale entry is evicted and reported as not a duplicate.
   */
  isDuplicate(hash: string, now: number): boolean {
    const seenAt = this.store.get(hash);
    if (seenAt === undefined) {
      this.stats.misses++;
      return false;
    }

    if (now - seenAt >= this.windowMs) {
      this.store.delete(hash);
      this.stats.evictions++;
      this.stats.misses++;
      return false;
    }

    this.stats.hits++;
    return true;
  }

  /** Record a delivery of `hash` at `now`. */
  remember(hash: string, now: number): void {
    this.store.set(hash, now);
  }

  /** Drop every hash delivered a full window or more before `now`. Returns how many went. */
  evictExpired(now: number): number {
    let count = 0;
    for (const [hash, seenAt] of this.store) {
      if (now - seenAt >= this.windowMs) {
        this.store.delete(hash);
        count++;
      }
    }
    this.stats.evictions += count;
    return count;
  }

  /** Clear the cache. Returns the number of entries dropped. */
  clear(): number {
    const count = this.store.size;
    this.store.clear();
    this.stats.evictions += count;
    return count;
  }

  get size(): number {
    return this.store.size;
  }

  getStats(): DedupCacheStats {
    return { ...this.stats, size: this.store.size };
  }
}
