/**
 * Bounded LRU cache with a TTL per entry.
 *
 * Eviction by count is independent of expiry: the least recently used entry
 * goes first even if it is still fresh. Map insertion order is the LRU order.
 */

export interface CacheEntry<T> {
  value: T;
  createdAt: number;
  ttlMs: number;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class TtlCache<T> {
  private entries = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private maxEntries: number) {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
  }

  /**
   * Fresh value for key, or undefined. Expired entries are dropped on read.
   */
  get(key: string, now: number = Date.now()): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (now - entry.createdAt >= entry.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Touch
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Raw entry without touching LRU order or counters
   */
  peek(key: string): CacheEntry<T> | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: T, ttlMs: number, now: number = Date.now()): void {
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
    this.entries.set(key, { value, createdAt: now, ttlMs });
  }

  /**
   * Synchronous get-or-compute. Runs to completion without yielding, so no
   * other task can interleave between the check and the set.
   */
  getOrCompute(key: string, compute: () => T, ttlMs: number, now: number = Date.now()): T {
    const cached = this.get(key, now);
    if (cached !== undefined) {
      return cached;
    }
    const value = compute();
    this.set(key, value, ttlMs, now);
    return value;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Shrink or grow the bound; shrinking evicts from the LRU end
   */
  resize(maxEntries: number): void {
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }
}
