/**
 * In-Memory Redis Simulator
 *
 * Implements the Redis commands the signal store needs, so the engine can run
 * without a Redis server (SIGNAL_STORE=memory) and tests stay in process.
 */

import type { KeyValueStore } from "./redisClient.js";

export class MemoryRedis implements KeyValueStore {
  private strings: Map<string, string> = new Map();
  private lists: Map<string, string[]> = new Map();
  private hashes: Map<string, Map<string, number>> = new Map();
  private expirations: Map<string, number> = new Map();

  constructor(private clock: () => number = Date.now) {}

  /**
   * SETEX - set with expiration
   */
  async setex(key: string, seconds: number, value: string): Promise<"OK"> {
    this.strings.set(key, value);
    this.expirations.set(key, this.clock() + seconds * 1000);
    return "OK";
  }

  /**
   * GET - value, or null once expired
   */
  async get(key: string): Promise<string | null> {
    const expiration = this.expirations.get(key);
    if (expiration !== undefined && this.clock() >= expiration) {
      this.strings.delete(key);
      this.expirations.delete(key);
      return null;
    }
    return this.strings.get(key) ?? null;
  }

  /**
   * LPUSH - add to front of list
   */
  async lpush(key: string, value: string): Promise<number> {
    const list = this.lists.get(key) ?? [];
    list.unshift(value);
    this.lists.set(key, list);
    return list.length;
  }

  /**
   * LTRIM - keep only elements start..stop (inclusive, negative from the end)
   */
  async ltrim(key: string, start: number, stop: number): Promise<"OK"> {
    const list = this.lists.get(key) ?? [];
    this.lists.set(key, sliceRange(list, start, stop));
    return "OK";
  }

  /**
   * LRANGE - elements start..stop (inclusive, negative from the end)
   */
  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return sliceRange(this.lists.get(key) ?? [], start, stop);
  }

  async hincrby(key: string, field: string, increment: number): Promise<number> {
    let hash = this.hashes.get(key);
    if (!hash) {
      hash = new Map();
      this.hashes.set(key, hash);
    }
    const next = (hash.get(field) ?? 0) + increment;
    hash.set(field, next);
    return next;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    const out: Record<string, string> = {};
    for (const [field, value] of this.hashes.get(key) ?? []) {
      out[field] = String(value);
    }
    return out;
  }

  async close(): Promise<void> {
    this.clear();
  }

  /**
   * Clear all data
   */
  clear(): void {
    this.strings.clear();
    this.lists.clear();
    this.hashes.clear();
    this.expirations.clear();
  }
}

function sliceRange(list: string[], start: number, stop: number): string[] {
  const from = start < 0 ? Math.max(0, list.length + start) : start;
  const to = stop < 0 ? list.length + stop : stop;
  return list.slice(from, to + 1);
}
