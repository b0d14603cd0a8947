import { describe, expect, it } from "vitest";
import { TtlCache } from "./ttlCache.js";

describe("TtlCache", () => {
  it("serves a value until its TTL passes", () => {
    const cache = new TtlCache<string>(3);
    cache.set("a", "alpha", 1_000, 0);

    expect(cache.get("a", 999)).toBe("alpha");
    expect(cache.get("a", 1_000)).toBeUndefined();
    expect(cache.stats()).toEqual({ size: 0, hits: 1, misses: 1, evictions: 0 });
  });

  it("evicts the least recently used entry when full", () => {
    const cache = new TtlCache<number>(2);
    cache.set("a", 1, 60_000, 0);
    cache.set("b", 2, 60_000, 0);
    cache.get("a", 1);
    cache.set("c", 3, 60_000, 2);

    expect(cache.keys()).toEqual(["a", "c"]);
    expect(cache.stats().evictions).toBe(1);
  });

  it("evicts by count even when entries are still fresh", () => {
    const cache = new TtlCache<number>(1);
    cache.set("a", 1, 60_000, 0);
    cache.set("b", 2, 60_000, 0);

    expect(cache.get("a", 1)).toBeUndefined();
    expect(cache.get("b", 1)).toBe(2);
  });

  it("computes once per fresh key", () => {
    const cache = new TtlCache<number>(2);
    let calls = 0;
    const compute = () => ++calls;

    expect(cache.getOrCompute("k", compute, 100, 0)).toBe(1);
    expect(cache.getOrCompute("k", compute, 100, 50)).toBe(1);
    expect(cache.getOrCompute("k", compute, 100, 150)).toBe(2);
    expect(calls).toBe(2);
  });

  it("shrinks from the LRU end on resize", () => {
    const cache = new TtlCache<number>(3);
    cache.set("a", 1, 60_000, 0);
    cache.set("b", 2, 60_000, 0);
    cache.set("c", 3, 60_000, 0);

    cache.resize(1);

    expect(cache.keys()).toEqual(["c"]);
  });

  it("rejects a non-positive bound", () => {
    expect(() => new TtlCache<number>(0)).toThrow(RangeError);
  });
});
