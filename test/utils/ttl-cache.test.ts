import { beforeEach, describe, expect, it } from "vitest";
import { TtlCache } from "../../src/utils/ttl-cache.js";

describe("TtlCache", () => {
  let now: number;
  let cache: TtlCache<string>;

  beforeEach(() => {
    now = 1_000;
    cache = new TtlCache<string>({ ttlMs: 1000, maxEntries: 3, now: () => now });
  });

  it("stores and retrieves values", () => {
    cache.set("key1", "value1");
    expect(cache.get("key1")).toBe("value1");
  });

  it("returns undefined for non-existent keys", () => {
    expect(cache.get("nonexistent")).toBeUndefined();
  });

  it("expires entries once the TTL has elapsed", () => {
    cache.set("key", "value");
    now += 999;
    expect(cache.get("key")).toBe("value");
    now += 1;
    expect(cache.get("key")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("does not extend the lifetime on reads", () => {
    cache.set("key", "value");
    now += 600;
    expect(cache.get("key")).toBe("value");
    now += 600;
    expect(cache.get("key")).toBeUndefined();
  });

  it("accepts a per-entry TTL", () => {
    cache.set("short", "v", 10);
    expect(cache.entry("short")?.expiresAt).toBe(1_010);
    now += 10;
    expect(cache.get("short")).toBeUndefined();
  });

  it("evicts the least recently used entry when at capacity", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    cache.set("c", "3");
    cache.get("a");
    cache.set("d", "4");

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe("1");
    expect(cache.get("c")).toBe("3");
    expect(cache.get("d")).toBe("4");
    expect(cache.getStats().evictions).toBe(1);
  });

  it("overwrites an existing key without evicting", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    cache.set("c", "3");
    cache.set("a", "updated");
    expect(cache.size).toBe(3);
    expect(cache.get("a")).toBe("updated");
    expect(cache.get("b")).toBe("2");
  });

  it("tracks hits and misses", () => {
    cache.set("a", "1");
    cache.get("a");
    cache.get("a");
    cache.get("missing");
    const stats = cache.getStats();
    expect(stats.hits).toBe(2);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBeCloseTo(2 / 3);
  });

  it("deletes and clears", () => {
    cache.set("a", "1");
    cache.set("b", "2");
    expect(cache.delete("a")).toBe(true);
    expect(cache.delete("a")).toBe(false);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
