import { describe, expect, it, vi } from "vitest";

import { createResponseCache } from "../src/core/responseCache";

function createClock(start = 1_000_000) {
  let nowMs = start;
  return {
    now: () => nowMs,
    advance(ms: number) {
      nowMs += ms;
    }
  };
}

describe("createResponseCache", () => {
  it("serves an entry up to and including its expiry instant", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 100, now: clock.now });

    cache.set("video", "v1");
    clock.advance(100);
    expect(cache.get("video")).toEqual({ found: true, value: "v1" });

    clock.advance(1);
    expect(cache.get("video")).toEqual({ found: false });
    expect(cache.size()).toBe(0);
  });

  it("honours a per-entry ttl", () => {
    const clock = createClock();
    const cache = createResponseCache<number>({ defaultTtlMs: 1000, now: clock.now });

    cache.setWithTtl("short", 1, 10);
    cache.set("long", 2);
    clock.advance(11);

    expect(cache.get("short").found).toBe(false);
    expect(cache.get("long")).toEqual({ found: true, value: 2 });
  });

  it("evicts the soonest-expiring entry when full", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 1000, maxItems: 2, now: clock.now });

    cache.set("a", "first");
    cache.setWithTtl("b", "second", 50);
    cache.set("c", "third");

    expect(cache.keys()).toEqual(["a", "c"]);
  });

  it("evicts the earliest inserted entry on an expiry tie", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 1000, maxItems: 2, now: clock.now });

    cache.set("a", "first");
    cache.set("b", "second");
    cache.set("c", "third");

    expect(cache.keys()).toEqual(["b", "c"]);
  });

  it("drops expired entries before evicting live ones", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 1000, maxItems: 2, now: clock.now });

    cache.setWithTtl("stale", "old", 10);
    cache.set("fresh", "new");
    clock.advance(20);
    cache.set("next", "newer");

    expect(cache.keys()).toEqual(["fresh", "next"]);
  });

  it("overwrites an existing key at capacity without evicting", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 1000, maxItems: 2, now: clock.now });

    cache.set("a", "first");
    cache.set("b", "second");
    cache.set("a", "updated");

    expect(cache.size()).toBe(2);
    expect(cache.get("a")).toEqual({ found: true, value: "updated" });
    expect(cache.get("b")).toEqual({ found: true, value: "second" });
  });

  it("reports stats and cleans up expired entries", () => {
    const clock = createClock();
    const cache = createResponseCache<string>({ defaultTtlMs: 1000, now: clock.now });

    cache.setWithTtl("x", "1", 10);
    cache.setWithTtl("y", "2", 10);
    cache.set("z", "3");
    clock.advance(11);

    expect(cache.stats()).toEqual({ total: 3, active: 1, expired: 2 });
    expect(cache.cleanup()).toBe(2);
    expect(cache.stats()).toEqual({ total: 1, active: 1, expired: 0 });
  });

  it("deletes and clears", () => {
    const cache = createResponseCache<string>();

    cache.set("a", "1");
    cache.set("b", "2");
    cache.delete("a");
    expect(cache.keys()).toEqual(["b"]);

    cache.clear();
    expect(cache.size()).toBe(0);
  });

  it("computes on a miss and serves the stored value afterwards", async () => {
    const cache = createResponseCache<string>();
    const compute = vi.fn(async () => "channel-title");

    await expect(cache.getOrSet("channel", compute)).resolves.toBe("channel-title");
    await expect(cache.getOrSet("channel", compute)).resolves.toBe("channel-title");

    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("recomputes once a read-through entry has expired", async () => {
    const clock = createClock();
    const cache = createResponseCache<number>({ now: clock.now });
    let calls = 0;
    const compute = (): number => {
      calls += 1;
      return calls;
    };

    await expect(cache.getOrSetWithTtl("n", 5, compute)).resolves.toBe(1);
    clock.advance(6);
    await expect(cache.getOrSetWithTtl("n", 5, compute)).resolves.toBe(2);
  });

  it("stores nothing when compute fails", async () => {
    const cache = createResponseCache<string>();

    await expect(
      cache.getOrSet("broken", async () => {
        throw new Error("lookup failed");
      })
    ).rejects.toThrow("lookup failed");

    expect(cache.get("broken")).toEqual({ found: false });
  });

  it("may compute twice for overlapping misses on one key", async () => {
    const cache = createResponseCache<string>();
    const compute = vi.fn(async () => "value");

    const results = await Promise.all([cache.getOrSet("k", compute), cache.getOrSet("k", compute)]);

    expect(results).toEqual(["value", "value"]);
    expect(compute).toHaveBeenCalledTimes(2);
    expect(cache.size()).toBe(1);
  });
});
