import { describe, expect, it, vi } from "vitest";
import type { CacheEntry, CacheStore } from "./result-cache.js";
import {
  DEFAULT_CACHE_TTL_MS,
  generateCacheKey,
  MemoryCacheStore,
  ResultCache,
  stableStringify,
  UncacheableValueError,
} from "./result-cache.js";

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------

describe("generateCacheKey", () => {
  it("is independent of argument order at the call site", () => {
    const a = generateCacheKey("unit:scouting", { top_n: 3, universe: ["A", "B"], opts: { x: 1, y: 2 } });
    const b = generateCacheKey("unit:scouting", { opts: { y: 2, x: 1 }, universe: ["A", "B"], top_n: 3 });
    expect(a).toBe(b);
    expect(a).toBe('unit:scouting:{"opts":{"x":1,"y":2},"top_n":3,"universe":["A","B"]}');
  });

  it("distinguishes different arguments and prefixes", () => {
    const keys = new Set([
      generateCacheKey("tool:news", { days: 2 }),
      generateCacheKey("tool:news", { days: 90 }),
      generateCacheKey("tool:news", { days: "2" }),
      generateCacheKey("tool:gnews", { days: 2 }),
      generateCacheKey("tool:news", { days: 2, symbol: "A" }),
      generateCacheKey("tool:news", { list: ["a", "b"] }),
      generateCacheKey("tool:news", { list: ["b", "a"] }),
      generateCacheKey("tool:news", {}),
    ]);
    expect(keys.size).toBe(8);
  });

  it("is exposed as ResultCache.generateKey", () => {
    expect(ResultCache.generateKey("p", { b: 1, a: 2 })).toBe('p:{"a":2,"b":1}');
  });
});

describe("stableStringify", () => {
  it("drops undefined members and renders dates as ISO strings", () => {
    expect(stableStringify({ b: undefined, a: [undefined, 1], d: new Date(0) })).toBe(
      '{"a":[null,1],"d":"1970-01-01T00:00:00.000Z"}',
    );
    expect(stableStringify(undefined)).toBe("null");
    expect(stableStringify("x")).toBe('"x"');
  });

  it("tells non-finite numbers apart from null", () => {
    expect(stableStringify({ x: NaN })).toBe('{"x":NaN}');
    const keys = [NaN, Infinity, -Infinity, null].map((x) => generateCacheKey("k", { x }));
    expect(new Set(keys).size).toBe(4);
  });

  it("encodes maps, sets and bigints by content", () => {
    expect(stableStringify(new Map([["b", 1], ["a", 2]]))).toBe('Map{["a",2],["b",1]}');
    expect(stableStringify(new Set([2, 1]))).toBe("Set[1,2]");
    expect(stableStringify(10n)).toBe("10n");

    const keys = [
      new Map([["a", 1]]),
      new Map([["a", 2]]),
      new Set([1, 2]),
      new Set([1]),
      {},
    ].map((x) => generateCacheKey("k", { x }));
    expect(new Set(keys).size).toBe(5);
  });

  it("encodes a value shared by two members twice", () => {
    const shared = { n: 1 };
    expect(stableStringify({ a: shared, b: shared })).toBe('{"a":{"n":1},"b":{"n":1}}');
  });

  it("refuses values it cannot key", () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    class Token {}

    expect(() => stableStringify(cyclic)).toThrow(UncacheableValueError);
    expect(() => stableStringify({ fn: () => 1 })).toThrow("cannot key a function");
    expect(() => stableStringify({ t: new Token() })).toThrow("cannot key [object Object]");
  });
});

// ---------------------------------------------------------------------------
// TTL
// ---------------------------------------------------------------------------

describe("ResultCache TTL", () => {
  function clockedCache(ttlMs = 1000) {
    let now = 10_000;
    const cache = new ResultCache({ ttlMs, nowMs: () => now });
    return {
      cache,
      advance: (ms: number) => {
        now += ms;
      },
    };
  }

  it("returns a value set immediately before", async () => {
    const { cache } = clockedCache();
    await cache.set("k", { v: 1 });
    expect(await cache.get("k")).toEqual({ v: 1 });
  });

  it("expires entries once the TTL has elapsed", async () => {
    const { cache, advance } = clockedCache(1000);
    await cache.set("k", "value");
    advance(999);
    expect(await cache.get("k")).toBe("value");
    advance(1);
    expect(await cache.get("k")).toBeUndefined();
  });

  it("restarts the window when an expired key is set again", async () => {
    const { cache, advance } = clockedCache(1000);
    await cache.set("k", "old");
    advance(1500);
    await cache.set("k", "new");
    advance(900);
    expect(await cache.get("k")).toBe("new");
  });

  it("evicts expired entries lazily on lookup", async () => {
    let now = 0;
    const store = new MemoryCacheStore();
    const cache = new ResultCache({ ttlMs: 10, nowMs: () => now, store });
    await cache.set("k", 1);
    now = 50;
    expect(store.size).toBe(1);
    await cache.get("k");
    expect(store.size).toBe(0);
  });

  it("defaults to three hours", () => {
    expect(new ResultCache().ttlMs).toBe(DEFAULT_CACHE_TTL_MS);
    expect(DEFAULT_CACHE_TTL_MS).toBe(10_800_000);
  });
});

// ---------------------------------------------------------------------------
// Isolation & degradation
// ---------------------------------------------------------------------------

describe("ResultCache isolation", () => {
  it("does not share mutable state with callers", async () => {
    const cache = new ResultCache();
    const value = { list: [1, 2] };
    await cache.set("k", value);
    value.list.push(3);

    const first = await cache.get("k");
    expect(first).toEqual({ list: [1, 2] });
    if (first && typeof first === "object" && "list" in first && Array.isArray(first.list)) {
      first.list.push(99);
    }
    expect(await cache.get("k")).toEqual({ list: [1, 2] });
  });

  it("keeps concurrent writes to distinct keys apart", async () => {
    const cache = new ResultCache();
    await Promise.all(
      Array.from({ length: 20 }, (_, i) => cache.set(`k${i}`, { i })),
    );
    const values = await Promise.all(Array.from({ length: 20 }, (_, i) => cache.get(`k${i}`)));
    expect(values).toEqual(Array.from({ length: 20 }, (_, i) => ({ i })));
  });

  it("degrades to a miss when the store fails", async () => {
    const failing: CacheStore = {
      get: async () => {
        throw new Error("store offline");
      },
      set: async (_entry: CacheEntry) => {
        throw new Error("store offline");
      },
      delete: () => {},
      clear: () => {},
    };
    const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const cache = new ResultCache({ store: failing, log });

    await expect(cache.set("k", 1)).resolves.toBeUndefined();
    await expect(cache.get("k")).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledWith("cache write failed for k: store offline");
    expect(log.warn).toHaveBeenCalledWith("cache read failed for k: store offline");
  });

  it("skips values that cannot be cloned", async () => {
    const cache = new ResultCache();
    await cache.set("fn", { run: () => 1 });
    expect(await cache.get("fn")).toBeUndefined();
  });
});
