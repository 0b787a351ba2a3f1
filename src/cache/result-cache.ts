// ---------------------------------------------------------------------------
// Result Cache – key-addressed store with a time-to-live
// ---------------------------------------------------------------------------
// Entries are valid while `now - createdAtMs < ttlMs`. Expired entries are
// treated as absent and evicted lazily on lookup. Every store failure
// degrades to a miss: caching never blocks or fails a unit.
// ---------------------------------------------------------------------------

import { formatError, silentLogger, type SubsystemLogger } from "../logging.js";

/** Default TTL: three hours. */
export const DEFAULT_CACHE_TTL_MS = 3 * 60 * 60 * 1000;

export type CacheEntry = {
  key: string;
  value: unknown;
  createdAtMs: number;
};

type MaybePromise<T> = T | Promise<T>;

/** Backing store. May be synchronous (in-process) or asynchronous (external). */
export interface CacheStore {
  get(key: string): MaybePromise<CacheEntry | undefined>;
  set(entry: CacheEntry): MaybePromise<void>;
  delete(key: string): MaybePromise<void>;
  clear(): MaybePromise<void>;
}

// ---------------------------------------------------------------------------
// Key generation
// ---------------------------------------------------------------------------

export class UncacheableValueError extends Error {
  readonly kind = "uncacheable" as const;

  constructor(message: string) {
    super(message);
    this.name = "UncacheableValueError";
  }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Canonical JSON: object keys sorted recursively, `undefined` members
 * dropped, array order preserved. Values plain JSON cannot tell apart get
 * bare tokens JSON never emits: `NaN`, `Infinity`, `-Infinity`, `10n`,
 * `Map{…}` and `Set[…]` (entries sorted by their own encoding).
 *
 * Throws `UncacheableValueError` for cycles, functions, symbols and class
 * instances other than `Date`, `Map` and `Set`.
 */
export function stableStringify(value: unknown): string {
  return encode(value, new Set());
}

function encode(value: unknown, ancestors: Set<object>): string {
  switch (typeof value) {
    case "undefined":
      return "null";
    case "number":
      return Number.isFinite(value) ? JSON.stringify(value) : String(value);
    case "bigint":
      return `${value}n`;
    case "string":
    case "boolean":
      return JSON.stringify(value);
    case "function":
    case "symbol":
      throw new UncacheableValueError(`cannot key a ${typeof value}`);
  }
  if (typeof value !== "object" || value === null) {
    return "null";
  }
  if (value instanceof Date) {
    return JSON.stringify(value.toISOString());
  }
  if (ancestors.has(value)) {
    throw new UncacheableValueError("cannot key a value that refers to itself");
  }
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return `[${value.map((item) => encode(item, ancestors)).join(",")}]`;
    }
    if (value instanceof Map) {
      const entries = [...value.entries()]
        .map(([k, v]) => `[${encode(k, ancestors)},${encode(v, ancestors)}]`)
        .sort();
      return `Map{${entries.join(",")}}`;
    }
    if (value instanceof Set) {
      const items = [...value.values()].map((item) => encode(item, ancestors)).sort();
      return `Set[${items.join(",")}]`;
    }
    if (!isPlainObject(value)) {
      throw new UncacheableValueError(`cannot key ${Object.prototype.toString.call(value)}`);
    }
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${encode(v, ancestors)}`);
    return `{${entries.join(",")}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Deterministic cache key for a unit-scoped prefix and its arguments.
 * Semantically identical argument objects collide regardless of key order.
 */
export function generateCacheKey(prefix: string, args: Record<string, unknown>): string {
  return `${prefix}:${stableStringify(args)}`;
}

// ---------------------------------------------------------------------------
// MemoryCacheStore
// ---------------------------------------------------------------------------

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | undefined {
    return this.entries.get(key);
  }

  set(entry: CacheEntry): void {
    this.entries.set(entry.key, entry);
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// ---------------------------------------------------------------------------
// ResultCache
// ---------------------------------------------------------------------------

export interface ResultCacheOpts {
  ttlMs?: number;
  store?: CacheStore;
  nowMs?: () => number;
  log?: SubsystemLogger;
}

export class ResultCache {
  readonly ttlMs: number;
  private readonly store: CacheStore;
  private readonly opts: ResultCacheOpts;

  constructor(opts: ResultCacheOpts = {}) {
    this.opts = opts;
    this.ttlMs = opts.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.store = opts.store ?? new MemoryCacheStore();
  }

  private now(): number {
    return this.opts.nowMs?.() ?? Date.now();
  }

  private get log(): SubsystemLogger {
    return this.opts.log ?? silentLogger;
  }

  static generateKey(prefix: string, args: Record<string, unknown>): string {
    return generateCacheKey(prefix, args);
  }

  // -------------------------------------------------------------------------
  // get
  // -------------------------------------------------------------------------
  /** Return a copy of the cached value, or `undefined` if absent or expired. */
  async get(key: string): Promise<unknown> {
    let entry: CacheEntry | undefined;
    try {
      entry = await this.store.get(key);
    } catch (err) {
      this.log.warn(`cache read failed for ${key}: ${formatError(err)}`);
      return undefined;
    }
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.createdAtMs >= this.ttlMs) {
      try {
        await this.store.delete(key);
      } catch (err) {
        this.log.warn(`cache eviction failed for ${key}: ${formatError(err)}`);
      }
      return undefined;
    }

    this.log.debug(`cache hit: ${key}`);
    return structuredClone(entry.value);
  }

  // -------------------------------------------------------------------------
  // set
  // -------------------------------------------------------------------------
  /** Overwrite unconditionally and restart the entry's TTL window. */
  async set(key: string, value: unknown): Promise<void> {
    let copy: unknown;
    try {
      copy = structuredClone(value);
    } catch (err) {
      this.log.warn(`cache value for ${key} is not cloneable: ${formatError(err)}`);
      return;
    }
    try {
      await this.store.set({ key, value: copy, createdAtMs: this.now() });
      this.log.debug(`cache set: ${key}`);
    } catch (err) {
      this.log.warn(`cache write failed for ${key}: ${formatError(err)}`);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.store.delete(key);
    } catch (err) {
      this.log.warn(`cache delete failed for ${key}: ${formatError(err)}`);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.store.clear();
    } catch (err) {
      this.log.warn(`cache clear failed: ${formatError(err)}`);
    }
  }
}
