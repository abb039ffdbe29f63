export const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_CACHE_MAX_ITEMS = 1000;

export type CacheLookup<T> = { found: true; value: T } | { found: false };

export interface CacheStats {
  total: number;
  active: number;
  expired: number;
}

export interface ResponseCache<T> {
  get(key: string): CacheLookup<T>;
  set(key: string, value: T): void;
  setWithTtl(key: string, value: T, ttlMs: number): void;
  delete(key: string): void;
  clear(): void;
  /** Drops every expired entry and returns how many were removed. */
  cleanup(): number;
  stats(): CacheStats;
  size(): number;
  keys(): string[];
  /**
   * Read-through lookup. A failing `compute` caches nothing. Two overlapping
   * misses on the same key may both run `compute`; the last to finish wins.
   */
  getOrSet(key: string, compute: () => T | Promise<T>): Promise<T>;
  getOrSetWithTtl(key: string, ttlMs: number, compute: () => T | Promise<T>): Promise<T>;
}

export interface ResponseCacheOptions {
  defaultTtlMs?: number;
  maxItems?: number;
  now?: () => number;
}

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export function createResponseCache<T>(options: ResponseCacheOptions = {}): ResponseCache<T> {
  const defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
  const maxItems = options.maxItems ?? DEFAULT_CACHE_MAX_ITEMS;
  const now = options.now ?? Date.now;
  const entries = new Map<string, CacheEntry<T>>();

  const isExpired = (entry: CacheEntry<T>, at: number): boolean => at > entry.expiresAt;

  const removeExpired = (): number => {
    const at = now();
    let removed = 0;
    for (const [key, entry] of entries) {
      if (isExpired(entry, at)) {
        entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  };

  // Soonest-expiring entry goes first; ties go to the entry inserted earliest.
  const evictEarliestExpiry = (): void => {
    let victim: string | null = null;
    let earliest = Number.POSITIVE_INFINITY;
    for (const [key, entry] of entries) {
      if (entry.expiresAt < earliest) {
        earliest = entry.expiresAt;
        victim = key;
      }
    }
    if (victim !== null) {
      entries.delete(victim);
    }
  };

  const lookup = (key: string): CacheLookup<T> => {
    const entry = entries.get(key);
    if (!entry) {
      return { found: false };
    }
    if (isExpired(entry, now())) {
      entries.delete(key);
      return { found: false };
    }
    return { found: true, value: entry.value };
  };

  const store = (key: string, value: T, ttlMs: number): void => {
    if (!entries.has(key) && entries.size >= maxItems) {
      removeExpired();
      if (entries.size >= maxItems) {
        evictEarliestExpiry();
      }
    }

    entries.set(key, { value, expiresAt: now() + ttlMs });
  };

  const readThrough = async (
    key: string,
    ttlMs: number,
    compute: () => T | Promise<T>
  ): Promise<T> => {
    const cached = lookup(key);
    if (cached.found) {
      return cached.value;
    }

    const value = await compute();
    store(key, value, ttlMs);
    return value;
  };

  return {
    get: lookup,

    set(key, value) {
      store(key, value, defaultTtlMs);
    },

    setWithTtl(key, value, ttlMs) {
      store(key, value, ttlMs);
    },

    delete(key) {
      entries.delete(key);
    },

    clear() {
      entries.clear();
    },

    cleanup: removeExpired,

    stats() {
      const at = now();
      let expired = 0;
      for (const entry of entries.values()) {
        if (isExpired(entry, at)) {
          expired += 1;
        }
      }
      return { total: entries.size, active: entries.size - expired, expired };
    },

    size: () => entries.size,

    keys: () => Array.from(entries.keys()),

    getOrSet: (key, compute) => readThrough(key, defaultTtlMs, compute),

    getOrSetWithTtl: readThrough
  };
}
