/**
 * Response Cache - bounded LRU store with per-entry TTL.
 *
 * A Map keeps insertion order, so re-inserting on every hit turns its first
 * key into the least recently used one. Expiry is logical: an entry past
 * `createdAt + ttlMs` is treated as absent by every read, whether or not
 * `sweep()` has removed it yet.
 */

export interface CacheEntry<V> {
  value: V;
  createdAt: number;
  ttlMs: number;
}

export interface ResponseCacheConfig {
  maxEntries: number;
  defaultTtlMs: number;
}

export interface ResponseCacheStats {
  size: number;
  maxEntries: number;
  defaultTtlMs: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  expirations: number;
}

export class ResponseCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(
    private readonly config: ResponseCacheConfig,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isInteger(config.maxEntries) || config.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${config.maxEntries}`);
    }
    if (!(config.defaultTtlMs > 0)) {
      throw new RangeError(`defaultTtlMs must be greater than 0, got ${config.defaultTtlMs}`);
    }
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Presence check that honours expiry but does not count as a use.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  /**
   * Stores `value`; when the cache is full the least recently used entry
   * makes room. Returns the evicted key, if any.
   */
  set(key: string, value: V, ttlMs = this.config.defaultTtlMs): string | undefined {
    if (!(ttlMs > 0)) {
      throw new RangeError(`ttlMs must be greater than 0, got ${ttlMs}`);
    }

    let evicted: string | undefined;
    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.config.maxEntries) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        evicted = oldest.value;
        this.entries.delete(oldest.value);
        this.evictions++;
      }
    }

    this.entries.set(key, { value, createdAt: this.now(), ttlMs });
    return evicted;
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drops every entry whose key starts with `prefix`; returns how many.
   */
  invalidatePrefix(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Physically removes expired entries; returns how many.
   */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed++;
      }
    }
    this.expirations += removed;
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
  }

  /**
   * Entries physically held, expired ones included until swept.
   */
  get size(): number {
    return this.entries.size;
  }

  stats(): ResponseCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxEntries: this.config.maxEntries,
      defaultTtlMs: this.config.defaultTtlMs,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now >= entry.createdAt + entry.ttlMs;
  }
}
