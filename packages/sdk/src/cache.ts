/**
 * In-memory LRU cache with time-based expiry for KV reads
 */

import type { Clock } from "./types.js";

/**
 * Cached value with the time it was fetched or written
 */
export interface CacheEntry<V> {
  value: V;
  /** Epoch milliseconds from the cache's clock */
  fetchedAt: number;
}

/**
 * Configuration options for the TTL cache
 */
export interface CacheOptions {
  /** Entry lifetime in milliseconds (default: 300000) */
  ttlMs?: number;
  /** Maximum number of entries (default: 10000) */
  maxSize?: number;
  /** Clock (default: Date.now) */
  now?: Clock;
}

/**
 * Cache statistics for monitoring and debugging
 */
export interface CacheStats {
  /** Current number of entries */
  size: number;
  hits: number;
  misses: number;
  /** Entries dropped because their TTL elapsed */
  expired: number;
  /** Entries dropped to stay within maxSize */
  evicted: number;
}

export const DEFAULT_CACHE_TTL_MS = 300_000;
export const DEFAULT_CACHE_MAX_SIZE = 10_000;

/**
 * LRU cache whose entries are honoured only while `now - fetchedAt < ttlMs`
 *
 * Uses native Map insertion order for O(1) LRU operations. A maxSize of 0
 * disables caching.
 */
export class TtlCache<V> {
  #entries = new Map<string, CacheEntry<V>>();
  #ttlMs: number;
  #maxSize: number;
  #now: Clock;
  #hits = 0;
  #misses = 0;
  #expired = 0;
  #evicted = 0;

  constructor(options: CacheOptions = {}) {
    this.#ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.#maxSize = options.maxSize ?? DEFAULT_CACHE_MAX_SIZE;
    this.#now = options.now ?? Date.now;
  }

  get ttlMs(): number {
    return this.#ttlMs;
  }

  /**
   * Get a value if present and fresh; stale entries are evicted
   */
  get(key: string): V | undefined {
    const entry = this.#entries.get(key);

    if (!entry) {
      this.#misses++;
      return undefined;
    }

    if (this.#now() - entry.fetchedAt >= this.#ttlMs) {
      this.#entries.delete(key);
      this.#expired++;
      this.#misses++;
      return undefined;
    }

    // LRU: move to end (most recently used)
    this.#entries.delete(key);
    this.#entries.set(key, entry);

    this.#hits++;
    return entry.value;
  }

  /**
   * Store a value stamped with the current time
   */
  set(key: string, value: V): void {
    if (this.#maxSize <= 0) {
      return;
    }

    this.#entries.delete(key);
    this.#entries.set(key, { value, fetchedAt: this.#now() });

    while (this.#entries.size > this.#maxSize) {
      const oldest = this.#entries.keys().next();
      if (oldest.done) break;
      this.#entries.delete(oldest.value);
      this.#evicted++;
    }
  }

  delete(key: string): boolean {
    return this.#entries.delete(key);
  }

  has(key: string): boolean {
    return this.#entries.has(key);
  }

  clear(): void {
    this.#entries.clear();
  }

  stats(): CacheStats {
    return {
      size: this.#entries.size,
      hits: this.#hits,
      misses: this.#misses,
      expired: this.#expired,
      evicted: this.#evicted,
    };
  }
}
