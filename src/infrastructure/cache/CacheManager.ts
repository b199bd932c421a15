/**
 * wiregraph - Cache Manager
 *
 * In-memory LRU store with optional TTL. Serves as the default definition
 * cache adapter and as a general memo for the container.
 */

import type { IDefinitionCacheAdapter } from '../../application/ports';

/**
 * Cache entry with value and metadata
 */
interface CacheEntry<V> {
  value: V;
  expiresAt?: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  hitRate: number;
}

export interface CacheManagerOptions {
  /** Maximum number of entries before the least recently used is evicted */
  capacity?: number;
  /** TTL in milliseconds applied when `set` is called without one */
  defaultTtl?: number;
  /** Time source, injectable for tests */
  clock?: () => number;
}

/**
 * CacheManager - LRU cache with TTL
 *
 * @example
 * ```typescript
 * const cache = new CacheManager({ capacity: 500 });
 * container.enableDefinitionCache(cache);
 * container.cacheAllDefinitions();
 *
 * cache.stats(); // { hits: 0, misses: 3, size: 3, capacity: 500, hitRate: 0 }
 * ```
 */
export class CacheManager<V = unknown> implements IDefinitionCacheAdapter {
  private readonly cache: Map<string, CacheEntry<V>> = new Map();
  private readonly capacity: number;
  private readonly defaultTtl?: number;
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: CacheManagerOptions = {}) {
    this.capacity = options.capacity ?? 1000;
    this.defaultTtl = options.defaultTtl;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Get a value from the cache
   */
  get(key: string): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.hits++;
    return entry.value;
  }

  /**
   * Set a value in the cache
   *
   * @param ttl - Time to live in milliseconds; falls back to `defaultTtl`
   */
  set(key: string, value: V, ttl?: number): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    if (this.cache.size >= this.capacity) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    const lifetime = ttl ?? this.defaultTtl;
    this.cache.set(key, {
      value,
      expiresAt: lifetime ? this.clock() + lifetime : undefined,
    });
  }

  /**
   * Check if key exists in cache (and is not expired)
   */
  has(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return false;
    }

    return true;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  /**
   * Clear all entries, or only keys starting with `prefix`.
   * Statistics reset only on a full clear.
   */
  clear(prefix?: string): void {
    if (prefix === undefined) {
      this.cache.clear();
      this.hits = 0;
      this.misses = 0;
      return;
    }

    for (const key of [...this.cache.keys()]) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
      }
    }
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }

  /**
   * Gets from cache or computes and caches
   */
  getOrSet(key: string, factory: () => V, ttl?: number): V {
    if (this.has(key)) {
      const cached = this.get(key);
      if (cached !== undefined) return cached;
    }

    const value = factory();
    this.set(key, value, ttl);
    return value;
  }

  keys(): string[] {
    return Array.from(this.cache.keys());
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    let pruned = 0;

    for (const [key, entry] of [...this.cache.entries()]) {
      if (this.isExpired(entry)) {
        this.cache.delete(key);
        pruned++;
      }
    }

    return pruned;
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return entry.expiresAt !== undefined && this.clock() > entry.expiresAt;
  }
}
