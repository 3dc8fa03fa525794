/**
 * @fileoverview LRUCache - Bounded Least-Recently-Used Cache
 *
 * @packageDocumentation
 * @module @provisio/core/infrastructure/cache
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Map-backed LRU cache. A Map iterates in insertion order, so re-inserting a
 * key on every hit keeps the least recently used key first in line for
 * eviction.
 *
 * @version 1.0.0
 */

/**
 * Cache entry wrapper, so stored `undefined` values still count as hits.
 */
interface ICacheEntry<V> {
  value: V;
}

/**
 * Cache statistics
 */
export interface ICacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
}

/**
 * LRUCache - bounded cache with least-recently-used eviction.
 *
 * @template K - Key type (compared by identity for objects and functions)
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const cache = new LRUCache<Function, Function>(2);
 * cache.set(a, wrappedA);
 * cache.set(b, wrappedB);
 * cache.get(a);           // a is now most recent
 * cache.set(c, wrappedC); // evicts b
 * ```
 */
export class LRUCache<K, V> {
  private readonly cache = new Map<K, ICacheEntry<V>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`LRUCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Get a value and mark it as most recently used.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);

    if (!entry) {
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
   * Store a value, evicting the least recently used entry when full.
   */
  set(key: K, value: V): void {
    // Remove if exists (to update position)
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    // Evict oldest if at capacity
    if (this.cache.size >= this.capacity) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(key, { value });
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  /**
   * Clear all entries and statistics.
   */
  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): ICacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.cache.size,
      capacity: this.capacity,
    };
  }

  get size(): number {
    return this.cache.size;
  }
}
