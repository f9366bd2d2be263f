/**
 * Result cache
 *
 * Bounded LRU cache from item key to the artifact its build produced.
 * Recency is the insertion order of the backing Map: a hit re-inserts the
 * entry at the end, eviction takes the first key.
 *
 * Artifacts are rendered at a specific scale, so the engine clears the whole
 * cache on every zoom change.
 */

import { EngineConfigError } from './errors';

export interface ResultCacheOptions<K, V> {
  capacity: number;
  /** Release resources owned by an artifact when it leaves the cache */
  onEvict?: (value: V, key: K) => void;
}

export interface ResultCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRatio: number;
}

/** Cache entry; recency is the entry's position in the Map */
interface CacheEntry<V> {
  value: V;
}

export class ResultCache<K, V> {
  private cache = new Map<K, CacheEntry<V>>();
  private capacity: number;
  private readonly onEvict?: (value: V, key: K) => void;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResultCacheOptions<K, V>) {
    assertCapacity(options.capacity);
    this.capacity = options.capacity;
    this.onEvict = options.onEvict;
  }

  /**
   * Look up an artifact, promoting it to most-recently-used on a hit.
   */
  get(key: K): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    this.cache.delete(key);
    this.cache.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Look up without touching recency or hit statistics.
   */
  peek(key: K): V | undefined {
    return this.cache.get(key)?.value;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  /**
   * Store an artifact as most-recently-used, evicting the LRU entry when full.
   */
  put(key: K, value: V): void {
    const existing = this.cache.get(key);
    if (existing) {
      this.cache.delete(key);
      if (existing.value !== value) {
        this.onEvict?.(existing.value, key);
      }
    }

    while (this.cache.size >= this.capacity) {
      this.evictOldest();
    }

    this.cache.set(key, { value });
  }

  delete(key: K): boolean {
    const entry = this.cache.get(key);
    if (!entry) return false;

    this.cache.delete(key);
    this.onEvict?.(entry.value, key);
    return true;
  }

  /**
   * Drop every entry, releasing each artifact.
   */
  clear(): void {
    for (const [key, entry] of this.cache) {
      this.onEvict?.(entry.value, key);
    }
    this.cache.clear();
  }

  /**
   * Change the capacity, evicting LRU entries when shrinking below the
   * current size.
   */
  resize(capacity: number): void {
    assertCapacity(capacity);
    this.capacity = capacity;
    while (this.cache.size > this.capacity) {
      this.evictOldest();
    }
  }

  hitRatio(): number {
    const total = this.hits + this.misses;
    return total > 0 ? this.hits / total : 0;
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  getStats(): ResultCacheStats {
    return {
      size: this.cache.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRatio: this.hitRatio(),
    };
  }

  get size(): number {
    return this.cache.size;
  }

  keys(): IterableIterator<K> {
    return this.cache.keys();
  }

  private evictOldest(): void {
    const oldest = this.cache.entries().next();
    if (oldest.done) return;

    const [key, entry] = oldest.value;
    this.cache.delete(key);
    this.evictions++;
    this.onEvict?.(entry.value, key);
  }
}

function assertCapacity(capacity: number): void {
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new EngineConfigError(`Cache capacity must be a positive integer, got ${capacity}`, [
      { path: ['cacheCapacity'], message: 'cacheCapacity must be a positive integer', code: 'not_positive' },
    ]);
  }
}
