/**
 * LruCache - capacity-bounded least-recently-used cache engine
 *
 * Recency is the Map's insertion order: a hit re-inserts the entry at the end,
 * so the first key is always the one untouched longest. Inserting past the
 * capacity evicts exactly that first key.
 */

import { createLogger } from "../structured-logger";
import type { CacheEngine, CacheLookup, CacheMetricsSnapshot } from "./cache-types";
import { MISS } from "./cache-types";

const logger = createLogger("lru-cache");

interface LruEntry<V> {
  readonly value: V;
}

export class LruCache<V> implements CacheEngine<V> {
  readonly type = "lru" as const;
  private readonly store = new Map<string, LruEntry<V>>();
  private readonly capacity: number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  /**
   * @param capacity - Maximum number of entries (integer >= 1)
   * @throws {Error} If capacity is not a positive integer
   */
  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error("LRU capacity must be a positive integer");
    }
    this.capacity = capacity;
  }

  get(key: string): CacheLookup<V> {
    const entry = this.store.get(key);
    if (!entry) {
      this.misses++;
      return MISS;
    }

    this.store.delete(key);
    this.store.set(key, entry);

    this.hits++;
    return { hit: true, value: entry.value };
  }

  put(key: string, value: V): void {
    if (this.store.has(key)) {
      this.store.delete(key);
    }
    this.store.set(key, { value });

    if (this.store.size > this.capacity) {
      const oldest = this.store.keys().next();
      if (!oldest.done) {
        this.store.delete(oldest.value);
        this.evictions++;
        logger.debug("LRU eviction", { evicted: oldest.value });
      }
    }
  }

  snapshotMetrics(): CacheMetricsSnapshot {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.store.size,
      evictions: this.evictions,
      expirations: 0,
    };
  }

  /**
   * Keys from least to most recently used.
   */
  keys(): string[] {
    return Array.from(this.store.keys());
  }
}
