/**
 * TtlCache - time-to-live cache engine
 *
 * Every entry lives for the same fixed duration. Expired entries are removed
 * lazily, on the read that finds them, and count as misses and expirations.
 * They never count as evictions. There is no capacity bound.
 */

import { createLogger } from "../structured-logger";
import type { CacheEngine, CacheLookup, CacheMetricsSnapshot } from "./cache-types";
import { MISS } from "./cache-types";

const logger = createLogger("ttl-cache");

interface TtlEntry<V> {
  readonly value: V;
  readonly expiresAt: number;
}

export class TtlCache<V> implements CacheEngine<V> {
  readonly type = "ttl" as const;
  private readonly store = new Map<string, TtlEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private expirations = 0;

  /**
   * @param ttlMs - Lifetime of each entry in milliseconds
   * @param now - Clock, defaults to Date.now (works with jest.setSystemTime())
   * @throws {Error} If ttlMs is not positive
   */
  constructor(ttlMs: number, now: () => number = () => Date.now()) {
    if (!(ttlMs > 0)) {
      throw new Error("TTL must be positive");
    }
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(key: string): CacheLookup<V> {
    const entry = this.store.get(key);

    if (!entry) {
      this.misses++;
      return MISS;
    }

    if (this.now() > entry.expiresAt) {
      this.store.delete(key);
      this.misses++;
      this.expirations++;
      logger.debug("Entry expired", { key });
      return MISS;
    }

    this.hits++;
    return { hit: true, value: entry.value };
  }

  put(key: string, value: V): void {
    this.store.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  snapshotMetrics(): CacheMetricsSnapshot {
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.store.size,
      evictions: 0,
      expirations: this.expirations,
    };
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}
