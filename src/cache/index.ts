/**
 * Proxy-local cache engines
 *
 * Two interchangeable eviction policies behind one capability interface:
 * - TtlCache: fixed lifetime per entry, lazy expiry on read
 * - LruCache: fixed entry count, least-recently-used eviction
 *
 * @module cache
 */

import type { CacheEngine, CacheEngineOptions } from "./cache-types";
import { LruCache } from "./lru-cache";
import { TtlCache } from "./ttl-cache";

export type {
  CacheEngine,
  CacheEngineOptions,
  CacheLookup,
  CacheMetricsSnapshot,
  CacheType,
  JsonValue,
} from "./cache-types";
export { isJsonValue, MISS } from "./cache-types";
export { LruCache } from "./lru-cache";
export { TtlCache } from "./ttl-cache";

/**
 * Build the engine selected by the options tag.
 *
 * @example
 * ```typescript
 * const cache = createCacheEngine<JsonValue>({ type: "lru", capacity: 3 });
 * ```
 */
export function createCacheEngine<V>(options: CacheEngineOptions): CacheEngine<V> {
  switch (options.type) {
    case "ttl":
      return new TtlCache<V>(options.ttlMs, options.now);
    case "lru":
      return new LruCache<V>(options.capacity);
  }
}
