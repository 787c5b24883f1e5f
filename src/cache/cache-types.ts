/**
 * Shared types for the proxy-local cache engines.
 *
 * Both eviction policies implement {@link CacheEngine}; the proxy picks one at
 * construction time through createCacheEngine() and never looks at which.
 *
 * @module cache-types
 */

/**
 * Any JSON-compatible payload returned by the origin.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Eviction policy tag.
 */
export type CacheType = "ttl" | "lru";

/**
 * Result of a cache lookup.
 *
 * A miss is a normal outcome, not an error. The hit variant carries the value so
 * that a cached JSON null is still distinguishable from a miss.
 */
export type CacheLookup<V> =
  | { readonly hit: true; readonly value: V }
  | { readonly hit: false };

/**
 * Counters exposed by every engine.
 *
 * Fields:
 * - hits / misses: lookup outcomes (an expired read counts as a miss)
 * - size: entries currently stored
 * - evictions: entries removed to respect the LRU capacity bound
 * - expirations: expired entries removed on read (always 0 for LRU)
 */
export interface CacheMetricsSnapshot {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
  readonly evictions: number;
  readonly expirations: number;
}

/**
 * Capability interface implemented by TTL and LRU engines.
 */
export interface CacheEngine<V = JsonValue> {
  readonly type: CacheType;
  get(key: string): CacheLookup<V>;
  put(key: string, value: V): void;
  snapshotMetrics(): CacheMetricsSnapshot;
  keys(): string[];
}

/**
 * Construction options, tagged by policy.
 */
export type CacheEngineOptions =
  | { readonly type: "ttl"; readonly ttlMs: number; readonly now?: () => number }
  | { readonly type: "lru"; readonly capacity: number };

/**
 * Lookup result constant for misses.
 */
export const MISS: CacheLookup<never> = { hit: false };

/**
 * Narrow a parsed JSON value (from the wire or a data file) to JsonValue.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) {
    return true;
  }
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
