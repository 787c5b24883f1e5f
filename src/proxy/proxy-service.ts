/**
 * Caching proxy request handling.
 *
 * Read-through flow for `GET resource/key`:
 * 1. Cache hit → reply with the cached value (`cache_hit: true`)
 * 2. Miss → fetch from the origin
 *    - OK: store in the cache, reply (`cache_hit: false`)
 *    - NOT_FOUND: reply, nothing cached
 *    - ORIGIN_FAILURE: reply, nothing cached
 *
 * The cache engine is the only state shared between connections. Its get/put
 * are synchronous, so the origin fetch is the only point where another request
 * can interleave.
 *
 * @module proxy-service
 */

import type { CacheEngine, JsonValue } from "../cache";
import type { ProxyMetrics } from "../cluster/cluster-types";
import type { Logger } from "../structured-logger";
import { createLogger } from "../structured-logger";
import { parseRequestLine } from "../wire-protocol";
import type { OriginClient } from "./origin-client";

/**
 * Reply to a proxied GET.
 *
 * `node` is the proxy's listening port, so clients can see which proxy served them.
 */
export interface ProxyGetReply {
  readonly status: string;
  readonly data: JsonValue;
  readonly cache_hit: boolean;
  readonly node: number;
}

/**
 * Reply to a proxy METRICS request: every field is filled in.
 */
export type ProxyMetricsReply = Required<ProxyMetrics>;

export interface ProxyServiceOptions {
  readonly cache: CacheEngine;
  readonly origin: OriginClient;
  /** Listening port reported as `node`; updated once the server is bound */
  readonly nodePort?: number;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export class ProxyService {
  private readonly cache: CacheEngine;
  private readonly origin: OriginClient;
  private readonly logger: Logger;
  private readonly startTime: Date;
  private nodePort: number;
  private requests = 0;
  private originFetches = 0;

  constructor(options: ProxyServiceOptions) {
    this.cache = options.cache;
    this.origin = options.origin;
    this.nodePort = options.nodePort ?? 0;
    this.logger = options.logger ?? createLogger("proxy-service");
    this.startTime = options.now ? options.now() : new Date();
  }

  setNodePort(port: number): void {
    this.nodePort = port;
  }

  /**
   * Serve one read through the cache.
   *
   * @param path - `resource/key`, used verbatim as the cache key
   */
  async handleGet(path: string): Promise<ProxyGetReply> {
    this.requests++;

    const cached = this.cache.get(path);
    if (cached.hit) {
      this.logger.debug("Cache hit", { key: path });
      return { status: "OK", data: cached.value, cache_hit: true, node: this.nodePort };
    }

    this.originFetches++;
    const result = await this.origin.fetch(path);

    switch (result.status) {
      case "OK":
        this.cache.put(path, result.data);
        this.logger.debug("Cache fill", { key: path });
        return { status: "OK", data: result.data, cache_hit: false, node: this.nodePort };

      case "NOT_FOUND":
        return { status: "NOT_FOUND", data: null, cache_hit: false, node: this.nodePort };

      case "ORIGIN_FAILURE":
        this.logger.warn("Origin fetch failed", { key: path, error: result.error.message });
        return { status: "ORIGIN_FAILURE", data: null, cache_hit: false, node: this.nodePort };
    }
  }

  /**
   * Snapshot of request counters and cache metrics.
   */
  handleMetrics(): ProxyMetricsReply {
    const cache = this.cache.snapshotMetrics();
    const lookups = cache.hits + cache.misses;

    return {
      hits: cache.hits,
      misses: cache.misses,
      requests: this.requests,
      origin_fetches: this.originFetches,
      size: cache.size,
      evictions: cache.evictions,
      expirations: cache.expirations,
      hit_rate: lookups === 0 ? 0 : cache.hits / lookups,
      cache_type: this.cache.type,
      start_time: this.startTime.toISOString(),
    };
  }

  /**
   * Handle one request line and produce the reply line.
   */
  async handleLine(line: string): Promise<string> {
    const request = parseRequestLine(line);

    switch (request.kind) {
      case "get":
        return JSON.stringify(await this.handleGet(request.path));

      case "metrics":
        return JSON.stringify(this.handleMetrics());

      case "invalid": {
        this.logger.debug("Rejected request", { request: line, detail: request.detail });
        const reply: ProxyGetReply = {
          status: request.status,
          data: null,
          cache_hit: false,
          node: this.nodePort,
        };
        return JSON.stringify(reply);
      }
    }
  }
}
