/**
 * Background health prober for the load balancer.
 *
 * Every `probeIntervalMs` the prober sends `METRICS` to every configured proxy,
 * healthy or not, so unhealthy proxies get a chance to recover:
 * - a reply with numeric counters records a success and refreshes the proxy's
 *   load metric (its reported `requests` total)
 * - a transport failure, malformed reply, or reply without the counters records
 *   a failure
 *
 * Uses recursive setTimeout (not setInterval) so rounds never overlap.
 *
 * @module cluster-prober
 */

import type { Logger } from "../structured-logger";
import { createLogger, toError } from "../structured-logger";
import type { Transport } from "../wire-protocol";
import {
  MalformedResponseError,
  METRICS_REQUEST,
  parseAddress,
  parseJsonObject,
} from "../wire-protocol";
import type { ClusterHealth } from "./cluster-health";
import type { ProxyId, ProxyMetrics } from "./cluster-types";

// ============================================================================
// Metrics Parsing
// ============================================================================

const REQUIRED_COUNTERS = ["hits", "misses", "requests", "origin_fetches"] as const;

function readCounter(metrics: Record<string, unknown>, field: string): number | undefined {
  const value = metrics[field];
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Parse a proxy's METRICS reply.
 *
 * @param source - Proxy id, used in error messages
 * @throws {MalformedResponseError} If the reply is not a JSON object or a core counter is missing
 */
export function parseProxyMetrics(reply: string, source: string): ProxyMetrics {
  const parsed = parseJsonObject(reply, source);

  for (const field of REQUIRED_COUNTERS) {
    if (readCounter(parsed, field) === undefined) {
      throw new MalformedResponseError(source, reply, `missing numeric "${field}"`);
    }
  }

  const cacheType = parsed["cache_type"];
  const startTime = parsed["start_time"];

  return {
    hits: readCounter(parsed, "hits") ?? 0,
    misses: readCounter(parsed, "misses") ?? 0,
    requests: readCounter(parsed, "requests") ?? 0,
    origin_fetches: readCounter(parsed, "origin_fetches") ?? 0,
    size: readCounter(parsed, "size"),
    evictions: readCounter(parsed, "evictions"),
    expirations: readCounter(parsed, "expirations"),
    hit_rate: readCounter(parsed, "hit_rate"),
    cache_type: cacheType === "ttl" || cacheType === "lru" ? cacheType : undefined,
    start_time: typeof startTime === "string" ? startTime : undefined,
  };
}

// ============================================================================
// HealthProber
// ============================================================================

/**
 * Options for HealthProber.
 */
export interface HealthProberOptions {
  readonly probeIntervalMs: number;
  readonly logger?: Logger;
}

/**
 * Periodic METRICS prober feeding ClusterHealth.
 *
 * @example
 * ```typescript
 * const prober = new HealthProber(health, new TcpTransport(2000, 2000), { probeIntervalMs: 2000 });
 * prober.start();
 * // ...
 * prober.stop();
 * ```
 */
export class HealthProber {
  private readonly logger: Logger;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  // Bumped by start(); a round from an earlier loop schedules nothing
  private generation = 0;

  constructor(
    private readonly health: ClusterHealth,
    private readonly transport: Transport,
    private readonly options: HealthProberOptions
  ) {
    this.logger = options.logger ?? createLogger("cluster-prober");
  }

  /**
   * Start the probe loop. The first round runs immediately.
   *
   * @throws {Error} If the prober is already running
   */
  start(): void {
    if (this.running) {
      throw new Error("Health prober is already running");
    }

    this.running = true;
    this.generation++;
    this.schedule(0, this.generation);
  }

  /**
   * Stop the probe loop. A round already in flight finishes but schedules nothing.
   */
  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Probe every configured proxy once, concurrently.
   *
   * Never rejects: every outcome is recorded in the health registry.
   */
  async probeOnce(): Promise<void> {
    await Promise.all(this.health.getProxyIds().map((proxyId) => this.probeProxy(proxyId)));
  }

  private schedule(delayMs: number, generation: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.probeOnce()
        .catch((err: unknown) => {
          this.logger.error("Probe round failed", toError(err));
        })
        .finally(() => {
          if (this.running && this.generation === generation) {
            this.schedule(this.options.probeIntervalMs, generation);
          }
        });
    }, delayMs);
  }

  private async probeProxy(proxyId: ProxyId): Promise<void> {
    try {
      const reply = await this.transport.request(parseAddress(proxyId), METRICS_REQUEST);
      const metrics = parseProxyMetrics(reply, proxyId);
      this.health.recordSuccess(proxyId);
      this.health.updateLoad(proxyId, metrics.requests, metrics);
      this.logger.debug("Probe succeeded", { proxyId, load: metrics.requests });
    } catch (err) {
      const error = toError(err);
      this.health.recordFailure(proxyId, error);
      this.logger.debug("Probe failed", { proxyId, error: error.message });
    }
  }
}
