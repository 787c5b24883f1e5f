/**
 * Load balancer service: routes client reads across caching proxies.
 *
 * Ties together:
 * - ClusterHealth: per-proxy health and load
 * - ClusterRouter: strategy-driven selection
 * - HealthProber: background METRICS probes
 *
 * Request handling:
 * - `GET <resource>/<key>`: select a proxy, forward the line, relay the reply
 *   unchanged. A transport failure or malformed reply counts against the proxy
 *   and the request is retried once on another healthy proxy. With no proxy
 *   left the client gets `{"status":"UNAVAILABLE"}`.
 * - `METRICS`: best-effort fan-out to every proxy plus the balancer's own view.
 *
 * @module load-balancer
 */

import type * as net from "net";
import type { Logger } from "../structured-logger";
import { createLogger, generateRequestId, toError, withRequestId } from "../structured-logger";
import type { NodeAddress, Transport } from "../wire-protocol";
import {
  closeServer,
  createLineServer,
  formatGetRequest,
  listen,
  MalformedResponseError,
  METRICS_REQUEST,
  parseAddress,
  parseJsonObject,
  parseRequestLine,
  TcpTransport,
  TransportError,
} from "../wire-protocol";
import { ClusterConfigError } from "./cluster-config";
import { ClusterHealth } from "./cluster-health";
import { HealthProber } from "./cluster-prober";
import { ClusterRouter, NoHealthyProxyError } from "./cluster-router";
import type {
  BalancerConfig,
  HealthConfig,
  LoadBalanceStrategy,
  NodeStatus,
  ProxyId,
  ProxyMetrics,
} from "./cluster-types";

/**
 * Reply sent when no proxy can serve a request.
 */
export const UNAVAILABLE_REPLY = JSON.stringify({ status: "UNAVAILABLE" });

/**
 * Attempts per client GET: the first selection plus one retry.
 */
const MAX_ATTEMPTS = 2;

// ============================================================================
// Types
// ============================================================================

/**
 * Per-proxy health as reported in the balancer's METRICS reply.
 */
export interface ProxyHealthView {
  readonly status: NodeStatus;
  readonly consecutive_failures: number;
  readonly load: number;
  readonly last_probe_at: string | null;
  readonly last_error: string | null;
  /** Metrics from the last successful probe */
  readonly last_metrics: ProxyMetrics | null;
}

/**
 * The balancer's METRICS reply.
 */
export interface LoadBalancerMetrics {
  readonly proxies: Record<ProxyId, Record<string, unknown> | "unreachable">;
  readonly healthy_count: number;
  readonly unhealthy_count: number;
  readonly strategy: LoadBalanceStrategy;
  readonly cursor: number;
  readonly health: Record<ProxyId, ProxyHealthView>;
}

/**
 * Options for LoadBalancer.
 */
export interface LoadBalancerOptions {
  readonly balancer: BalancerConfig;
  readonly health: HealthConfig;
  readonly connectTimeoutMs: number;
  /**
   * Channel to proxies for requests and probes. Defaults to TCP bounded by
   * connectTimeoutMs; probes also get that long to reply.
   */
  readonly transport?: Transport;
  readonly logger?: Logger;
}

// ============================================================================
// LoadBalancer
// ============================================================================

/**
 * Client-facing load balancer.
 *
 * @example
 * ```typescript
 * const lb = new LoadBalancer({
 *   balancer: config.balancer,
 *   health: config.health,
 *   connectTimeoutMs: config.network.connectTimeoutMs,
 * });
 * const address = await lb.start();
 * // ...
 * await lb.stop();
 * ```
 */
export class LoadBalancer {
  private readonly logger: Logger;
  private readonly transport: Transport;
  private readonly health: ClusterHealth;
  private readonly router: ClusterRouter;
  private readonly prober: HealthProber;
  private server: net.Server | null = null;

  /**
   * @throws {ClusterConfigError} MISSING_PROXIES if the proxy list is empty
   */
  constructor(private readonly options: LoadBalancerOptions) {
    if (options.balancer.proxies.length === 0) {
      throw new ClusterConfigError(
        "MISSING_PROXIES",
        "Load balancer needs at least one proxy (--proxies or TIERCACHE_PROXIES)"
      );
    }

    this.logger = options.logger ?? createLogger("load-balancer");
    this.transport = options.transport ?? new TcpTransport(options.connectTimeoutMs);

    this.health = new ClusterHealth(options.balancer.proxies, {
      failureThreshold: options.health.failureThreshold,
      onStatusChange: (proxyId, oldStatus, newStatus, record) => {
        this.logger.warn("Proxy health changed", {
          proxyId,
          from: oldStatus,
          to: newStatus,
          consecutiveFailures: record.consecutiveFailures,
          lastError: record.lastError,
        });
      },
    });

    this.router = new ClusterRouter(options.balancer.strategy, this.health, {
      onProxySelected: (decision) => {
        this.logger.debug("Proxy selected", {
          proxyId: decision.proxyId,
          reason: decision.reason,
        });
      },
      onRoutingFailed: (reason) => {
        this.logger.warn("Routing failed", { reason });
      },
    });

    // A probe that never answers would stall every later round
    const probeTransport =
      options.transport ?? new TcpTransport(options.connectTimeoutMs, options.connectTimeoutMs);
    this.prober = new HealthProber(this.health, probeTransport, {
      probeIntervalMs: options.health.probeIntervalMs,
      logger: this.logger,
    });
  }

  getHealth(): ClusterHealth {
    return this.health;
  }

  getRouter(): ClusterRouter {
    return this.router;
  }

  getProber(): HealthProber {
    return this.prober;
  }

  /**
   * Handle one client request line and produce the reply line.
   */
  handleLine(line: string): Promise<string> {
    return withRequestId(generateRequestId(), async () => {
      const request = parseRequestLine(line);

      switch (request.kind) {
        case "get":
          return this.handleGet(request.path);

        case "metrics":
          return JSON.stringify(await this.handleMetrics());

        case "invalid":
          this.logger.debug("Rejected request", { request: line, detail: request.detail });
          return JSON.stringify({ status: request.status, data: null });
      }
    });
  }

  /**
   * Route a GET to a healthy proxy, retrying once on another proxy.
   *
   * Resolves with the proxy's reply line exactly as received, or the
   * UNAVAILABLE reply.
   */
  async handleGet(path: string): Promise<string> {
    const exclude = new Set<ProxyId>();

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      let proxyId: ProxyId;
      try {
        proxyId = this.router.select(exclude).proxyId;
      } catch (err) {
        if (err instanceof NoHealthyProxyError) {
          return UNAVAILABLE_REPLY;
        }
        throw err;
      }

      try {
        const reply = await this.transport.request(parseAddress(proxyId), formatGetRequest(path));
        parseJsonObject(reply, proxyId);
        this.health.recordSuccess(proxyId);
        return reply;
      } catch (err) {
        if (!(err instanceof TransportError || err instanceof MalformedResponseError)) {
          throw err;
        }
        this.health.recordFailure(proxyId, err);
        exclude.add(proxyId);
        this.logger.warn("Proxy request failed", {
          proxyId,
          path,
          attempt,
          code: err.code,
          error: err.message,
        });
      }
    }

    return UNAVAILABLE_REPLY;
  }

  /**
   * Collect every proxy's metrics concurrently plus the balancer's own view.
   *
   * Best-effort: an unreachable or malformed proxy is reported as
   * `"unreachable"` and does not affect its health.
   */
  async handleMetrics(): Promise<LoadBalancerMetrics> {
    const proxyIds = this.health.getProxyIds();

    const replies = await Promise.all(
      proxyIds.map(async (proxyId): Promise<[ProxyId, Record<string, unknown> | "unreachable"]> => {
        try {
          const reply = await this.transport.request(parseAddress(proxyId), METRICS_REQUEST);
          return [proxyId, parseJsonObject(reply, proxyId)];
        } catch (err) {
          this.logger.debug("Proxy metrics unavailable", {
            proxyId,
            error: toError(err).message,
          });
          return [proxyId, "unreachable"];
        }
      })
    );

    const health: Record<ProxyId, ProxyHealthView> = {};
    for (const record of this.health.getRecords()) {
      health[record.id] = {
        status: record.status,
        consecutive_failures: record.consecutiveFailures,
        load: record.load,
        last_probe_at: record.lastProbeAt > 0 ? new Date(record.lastProbeAt).toISOString() : null,
        last_error: record.lastError ?? null,
        last_metrics: record.lastMetrics ?? null,
      };
    }

    const summary = this.health.summary();

    return {
      proxies: Object.fromEntries(replies),
      healthy_count: summary.healthy,
      unhealthy_count: summary.unhealthy,
      strategy: this.router.getStrategy(),
      cursor: this.router.getCursor(),
      health,
    };
  }

  /**
   * Start serving clients and probing proxies.
   *
   * @returns Bound address (the real port when configured with port 0)
   * @throws {Error} If already started or the port cannot be bound
   */
  async start(): Promise<NodeAddress> {
    if (this.server) {
      throw new Error("Load balancer is already running");
    }

    const { host, port, strategy, proxies } = this.options.balancer;
    const server = createLineServer((line) => this.handleLine(line), this.logger);
    const address = await listen(server, port, host);
    this.server = server;
    this.prober.start();

    this.logger.info("Load balancer listening", {
      host: address.host,
      port: address.port,
      strategy,
      proxies,
      probeIntervalMs: this.options.health.probeIntervalMs,
    });

    return address;
  }

  /**
   * Stop probing and close the listening socket.
   */
  async stop(): Promise<void> {
    this.prober.stop();
    if (this.server) {
      const server = this.server;
      this.server = null;
      await closeServer(server);
      this.logger.info("Load balancer stopped");
    }
  }
}
