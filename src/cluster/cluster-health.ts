/**
 * Proxy registry and health tracking for the load balancer.
 *
 * This module provides:
 * 1. ProxyHealthTracker - Per-proxy consecutive-failure state machine
 * 2. ClusterHealth - Registry of every configured proxy with status-change callbacks
 * 3. UnknownProxyError - Raised for ids outside the configured list
 *
 * State machine:
 * - HEALTHY → UNHEALTHY once consecutive failures reach `failureThreshold`
 * - UNHEALTHY → HEALTHY on a single success (counter resets to zero)
 *
 * Every method is synchronous, so each update is atomic with respect to other
 * in-flight requests and probes on the event loop. The probe loop itself lives
 * in cluster-prober.ts.
 *
 * @module cluster-health
 */

import { createLogger, toError } from "../structured-logger";
import { formatAddress, parseAddress } from "../wire-protocol";
import type { HealthSummary, ProxyId, ProxyMetrics, ProxyRecord } from "./cluster-types";
import { NodeStatus } from "./cluster-types";

const logger = createLogger("cluster-health");

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Error thrown when a proxy id is not part of the configured list.
 */
export class UnknownProxyError extends Error {
  readonly code = "UNKNOWN_PROXY";
  readonly proxyId: string;

  constructor(proxyId: string) {
    super(`Unknown proxy: ${proxyId}`);
    this.name = "UnknownProxyError";
    this.proxyId = proxyId;

    Object.setPrototypeOf(this, UnknownProxyError.prototype);
  }
}

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Callback invoked when a proxy changes health status.
 *
 * @param proxyId - Proxy whose status changed
 * @param oldStatus - Previous status
 * @param newStatus - New status
 * @param record - Record after the change
 */
export type HealthCallback = (
  proxyId: ProxyId,
  oldStatus: NodeStatus,
  newStatus: NodeStatus,
  record: ProxyRecord
) => void;

/**
 * Options for ClusterHealth.
 */
export interface ClusterHealthOptions {
  readonly failureThreshold: number;
  readonly onStatusChange?: HealthCallback;
  /** Clock for probe timestamps; defaults to Date.now */
  readonly now?: () => number;
}

// ============================================================================
// ProxyHealthTracker
// ============================================================================

/**
 * Health state of a single proxy.
 *
 * @example
 * ```typescript
 * const tracker = new ProxyHealthTracker('127.0.0.1:8001', 3);
 * tracker.recordFailure(new Error('ECONNREFUSED'));
 * tracker.getStatus(); // HEALTHY (1 of 3)
 * ```
 */
export class ProxyHealthTracker {
  private readonly host: string;
  private readonly port: number;
  private status: NodeStatus = NodeStatus.HEALTHY;
  private consecutiveFailures = 0;
  private load = 0;
  private lastProbeAt = 0;
  private lastMetrics?: ProxyMetrics;
  private lastError?: string;

  constructor(
    readonly proxyId: ProxyId,
    private readonly failureThreshold: number
  ) {
    const address = parseAddress(proxyId);
    this.host = address.host;
    this.port = address.port;
  }

  getStatus(): NodeStatus {
    return this.status;
  }

  getLoad(): number {
    return this.load;
  }

  /**
   * Record a successful request or probe. Always leaves the proxy HEALTHY.
   */
  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.status = NodeStatus.HEALTHY;
  }

  /**
   * Record a failed request or probe.
   */
  recordFailure(error?: Error): void {
    this.consecutiveFailures++;
    if (error) {
      this.lastError = error.message;
    }
    if (this.consecutiveFailures >= this.failureThreshold) {
      this.status = NodeStatus.UNHEALTHY;
    }
  }

  /**
   * Store the load metric and metrics snapshot from a successful probe.
   */
  updateLoad(load: number, metrics: ProxyMetrics | undefined, probedAt: number): void {
    this.load = load;
    this.lastMetrics = metrics;
    this.lastProbeAt = probedAt;
  }

  toRecord(): ProxyRecord {
    return {
      id: this.proxyId,
      host: this.host,
      port: this.port,
      status: this.status,
      consecutiveFailures: this.consecutiveFailures,
      load: this.load,
      lastProbeAt: this.lastProbeAt,
      lastMetrics: this.lastMetrics,
      lastError: this.lastError,
    };
  }
}

// ============================================================================
// ClusterHealth
// ============================================================================

/**
 * Registry of every configured proxy and its health.
 *
 * Created once from the static proxy list; records are never added or removed
 * during a run. Every proxy starts HEALTHY.
 *
 * @example
 * ```typescript
 * const health = new ClusterHealth(['127.0.0.1:8001', '127.0.0.1:8002'], {
 *   failureThreshold: 3,
 *   onStatusChange: (id, from, to) => console.log(id, from, '->', to),
 * });
 * health.recordFailure('127.0.0.1:8001');
 * health.listHealthy(); // both, until the third failure
 * ```
 */
export class ClusterHealth {
  private readonly trackers: Map<ProxyId, ProxyHealthTracker>;
  private readonly statusCallbacks: Map<string, HealthCallback>;
  private readonly now: () => number;

  /**
   * @throws {Error} If an id is not a valid `host:port` address or the threshold is not positive
   */
  constructor(proxyIds: readonly string[], options: ClusterHealthOptions) {
    if (!Number.isInteger(options.failureThreshold) || options.failureThreshold < 1) {
      throw new Error("failureThreshold must be a positive integer");
    }

    this.trackers = new Map();
    this.statusCallbacks = new Map();
    this.now = options.now ?? (() => Date.now());

    for (const proxyId of proxyIds) {
      const id = formatAddress(parseAddress(proxyId));
      if (!this.trackers.has(id)) {
        this.trackers.set(id, new ProxyHealthTracker(id, options.failureThreshold));
      }
    }

    if (options.onStatusChange) {
      this.statusCallbacks.set("default", options.onStatusChange);
    }
  }

  /**
   * Proxy ids in configuration order.
   */
  getProxyIds(): ProxyId[] {
    return Array.from(this.trackers.keys());
  }

  /**
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  isHealthy(proxyId: ProxyId): boolean {
    return this.getTracker(proxyId).getStatus() === NodeStatus.HEALTHY;
  }

  /**
   * Healthy proxy ids in configuration order.
   */
  listHealthy(): ProxyId[] {
    return Array.from(this.trackers.values())
      .filter((tracker) => tracker.getStatus() === NodeStatus.HEALTHY)
      .map((tracker) => tracker.proxyId);
  }

  /**
   * Last-known load metric of a proxy (0 until the first successful probe).
   *
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  getLoad(proxyId: ProxyId): number {
    return this.getTracker(proxyId).getLoad();
  }

  /**
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  recordSuccess(proxyId: ProxyId): void {
    const tracker = this.getTracker(proxyId);
    const oldStatus = tracker.getStatus();
    tracker.recordSuccess();
    this.notifyIfChanged(tracker, oldStatus);
  }

  /**
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  recordFailure(proxyId: ProxyId, error?: Error): void {
    const tracker = this.getTracker(proxyId);
    const oldStatus = tracker.getStatus();
    tracker.recordFailure(error);
    this.notifyIfChanged(tracker, oldStatus);
  }

  /**
   * Refresh a proxy's load metric after a successful probe.
   *
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  updateLoad(proxyId: ProxyId, load: number, metrics?: ProxyMetrics): void {
    this.getTracker(proxyId).updateLoad(load, metrics, this.now());
  }

  /**
   * @throws {UnknownProxyError} If the proxy is not configured
   */
  getRecord(proxyId: ProxyId): ProxyRecord {
    return this.getTracker(proxyId).toRecord();
  }

  /**
   * Snapshot of every proxy record, in configuration order.
   */
  getRecords(): ProxyRecord[] {
    return Array.from(this.trackers.values()).map((tracker) => tracker.toRecord());
  }

  summary(): HealthSummary {
    let healthy = 0;
    let unhealthy = 0;
    for (const tracker of this.trackers.values()) {
      if (tracker.getStatus() === NodeStatus.HEALTHY) {
        healthy++;
      } else {
        unhealthy++;
      }
    }
    return { healthy, unhealthy };
  }

  /**
   * Register a callback for health status changes.
   */
  onHealthChange(callbackId: string, callback: HealthCallback): void {
    this.statusCallbacks.set(callbackId, callback);
  }

  removeHealthCallback(callbackId: string): void {
    this.statusCallbacks.delete(callbackId);
  }

  private getTracker(proxyId: ProxyId): ProxyHealthTracker {
    const tracker = this.trackers.get(proxyId);
    if (!tracker) {
      throw new UnknownProxyError(proxyId);
    }
    return tracker;
  }

  private notifyIfChanged(tracker: ProxyHealthTracker, oldStatus: NodeStatus): void {
    const newStatus = tracker.getStatus();
    if (oldStatus === newStatus) {
      return;
    }

    const record = tracker.toRecord();
    for (const callback of this.statusCallbacks.values()) {
      try {
        callback(tracker.proxyId, oldStatus, newStatus, record);
      } catch (err) {
        // one failing callback must not block the others
        logger.error("Health callback error", toError(err), { proxyId: tracker.proxyId });
      }
    }
  }
}
