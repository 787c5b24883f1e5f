/**
 * TypeScript types and interfaces for the tiercache cluster.
 *
 * This module defines the core data structures for:
 * - Proxy health tracking
 * - Load balancing strategies and routing decisions
 * - Proxy and cluster metrics as they appear on the wire
 * - Cluster configuration for every process role
 *
 * @module cluster-types
 */

import type { CacheType } from "../cache/cache-types";

/**
 * Identifier of a proxy in the load balancer: its `host:port` address.
 */
export type ProxyId = string;

/**
 * Health of a proxy as seen by the load balancer.
 *
 * States:
 * - HEALTHY: eligible for routing
 * - UNHEALTHY: failed `failureThreshold` times in a row, skipped by the router
 *   until one probe or request succeeds
 */
export enum NodeStatus {
  HEALTHY = "healthy",
  UNHEALTHY = "unhealthy",
}

/**
 * Strategy for distributing requests across proxies. Fixed at startup.
 *
 * Strategies:
 * - ROUND_ROBIN: rotate through the configured list, skipping unhealthy proxies
 * - LEAST_LOADED: lowest last-probed load, ties to the earliest configured proxy
 */
export enum LoadBalanceStrategy {
  ROUND_ROBIN = "round_robin",
  LEAST_LOADED = "least_loaded",
}

/**
 * Metrics reported by a proxy's `METRICS` reply.
 *
 * The first four fields are the required core; the rest are informational.
 */
export interface ProxyMetrics {
  readonly hits: number;
  readonly misses: number;
  readonly requests: number;
  readonly origin_fetches: number;
  readonly size?: number;
  readonly evictions?: number;
  readonly expirations?: number;
  readonly hit_rate?: number;
  readonly cache_type?: CacheType;
  readonly start_time?: string;
}

/**
 * Snapshot of what the load balancer knows about one proxy.
 *
 * Fields:
 * - id / host / port: static address from configuration
 * - status: current health
 * - consecutiveFailures: failures since the last success
 * - load: last-known load metric (the proxy's total request count)
 * - lastProbeAt: time of the last successful probe (ms since epoch), 0 if none
 * - lastMetrics: metrics from the last successful probe
 * - lastError: message of the most recent failure
 */
export interface ProxyRecord {
  readonly id: ProxyId;
  readonly host: string;
  readonly port: number;
  readonly status: NodeStatus;
  readonly consecutiveFailures: number;
  readonly load: number;
  readonly lastProbeAt: number;
  readonly lastMetrics?: ProxyMetrics;
  readonly lastError?: string;
}

/**
 * Routing decision made by the router.
 *
 * Fields:
 * - proxyId: proxy selected for this request
 * - reason: human-readable explanation, for debug logs
 * - slot: round-robin cursor value consumed by this decision (round-robin only)
 */
export interface RoutingDecision {
  readonly proxyId: ProxyId;
  readonly reason: string;
  readonly slot?: number;
}

/**
 * Healthy/unhealthy proxy counts.
 */
export interface HealthSummary {
  readonly healthy: number;
  readonly unhealthy: number;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Origin server settings.
 */
export interface OriginConfig {
  readonly host: string;
  readonly port: number;
  readonly dataDir: string;
}

/**
 * Caching proxy settings.
 *
 * Fields:
 * - origin: `host:port` of the origin server
 * - cacheType: eviction policy
 * - ttlSec: entry lifetime for the TTL policy
 * - lruCapacity: maximum entries for the LRU policy
 */
export interface ProxyConfig {
  readonly host: string;
  readonly port: number;
  readonly origin: string;
  readonly cacheType: CacheType;
  readonly ttlSec: number;
  readonly lruCapacity: number;
}

/**
 * Load balancer settings.
 *
 * Fields:
 * - proxies: static `host:port` list, in routing order
 * - strategy: routing strategy
 */
export interface BalancerConfig {
  readonly host: string;
  readonly port: number;
  readonly proxies: readonly string[];
  readonly strategy: LoadBalanceStrategy;
}

/**
 * Health tracking settings.
 *
 * Fields:
 * - failureThreshold: consecutive failures before a proxy is marked unhealthy
 * - probeIntervalMs: delay between background probe rounds
 */
export interface HealthConfig {
  readonly failureThreshold: number;
  readonly probeIntervalMs: number;
}

/**
 * Transport settings shared by every outgoing connection.
 */
export interface NetworkConfig {
  readonly connectTimeoutMs: number;
}

/**
 * Complete configuration for every tiercache process role.
 */
export interface ClusterConfig {
  readonly origin: OriginConfig;
  readonly proxy: ProxyConfig;
  readonly balancer: BalancerConfig;
  readonly health: HealthConfig;
  readonly network: NetworkConfig;
}

/**
 * Process roles started by the CLI.
 */
export type ClusterRole = "origin" | "proxy" | "balancer";
