/**
 * Load balancer cluster layer
 *
 * Proxy health tracking, routing strategies, background probing and the
 * client-facing load balancer service, plus configuration for every role.
 *
 * @module cluster
 */

export type {
  ProxyId,
  ProxyMetrics,
  ProxyRecord,
  RoutingDecision,
  HealthSummary,
  OriginConfig,
  ProxyConfig,
  BalancerConfig,
  HealthConfig,
  NetworkConfig,
  ClusterConfig,
  ClusterRole,
} from "./cluster-types";
export { NodeStatus, LoadBalanceStrategy } from "./cluster-types";

export * from "./cluster-config";
export * from "./cluster-health";
export * from "./cluster-router";
export * from "./cluster-prober";
export * from "./load-balancer";
