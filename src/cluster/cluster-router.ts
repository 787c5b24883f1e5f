/**
 * Request router for the load balancer.
 *
 * Picks one healthy proxy per client request. The strategy is fixed at
 * construction:
 * - ROUND_ROBIN: cursor over the full configured list; every inspected slot
 *   advances the cursor, unhealthy or excluded proxies are skipped, and at most
 *   one full wrap is made before giving up
 * - LEAST_LOADED: lowest last-known load among healthy proxies; ties go to the
 *   proxy listed first in configuration
 *
 * select() is synchronous and performs no I/O, so the cursor read and its
 * advance happen in one step: concurrent requests always consume distinct slots.
 *
 * @module cluster-router
 */

import type { ClusterHealth } from "./cluster-health";
import type { ProxyId, RoutingDecision } from "./cluster-types";
import { LoadBalanceStrategy } from "./cluster-types";

/**
 * Error thrown when no healthy proxy is left to route to.
 *
 * Terminal for the request: the load balancer answers `UNAVAILABLE`.
 */
export class NoHealthyProxyError extends Error {
  readonly code = "NO_HEALTHY_PROXY";
  readonly strategy: LoadBalanceStrategy;
  readonly excluded: readonly ProxyId[];

  constructor(strategy: LoadBalanceStrategy, excluded: readonly ProxyId[] = []) {
    super(
      excluded.length > 0
        ? `No healthy proxy available (excluding ${excluded.join(", ")})`
        : "No healthy proxy available"
    );
    this.name = "NoHealthyProxyError";
    this.strategy = strategy;
    this.excluded = excluded;

    Object.setPrototypeOf(this, NoHealthyProxyError.prototype);
  }
}

/**
 * Callbacks for routing events.
 *
 * Callbacks:
 * - onProxySelected: Called with every decision
 * - onRoutingFailed: Called before NoHealthyProxyError is thrown
 */
export interface RouterCallbacks {
  onProxySelected?: (decision: RoutingDecision) => void;
  onRoutingFailed?: (reason: string) => void;
}

/**
 * Strategy-driven proxy selector.
 *
 * Example:
 * ```typescript
 * const router = new ClusterRouter(LoadBalanceStrategy.ROUND_ROBIN, health);
 * const decision = router.select();
 * console.log(`Route to ${decision.proxyId}: ${decision.reason}`);
 * ```
 */
export class ClusterRouter {
  private readonly proxyIds: readonly ProxyId[];
  private cursor = 0;

  /**
   * @param strategy - Routing strategy for the life of the router
   * @param health - Registry providing health status and load per proxy
   * @param callbacks - Optional callbacks for routing events
   */
  constructor(
    private readonly strategy: LoadBalanceStrategy,
    private readonly health: ClusterHealth,
    private readonly callbacks?: RouterCallbacks
  ) {
    this.proxyIds = health.getProxyIds();
  }

  getStrategy(): LoadBalanceStrategy {
    return this.strategy;
  }

  /**
   * Current round-robin cursor: the number of slots inspected so far.
   */
  getCursor(): number {
    return this.cursor;
  }

  /**
   * Select a proxy for one request.
   *
   * @param exclude - Proxies to skip even if healthy (used for the single retry)
   * @throws {NoHealthyProxyError} If every proxy is unhealthy or excluded
   */
  select(exclude: ReadonlySet<ProxyId> = new Set()): RoutingDecision {
    let decision: RoutingDecision | undefined;

    switch (this.strategy) {
      case LoadBalanceStrategy.ROUND_ROBIN:
        decision = this.selectRoundRobin(exclude);
        break;

      case LoadBalanceStrategy.LEAST_LOADED:
        decision = this.selectLeastLoaded(exclude);
        break;
    }

    if (!decision) {
      const error = new NoHealthyProxyError(this.strategy, Array.from(exclude));
      this.safeCallback(() => this.callbacks?.onRoutingFailed?.(error.message));
      throw error;
    }

    const selected = decision;
    this.safeCallback(() => this.callbacks?.onProxySelected?.(selected));
    return selected;
  }

  private isEligible(proxyId: ProxyId, exclude: ReadonlySet<ProxyId>): boolean {
    return !exclude.has(proxyId) && this.health.isHealthy(proxyId);
  }

  /**
   * Round-robin over the configured list, advancing once per inspected slot.
   */
  private selectRoundRobin(exclude: ReadonlySet<ProxyId>): RoutingDecision | undefined {
    const count = this.proxyIds.length;

    for (let attempt = 0; attempt < count; attempt++) {
      const slot = this.cursor++;
      const proxyId = this.proxyIds[slot % count];
      if (this.isEligible(proxyId, exclude)) {
        return {
          proxyId,
          reason: `round-robin slot ${slot}`,
          slot,
        };
      }
    }

    return undefined;
  }

  /**
   * Least-loaded: strict comparison keeps the earliest proxy on ties.
   */
  private selectLeastLoaded(exclude: ReadonlySet<ProxyId>): RoutingDecision | undefined {
    let selected: ProxyId | undefined;
    let minLoad = Infinity;

    for (const proxyId of this.proxyIds) {
      if (!this.isEligible(proxyId, exclude)) {
        continue;
      }
      const load = this.health.getLoad(proxyId);
      if (selected === undefined || load < minLoad) {
        minLoad = load;
        selected = proxyId;
      }
    }

    if (selected === undefined) {
      return undefined;
    }

    return {
      proxyId: selected,
      reason: `least-loaded: ${minLoad} requests`,
    };
  }

  private safeCallback(fn: () => void): void {
    try {
      fn();
    } catch {
      // callback errors never affect routing
    }
  }
}
