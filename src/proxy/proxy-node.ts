/**
 * Caching proxy process: a ProxyService behind a line server.
 *
 * @module proxy-node
 */

import type * as net from "net";
import { createCacheEngine } from "../cache";
import type { CacheEngineOptions, JsonValue } from "../cache";
import type { NetworkConfig, ProxyConfig } from "../cluster/cluster-types";
import type { Logger } from "../structured-logger";
import { createLogger } from "../structured-logger";
import type { NodeAddress, Transport } from "../wire-protocol";
import { closeServer, createLineServer, listen, parseAddress, TcpTransport } from "../wire-protocol";
import type { OriginClient } from "./origin-client";
import { TcpOriginClient } from "./origin-client";
import { ProxyService } from "./proxy-service";

export interface ProxyNodeOptions {
  readonly proxy: ProxyConfig;
  readonly network: NetworkConfig;
  /** Overrides the TCP origin client built from `proxy.origin` */
  readonly origin?: OriginClient;
  readonly transport?: Transport;
  readonly logger?: Logger;
}

/**
 * Map proxy settings to cache engine options.
 */
export function cacheOptionsFor(config: ProxyConfig): CacheEngineOptions {
  switch (config.cacheType) {
    case "ttl":
      return { type: "ttl", ttlMs: config.ttlSec * 1000 };
    case "lru":
      return { type: "lru", capacity: config.lruCapacity };
  }
}

export class ProxyNode {
  private readonly logger: Logger;
  private readonly service: ProxyService;
  private server: net.Server | null = null;

  constructor(private readonly options: ProxyNodeOptions) {
    this.logger = options.logger ?? createLogger("proxy");

    const origin =
      options.origin ??
      new TcpOriginClient(
        parseAddress(options.proxy.origin),
        options.transport ?? new TcpTransport(options.network.connectTimeoutMs)
      );

    this.service = new ProxyService({
      cache: createCacheEngine<JsonValue>(cacheOptionsFor(options.proxy)),
      origin,
      nodePort: options.proxy.port,
      logger: this.logger,
    });
  }

  getService(): ProxyService {
    return this.service;
  }

  /**
   * @returns Bound address (the real port when configured with port 0)
   * @throws {Error} If already started or the port cannot be bound
   */
  async start(): Promise<NodeAddress> {
    if (this.server) {
      throw new Error("Proxy is already running");
    }

    const { host, port, origin, cacheType, ttlSec, lruCapacity } = this.options.proxy;
    const server = createLineServer((line) => this.service.handleLine(line), this.logger);
    const address = await listen(server, port, host);
    this.server = server;
    this.service.setNodePort(address.port);

    this.logger.info("Proxy listening", {
      host: address.host,
      port: address.port,
      origin,
      cacheType,
      ...(cacheType === "ttl" ? { ttlSec } : { lruCapacity }),
    });

    return address;
  }

  async stop(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await closeServer(server);
      this.logger.info("Proxy stopped");
    }
  }
}
