/**
 * Origin server: authoritative data over the line protocol.
 *
 * Replies:
 * - `{"status":"OK","data":<value>}` for a stored key
 * - `{"status":"NOT_FOUND","data":null}` for a missing or unreadable key
 * - `{"status":"WRONG_METHOD: <m>","data":null}` for methods other than GET
 * - `{"status":"BAD_REQUEST","data":null}` for anything unparseable, METRICS included
 *
 * @module origin-server
 */

import type * as net from "net";
import type { JsonValue } from "../cache";
import type { OriginConfig } from "../cluster/cluster-types";
import type { Logger } from "../structured-logger";
import { createLogger, toError } from "../structured-logger";
import type { NodeAddress } from "../wire-protocol";
import { closeServer, createLineServer, listen, parseRequestLine } from "../wire-protocol";
import type { OriginStore } from "./origin-store";
import { FileOriginStore } from "./origin-store";

export interface OriginReply {
  readonly status: string;
  readonly data: JsonValue;
}

export interface OriginServerOptions {
  readonly config: OriginConfig;
  /** Defaults to a FileOriginStore over `config.dataDir` */
  readonly store?: OriginStore;
  readonly logger?: Logger;
}

export class OriginServer {
  private readonly logger: Logger;
  private readonly store: OriginStore;
  private server: net.Server | null = null;

  constructor(private readonly options: OriginServerOptions) {
    this.logger = options.logger ?? createLogger("origin");
    this.store = options.store ?? new FileOriginStore(options.config.dataDir);
  }

  /**
   * Handle one request line and produce the reply object.
   */
  async handleRequest(line: string): Promise<OriginReply> {
    const request = parseRequestLine(line);

    switch (request.kind) {
      case "get":
        break;

      case "metrics":
        return { status: "BAD_REQUEST", data: null };

      case "invalid":
        this.logger.debug("Rejected request", { request: line, detail: request.detail });
        return { status: request.status, data: null };
    }

    try {
      const lookup = await this.store.get(request.resource, request.key);
      if (!lookup.found) {
        this.logger.debug("Key not found", { path: request.path });
        return { status: "NOT_FOUND", data: null };
      }
      return { status: "OK", data: lookup.data };
    } catch (err) {
      this.logger.error("Failed to load key", toError(err), { path: request.path });
      return { status: "NOT_FOUND", data: null };
    }
  }

  /**
   * @returns Bound address (the real port when configured with port 0)
   * @throws {Error} If already started or the port cannot be bound
   */
  async start(): Promise<NodeAddress> {
    if (this.server) {
      throw new Error("Origin server is already running");
    }

    const { host, port, dataDir } = this.options.config;
    const server = createLineServer(
      async (line) => JSON.stringify(await this.handleRequest(line)),
      this.logger
    );
    const address = await listen(server, port, host);
    this.server = server;

    this.logger.info("Origin listening", { host: address.host, port: address.port, dataDir });
    return address;
  }

  async stop(): Promise<void> {
    if (this.server) {
      const server = this.server;
      this.server = null;
      await closeServer(server);
      this.logger.info("Origin stopped");
    }
  }
}
