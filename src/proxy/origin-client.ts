/**
 * Client side of the origin protocol, as used by caching proxies.
 *
 * The origin is a black-box key→value store: `GET resource/key` yields `OK`
 * with data or `NOT_FOUND`. Anything else (unreachable origin, malformed reply,
 * an error status) is reported as ORIGIN_FAILURE so the proxy can answer
 * without caching.
 *
 * @module origin-client
 */

import type { JsonValue } from "../cache";
import { isJsonValue } from "../cache";
import { toError } from "../structured-logger";
import type { NodeAddress, Transport } from "../wire-protocol";
import {
  formatAddress,
  formatGetRequest,
  MalformedResponseError,
  parseJsonObject,
} from "../wire-protocol";

/**
 * Outcome of one origin fetch.
 */
export type OriginResult =
  | { readonly status: "OK"; readonly data: JsonValue }
  | { readonly status: "NOT_FOUND" }
  | { readonly status: "ORIGIN_FAILURE"; readonly error: Error };

/**
 * Fetches authoritative values on cache misses.
 */
export interface OriginClient {
  /**
   * @param path - `resource/key`
   */
  fetch(path: string): Promise<OriginResult>;
}

/**
 * Origin client over the line protocol. Never rejects.
 */
export class TcpOriginClient implements OriginClient {
  private readonly source: string;

  constructor(
    private readonly address: NodeAddress,
    private readonly transport: Transport
  ) {
    this.source = `origin ${formatAddress(address)}`;
  }

  async fetch(path: string): Promise<OriginResult> {
    let reply: string;
    try {
      reply = await this.transport.request(this.address, formatGetRequest(path));
    } catch (err) {
      return { status: "ORIGIN_FAILURE", error: toError(err) };
    }

    try {
      return this.parseReply(reply);
    } catch (err) {
      return { status: "ORIGIN_FAILURE", error: toError(err) };
    }
  }

  private parseReply(reply: string): OriginResult {
    const parsed = parseJsonObject(reply, this.source);

    switch (parsed.status) {
      case "OK": {
        const data = parsed.data;
        if (!isJsonValue(data)) {
          throw new MalformedResponseError(this.source, reply, "data is not a JSON value");
        }
        return { status: "OK", data };
      }

      case "NOT_FOUND":
        return { status: "NOT_FOUND" };

      default:
        return {
          status: "ORIGIN_FAILURE",
          error: new Error(`${this.source} replied with status ${String(parsed.status)}`),
        };
    }
  }
}
