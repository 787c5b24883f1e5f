/**
 * One-shot client for any cluster process.
 *
 * Sends `GET <path>` or `METRICS`, waits for the single reply line and returns
 * it as an object with the round-trip latency attached. Connection problems
 * are reported in-band as `CLIENT_CONNECTION_ERROR`.
 *
 * @module client
 */

import type { NodeAddress, Transport } from "./wire-protocol";
import {
  formatGetRequest,
  MalformedResponseError,
  METRICS_REQUEST,
  parseJsonObject,
  TransportError,
} from "./wire-protocol";

export type ClientRequest =
  | { readonly kind: "get"; readonly path: string }
  | { readonly kind: "metrics" };

export type ClientReply = Record<string, unknown> & { readonly latency_ms: number };

/**
 * Request line for a client request.
 */
export function buildRequestLine(request: ClientRequest): string {
  return request.kind === "metrics" ? METRICS_REQUEST : formatGetRequest(request.path);
}

/**
 * Send one request and return the parsed reply plus `latency_ms`.
 *
 * @param now - Clock in milliseconds; defaults to performance.now
 * @throws {Error} For failures other than transport or malformed replies
 */
export async function sendClientRequest(
  address: NodeAddress,
  request: ClientRequest,
  transport: Transport,
  now: () => number = () => performance.now()
): Promise<ClientReply> {
  const startedAt = now();
  let reply: Record<string, unknown>;

  try {
    const line = await transport.request(address, buildRequestLine(request));
    reply = parseJsonObject(line, "server");
  } catch (err) {
    if (err instanceof TransportError) {
      reply = { status: "CLIENT_CONNECTION_ERROR", data: null, error: err.message };
    } else if (err instanceof MalformedResponseError) {
      reply = { status: "MALFORMED_RESPONSE", data: err.reply };
    } else {
      throw err;
    }
  }

  return { ...reply, latency_ms: now() - startedAt };
}
