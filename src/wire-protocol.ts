/**
 * Line-delimited JSON wire protocol shared by origin, proxies and load balancer.
 *
 * One request = one UTF-8 line over a fresh TCP connection.
 * One response = one JSON object line, after which the connection closes.
 *
 * This module provides:
 * 1. parseRequestLine - `GET <resource>/<key>` and `METRICS` recognition
 * 2. sendRequest - one-shot client call returning the raw reply line
 * 3. Transport / TcpTransport - injectable request channel built on sendRequest
 * 4. createLineServer - accept loop handing each request line to a handler
 * 5. TransportError / MalformedResponseError - typed failures for health accounting
 *
 * @module wire-protocol
 */

import * as net from "net";
import type { Logger } from "./structured-logger";
import { toError } from "./structured-logger";

// ============================================================================
// Addresses
// ============================================================================

/**
 * Network address of any cluster process.
 */
export interface NodeAddress {
  readonly host: string;
  readonly port: number;
}

/**
 * Format an address as the `host:port` id used in logs and metrics.
 */
export function formatAddress(address: NodeAddress): string {
  return `${address.host}:${address.port}`;
}

/**
 * Parse `host:port` into an address.
 *
 * @throws {Error} If the port part is missing or not a valid TCP port
 */
export function parseAddress(value: string): NodeAddress {
  const trimmed = value.trim();
  const separator = trimmed.lastIndexOf(":");
  if (separator <= 0) {
    throw new Error(`Invalid address "${value}": expected host:port`);
  }

  const host = trimmed.slice(0, separator);
  const port = Number(trimmed.slice(separator + 1));
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid address "${value}": port must be 1-65535`);
  }

  return { host, port };
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Connection refused, reset, timed out, or closed before a reply arrived.
 *
 * Codes: the socket errno (ECONNREFUSED, ECONNRESET, ...), TIMEOUT, or
 * CONNECTION_CLOSED.
 */
export class TransportError extends Error {
  readonly code: string;
  readonly address: string;

  constructor(code: string, address: NodeAddress, message: string, cause?: Error) {
    super(`${formatAddress(address)}: ${message}`, { cause });
    this.name = "TransportError";
    this.code = code;
    this.address = formatAddress(address);

    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

/**
 * A reply line that is not a JSON object of the expected shape.
 */
export class MalformedResponseError extends Error {
  readonly code = "MALFORMED_RESPONSE";
  readonly source: string;
  readonly reply: string;

  constructor(source: string, reply: string, reason: string) {
    super(`Malformed response from ${source}: ${reason}`);
    this.name = "MalformedResponseError";
    this.source = source;
    this.reply = reply;

    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

// ============================================================================
// Request Parsing
// ============================================================================

/**
 * A parsed request line.
 *
 * `invalid` requests carry the status string the receiving server replies with.
 */
export type WireRequest =
  | { readonly kind: "get"; readonly path: string; readonly resource: string; readonly key: string }
  | { readonly kind: "metrics" }
  | { readonly kind: "invalid"; readonly status: string; readonly detail: string };

/**
 * Parse one request line.
 *
 * Accepts `GET resource/key` (a leading slash on the path is ignored) and
 * `METRICS`. A method other than GET yields `WRONG_METHOD: <method>`; anything
 * else unparseable yields `BAD_REQUEST`.
 */
export function parseRequestLine(line: string): WireRequest {
  const trimmed = line.trim();

  if (trimmed === "METRICS") {
    return { kind: "metrics" };
  }

  const parts = trimmed.split(/\s+/);
  if (parts.length !== 2 || parts[0] === "") {
    return {
      kind: "invalid",
      status: "BAD_REQUEST",
      detail: `expected "GET <resource>/<key>" or "METRICS", got "${trimmed}"`,
    };
  }

  const [method, url] = parts;
  if (method !== "GET") {
    return {
      kind: "invalid",
      status: `WRONG_METHOD: ${method}`,
      detail: `${method} is not supported`,
    };
  }

  const path = url.replace(/^\/+/, "");
  const slash = path.indexOf("/");
  const resource = slash > 0 ? path.slice(0, slash) : "";
  const key = slash > 0 ? path.slice(slash + 1) : "";
  if (!resource || !key) {
    return {
      kind: "invalid",
      status: "BAD_REQUEST",
      detail: `path must look like <resource>/<key>, got "${url}"`,
    };
  }

  return { kind: "get", path: `${resource}/${key}`, resource, key };
}

/**
 * Build a GET request line (without the trailing newline).
 */
export function formatGetRequest(path: string): string {
  return `GET ${path}`;
}

export const METRICS_REQUEST = "METRICS";

// ============================================================================
// Reply Parsing
// ============================================================================

/**
 * Narrow an unknown JSON value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a reply line that must hold a single JSON object.
 *
 * @param source - Who sent the reply, used in the error message
 * @throws {MalformedResponseError} If the line is not a JSON object
 */
export function parseJsonObject(line: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new MalformedResponseError(source, line, toError(err).message);
  }

  if (!isRecord(parsed)) {
    throw new MalformedResponseError(source, line, "reply is not a JSON object");
  }

  return parsed;
}

// ============================================================================
// Client Side
// ============================================================================

/**
 * Send one request line and wait for one reply line.
 *
 * Resolves with the reply line without its newline. A peer that closes after a
 * partial line still resolves with what arrived.
 *
 * `connectTimeoutMs` bounds only the connect. Once connected, the reply is
 * awaited for `replyTimeoutMs` of inactivity, or without limit when it is
 * omitted, so a slow upstream behind the peer never reads as a dead peer.
 *
 * @throws {TransportError} On connection errors, timeout, or an empty reply
 */
export function sendRequest(
  address: NodeAddress,
  line: string,
  connectTimeoutMs: number,
  replyTimeoutMs?: number
): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const socket = net.createConnection({ host: address.host, port: address.port });
    let buffer = "";
    let settled = false;

    const succeed = (reply: string): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(reply);
    };

    const fail = (error: TransportError): void => {
      if (settled) return;
      settled = true;
      socket.destroy();
      reject(error);
    };

    let connected = false;

    socket.setEncoding("utf8");
    socket.setTimeout(connectTimeoutMs);
    socket.on("timeout", () => {
      fail(
        connected
          ? new TransportError("TIMEOUT", address, `no reply within ${replyTimeoutMs}ms`)
          : new TransportError("TIMEOUT", address, `no connection within ${connectTimeoutMs}ms`)
      );
    });

    socket.on("connect", () => {
      connected = true;
      socket.setTimeout(replyTimeoutMs ?? 0);
      socket.write(line.endsWith("\n") ? line : `${line}\n`);
    });

    socket.on("data", (chunk: string) => {
      buffer += chunk;
      const newline = buffer.indexOf("\n");
      if (newline !== -1) {
        succeed(buffer.slice(0, newline));
      }
    });

    socket.on("end", () => {
      if (buffer.trim()) {
        succeed(buffer.trim());
      } else {
        fail(new TransportError("CONNECTION_CLOSED", address, "connection closed without a reply"));
      }
    });

    socket.on("error", (err: NodeJS.ErrnoException) => {
      fail(new TransportError(err.code ?? "SOCKET_ERROR", address, err.message, err));
    });

    socket.on("close", () => {
      fail(new TransportError("CONNECTION_CLOSED", address, "connection closed without a reply"));
    });
  });
}

/**
 * Request/response channel to another cluster process.
 *
 * The TCP implementation is used in production; tests substitute in-memory fakes.
 */
export interface Transport {
  request(address: NodeAddress, line: string): Promise<string>;
}

/**
 * Transport over a fresh TCP connection per request.
 *
 * @param replyTimeoutMs - Optional inactivity limit once connected
 */
export class TcpTransport implements Transport {
  constructor(
    private readonly connectTimeoutMs: number,
    private readonly replyTimeoutMs?: number
  ) {}

  request(address: NodeAddress, line: string): Promise<string> {
    return sendRequest(address, line, this.connectTimeoutMs, this.replyTimeoutMs);
  }
}

// ============================================================================
// Server Side
// ============================================================================

/**
 * Longest request line a server reads, newline excluded. Longer requests are
 * answered with `BAD_REQUEST` without reaching the handler.
 */
export const MAX_REQUEST_LINE_LENGTH = 8192;

/**
 * Turns one request line into one reply line (a serialized JSON object).
 */
export type LineHandler = (line: string) => Promise<string>;

/**
 * Create a TCP server that reads one line per connection, replies once and
 * closes. Each connection is handled independently of the others.
 *
 * A handler rejection is logged and answered with `INTERNAL_ERROR` so the
 * caller is never left waiting. A line over MAX_REQUEST_LINE_LENGTH gets
 * `BAD_REQUEST`.
 */
export function createLineServer(handler: LineHandler, logger: Logger): net.Server {
  return net.createServer({ allowHalfOpen: true }, (socket) => {
    let buffer = "";
    let handled = false;

    const respond = (line: string): void => {
      if (handled) return;
      handled = true;

      handler(line).then(
        (reply) => {
          socket.end(`${reply}\n`);
        },
        (err: unknown) => {
          logger.error("Request handler failed", toError(err), { request: line });
          socket.end(`${JSON.stringify({ status: "INTERNAL_ERROR", data: null })}\n`);
        }
      );
    };

    socket.setEncoding("utf8");

    const rejectOversized = (): void => {
      handled = true;
      buffer = "";
      logger.debug("Rejected oversized request line", { limit: MAX_REQUEST_LINE_LENGTH });
      socket.end(`${JSON.stringify({ status: "BAD_REQUEST", data: null })}\n`);
    };

    socket.on("data", (chunk: string) => {
      if (handled) return;
      buffer += chunk;
      const newline = buffer.indexOf("\n");
      const lineLength = newline === -1 ? buffer.length : newline;
      if (lineLength > MAX_REQUEST_LINE_LENGTH) {
        rejectOversized();
      } else if (newline !== -1) {
        respond(buffer.slice(0, newline));
      }
    });

    socket.on("end", () => {
      if (handled) return;
      if (buffer.trim()) {
        respond(buffer);
      } else {
        handled = true;
        socket.end();
      }
    });

    socket.on("error", (err) => {
      logger.debug("Client socket error", { error: err.message });
    });
  });
}

/**
 * Start listening and resolve with the bound address (useful with port 0).
 */
export function listen(server: net.Server, port: number, host: string): Promise<NodeAddress> {
  return new Promise<NodeAddress>((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };

    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const bound = server.address();
      if (bound === null || typeof bound === "string") {
        reject(new Error(`Server on ${host}:${port} did not bind to a TCP address`));
        return;
      }
      resolve({ host, port: bound.port });
    });
  });
}

/**
 * Stop accepting connections and resolve once the server has closed.
 */
export function closeServer(server: net.Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
