/**
 * In-memory Transport for unit tests: each port maps to a responder.
 * Unmapped ports fail like a refused connection.
 */

import { TransportError } from "../../src/wire-protocol";
import type { NodeAddress, Transport } from "../../src/wire-protocol";

export type Responder = (line: string) => Promise<string>;

export class FakeTransport implements Transport {
  readonly calls: Array<{ port: number; line: string }> = [];

  constructor(readonly responders: Map<number, Responder> = new Map()) {}

  request(address: NodeAddress, line: string): Promise<string> {
    this.calls.push({ port: address.port, line });
    const responder = this.responders.get(address.port);
    if (!responder) {
      return Promise.reject(new TransportError("ECONNREFUSED", address, "connection refused"));
    }
    return responder(line);
  }
}

export function reply(value: unknown): Responder {
  return async () => JSON.stringify(value);
}

export function metricsReply(requests: number): Responder {
  return reply({ hits: 1, misses: 2, requests, origin_fetches: 2, cache_type: "lru" });
}

export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 50; i++) {
    await Promise.resolve();
  }
}
