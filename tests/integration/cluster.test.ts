/**
 * End-to-end test of an origin, two caching proxies and a load balancer on
 * loopback sockets, driven through the client.
 */

import { sendClientRequest } from "../../src/client";
import { LoadBalanceStrategy } from "../../src/cluster/cluster-types";
import { LoadBalancer } from "../../src/cluster/load-balancer";
import { MemoryOriginStore } from "../../src/origin/origin-store";
import { OriginServer } from "../../src/origin/origin-server";
import { ProxyNode } from "../../src/proxy/proxy-node";
import type { NodeAddress } from "../../src/wire-protocol";
import { formatAddress, TcpTransport } from "../../src/wire-protocol";

const HOST = "127.0.0.1";
const transport = new TcpTransport(1000);

let stdout: jest.SpyInstance;
let origin: OriginServer;
let proxyA: ProxyNode;
let proxyB: ProxyNode;
let balancer: LoadBalancer;
let addressA: NodeAddress;
let addressB: NodeAddress;
let balancerAddress: NodeAddress;

function createProxy(originAddress: NodeAddress): ProxyNode {
  return new ProxyNode({
    proxy: {
      host: HOST,
      port: 0,
      origin: formatAddress(originAddress),
      cacheType: "lru",
      ttlSec: 30,
      lruCapacity: 10,
    },
    network: { connectTimeoutMs: 1000 },
  });
}

function get(path: string) {
  return sendClientRequest(balancerAddress, { kind: "get", path }, transport);
}

beforeAll(async () => {
  stdout = jest.spyOn(process.stdout, "write").mockImplementation(() => true);

  origin = new OriginServer({
    config: { host: HOST, port: 0, dataDir: "unused" },
    store: new MemoryOriginStore({ "users/1": { name: "Ada" } }),
  });
  const originAddress = await origin.start();

  proxyA = createProxy(originAddress);
  proxyB = createProxy(originAddress);
  addressA = await proxyA.start();
  addressB = await proxyB.start();

  balancer = new LoadBalancer({
    balancer: {
      host: HOST,
      port: 0,
      proxies: [formatAddress(addressA), formatAddress(addressB)],
      strategy: LoadBalanceStrategy.ROUND_ROBIN,
    },
    health: { failureThreshold: 3, probeIntervalMs: 60_000 },
    connectTimeoutMs: 1000,
  });
  balancerAddress = await balancer.start();
});

afterAll(async () => {
  await balancer.stop();
  await proxyA.stop();
  await proxyB.stop();
  await origin.stop();
  stdout.mockRestore();
});

describe("cluster", () => {
  test("should fetch through each proxy once, then serve from cache", async () => {
    const first = await get("users/1");
    const second = await get("users/1");
    const third = await get("users/1");

    expect(first).toMatchObject({
      status: "OK",
      data: { name: "Ada" },
      cache_hit: false,
      node: addressA.port,
    });
    expect(second).toMatchObject({ status: "OK", cache_hit: false, node: addressB.port });
    expect(third).toMatchObject({ status: "OK", cache_hit: true, node: addressA.port });
    expect(typeof third.latency_ms).toBe("number");
  });

  test("should relay NOT_FOUND from the origin", async () => {
    const reply = await get("users/999");

    expect(reply).toMatchObject({
      status: "NOT_FOUND",
      data: null,
      cache_hit: false,
      node: addressB.port,
    });
  });

  test("should aggregate proxy metrics", async () => {
    const reply = await sendClientRequest(balancerAddress, { kind: "metrics" }, transport);

    expect(reply).toMatchObject({
      healthy_count: 2,
      unhealthy_count: 0,
      strategy: "round_robin",
      cursor: 4,
      proxies: {
        [formatAddress(addressA)]: { requests: 2, hits: 1, misses: 1, origin_fetches: 1 },
        [formatAddress(addressB)]: { requests: 2, hits: 0, misses: 2, origin_fetches: 2 },
      },
    });
  });

  test("should reject malformed requests at the balancer", async () => {
    const reply = await transport.request(balancerAddress, "GET users");

    expect(JSON.parse(reply)).toEqual({ status: "BAD_REQUEST", data: null });
  });

  test("should route around a stopped proxy, then report UNAVAILABLE", async () => {
    await proxyB.stop();

    // Slot 4 lands on A, slot 5 on the stopped B and is retried on A
    const direct = await get("users/1");
    const failover = await get("users/1");
    expect(direct).toMatchObject({ status: "OK", node: addressA.port });
    expect(failover).toMatchObject({ status: "OK", node: addressA.port });
    expect(balancer.getHealth().getRecord(formatAddress(addressB)).consecutiveFailures).toBe(1);

    const metrics = await sendClientRequest(balancerAddress, { kind: "metrics" }, transport);
    expect(metrics).toMatchObject({ proxies: { [formatAddress(addressB)]: "unreachable" } });

    await proxyA.stop();

    expect(await get("users/1")).toMatchObject({ status: "UNAVAILABLE" });
  });
});
