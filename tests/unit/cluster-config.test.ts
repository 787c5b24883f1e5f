/**
 * Unit tests for cluster-config.ts
 *
 * Test categories:
 * - Defaults and section merging
 * - Validation of addresses, ports, strategies and ranges
 * - Environment variable overrides
 * - CLI flag overrides per role
 * - File loading pipeline and error codes
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  applyEnvOverrides,
  applyFlagOverrides,
  ClusterConfigError,
  DEFAULT_CLUSTER_CONFIG,
  mergeWithDefaults,
  parseClusterConfig,
  parseProxyList,
  parseStrategy,
  validateClusterConfig,
} from "../../src/cluster/cluster-config";
import { LoadBalanceStrategy } from "../../src/cluster/cluster-types";

describe("cluster-config", () => {
  describe("defaults", () => {
    test("should match the documented defaults", () => {
      expect(DEFAULT_CLUSTER_CONFIG).toEqual({
        origin: { host: "127.0.0.1", port: 8000, dataDir: "./data" },
        proxy: {
          host: "127.0.0.1",
          port: 8001,
          origin: "127.0.0.1:8000",
          cacheType: "ttl",
          ttlSec: 30,
          lruCapacity: 3,
        },
        balancer: { host: "127.0.0.1", port: 9000, proxies: [], strategy: "round_robin" },
        health: { failureThreshold: 3, probeIntervalMs: 2000 },
        network: { connectTimeoutMs: 2000 },
      });
    });

    test("should be valid", () => {
      expect(validateClusterConfig(DEFAULT_CLUSTER_CONFIG)).toEqual({
        isValid: true,
        warnings: [],
        errors: [],
      });
    });
  });

  describe("mergeWithDefaults", () => {
    test("should merge per field and keep other defaults", () => {
      const config = mergeWithDefaults({
        balancer: { proxies: ["127.0.0.1:8001"], strategy: "least_loaded" },
        health: { failureThreshold: 5 },
      });

      expect(config.balancer).toEqual({
        host: "127.0.0.1",
        port: 9000,
        proxies: ["127.0.0.1:8001"],
        strategy: "least_loaded",
      });
      expect(config.health).toEqual({ failureThreshold: 5, probeIntervalMs: 2000 });
      expect(config.proxy).toEqual(DEFAULT_CLUSTER_CONFIG.proxy);
    });

    test("should ignore null fields", () => {
      const config = mergeWithDefaults({ origin: { port: null } });

      expect(config.origin.port).toBe(8000);
    });
  });

  describe("validateClusterConfig", () => {
    test("should collect every error", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({
          proxy: { cacheType: "fifo", ttlSec: 0, lruCapacity: 2.5, origin: "nowhere" },
          balancer: { port: 70000, strategy: "random" },
          health: { failureThreshold: 0 },
        })
      );

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        'proxy.origin: Invalid address "nowhere": expected host:port',
        "Invalid cache type: fifo. Must be one of: ttl, lru",
        "proxy.ttlSec must be positive",
        "proxy.lruCapacity must be a positive integer",
        "balancer.port must be an integer between 0 and 65535",
        "Invalid load balance strategy: random. Must be one of: round_robin, least_loaded",
        "health.failureThreshold must be a positive integer",
      ]);
    });

    test("should reject duplicate and malformed proxy addresses", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({
          balancer: { proxies: ["127.0.0.1:8001", "127.0.0.1:8001", "bad"] },
        })
      );

      expect(result.errors).toEqual([
        "Duplicate proxy address: 127.0.0.1:8001",
        'balancer.proxies[2]: Invalid address "bad": expected host:port',
      ]);
    });

    test("should treat addresses that differ only in spacing as duplicates", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({ balancer: { proxies: ["127.0.0.1:8001", " 127.0.0.1:8001 "] } })
      );

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual(["Duplicate proxy address: 127.0.0.1:8001"]);
    });

    test("should reject a proxy listening on its origin's address", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({ proxy: { port: 8000, origin: "127.0.0.1:8000" } })
      );

      expect(result.errors).toEqual(["proxy.port and the origin port cannot be the same"]);
    });

    test("should accept port 0 for ephemeral binding", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({ origin: { port: 0 }, proxy: { port: 0 }, balancer: { port: 0 } })
      );

      expect(result.isValid).toBe(true);
    });

    test("should warn about very long probe intervals", () => {
      const result = validateClusterConfig(
        mergeWithDefaults({ health: { probeIntervalMs: 120000 } })
      );

      expect(result.isValid).toBe(true);
      expect(result.warnings).toEqual([
        "Probe interval is 120000ms (>= 60s), which delays recovery of unhealthy proxies",
      ]);
    });
  });

  describe("applyEnvOverrides", () => {
    test("should apply every supported variable", () => {
      const config = applyEnvOverrides(DEFAULT_CLUSTER_CONFIG, {
        TIERCACHE_CACHE_TYPE: "lru",
        TIERCACHE_TTL_SEC: "10",
        TIERCACHE_LRU_CAPACITY: "50",
        TIERCACHE_ORIGIN: "10.0.0.5:8000",
        TIERCACHE_PROXIES: "127.0.0.1:8001, 127.0.0.1:8002,",
        TIERCACHE_STRATEGY: "least_loaded",
        TIERCACHE_FAILURE_THRESHOLD: "2",
        TIERCACHE_PROBE_INTERVAL: "500",
        TIERCACHE_CONNECT_TIMEOUT: "750",
      });

      expect(config.proxy).toMatchObject({
        cacheType: "lru",
        ttlSec: 10,
        lruCapacity: 50,
        origin: "10.0.0.5:8000",
      });
      expect(config.balancer.proxies).toEqual(["127.0.0.1:8001", "127.0.0.1:8002"]);
      expect(config.balancer.strategy).toBe(LoadBalanceStrategy.LEAST_LOADED);
      expect(config.health).toEqual({ failureThreshold: 2, probeIntervalMs: 500 });
      expect(config.network).toEqual({ connectTimeoutMs: 750 });
    });

    test("should leave the config unchanged without variables", () => {
      expect(applyEnvOverrides(DEFAULT_CLUSTER_CONFIG, {})).toEqual(DEFAULT_CLUSTER_CONFIG);
    });

    test("should reject invalid values", () => {
      expect(() =>
        applyEnvOverrides(DEFAULT_CLUSTER_CONFIG, { TIERCACHE_STRATEGY: "random" })
      ).toThrow("Invalid TIERCACHE_STRATEGY: random. Must be one of: round_robin, least_loaded");
      expect(() =>
        applyEnvOverrides(DEFAULT_CLUSTER_CONFIG, { TIERCACHE_LRU_CAPACITY: "-1" })
      ).toThrow("Invalid TIERCACHE_LRU_CAPACITY: must be positive");
      expect(() =>
        applyEnvOverrides(DEFAULT_CLUSTER_CONFIG, { TIERCACHE_TTL_SEC: "abc" })
      ).toThrow("Invalid TIERCACHE_TTL_SEC: must be an integer");
    });
  });

  describe("applyFlagOverrides", () => {
    test("should apply proxy flags to the proxy section", () => {
      const config = applyFlagOverrides(DEFAULT_CLUSTER_CONFIG, "proxy", {
        port: "8002",
        origin: "127.0.0.1:7000",
        "cache-type": "lru",
        capacity: "10",
      });

      expect(config.proxy).toEqual({
        host: "127.0.0.1",
        port: 8002,
        origin: "127.0.0.1:7000",
        cacheType: "lru",
        ttlSec: 30,
        lruCapacity: 10,
      });
      expect(config.balancer).toEqual(DEFAULT_CLUSTER_CONFIG.balancer);
    });

    test("should apply balancer flags", () => {
      const config = applyFlagOverrides(DEFAULT_CLUSTER_CONFIG, "balancer", {
        proxies: "127.0.0.1:8001,127.0.0.1:8002",
        strategy: "least_loaded",
        "failure-threshold": "4",
        "probe-interval": "100",
        "connect-timeout": "300",
      });

      expect(config.balancer.proxies).toEqual(["127.0.0.1:8001", "127.0.0.1:8002"]);
      expect(config.balancer.strategy).toBe(LoadBalanceStrategy.LEAST_LOADED);
      expect(config.health).toEqual({ failureThreshold: 4, probeIntervalMs: 100 });
      expect(config.network.connectTimeoutMs).toBe(300);
    });

    test("should apply origin flags", () => {
      const config = applyFlagOverrides(DEFAULT_CLUSTER_CONFIG, "origin", {
        host: "0.0.0.0",
        "data-dir": "/srv/data",
      });

      expect(config.origin).toEqual({ host: "0.0.0.0", port: 8000, dataDir: "/srv/data" });
    });

    test("should reject flags that belong to another role", () => {
      expect(() => applyFlagOverrides(DEFAULT_CLUSTER_CONFIG, "origin", { ttl: "5" })).toThrow(
        "Unknown flag --ttl for origin"
      );
    });

    test("should reject bad values with INVALID_FLAG", () => {
      let caught: unknown;
      try {
        applyFlagOverrides(DEFAULT_CLUSTER_CONFIG, "proxy", { "cache-type": "fifo" });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ClusterConfigError);
      expect(caught).toMatchObject({
        code: "INVALID_FLAG",
        message: "Invalid --cache-type: fifo. Must be one of: ttl, lru",
      });
    });
  });

  describe("parseClusterConfig", () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "tiercache-config-"));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(content: string): string {
      const file = path.join(dir, "tiercache.json");
      fs.writeFileSync(file, content);
      return file;
    }

    test("should return defaults without a file", () => {
      const result = parseClusterConfig(undefined, {});

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.config).toEqual(DEFAULT_CLUSTER_CONFIG);
      }
    });

    test("should load, merge and override a file", () => {
      const file = writeConfig(
        JSON.stringify({
          balancer: { proxies: ["127.0.0.1:8001"], strategy: "least_loaded" },
          proxy: { cacheType: "lru" },
        })
      );

      const result = parseClusterConfig(file, { TIERCACHE_LRU_CAPACITY: "7" });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.config.balancer.proxies).toEqual(["127.0.0.1:8001"]);
        expect(result.config.proxy.cacheType).toBe("lru");
        expect(result.config.proxy.lruCapacity).toBe(7);
      }
    });

    test.each([
      ["missing file", null, "FILE_NOT_FOUND"],
      ["empty file", "   ", "PARSE_ERROR"],
      ["invalid JSON", "{ broken", "PARSE_ERROR"],
      ["JSON array", "[1, 2]", "PARSE_ERROR"],
      ["non-object section", '{"proxy": 5}', "PARSE_ERROR"],
      ["invalid values", '{"proxy": {"ttlSec": -1}}', "INVALID_CONFIG"],
    ])("should fail on %s", (_name, content, code) => {
      const file = content === null ? path.join(dir, "absent.json") : writeConfig(content);

      const result = parseClusterConfig(file, {});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ClusterConfigError);
        expect(result.error.code).toBe(code);
      }
    });

    test("should report bad environment overrides as INVALID_CONFIG", () => {
      const result = parseClusterConfig(undefined, { TIERCACHE_CACHE_TYPE: "fifo" });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("INVALID_CONFIG");
      }
    });
  });

  describe("value parsers", () => {
    test("should parse strategies", () => {
      expect(parseStrategy("round_robin")).toBe(LoadBalanceStrategy.ROUND_ROBIN);
      expect(parseStrategy("fastest")).toBeUndefined();
    });

    test("should parse proxy lists", () => {
      expect(parseProxyList(" a:1 ,,b:2 ")).toEqual(["a:1", "b:2"]);
    });
  });
});
