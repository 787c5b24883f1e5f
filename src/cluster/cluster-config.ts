/**
 * Configuration parsing and validation for every tiercache process.
 *
 * This module provides:
 * - Configuration file loading and parsing
 * - Default value merging (per-section merge)
 * - Environment variable overrides
 * - CLI flag overrides for the role being started
 * - Validation (addresses, ports, strategies, ranges)
 *
 * Usage:
 * ```typescript
 * const result = parseClusterConfig('./tiercache.json');
 * if (result.success) {
 *   startBalancer(result.config);
 * } else {
 *   console.error('Config error:', result.error.message);
 * }
 * ```
 *
 * @module cluster-config
 */

import * as fs from "fs";
import * as path from "path";
import type { CacheType } from "../cache/cache-types";
import { formatAddress, isRecord, parseAddress } from "../wire-protocol";
import type {
  BalancerConfig,
  ClusterConfig,
  ClusterRole,
  HealthConfig,
  NetworkConfig,
  OriginConfig,
  ProxyConfig,
} from "./cluster-types";
import { LoadBalanceStrategy } from "./cluster-types";

// ============================================================================
// Error Types
// ============================================================================

/**
 * Error for configuration problems.
 *
 * Standard error codes:
 * - FILE_NOT_FOUND: Configuration file does not exist
 * - PARSE_ERROR: File is empty, not JSON, or not a JSON object
 * - INVALID_CONFIG: Values failed validation or an override was malformed
 * - INVALID_FLAG: A CLI flag is unknown for the role or has a bad value
 */
export class ClusterConfigError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(code: string, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ClusterConfigError";
    this.code = code;
    this.context = context;

    Object.setPrototypeOf(this, ClusterConfigError.prototype);
  }
}

// ============================================================================
// Result Types
// ============================================================================

/**
 * Result of configuration validation.
 */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly warnings: string[];
  readonly errors: string[];
}

/**
 * Result of configuration loading: success with config, or failure with error.
 */
export type ClusterConfigResult =
  | { readonly success: true; readonly config: ClusterConfig; readonly warnings: string[] }
  | { readonly success: false; readonly error: ClusterConfigError; readonly warnings: string[] };

/**
 * Config as read from a file: any section, any subset of fields.
 *
 * Field values are unchecked until validateClusterConfig runs.
 */
export type PartialClusterConfig = {
  readonly [K in keyof ClusterConfig]?: { readonly [F in keyof ClusterConfig[K]]?: unknown };
};

// ============================================================================
// Default Values
// ============================================================================

const DEFAULT_ORIGIN_CONFIG: OriginConfig = {
  host: "127.0.0.1",
  port: 8000,
  dataDir: "./data",
};

const DEFAULT_PROXY_CONFIG: ProxyConfig = {
  host: "127.0.0.1",
  port: 8001,
  origin: "127.0.0.1:8000",
  cacheType: "ttl",
  ttlSec: 30,
  lruCapacity: 3,
};

const DEFAULT_BALANCER_CONFIG: BalancerConfig = {
  host: "127.0.0.1",
  port: 9000,
  proxies: [],
  strategy: LoadBalanceStrategy.ROUND_ROBIN,
};

const DEFAULT_HEALTH_CONFIG: HealthConfig = {
  failureThreshold: 3,
  probeIntervalMs: 2000,
};

const DEFAULT_NETWORK_CONFIG: NetworkConfig = {
  connectTimeoutMs: 2000,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CLUSTER_CONFIG: ClusterConfig = {
  origin: DEFAULT_ORIGIN_CONFIG,
  proxy: DEFAULT_PROXY_CONFIG,
  balancer: DEFAULT_BALANCER_CONFIG,
  health: DEFAULT_HEALTH_CONFIG,
  network: DEFAULT_NETWORK_CONFIG,
};

// ============================================================================
// Value Parsers
// ============================================================================

/**
 * Match a string against the routing strategies.
 */
export function parseStrategy(value: string): LoadBalanceStrategy | undefined {
  return Object.values(LoadBalanceStrategy).find((strategy) => strategy === value);
}

/**
 * Match a string against the cache policies.
 */
export function parseCacheType(value: string): CacheType | undefined {
  if (value === "ttl" || value === "lru") {
    return value;
  }
  return undefined;
}

/**
 * Split a comma-separated `host:port` list, dropping empty items.
 */
export function parseProxyList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid ${name}: must be an integer`);
  }
  if (parsed <= 0) {
    throw new Error(`Invalid ${name}: must be positive`);
  }
  return parsed;
}

function parsePort(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: must be an integer between 0 and 65535`);
  }
  return parsed;
}

// ============================================================================
// Configuration Merging
// ============================================================================

/**
 * Merge user-provided configuration with default values.
 *
 * Each section is merged field by field; null and undefined fields keep the
 * default.
 *
 * @example
 * ```typescript
 * const config = mergeWithDefaults({
 *   balancer: { proxies: ['127.0.0.1:8001', '127.0.0.1:8002'] }
 * });
 * // config.health.failureThreshold === 3
 * ```
 */
export function mergeWithDefaults(partial: PartialClusterConfig): ClusterConfig {
  function mergeSection<T extends object>(
    defaults: T,
    overrides: { readonly [F in keyof T]?: unknown } | undefined
  ): T {
    if (!overrides || typeof overrides !== "object") {
      return defaults;
    }

    const result = { ...defaults };

    for (const key in defaults) {
      const override = overrides[key];
      if (override !== undefined && override !== null) {
        result[key] = override as T[Extract<keyof T, string>];
      }
    }

    return result;
  }

  return {
    origin: mergeSection(DEFAULT_ORIGIN_CONFIG, partial.origin),
    proxy: mergeSection(DEFAULT_PROXY_CONFIG, partial.proxy),
    balancer: mergeSection(DEFAULT_BALANCER_CONFIG, partial.balancer),
    health: mergeSection(DEFAULT_HEALTH_CONFIG, partial.health),
    network: mergeSection(DEFAULT_NETWORK_CONFIG, partial.network),
  };
}

// ============================================================================
// Validation
// ============================================================================

function checkHost(field: string, value: unknown, errors: string[]): void {
  if (typeof value !== "string" || value.trim() === "") {
    errors.push(`${field} must be a non-empty string`);
  }
}

function checkPort(field: string, value: unknown, errors: string[]): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value > 65535) {
    errors.push(`${field} must be an integer between 0 and 65535`);
  }
}

function checkPositiveInt(field: string, value: unknown, errors: string[]): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    errors.push(`${field} must be a positive integer`);
  }
}

function checkAddress(field: string, value: unknown, errors: string[]): void {
  if (typeof value !== "string") {
    errors.push(`${field} must be a host:port string`);
    return;
  }
  try {
    parseAddress(value);
  } catch (err) {
    errors.push(`${field}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Validate configuration structure and values.
 *
 * Values may come from untyped JSON, so every field is checked at runtime.
 *
 * Checks:
 * - Hosts are non-empty strings, ports are 0-65535 (0 = ephemeral)
 * - Addresses are `host:port`
 * - Cache type and routing strategy are recognized
 * - Counts, durations and thresholds are positive
 */
export function validateClusterConfig(config: ClusterConfig): ValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];

  const { origin, proxy, balancer, health, network } = config;

  checkHost("origin.host", origin.host, errors);
  checkPort("origin.port", origin.port, errors);
  if (typeof origin.dataDir !== "string" || origin.dataDir.trim() === "") {
    errors.push("origin.dataDir must be a non-empty string");
  }

  checkHost("proxy.host", proxy.host, errors);
  checkPort("proxy.port", proxy.port, errors);
  checkAddress("proxy.origin", proxy.origin, errors);
  if (parseCacheType(String(proxy.cacheType)) === undefined) {
    errors.push(`Invalid cache type: ${String(proxy.cacheType)}. Must be one of: ttl, lru`);
  }
  if (typeof proxy.ttlSec !== "number" || !(proxy.ttlSec > 0)) {
    errors.push("proxy.ttlSec must be positive");
  }
  checkPositiveInt("proxy.lruCapacity", proxy.lruCapacity, errors);
  if (typeof proxy.origin === "string" && proxy.port !== 0) {
    try {
      const originAddress = parseAddress(proxy.origin);
      if (originAddress.port === proxy.port && originAddress.host === proxy.host) {
        errors.push("proxy.port and the origin port cannot be the same");
      }
    } catch {
      // already reported by checkAddress
    }
  }

  checkHost("balancer.host", balancer.host, errors);
  checkPort("balancer.port", balancer.port, errors);
  const proxies: unknown = balancer.proxies;
  if (!Array.isArray(proxies)) {
    errors.push("balancer.proxies must be an array of host:port strings");
  } else {
    const list: readonly unknown[] = proxies;
    const seen = new Set<string>();
    list.forEach((proxyAddress, index) => {
      checkAddress(`balancer.proxies[${index}]`, proxyAddress, errors);
      if (typeof proxyAddress !== "string") {
        return;
      }
      // Compare the ids ClusterHealth will key proxies by
      let proxyId: string;
      try {
        proxyId = formatAddress(parseAddress(proxyAddress));
      } catch {
        return;
      }
      if (seen.has(proxyId)) {
        errors.push(`Duplicate proxy address: ${proxyId}`);
      }
      seen.add(proxyId);
    });
  }
  if (parseStrategy(String(balancer.strategy)) === undefined) {
    errors.push(
      `Invalid load balance strategy: ${String(balancer.strategy)}. Must be one of: ${Object.values(LoadBalanceStrategy).join(", ")}`
    );
  }

  checkPositiveInt("health.failureThreshold", health.failureThreshold, errors);
  checkPositiveInt("health.probeIntervalMs", health.probeIntervalMs, errors);
  if (typeof health.probeIntervalMs === "number" && health.probeIntervalMs >= 60000) {
    warnings.push(
      `Probe interval is ${health.probeIntervalMs}ms (>= 60s), which delays recovery of unhealthy proxies`
    );
  }

  checkPositiveInt("network.connectTimeoutMs", network.connectTimeoutMs, errors);

  return {
    isValid: errors.length === 0,
    warnings,
    errors,
  };
}

// ============================================================================
// Environment Variable Overrides
// ============================================================================

/**
 * Apply environment variable overrides to configuration.
 *
 * Supported environment variables:
 * - TIERCACHE_CACHE_TYPE: ttl | lru
 * - TIERCACHE_TTL_SEC: TTL policy lifetime in seconds
 * - TIERCACHE_LRU_CAPACITY: LRU policy capacity
 * - TIERCACHE_ORIGIN: origin address used by proxies (host:port)
 * - TIERCACHE_PROXIES: comma-separated proxy addresses for the balancer
 * - TIERCACHE_STRATEGY: round_robin | least_loaded
 * - TIERCACHE_FAILURE_THRESHOLD: consecutive failures before unhealthy
 * - TIERCACHE_PROBE_INTERVAL: probe interval in milliseconds
 * - TIERCACHE_CONNECT_TIMEOUT: connection timeout in milliseconds
 *
 * Environment variables take precedence over file configuration.
 *
 * @throws {Error} If a variable has an invalid format or value
 */
export function applyEnvOverrides(
  config: ClusterConfig,
  env: NodeJS.ProcessEnv = process.env
): ClusterConfig {
  let proxy = { ...config.proxy };
  let balancer = { ...config.balancer };
  let health = { ...config.health };
  let network = { ...config.network };

  if (env.TIERCACHE_CACHE_TYPE) {
    const cacheType = parseCacheType(env.TIERCACHE_CACHE_TYPE);
    if (!cacheType) {
      throw new Error(
        `Invalid TIERCACHE_CACHE_TYPE: ${env.TIERCACHE_CACHE_TYPE}. Must be one of: ttl, lru`
      );
    }
    proxy = { ...proxy, cacheType };
  }

  if (env.TIERCACHE_TTL_SEC) {
    proxy = { ...proxy, ttlSec: parsePositiveInt("TIERCACHE_TTL_SEC", env.TIERCACHE_TTL_SEC) };
  }

  if (env.TIERCACHE_LRU_CAPACITY) {
    proxy = {
      ...proxy,
      lruCapacity: parsePositiveInt("TIERCACHE_LRU_CAPACITY", env.TIERCACHE_LRU_CAPACITY),
    };
  }

  if (env.TIERCACHE_ORIGIN) {
    proxy = { ...proxy, origin: env.TIERCACHE_ORIGIN.trim() };
  }

  if (env.TIERCACHE_PROXIES) {
    balancer = { ...balancer, proxies: parseProxyList(env.TIERCACHE_PROXIES) };
  }

  if (env.TIERCACHE_STRATEGY) {
    const strategy = parseStrategy(env.TIERCACHE_STRATEGY);
    if (!strategy) {
      throw new Error(
        `Invalid TIERCACHE_STRATEGY: ${env.TIERCACHE_STRATEGY}. Must be one of: ${Object.values(LoadBalanceStrategy).join(", ")}`
      );
    }
    balancer = { ...balancer, strategy };
  }

  if (env.TIERCACHE_FAILURE_THRESHOLD) {
    health = {
      ...health,
      failureThreshold: parsePositiveInt(
        "TIERCACHE_FAILURE_THRESHOLD",
        env.TIERCACHE_FAILURE_THRESHOLD
      ),
    };
  }

  if (env.TIERCACHE_PROBE_INTERVAL) {
    health = {
      ...health,
      probeIntervalMs: parsePositiveInt("TIERCACHE_PROBE_INTERVAL", env.TIERCACHE_PROBE_INTERVAL),
    };
  }

  if (env.TIERCACHE_CONNECT_TIMEOUT) {
    network = {
      connectTimeoutMs: parsePositiveInt("TIERCACHE_CONNECT_TIMEOUT", env.TIERCACHE_CONNECT_TIMEOUT),
    };
  }

  return { origin: config.origin, proxy, balancer, health, network };
}

// ============================================================================
// CLI Flag Overrides
// ============================================================================

const COMMON_FLAGS = ["host", "port", "connect-timeout"];

const ROLE_FLAGS: Record<ClusterRole, readonly string[]> = {
  origin: [...COMMON_FLAGS, "data-dir"],
  proxy: [...COMMON_FLAGS, "origin", "cache-type", "ttl", "capacity"],
  balancer: [...COMMON_FLAGS, "proxies", "strategy", "failure-threshold", "probe-interval"],
};

/**
 * Apply `--flag=value` overrides for the role being started.
 *
 * `--host` and `--port` apply to the role's own section.
 *
 * @throws {ClusterConfigError} INVALID_FLAG for unknown flags or bad values
 */
export function applyFlagOverrides(
  config: ClusterConfig,
  role: ClusterRole,
  flags: Readonly<Record<string, string>>
): ClusterConfig {
  const allowed = ROLE_FLAGS[role];
  for (const name of Object.keys(flags)) {
    if (!allowed.includes(name)) {
      throw new ClusterConfigError("INVALID_FLAG", `Unknown flag --${name} for ${role}`, {
        flag: name,
        allowed,
      });
    }
  }

  try {
    let { origin, proxy, balancer, health, network } = config;
    const host = flags["host"];
    const port = flags["port"] === undefined ? undefined : parsePort("--port", flags["port"]);

    if (flags["connect-timeout"] !== undefined) {
      network = {
        connectTimeoutMs: parsePositiveInt("--connect-timeout", flags["connect-timeout"]),
      };
    }

    switch (role) {
      case "origin":
        origin = {
          ...origin,
          host: host ?? origin.host,
          port: port ?? origin.port,
          dataDir: flags["data-dir"] ?? origin.dataDir,
        };
        break;

      case "proxy": {
        let cacheType = proxy.cacheType;
        if (flags["cache-type"] !== undefined) {
          const parsed = parseCacheType(flags["cache-type"]);
          if (!parsed) {
            throw new Error(`Invalid --cache-type: ${flags["cache-type"]}. Must be one of: ttl, lru`);
          }
          cacheType = parsed;
        }
        proxy = {
          ...proxy,
          host: host ?? proxy.host,
          port: port ?? proxy.port,
          origin: flags["origin"] ?? proxy.origin,
          cacheType,
          ttlSec: flags["ttl"] === undefined ? proxy.ttlSec : parsePositiveInt("--ttl", flags["ttl"]),
          lruCapacity:
            flags["capacity"] === undefined
              ? proxy.lruCapacity
              : parsePositiveInt("--capacity", flags["capacity"]),
        };
        break;
      }

      case "balancer": {
        let strategy = balancer.strategy;
        if (flags["strategy"] !== undefined) {
          const parsed = parseStrategy(flags["strategy"]);
          if (!parsed) {
            throw new Error(
              `Invalid --strategy: ${flags["strategy"]}. Must be one of: ${Object.values(LoadBalanceStrategy).join(", ")}`
            );
          }
          strategy = parsed;
        }
        balancer = {
          ...balancer,
          host: host ?? balancer.host,
          port: port ?? balancer.port,
          proxies:
            flags["proxies"] === undefined ? balancer.proxies : parseProxyList(flags["proxies"]),
          strategy,
        };
        health = {
          failureThreshold:
            flags["failure-threshold"] === undefined
              ? health.failureThreshold
              : parsePositiveInt("--failure-threshold", flags["failure-threshold"]),
          probeIntervalMs:
            flags["probe-interval"] === undefined
              ? health.probeIntervalMs
              : parsePositiveInt("--probe-interval", flags["probe-interval"]),
        };
        break;
      }
    }

    return { origin, proxy, balancer, health, network };
  } catch (err) {
    throw new ClusterConfigError(
      "INVALID_FLAG",
      err instanceof Error ? err.message : String(err),
      { role }
    );
  }
}

// ============================================================================
// Configuration Loading
// ============================================================================

function readConfigFile(configFilePath: string): PartialClusterConfig | ClusterConfigError {
  const configPath = path.resolve(configFilePath);

  if (!fs.existsSync(configFilePath)) {
    return new ClusterConfigError(
      "FILE_NOT_FOUND",
      `Configuration file not found: ${configFilePath}`,
      { configPath }
    );
  }

  let parsed: unknown;
  try {
    const fileContent = fs.readFileSync(configFilePath, "utf-8");
    if (!fileContent.trim()) {
      return new ClusterConfigError("PARSE_ERROR", "Configuration file is empty", { configPath });
    }
    parsed = JSON.parse(fileContent);
  } catch (err) {
    return new ClusterConfigError(
      "PARSE_ERROR",
      `Failed to parse configuration file: ${err instanceof Error ? err.message : String(err)}`,
      { configPath }
    );
  }

  if (!isRecord(parsed)) {
    return new ClusterConfigError("PARSE_ERROR", "Configuration must be a JSON object", {
      configPath,
    });
  }

  for (const section of ["origin", "proxy", "balancer", "health", "network"]) {
    const value = parsed[section];
    if (value !== undefined && !isRecord(value)) {
      return new ClusterConfigError("PARSE_ERROR", `Section "${section}" must be a JSON object`, {
        configPath,
      });
    }
  }

  const section = (name: string): Record<string, unknown> | undefined => {
    const value = parsed[name];
    return isRecord(value) ? value : undefined;
  };

  return {
    origin: section("origin"),
    proxy: section("proxy"),
    balancer: section("balancer"),
    health: section("health"),
    network: section("network"),
  };
}

/**
 * Load, merge, override and validate configuration.
 *
 * Pipeline:
 * 1. Load configuration file (if path provided)
 * 2. Merge with default values
 * 3. Apply environment variable overrides
 * 4. Validate final configuration
 *
 * Never throws; failures come back as `{ success: false, error }`.
 */
export function parseClusterConfig(
  configFilePath?: string,
  env: NodeJS.ProcessEnv = process.env
): ClusterConfigResult {
  let parsedConfig: PartialClusterConfig = {};

  if (configFilePath) {
    const fileResult = readConfigFile(configFilePath);
    if (fileResult instanceof ClusterConfigError) {
      return { success: false, error: fileResult, warnings: [] };
    }
    parsedConfig = fileResult;
  }

  let mergedConfig = mergeWithDefaults(parsedConfig);

  try {
    mergedConfig = applyEnvOverrides(mergedConfig, env);
  } catch (err) {
    return {
      success: false,
      error: new ClusterConfigError(
        "INVALID_CONFIG",
        `Failed to apply environment overrides: ${err instanceof Error ? err.message : String(err)}`
      ),
      warnings: [],
    };
  }

  return finalizeConfig(mergedConfig);
}

/**
 * Validate a fully assembled configuration and wrap it in a result.
 */
export function finalizeConfig(config: ClusterConfig): ClusterConfigResult {
  const validation = validateClusterConfig(config);

  if (!validation.isValid) {
    return {
      success: false,
      error: new ClusterConfigError(
        "INVALID_CONFIG",
        `Configuration validation failed: ${validation.errors.join(", ")}`,
        { errors: validation.errors }
      ),
      warnings: validation.warnings,
    };
  }

  return {
    success: true,
    config,
    warnings: validation.warnings,
  };
}
