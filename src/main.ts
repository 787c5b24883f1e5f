#!/usr/bin/env node
// tiercache CLI: start an origin, a caching proxy or the load balancer, or send one request

// Load environment variables from .env file
import * as dotenv from "dotenv";
dotenv.config();

import {
  CliUsageError,
  isClusterRole,
  parseCliArgs,
  takeFlags,
  USAGE,
} from "./cli-args";
import { sendClientRequest } from "./client";
import type { ClientRequest } from "./client";
import {
  applyFlagOverrides,
  ClusterConfigError,
  finalizeConfig,
  LoadBalancer,
  parseClusterConfig,
} from "./cluster";
import type { ClusterConfig, ClusterRole } from "./cluster";
import { OriginServer } from "./origin/origin-server";
import { ProxyNode } from "./proxy/proxy-node";
import { createLogger, toError } from "./structured-logger";
import { parseAddress, TcpTransport } from "./wire-protocol";

const logger = createLogger("main");

/**
 * A started server process.
 */
interface Service {
  stop(): Promise<void>;
}

/**
 * Load config file and environment, then apply the role's CLI flags.
 *
 * @throws {ClusterConfigError} If any stage fails validation
 */
function loadConfig(
  role: ClusterRole,
  configFile: string | undefined,
  flags: Readonly<Record<string, string>>
): ClusterConfig {
  const loaded = parseClusterConfig(configFile);
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }
  if (!loaded.success) {
    throw loaded.error;
  }

  const result = finalizeConfig(applyFlagOverrides(loaded.config, role, flags));
  if (!result.success) {
    throw result.error;
  }
  return result.config;
}

async function startRole(role: ClusterRole, config: ClusterConfig): Promise<Service> {
  switch (role) {
    case "origin": {
      const origin = new OriginServer({ config: config.origin });
      await origin.start();
      return origin;
    }

    case "proxy": {
      const proxy = new ProxyNode({ proxy: config.proxy, network: config.network });
      await proxy.start();
      return proxy;
    }

    case "balancer": {
      const balancer = new LoadBalancer({
        balancer: config.balancer,
        health: config.health,
        connectTimeoutMs: config.network.connectTimeoutMs,
      });
      await balancer.start();
      return balancer;
    }
  }
}

function installShutdownHandlers(service: Service): void {
  let stopping = false;

  const handleShutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info("Received shutdown signal, stopping", { signal });

    service.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", toError(err));
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", () => handleShutdown("SIGINT"));
  process.on("SIGTERM", () => handleShutdown("SIGTERM"));
}

async function runClient(
  configFile: string | undefined,
  flags: Readonly<Record<string, string>>
): Promise<number> {
  const { taken, rest } = takeFlags(flags, [
    "host",
    "port",
    "get",
    "metrics",
    "connect-timeout",
  ]);
  const unknown = Object.keys(rest);
  if (unknown.length > 0) {
    throw new CliUsageError(`Unknown flag --${unknown[0]} for client`);
  }

  // the client talks to the balancer by default
  const config = loadConfig(
    "balancer",
    configFile,
    taken["connect-timeout"] === undefined
      ? {}
      : { "connect-timeout": taken["connect-timeout"] }
  );
  const host = taken["host"] ?? "127.0.0.1";
  const port = taken["port"] ?? String(config.balancer.port);
  const address = parseAddress(`${host}:${port}`);

  let request: ClientRequest;
  if (taken["metrics"] !== undefined) {
    request = { kind: "metrics" };
  } else if (taken["get"] !== undefined && taken["get"] !== "true") {
    request = { kind: "get", path: taken["get"] };
  } else {
    throw new CliUsageError("client needs --get=<resource/key> or --metrics");
  }

  const reply = await sendClientRequest(
    address,
    request,
    new TcpTransport(config.network.connectTimeoutMs)
  );
  process.stdout.write(`${JSON.stringify(reply, null, 4)}\n`);
  return reply.status === "CLIENT_CONNECTION_ERROR" ? 1 : 0;
}

async function main(argv: readonly string[]): Promise<number> {
  const { command, flags } = parseCliArgs(argv);

  if (command === undefined || command === "help") {
    process.stdout.write(`${USAGE}\n`);
    return command === "help" ? 0 : 1;
  }

  const { taken, rest } = takeFlags(flags, ["config"]);
  const configFile = taken["config"];

  if (!isClusterRole(command)) {
    return runClient(configFile, rest);
  }

  const config = loadConfig(command, configFile, rest);
  const service = await startRole(command, config);
  installShutdownHandlers(service);
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    if (code !== 0) {
      process.exitCode = code;
    }
  },
  (err: unknown) => {
    if (err instanceof CliUsageError) {
      process.stderr.write(`${err.message}\n\n${USAGE}\n`);
    } else if (err instanceof ClusterConfigError) {
      logger.error("Invalid configuration", err, { code: err.code, ...err.context });
    } else {
      logger.error("Startup failed", toError(err));
    }
    process.exitCode = 1;
  }
);
