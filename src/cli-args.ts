/**
 * Command-line parsing for the tiercache CLI.
 *
 * Accepted forms: `tiercache <command> --name=value --name value --switch`.
 * A flag without a value (followed by another flag or nothing) is set to "true".
 *
 * @module cli-args
 */

import type { ClusterRole } from "./cluster/cluster-types";

export type CliCommand = ClusterRole | "client" | "help";

export interface ParsedArgs {
  readonly command?: CliCommand;
  readonly flags: Record<string, string>;
}

/**
 * Error for malformed command lines.
 */
export class CliUsageError extends Error {
  readonly code = "USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";

    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

const COMMANDS: readonly CliCommand[] = ["origin", "proxy", "balancer", "client", "help"];

export function isClusterRole(command: CliCommand | undefined): command is ClusterRole {
  return command === "origin" || command === "proxy" || command === "balancer";
}

/**
 * Parse arguments after the executable and script path.
 *
 * @throws {CliUsageError} On an unknown command, a repeated flag, or a stray positional argument
 */
export function parseCliArgs(args: readonly string[]): ParsedArgs {
  const flags: Record<string, string> = {};
  let command: CliCommand | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith("--")) {
      if (command !== undefined) {
        throw new CliUsageError(`Unexpected argument: ${arg}`);
      }
      command = COMMANDS.find((name) => name === arg);
      if (command === undefined) {
        throw new CliUsageError(`Unknown command: ${arg}`);
      }
      continue;
    }

    const body = arg.slice(2);
    const equals = body.indexOf("=");
    let name: string;
    let value: string;

    if (equals !== -1) {
      name = body.slice(0, equals);
      value = body.slice(equals + 1);
    } else {
      name = body;
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        value = next;
        i++;
      } else {
        value = "true";
      }
    }

    if (!name) {
      throw new CliUsageError(`Invalid flag: ${arg}`);
    }
    if (name in flags) {
      throw new CliUsageError(`Flag --${name} given more than once`);
    }
    flags[name] = value;
  }

  if (command === undefined && flags["help"] !== undefined) {
    command = "help";
  }

  return { command, flags };
}

/**
 * Split off flags handled by the CLI itself, leaving the role's own flags.
 */
export function takeFlags(
  flags: Readonly<Record<string, string>>,
  names: readonly string[]
): { taken: Record<string, string>; rest: Record<string, string> } {
  const taken: Record<string, string> = {};
  const rest: Record<string, string> = {};
  for (const [name, value] of Object.entries(flags)) {
    if (names.includes(name)) {
      taken[name] = value;
    } else {
      rest[name] = value;
    }
  }
  return { taken, rest };
}

export const USAGE = `Usage: tiercache <command> [--flag=value ...]

Commands:
  origin     --host --port --data-dir
  proxy      --host --port --origin=<host:port> --cache-type=ttl|lru --ttl=<sec> --capacity=<n>
  balancer   --host --port --proxies=<host:port,...> --strategy=round_robin|least_loaded
             --failure-threshold=<n> --probe-interval=<ms>
  client     --host --port (--get=<resource/key> | --metrics)

Every command accepts --config=<file> and --connect-timeout=<ms>.`;
