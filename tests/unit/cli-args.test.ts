/**
 * Unit tests for cli-args.ts
 */

import { CliUsageError, isClusterRole, parseCliArgs, takeFlags } from "../../src/cli-args";

describe("parseCliArgs", () => {
  test("should parse a command with --name=value flags", () => {
    expect(parseCliArgs(["proxy", "--port=8001", "--cache-type=lru"])).toEqual({
      command: "proxy",
      flags: { port: "8001", "cache-type": "lru" },
    });
  });

  test("should accept space-separated values and switches", () => {
    expect(parseCliArgs(["client", "--port", "9000", "--metrics"])).toEqual({
      command: "client",
      flags: { port: "9000", metrics: "true" },
    });
  });

  test("should keep everything after the first = in the value", () => {
    expect(parseCliArgs(["client", "--get=a/b=c"]).flags).toEqual({ get: "a/b=c" });
  });

  test("should allow flags before the command", () => {
    expect(parseCliArgs(["--config=x.json", "origin"])).toEqual({
      command: "origin",
      flags: { config: "x.json" },
    });
  });

  test("should treat a bare --help as the help command", () => {
    expect(parseCliArgs(["--help"]).command).toBe("help");
  });

  test("should return no command for empty input", () => {
    expect(parseCliArgs([])).toEqual({ command: undefined, flags: {} });
  });

  test("should reject unknown commands", () => {
    expect(() => parseCliArgs(["cache"])).toThrow(new CliUsageError("Unknown command: cache"));
  });

  test("should reject repeated flags", () => {
    expect(() => parseCliArgs(["origin", "--port=1", "--port=2"])).toThrow(
      "Flag --port given more than once"
    );
  });

  test("should reject a second positional argument", () => {
    expect(() => parseCliArgs(["origin", "proxy"])).toThrow("Unexpected argument: proxy");
  });
});

describe("isClusterRole", () => {
  test("should accept server roles only", () => {
    expect(isClusterRole("origin")).toBe(true);
    expect(isClusterRole("balancer")).toBe(true);
    expect(isClusterRole("client")).toBe(false);
    expect(isClusterRole(undefined)).toBe(false);
  });
});

describe("takeFlags", () => {
  test("should split named flags from the rest", () => {
    expect(takeFlags({ config: "x.json", port: "1" }, ["config"])).toEqual({
      taken: { config: "x.json" },
      rest: { port: "1" },
    });
  });
});
