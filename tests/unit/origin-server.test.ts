/**
 * Unit tests for origin-store.ts and origin-server.ts
 *
 * FileOriginStore runs against a temporary data directory.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { OriginServer } from "../../src/origin/origin-server";
import {
  FileOriginStore,
  MemoryOriginStore,
  OriginStoreError,
} from "../../src/origin/origin-store";

describe("FileOriginStore", () => {
  let dataDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "tiercache-origin-"));
    fs.mkdirSync(path.join(dataDir, "users"));
    fs.writeFileSync(path.join(dataDir, "users", "1.json"), JSON.stringify({ name: "Ada" }));
    fs.writeFileSync(path.join(dataDir, "users", "broken.json"), "{ nope");
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  test("should read <resource>/<key>.json", async () => {
    const store = new FileOriginStore(dataDir);

    await expect(store.get("users", "1")).resolves.toEqual({ found: true, data: { name: "Ada" } });
  });

  test("should report missing files and resources as not found", async () => {
    const store = new FileOriginStore(dataDir);

    await expect(store.get("users", "2")).resolves.toEqual({ found: false });
    await expect(store.get("orders", "1")).resolves.toEqual({ found: false });
  });

  test("should not read outside the data directory", async () => {
    fs.writeFileSync(path.join(path.dirname(dataDir), "secret.json"), "{}");
    const store = new FileOriginStore(dataDir);

    expect(store.resolvePath("..", "secret")).toBeUndefined();
    await expect(store.get("users", "../../secret")).resolves.toEqual({ found: false });
  });

  test("should raise CORRUPT_DATA for invalid JSON", async () => {
    const store = new FileOriginStore(dataDir);

    await expect(store.get("users", "broken")).rejects.toBeInstanceOf(OriginStoreError);
    await expect(store.get("users", "broken")).rejects.toMatchObject({ code: "CORRUPT_DATA" });
  });
});

describe("OriginServer", () => {
  const config = { host: "127.0.0.1", port: 0, dataDir: "./unused" };

  function createServer(): OriginServer {
    return new OriginServer({
      config,
      store: new MemoryOriginStore({ "users/1": { name: "Ada" }, "flags/off": null }),
    });
  }

  test("should answer OK with data", async () => {
    await expect(createServer().handleRequest("GET /users/1")).resolves.toEqual({
      status: "OK",
      data: { name: "Ada" },
    });
  });

  test("should serve stored null values", async () => {
    await expect(createServer().handleRequest("GET flags/off")).resolves.toEqual({
      status: "OK",
      data: null,
    });
  });

  test("should answer NOT_FOUND with null data", async () => {
    await expect(createServer().handleRequest("GET /users/2")).resolves.toEqual({
      status: "NOT_FOUND",
      data: null,
    });
  });

  test("should reject other methods", async () => {
    await expect(createServer().handleRequest("POST /users/1")).resolves.toEqual({
      status: "WRONG_METHOD: POST",
      data: null,
    });
  });

  test("should reject METRICS and garbage as BAD_REQUEST", async () => {
    const server = createServer();

    await expect(server.handleRequest("METRICS")).resolves.toEqual({
      status: "BAD_REQUEST",
      data: null,
    });
    await expect(server.handleRequest("hello there world")).resolves.toEqual({
      status: "BAD_REQUEST",
      data: null,
    });
  });

  test("should answer NOT_FOUND when the store fails", async () => {
    const stderr = jest.spyOn(process.stderr, "write").mockImplementation(() => true);
    const server = new OriginServer({
      config,
      store: {
        get: async () => {
          throw new OriginStoreError("CORRUPT_DATA", "users/1.json", "Invalid JSON");
        },
      },
    });

    await expect(server.handleRequest("GET users/1")).resolves.toEqual({
      status: "NOT_FOUND",
      data: null,
    });
    expect(stderr).toHaveBeenCalledTimes(1);
    stderr.mockRestore();
  });
});
