/**
 * Authoritative key→value storage behind the origin server.
 *
 * FileOriginStore serves `<dataDir>/<resource>/<key>.json`; MemoryOriginStore
 * holds values in a Map for tests and embedding.
 *
 * @module origin-store
 */

import { promises as fs } from "fs";
import * as path from "path";
import type { JsonValue } from "../cache";
import { isJsonValue } from "../cache";

/**
 * Result of a store lookup.
 */
export type OriginLookup =
  | { readonly found: true; readonly data: JsonValue }
  | { readonly found: false };

/**
 * Error for stored data that exists but cannot be served.
 *
 * Codes:
 * - CORRUPT_DATA: file is not valid JSON
 * - READ_FAILED: file exists but could not be read
 */
export class OriginStoreError extends Error {
  readonly code: string;
  readonly location: string;

  constructor(code: string, location: string, message: string) {
    super(message);
    this.name = "OriginStoreError";
    this.code = code;
    this.location = location;

    Object.setPrototypeOf(this, OriginStoreError.prototype);
  }
}

export interface OriginStore {
  /**
   * @throws {OriginStoreError} If the value exists but cannot be read
   */
  get(resource: string, key: string): Promise<OriginLookup>;
}

const NOT_FOUND: OriginLookup = { found: false };

/**
 * JSON files under a data directory, one file per key.
 *
 * Paths that would leave the data directory are treated as not found.
 */
export class FileOriginStore implements OriginStore {
  private readonly root: string;

  constructor(dataDir: string) {
    this.root = path.resolve(dataDir);
  }

  /**
   * File path for a key, or undefined when it escapes the data directory.
   */
  resolvePath(resource: string, key: string): string | undefined {
    const filePath = path.resolve(this.root, resource, `${key}.json`);
    if (!filePath.startsWith(this.root + path.sep)) {
      return undefined;
    }
    return filePath;
  }

  async get(resource: string, key: string): Promise<OriginLookup> {
    const filePath = this.resolvePath(resource, key);
    if (!filePath) {
      return NOT_FOUND;
    }

    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      if (code === "ENOENT" || code === "ENOTDIR" || code === "EISDIR") {
        return NOT_FOUND;
      }
      throw new OriginStoreError(
        "READ_FAILED",
        filePath,
        `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (err) {
      throw new OriginStoreError(
        "CORRUPT_DATA",
        filePath,
        `Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    if (!isJsonValue(data)) {
      throw new OriginStoreError("CORRUPT_DATA", filePath, `Unsupported JSON value in ${filePath}`);
    }

    return { found: true, data };
  }
}

/**
 * In-memory store keyed by `resource/key`.
 */
export class MemoryOriginStore implements OriginStore {
  private readonly values = new Map<string, JsonValue>();

  constructor(entries: Record<string, JsonValue> = {}) {
    for (const [location, value] of Object.entries(entries)) {
      this.values.set(location, value);
    }
  }

  set(resource: string, key: string, value: JsonValue): void {
    this.values.set(`${resource}/${key}`, value);
  }

  delete(resource: string, key: string): void {
    this.values.delete(`${resource}/${key}`);
  }

  async get(resource: string, key: string): Promise<OriginLookup> {
    const data = this.values.get(`${resource}/${key}`);
    return data === undefined ? NOT_FOUND : { found: true, data };
  }
}
