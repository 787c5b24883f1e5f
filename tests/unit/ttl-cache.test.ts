/**
 * Unit tests for the TTL cache engine
 *
 * Uses jest fake timers (jest.setSystemTime) to move the clock.
 */

import { TtlCache } from "../../src/cache/ttl-cache";

beforeEach(() => {
  jest.useFakeTimers();
  jest.setSystemTime(new Date("2024-01-01T00:00:00Z"));
});

afterEach(() => {
  jest.useRealTimers();
});

describe("TtlCache", () => {
  test("should reject a non-positive TTL", () => {
    expect(() => new TtlCache<number>(0)).toThrow("TTL must be positive");
    expect(() => new TtlCache<number>(-5)).toThrow("TTL must be positive");
  });

  test("should hit before the TTL elapses", () => {
    const cache = new TtlCache<string>(30000);
    cache.put("users/1", "ada");

    jest.advanceTimersByTime(29999);

    expect(cache.get("users/1")).toEqual({ hit: true, value: "ada" });
  });

  test("should still hit exactly at expiry", () => {
    const cache = new TtlCache<string>(30000);
    cache.put("users/1", "ada");

    jest.advanceTimersByTime(30000);

    expect(cache.get("users/1")).toEqual({ hit: true, value: "ada" });
  });

  test("should miss past expiry and remove the entry", () => {
    const cache = new TtlCache<string>(30000);
    cache.put("users/1", "ada");

    jest.advanceTimersByTime(30001);

    expect(cache.get("users/1")).toEqual({ hit: false });
    expect(cache.keys()).toEqual([]);
    expect(cache.snapshotMetrics()).toEqual({
      hits: 0,
      misses: 1,
      size: 0,
      evictions: 0,
      expirations: 1,
    });
  });

  test("should count a plain miss without an expiration", () => {
    const cache = new TtlCache<string>(1000);

    expect(cache.get("missing/1")).toEqual({ hit: false });
    expect(cache.snapshotMetrics().expirations).toBe(0);
    expect(cache.snapshotMetrics().misses).toBe(1);
  });

  test("should restart the lifetime on overwrite", () => {
    const cache = new TtlCache<number>(1000);
    cache.put("k", 1);
    jest.advanceTimersByTime(800);
    cache.put("k", 2);
    jest.advanceTimersByTime(800);

    expect(cache.get("k")).toEqual({ hit: true, value: 2 });
  });

  test("should keep unread expired entries until they are read", () => {
    const cache = new TtlCache<number>(1000);
    cache.put("a", 1);
    cache.put("b", 2);
    jest.advanceTimersByTime(5000);

    expect(cache.snapshotMetrics().size).toBe(2);
    cache.get("a");
    expect(cache.keys()).toEqual(["b"]);
  });

  test("should use an injected clock", () => {
    let now = 100;
    const cache = new TtlCache<string>(50, () => now);
    cache.put("k", "v");

    now = 150;
    expect(cache.get("k").hit).toBe(true);
    now = 151;
    expect(cache.get("k").hit).toBe(false);
  });
});
