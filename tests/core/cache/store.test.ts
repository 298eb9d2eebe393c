import { describe, it, expect, beforeEach } from "vitest";
import { z } from "zod";
import { computeKey, createCacheStore, type CacheStore } from "../../../src/core/cache/store";
import type { Db } from "../../../src/db/connection";
import { createClock, createTestDb } from "../../helpers";

const Payload = z.object({ foods: z.array(z.string()) });

describe("computeKey", () => {
  it("is deterministic for identical input", () => {
    expect(computeKey("eggs, toast")).toBe(computeKey("eggs, toast"));
  });

  it("differs for different input", () => {
    expect(computeKey("eggs")).not.toBe(computeKey("egg"));
  });

  it("gives the same key for a string and its UTF-8 bytes", () => {
    expect(computeKey(Buffer.from("abc", "utf8"))).toBe(computeKey("abc"));
  });

  it("returns a 64 character hex digest", () => {
    expect(computeKey("anything")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("cache store", () => {
  let db: Db;
  let clock: ReturnType<typeof createClock>;
  let cache: CacheStore;

  beforeEach(() => {
    db = createTestDb();
    clock = createClock();
    cache = createCacheStore(db, clock.now);
  });

  it("returns a value right after put", () => {
    cache.put("k1", { foods: ["eggs"] }, 24, "image_analysis");
    expect(cache.get("k1", "image_analysis", Payload)).toEqual({ foods: ["eggs"] });
  });

  it("reports a miss for unknown keys", () => {
    expect(cache.get("nope", "image_analysis", Payload)).toBeNull();
  });

  it("serves entries until expiry and misses from expiresAt on", () => {
    cache.put("k1", { foods: ["eggs"] }, 24, "image_analysis");

    clock.advanceHours(23.5);
    expect(cache.get("k1", "image_analysis", Payload)).toEqual({ foods: ["eggs"] });

    clock.advanceHours(0.5);
    expect(cache.get("k1", "image_analysis", Payload)).toBeNull();
  });

  it("keeps cache classes independent", () => {
    cache.put("shared", { foods: ["rice"] }, 24, "image_analysis");
    expect(cache.get("shared", "nutrition_lookup", Payload)).toBeNull();
  });

  it("overwrites an existing key and restarts its TTL", () => {
    cache.put("k1", { foods: ["eggs"] }, 1, "image_analysis");
    clock.advanceHours(0.5);
    cache.put("k1", { foods: ["toast"] }, 1, "image_analysis");
    clock.advanceHours(0.75);

    expect(cache.get("k1", "image_analysis", Payload)).toEqual({ foods: ["toast"] });
    const count = db.prepare("SELECT COUNT(*) AS n FROM api_cache").get() as { n: number };
    expect(count.n).toBe(1);
  });

  it("treats a payload of the wrong shape as a miss", () => {
    cache.put("k1", ["not", "an", "object"], 24, "image_analysis");
    expect(cache.get("k1", "image_analysis", Payload)).toBeNull();
  });

  it("purges only expired rows", () => {
    cache.put("short", { foods: [] }, 1, "image_analysis");
    cache.put("long", { foods: ["kept"] }, 48, "image_analysis");
    clock.advanceHours(2);

    expect(cache.purgeExpired()).toBe(1);
    expect(cache.get("long", "image_analysis", Payload)).toEqual({ foods: ["kept"] });
  });
});
