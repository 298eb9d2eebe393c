import crypto from "node:crypto";
import type { z } from "zod";
import type { Db } from "../../db/connection";
import { upsert } from "../../db/upsert";
import { systemClock, type Clock } from "../config";
import { createLogger } from "../../utils/logger";

const log = createLogger("cache");

/** Named partitions of `api_cache`; keys are independent across classes. */
export type CacheClass = "image_analysis" | "nutrition_lookup";

const HOUR_MS = 60 * 60 * 1000;

/** Content-addressed key: SHA-256 hex of the string (UTF-8) or raw bytes. */
export function computeKey(input: string | Buffer): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

export type CacheStore = {
  get<T>(key: string, cacheClass: CacheClass, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null;
  put(key: string, value: unknown, ttlHours: number, cacheClass: CacheClass): void;
  purgeExpired(): number;
};

export function createCacheStore(db: Db, now: Clock = systemClock): CacheStore {
  const selectLive = db.prepare(
    `
    SELECT responseData
    FROM api_cache
    WHERE cacheClass = ? AND cacheKey = ? AND expiresAt > ?
    `
  );

  return {
    get(key, cacheClass, schema) {
      const row = selectLive.get(cacheClass, key, now().toISOString()) as
        | { responseData: string }
        | undefined;

      if (!row) {
        log.debug(`miss ${cacheClass}:${key.slice(0, 8)}`);
        return null;
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(row.responseData);
      } catch {
        log.warn(`undecodable entry ${cacheClass}:${key.slice(0, 8)}, treating as miss`);
        return null;
      }

      const parsed = schema.safeParse(decoded);
      if (!parsed.success) {
        log.warn(`entry ${cacheClass}:${key.slice(0, 8)} has unexpected shape, treating as miss`);
        return null;
      }

      log.debug(`hit ${cacheClass}:${key.slice(0, 8)}`);
      return parsed.data;
    },

    put(key, value, ttlHours, cacheClass) {
      const createdAt = now();
      const expiresAt = new Date(createdAt.getTime() + ttlHours * HOUR_MS);

      upsert(
        db,
        "api_cache",
        { cacheClass, cacheKey: key },
        {
          responseData: JSON.stringify(value),
          createdAt: createdAt.toISOString(),
          expiresAt: expiresAt.toISOString(),
        }
      );
      log.debug(`stored ${cacheClass}:${key.slice(0, 8)} for ${ttlHours}h`);
    },

    purgeExpired() {
      const r = db.prepare("DELETE FROM api_cache WHERE expiresAt <= ?").run(now().toISOString());
      return r.changes;
    },
  };
}
