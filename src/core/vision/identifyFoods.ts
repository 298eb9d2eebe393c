import { z } from "zod";
import { systemClock, type CoreDeps, type FetchFn } from "../config";
import { computeKey, createCacheStore, type CacheStore } from "../cache/store";
import { createLogger } from "../../utils/logger";
import { FOOD_LIST_PROMPT, generateFromImage } from "./gemini";

const log = createLogger("vision");

export type FoodIdentification =
  | { status: "identified"; foods: string[]; cached: boolean }
  | { status: "empty" }
  | { status: "failed"; reason: "not_configured" | "transport" | "bad_response" };

export type ImageAnalyzer = {
  identifyFoods(image: Buffer, mimeType?: string): Promise<FoodIdentification>;
};

const FoodListSchema = z.array(z.string().min(1)).min(1);

export function splitFoodList(text: string): string[] {
  return text
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function createImageAnalyzer(deps: CoreDeps & { cache?: CacheStore }): ImageAnalyzer {
  const now = deps.now ?? systemClock;
  const fetchFn: FetchFn = deps.fetch ?? globalThis.fetch;
  const cache = deps.cache ?? createCacheStore(deps.db, now);
  const { gemini, cache: cacheCfg } = deps.config;

  return {
    async identifyFoods(image, mimeType = "image/jpeg") {
      const imageBase64 = image.toString("base64");

      // Keyed on a prefix only: cheap to hash, collisions bounded by the TTL.
      const key = computeKey(imageBase64.slice(0, cacheCfg.imageKeyChars));
      const cached = cache.get(key, "image_analysis", FoodListSchema);
      if (cached) return { status: "identified", foods: cached, cached: true };

      if (!gemini.apiKey) {
        log.error("image analysis requested but GEMINI_API_KEY is not configured");
        return { status: "failed", reason: "not_configured" };
      }

      log.info("calling Gemini for food identification");
      const r = await generateFromImage({
        fetch: fetchFn,
        baseUrl: gemini.baseUrl,
        model: gemini.model,
        apiKey: gemini.apiKey,
        prompt: FOOD_LIST_PROMPT,
        mimeType,
        imageBase64,
      });

      if (!r.ok) {
        log.error(`Gemini call failed (${r.reason}): ${r.detail}`);
        return { status: "failed", reason: r.reason };
      }

      const foods = splitFoodList(r.text);
      if (foods.length === 0) {
        log.warn("Gemini returned no usable food list");
        return { status: "empty" };
      }

      log.info(`Gemini identified: ${foods.join(", ")}`);
      cache.put(key, foods, cacheCfg.imageTtlHours, "image_analysis");
      return { status: "identified", foods, cached: false };
    },
  };
}
