import { systemClock, type CoreDeps, type FetchFn } from "../config";
import { computeKey, createCacheStore, type CacheStore } from "../cache/store";
import { createLogger } from "../../utils/logger";
import { matchEstimate, normalizeFoodName } from "./estimates";
import { createFoodFactStore, type FoodFactStore } from "./foodFacts";
import {
  FoodsSearchResponseSchema,
  firstDescription,
  parseFoodDescription,
  searchFoods,
  type FoodsSearchResponse,
} from "./fatsecret";
import {
  GENERIC_FALLBACK,
  toReferenceServing,
  type Nutrition,
  type NutritionSource,
  type Per100g,
} from "./types";

const log = createLogger("nutrition");

export type ResolvedNutrition = {
  nutrition: Nutrition;
  source: NutritionSource;
};

export type NutritionResolver = {
  /** Nutrition for one reference serving (150 g). Never rejects. */
  resolve(foodName: string): Promise<Nutrition>;
  resolveWithSource(foodName: string): Promise<ResolvedNutrition>;
};

export function createNutritionResolver(
  deps: CoreDeps & { cache?: CacheStore; facts?: FoodFactStore }
): NutritionResolver {
  const now = deps.now ?? systemClock;
  const fetchFn: FetchFn = deps.fetch ?? globalThis.fetch;
  const cache = deps.cache ?? createCacheStore(deps.db, now);
  const facts = deps.facts ?? createFoodFactStore(deps.db, now);
  const { fatSecret, cache: cacheCfg } = deps.config;

  function fallback(): ResolvedNutrition {
    return { nutrition: { ...GENERIC_FALLBACK }, source: "fallback" };
  }

  async function lookupRemote(foodName: string, accessToken: string): Promise<Per100g | null> {
    const key = computeKey(`fatsecret:${normalizeFoodName(foodName)}`);

    let body: FoodsSearchResponse | null = cache.get(key, "nutrition_lookup", FoodsSearchResponseSchema);
    if (!body) {
      log.info(`calling FatSecret for '${foodName}'`);
      const r = await searchFoods({ fetch: fetchFn, baseUrl: fatSecret.baseUrl, accessToken, foodName });
      if (!r.ok) {
        log.error(`FatSecret lookup failed for '${foodName}' (${r.reason}): ${r.detail}`);
        return null;
      }
      body = r.body;
      cache.put(key, body, cacheCfg.apiTtlHours, "nutrition_lookup");
    }

    const description = firstDescription(body);
    if (!description) {
      log.warn(`no FatSecret result for '${foodName}'`);
      return null;
    }

    const parsed = parseFoodDescription(description);
    if (!parsed) log.warn(`could not parse FatSecret nutrition for '${foodName}': ${description}`);
    return parsed;
  }

  async function resolveWithSource(foodName: string): Promise<ResolvedNutrition> {
    const name = foodName.trim();
    if (!normalizeFoodName(name)) return fallback();

    const fact = facts.find(name);
    if (fact) {
      log.debug(`fact cache hit for '${name}'`);
      return { nutrition: toReferenceServing(fact), source: "fact_cache" };
    }

    const estimate = matchEstimate(name);
    if (estimate) {
      log.info(`estimated nutrition for '${name}' (matched '${estimate.key}')`);
      facts.save(name, estimate.per100g);
      return { nutrition: toReferenceServing(estimate.per100g), source: "estimate" };
    }

    if (!fatSecret.accessToken) {
      log.warn(`no estimate for '${name}' and no FatSecret token; using generic values`);
      return fallback();
    }

    try {
      const per100g = await lookupRemote(name, fatSecret.accessToken);
      if (!per100g) return fallback();

      facts.save(name, per100g);
      return { nutrition: toReferenceServing(per100g), source: "api" };
    } catch (e) {
      log.error(`unexpected nutrition lookup failure for '${name}':`, e);
      return fallback();
    }
  }

  return {
    resolveWithSource,
    async resolve(foodName) {
      const r = await resolveWithSource(foodName);
      return r.nutrition;
    },
  };
}
