import { systemClock, type CoreDeps } from "./config";
import { createCacheStore, type CacheStore } from "./cache/store";
import { createFoodFactStore } from "./nutrition/foodFacts";
import { createNutritionResolver, type NutritionResolver } from "./nutrition/resolver";
import { createImageAnalyzer, type ImageAnalyzer } from "./vision/identifyFoods";
import { createDailyAggregator, type DailyAggregator } from "./summary/aggregator";

export type Core = {
  cache: CacheStore;
  nutrition: NutritionResolver;
  vision: ImageAnalyzer;
  summary: DailyAggregator;
};

/** Wires the four core components over one database, config, fetch and clock. */
export function createCore(deps: CoreDeps): Core {
  const now = deps.now ?? systemClock;
  const cache = createCacheStore(deps.db, now);
  const facts = createFoodFactStore(deps.db, now);

  return {
    cache,
    nutrition: createNutritionResolver({ ...deps, now, cache, facts }),
    vision: createImageAnalyzer({ ...deps, now, cache }),
    summary: createDailyAggregator(deps.db, now),
  };
}
