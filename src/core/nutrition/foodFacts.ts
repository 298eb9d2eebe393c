import type { Db } from "../../db/connection";
import { upsert } from "../../db/upsert";
import { systemClock, type Clock } from "../config";
import type { Per100g } from "./types";

export type FoodFact = Per100g & {
  foodName: string;
  lastUpdated: string;
};

/** Local per-100g fact cache (`food_cache`); names are unique case-insensitively. */
export type FoodFactStore = {
  find(foodName: string): FoodFact | null;
  save(foodName: string, per100g: Per100g): void;
};

export function createFoodFactStore(db: Db, now: Clock = systemClock): FoodFactStore {
  const selectByName = db.prepare(
    `
    SELECT foodName, caloriesPer100g, proteinPer100g, fatPer100g, carbsPer100g, lastUpdated
    FROM food_cache
    WHERE foodName = ? COLLATE NOCASE
    `
  );

  return {
    find(foodName) {
      const row = selectByName.get(foodName.trim()) as FoodFact | undefined;
      return row ?? null;
    },

    save(foodName, per100g) {
      upsert(
        db,
        "food_cache",
        { foodName: foodName.trim() },
        {
          caloriesPer100g: per100g.caloriesPer100g,
          proteinPer100g: per100g.proteinPer100g,
          fatPer100g: per100g.fatPer100g,
          carbsPer100g: per100g.carbsPer100g,
          lastUpdated: now().toISOString(),
        }
      );
    },
  };
}
