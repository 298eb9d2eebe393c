import { z } from "zod";

/** Nutrition for one serving (reference serving unless scaled). */
export type Nutrition = {
  calories: number;
  protein: number;
  fat: number;
  carbohydrates: number;
};

export const Per100gSchema = z.object({
  caloriesPer100g: z.number().min(0),
  proteinPer100g: z.number().min(0),
  fatPer100g: z.number().min(0),
  carbsPer100g: z.number().min(0),
});

export type Per100g = z.infer<typeof Per100gSchema>;

export type NutritionSource = "fact_cache" | "estimate" | "api" | "fallback";

/** Reference serving is 150 g; stored facts are per 100 g. */
export const REFERENCE_SERVING_GRAMS = 150;
export const REFERENCE_SERVING_FACTOR = REFERENCE_SERVING_GRAMS / 100;

export const GENERIC_FALLBACK: Readonly<Nutrition> = Object.freeze({
  calories: 100,
  protein: 5,
  fat: 3,
  carbohydrates: 15,
});

export function toReferenceServing(f: Per100g): Nutrition {
  return {
    calories: f.caloriesPer100g * REFERENCE_SERVING_FACTOR,
    protein: f.proteinPer100g * REFERENCE_SERVING_FACTOR,
    fat: f.fatPer100g * REFERENCE_SERVING_FACTOR,
    carbohydrates: f.carbsPer100g * REFERENCE_SERVING_FACTOR,
  };
}

/** Rescale a reference-serving value to an actual portion weight. */
export function scaleNutrition(n: Nutrition, portionGrams: number): Nutrition {
  const factor = portionGrams / REFERENCE_SERVING_GRAMS;
  return {
    calories: n.calories * factor,
    protein: n.protein * factor,
    fat: n.fat * factor,
    carbohydrates: n.carbohydrates * factor,
  };
}

export function sumNutrition(items: Nutrition[]): Nutrition {
  return items.reduce<Nutrition>(
    (acc, n) => ({
      calories: acc.calories + n.calories,
      protein: acc.protein + n.protein,
      fat: acc.fat + n.fat,
      carbohydrates: acc.carbohydrates + n.carbohydrates,
    }),
    { calories: 0, protein: 0, fat: 0, carbohydrates: 0 }
  );
}
