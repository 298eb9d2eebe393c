import { randomUUID } from "crypto";
import { z } from "zod";
import type { Db } from "../../db/connection";
import type { Core } from "../../core";
import { systemClock, type Clock } from "../../core/config";
import type { NutritionSource, Nutrition } from "../../core/nutrition/types";
import { scaleNutrition, sumNutrition, REFERENCE_SERVING_GRAMS } from "../../core/nutrition/types";
import type { AppContext } from "../../middleware/resolveContext";
import { writeAuditEvent } from "../../audit/audit";
import { AppError } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { mealTypeForTime, type MealType } from "../../utils/mealTime";
import { isoLocalDay } from "../../utils/dates";
import { boundedNumber, IsoDaySchema, MealTypeSchema } from "../../utils/validation";

const log = createLogger("meals");

export type MealsDeps = {
  db: Db;
  core: Core;
  now?: Clock;
};

export type MealRecord = {
  mealId: string;
  userId: string;
  date: string;
  mealType: MealType;
  foodItems: string;
  calories: number;
  protein: number;
  fat: number;
  carbohydrates: number;
  hasImage: boolean;
  createdAt: string;
};

export type BreakdownItem = {
  food: string;
  source: NutritionSource;
  portionGrams: number;
  nutrition: Nutrition;
};

export type UploadedImage = {
  buffer: Buffer;
  mimetype: string;
};

export const ManualMealSchema = z.object({
  date: IsoDaySchema.optional(),
  mealType: MealTypeSchema.optional(),
  foodItems: z.string().trim().min(1).max(500),
  calories: boundedNumber(0, 5000, 0),
  protein: boundedNumber(0, 1000, 0),
  fat: boundedNumber(0, 1000, 0),
  carbohydrates: boundedNumber(0, 1000, 0),
});

export const PhotoMealSchema = z.object({
  date: IsoDaySchema.optional(),
  mealType: MealTypeSchema.optional(),
  portionGrams: boundedNumber(10, 1000, REFERENCE_SERVING_GRAMS),
});

const ALLOWED_IMAGE_TYPES = new Set(["image/jpeg", "image/jpg", "image/png"]);

const MEAL_ORDER_SQL = `
  CASE mealType
    WHEN 'breakfast' THEN 1
    WHEN 'lunch' THEN 2
    WHEN 'snacks' THEN 3
    WHEN 'dinner' THEN 4
  END
`;

type MealRow = Omit<MealRecord, "hasImage"> & { hasImage: number };

function toRecord(row: MealRow): MealRecord {
  return { ...row, hasImage: row.hasImage === 1 };
}

function insertMeal(
  db: Db,
  m: Omit<MealRecord, "mealId" | "hasImage"> & { imageData: string | null }
): MealRecord {
  const mealId = randomUUID();

  db.prepare(
    `
    INSERT INTO meals (
      mealId, userId, date, mealType, foodItems,
      calories, protein, fat, carbohydrates, imageData, createdAt
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `
  ).run(
    mealId,
    m.userId,
    m.date,
    m.mealType,
    m.foodItems,
    m.calories,
    m.protein,
    m.fat,
    m.carbohydrates,
    m.imageData,
    m.createdAt
  );

  const { imageData, ...rest } = m;
  return { mealId, ...rest, hasImage: imageData !== null };
}

export function listMeals(db: Db, userId: string, date: string): MealRecord[] {
  const rows = db
    .prepare(
      `
      SELECT mealId, userId, date, mealType, foodItems, calories, protein, fat, carbohydrates,
             (imageData IS NOT NULL) AS hasImage, createdAt
      FROM meals
      WHERE userId = ? AND date = ?
      ORDER BY ${MEAL_ORDER_SQL}, createdAt ASC
      `
    )
    .all(userId, date) as MealRow[];

  return rows.map(toRecord);
}

export function addManualMeal(deps: MealsDeps, ctx: AppContext, body: unknown): MealRecord {
  const now = deps.now ?? systemClock;
  const input = ManualMealSchema.parse(body ?? {});
  const createdAt = now();

  const meal = insertMeal(deps.db, {
    userId: ctx.userId,
    date: input.date ?? isoLocalDay(createdAt),
    mealType: input.mealType ?? mealTypeForTime(createdAt),
    foodItems: input.foodItems,
    calories: input.calories,
    protein: input.protein,
    fat: input.fat,
    carbohydrates: input.carbohydrates,
    imageData: null,
    createdAt: createdAt.toISOString(),
  });

  deps.core.summary.resync(ctx.userId, meal.date);

  writeAuditEvent(deps.db, ctx, {
    action: "MEAL_CREATE",
    targetType: "meal",
    targetId: meal.mealId,
    metadata: { entry: "manual", date: meal.date, calories: meal.calories },
  });

  return meal;
}

export async function addPhotoMeal(
  deps: MealsDeps,
  ctx: AppContext,
  fields: unknown,
  image: UploadedImage | undefined
): Promise<{ meal: MealRecord; foods: string[]; nutrition: Nutrition; breakdown: BreakdownItem[] }> {
  const now = deps.now ?? systemClock;
  const input = PhotoMealSchema.parse(fields ?? {});

  if (!image?.buffer?.length) throw new AppError("MISSING_PHOTO", 400);
  const mimetype = image.mimetype.toLowerCase();
  if (!ALLOWED_IMAGE_TYPES.has(mimetype)) throw new AppError("UNSUPPORTED_MEDIA_TYPE", 415);

  const identified = await deps.core.vision.identifyFoods(image.buffer, mimetype);
  if (identified.status === "failed") {
    throw new AppError("IMAGE_ANALYSIS_FAILED", 502, { reason: identified.reason });
  }
  if (identified.status === "empty") {
    throw new AppError("NO_FOOD_IDENTIFIED", 422);
  }

  const breakdown: BreakdownItem[] = [];
  for (const food of identified.foods) {
    const r = await deps.core.nutrition.resolveWithSource(food);
    breakdown.push({
      food,
      source: r.source,
      portionGrams: input.portionGrams,
      nutrition: scaleNutrition(r.nutrition, input.portionGrams),
    });
  }

  const nutrition = sumNutrition(breakdown.map((b) => b.nutrition));
  log.info(
    `photo meal for ${ctx.userId}: ${identified.foods.join(", ")} @ ${input.portionGrams}g each -> ${nutrition.calories.toFixed(1)} kcal`
  );

  const createdAt = now();
  const meal = insertMeal(deps.db, {
    userId: ctx.userId,
    date: input.date ?? isoLocalDay(createdAt),
    mealType: input.mealType ?? mealTypeForTime(createdAt),
    foodItems: identified.foods.join(", "),
    calories: nutrition.calories,
    protein: nutrition.protein,
    fat: nutrition.fat,
    carbohydrates: nutrition.carbohydrates,
    imageData: image.buffer.toString("base64"),
    createdAt: createdAt.toISOString(),
  });

  deps.core.summary.resync(ctx.userId, meal.date);

  writeAuditEvent(deps.db, ctx, {
    action: "MEAL_CREATE",
    targetType: "meal",
    targetId: meal.mealId,
    metadata: {
      entry: "photo",
      date: meal.date,
      foods: identified.foods,
      portionGrams: input.portionGrams,
      cachedAnalysis: identified.cached,
    },
  });

  return { meal, foods: identified.foods, nutrition, breakdown };
}
