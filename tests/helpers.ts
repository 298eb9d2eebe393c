import { openDb, type Db } from "../src/db/connection";
import { runMigrations } from "../src/db/migrate";
import type { CoreConfig } from "../src/core/config";
import type { AppContext } from "../src/middleware/resolveContext";
import { ensureUser } from "../src/modules/profile/bootstrap";

export function createTestDb(): Db {
  const db = openDb(":memory:");
  runMigrations(db);
  return db;
}

export function testConfig(overrides: {
  geminiApiKey?: string | null;
  fatSecretToken?: string | null;
} = {}): CoreConfig {
  return {
    gemini: {
      apiKey: overrides.geminiApiKey === undefined ? "test-gemini-key" : overrides.geminiApiKey,
      model: "gemini-1.5-flash",
      baseUrl: "https://vision.test/v1beta",
    },
    fatSecret: {
      accessToken: overrides.fatSecretToken === undefined ? null : overrides.fatSecretToken,
      baseUrl: "https://nutrition.test/rest/server.api",
    },
    cache: {
      imageTtlHours: 168,
      apiTtlHours: 24,
      imageKeyChars: 100,
    },
    defaultTargetCalories: 2000,
  };
}

/** Manually advanced clock. */
export function createClock(startIso = "2024-01-01T12:00:00.000Z") {
  let t = new Date(startIso).getTime();
  return {
    now: () => new Date(t),
    advanceHours(h: number) {
      t += h * 60 * 60 * 1000;
    },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function testCtx(db: Db, userId = "1"): AppContext {
  ensureUser(db, userId, 2000);
  return { userId, requestId: "req-test", ip: "127.0.0.1", userAgent: "vitest" };
}

export function insertMealRow(
  db: Db,
  row: { mealId: string; userId: string; date: string; calories: number; protein?: number; fat?: number; carbohydrates?: number }
) {
  db.prepare(
    `
    INSERT INTO meals (mealId, userId, date, mealType, foodItems, calories, protein, fat, carbohydrates, createdAt)
    VALUES (?, ?, ?, 'lunch', 'test food', ?, ?, ?, ?, '2024-01-01T12:00:00.000Z')
    `
  ).run(row.mealId, row.userId, row.date, row.calories, row.protein ?? 0, row.fat ?? 0, row.carbohydrates ?? 0);
}

export function insertActivityRow(
  db: Db,
  row: { activityId: string; userId: string; date: string; caloriesBurned: number }
) {
  db.prepare(
    `
    INSERT INTO activities (activityId, userId, date, activityName, durationMinutes, caloriesBurned, notes, createdAt)
    VALUES (?, ?, ?, 'walk', 30, ?, '', '2024-01-01T12:00:00.000Z')
    `
  ).run(row.activityId, row.userId, row.date, row.caloriesBurned);
}
