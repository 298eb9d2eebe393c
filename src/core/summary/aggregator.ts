import { systemClock, type Clock } from "../config";
import type { Db } from "../../db/connection";
import { upsert } from "../../db/upsert";
import { dayOfMonth, monthRange } from "../../utils/dates";
import { createLogger } from "../../utils/logger";

const log = createLogger("summary");

export type DailySummary = {
  userId: string;
  date: string;
  totalCaloriesConsumed: number;
  totalCaloriesBurned: number;
  netCalories: number;
  totalProtein: number;
  totalFat: number;
  totalCarbs: number;
};

export type CalendarDay = {
  consumed: number;
  burned: number;
  net: number;
  status: "good" | "over";
};

/** Day of month -> totals, only for days with a materialised summary. */
export type CalendarMonth = Record<number, CalendarDay>;

export type DailyAggregator = {
  resync(userId: string, date: string): DailySummary;
  getOrCreate(userId: string, date: string): DailySummary;
  getMonth(userId: string, year: number, month: number, targetCalories: number): CalendarMonth;
  reconcile(userId: string): number;
};

export function remainingCalories(summary: DailySummary, targetCalories: number): number {
  return targetCalories - (summary.totalCaloriesConsumed - summary.totalCaloriesBurned);
}

export function createDailyAggregator(db: Db, now: Clock = systemClock): DailyAggregator {
  const mealTotals = db.prepare(
    `
    SELECT
      COALESCE(SUM(calories), 0) AS calories,
      COALESCE(SUM(protein), 0) AS protein,
      COALESCE(SUM(fat), 0) AS fat,
      COALESCE(SUM(carbohydrates), 0) AS carbohydrates
    FROM meals
    WHERE userId = ? AND date = ?
    `
  );

  const activityTotals = db.prepare(
    `
    SELECT COALESCE(SUM(caloriesBurned), 0) AS burned
    FROM activities
    WHERE userId = ? AND date = ?
    `
  );

  const selectSummary = db.prepare(
    `
    SELECT userId, date, totalCaloriesConsumed, totalCaloriesBurned, netCalories,
           totalProtein, totalFat, totalCarbs
    FROM daily_summary
    WHERE userId = ? AND date = ?
    `
  );

  function read(userId: string, date: string): DailySummary | null {
    const row = selectSummary.get(userId, date) as DailySummary | undefined;
    return row ?? null;
  }

  // Summary rows are only ever written here.
  function resync(userId: string, date: string): DailySummary {
    const meals = mealTotals.get(userId, date) as {
      calories: number;
      protein: number;
      fat: number;
      carbohydrates: number;
    };
    const { burned } = activityTotals.get(userId, date) as { burned: number };

    const summary: DailySummary = {
      userId,
      date,
      totalCaloriesConsumed: meals.calories,
      totalCaloriesBurned: burned,
      netCalories: meals.calories - burned,
      totalProtein: meals.protein,
      totalFat: meals.fat,
      totalCarbs: meals.carbohydrates,
    };

    upsert(
      db,
      "daily_summary",
      { userId, date },
      {
        totalCaloriesConsumed: summary.totalCaloriesConsumed,
        totalCaloriesBurned: summary.totalCaloriesBurned,
        netCalories: summary.netCalories,
        totalProtein: summary.totalProtein,
        totalFat: summary.totalFat,
        totalCarbs: summary.totalCarbs,
        updatedAt: now().toISOString(),
      }
    );

    log.debug(`resynced ${userId} ${date}: net ${summary.netCalories}`);
    return summary;
  }

  function getOrCreate(userId: string, date: string): DailySummary {
    const existing = read(userId, date);
    if (existing) return existing;

    resync(userId, date);
    const created = read(userId, date);
    if (!created) throw new Error("SUMMARY_NOT_FOUND");
    return created;
  }

  function getMonth(userId: string, year: number, month: number, targetCalories: number): CalendarMonth {
    const { start, end } = monthRange(year, month);
    const rows = db
      .prepare(
        `
        SELECT date, totalCaloriesConsumed, totalCaloriesBurned, netCalories
        FROM daily_summary
        WHERE userId = ? AND date >= ? AND date < ?
        ORDER BY date ASC
        `
      )
      .all(userId, start, end) as Array<{
      date: string;
      totalCaloriesConsumed: number;
      totalCaloriesBurned: number;
      netCalories: number;
    }>;

    const out: CalendarMonth = {};
    for (const r of rows) {
      out[dayOfMonth(r.date)] = {
        consumed: r.totalCaloriesConsumed,
        burned: r.totalCaloriesBurned,
        net: r.netCalories,
        status: r.netCalories <= targetCalories ? "good" : "over",
      };
    }
    return out;
  }

  function reconcile(userId: string): number {
    const dates = db
      .prepare(
        `
        SELECT date FROM meals WHERE userId = ?
        UNION
        SELECT date FROM activities WHERE userId = ?
        UNION
        SELECT date FROM daily_summary WHERE userId = ?
        `
      )
      .all(userId, userId, userId) as Array<{ date: string }>;

    const tx = db.transaction(() => {
      for (const d of dates) resync(userId, d.date);
    });
    tx();

    log.info(`reconciled ${dates.length} day(s) for ${userId}`);
    return dates.length;
  }

  return { resync, getOrCreate, getMonth, reconcile };
}
