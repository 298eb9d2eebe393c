import { describe, it, expect, beforeEach } from "vitest";
import type { Db } from "../../../src/db/connection";
import { createDailyAggregator, remainingCalories, type DailyAggregator } from "../../../src/core/summary/aggregator";
import { ensureUser } from "../../../src/modules/profile/bootstrap";
import { createClock, createTestDb, insertActivityRow, insertMealRow } from "../../helpers";

describe("daily aggregator", () => {
  let db: Db;
  let summary: DailyAggregator;

  beforeEach(() => {
    db = createTestDb();
    summary = createDailyAggregator(db, createClock().now);
    ensureUser(db, "1", 2000);
    ensureUser(db, "2", 2000);
  });

  it("totals meals and activities for the day", () => {
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-03-10", calories: 300, protein: 20, fat: 10, carbohydrates: 30 });
    insertMealRow(db, { mealId: "m2", userId: "1", date: "2024-03-10", calories: 200, protein: 5, fat: 2, carbohydrates: 40 });
    insertActivityRow(db, { activityId: "a1", userId: "1", date: "2024-03-10", caloriesBurned: 200 });

    expect(summary.resync("1", "2024-03-10")).toEqual({
      userId: "1",
      date: "2024-03-10",
      totalCaloriesConsumed: 500,
      totalCaloriesBurned: 200,
      netCalories: 300,
      totalProtein: 25,
      totalFat: 12,
      totalCarbs: 70,
    });
  });

  it("ignores other days and other users", () => {
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-03-10", calories: 400 });
    insertMealRow(db, { mealId: "m2", userId: "1", date: "2024-03-11", calories: 900 });
    insertMealRow(db, { mealId: "m3", userId: "2", date: "2024-03-10", calories: 700 });

    expect(summary.resync("1", "2024-03-10").totalCaloriesConsumed).toBe(400);
  });

  it("writes zeros for a day with no rows", () => {
    const s = summary.getOrCreate("1", "2024-03-12");
    expect(s.totalCaloriesConsumed).toBe(0);
    expect(s.totalCaloriesBurned).toBe(0);
    expect(s.netCalories).toBe(0);

    const row = db.prepare("SELECT COUNT(*) AS n FROM daily_summary WHERE userId = '1'").get() as { n: number };
    expect(row.n).toBe(1);
  });

  it("materialises an all-zero day for an id without a users row", () => {
    expect(summary.getOrCreate("42", "2024-01-01")).toEqual({
      userId: "42",
      date: "2024-01-01",
      totalCaloriesConsumed: 0,
      totalCaloriesBurned: 0,
      netCalories: 0,
      totalProtein: 0,
      totalFat: 0,
      totalCarbs: 0,
    });
  });

  it("returns the stored row from getOrCreate until the next resync", () => {
    summary.getOrCreate("1", "2024-03-10");
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-03-10", calories: 250 });

    expect(summary.getOrCreate("1", "2024-03-10").totalCaloriesConsumed).toBe(0);
    summary.resync("1", "2024-03-10");
    expect(summary.getOrCreate("1", "2024-03-10").totalCaloriesConsumed).toBe(250);
  });

  it("reflects deleted rows after a resync", () => {
    insertActivityRow(db, { activityId: "a1", userId: "1", date: "2024-03-10", caloriesBurned: 150 });
    summary.resync("1", "2024-03-10");

    db.prepare("DELETE FROM activities WHERE activityId = 'a1'").run();
    expect(summary.resync("1", "2024-03-10").totalCaloriesBurned).toBe(0);
  });

  it("builds a month calendar with status against the target", () => {
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-03-05", calories: 500 });
    insertActivityRow(db, { activityId: "a1", userId: "1", date: "2024-03-05", caloriesBurned: 200 });
    insertMealRow(db, { mealId: "m2", userId: "1", date: "2024-03-20", calories: 2500 });
    insertMealRow(db, { mealId: "m3", userId: "1", date: "2024-03-21", calories: 2000 });
    insertMealRow(db, { mealId: "m4", userId: "1", date: "2024-04-01", calories: 100 });
    for (const d of ["2024-03-05", "2024-03-20", "2024-03-21", "2024-04-01"]) summary.resync("1", d);

    expect(summary.getMonth("1", 2024, 3, 2000)).toEqual({
      5: { consumed: 500, burned: 200, net: 300, status: "good" },
      20: { consumed: 2500, burned: 0, net: 2500, status: "over" },
      21: { consumed: 2000, burned: 0, net: 2000, status: "good" },
    });
  });

  it("handles December without leaking into the next year", () => {
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-12-31", calories: 100 });
    insertMealRow(db, { mealId: "m2", userId: "1", date: "2025-01-01", calories: 100 });
    summary.resync("1", "2024-12-31");
    summary.resync("1", "2025-01-01");

    expect(Object.keys(summary.getMonth("1", 2024, 12, 2000))).toEqual(["31"]);
  });

  it("reconciles every day that has rows or a stale summary", () => {
    insertMealRow(db, { mealId: "m1", userId: "1", date: "2024-03-10", calories: 600 });
    insertActivityRow(db, { activityId: "a1", userId: "1", date: "2024-03-11", caloriesBurned: 300 });
    summary.resync("1", "2024-03-12");
    db.prepare("UPDATE daily_summary SET totalCaloriesConsumed = 999, netCalories = 999 WHERE date = '2024-03-12'").run();

    expect(summary.reconcile("1")).toBe(3);
    expect(summary.getOrCreate("1", "2024-03-10").netCalories).toBe(600);
    expect(summary.getOrCreate("1", "2024-03-11").netCalories).toBe(-300);
    expect(summary.getOrCreate("1", "2024-03-12").netCalories).toBe(0);
  });
});

describe("remainingCalories", () => {
  it("subtracts net intake from the target", () => {
    expect(
      remainingCalories(
        {
          userId: "1",
          date: "2024-03-10",
          totalCaloriesConsumed: 500,
          totalCaloriesBurned: 200,
          netCalories: 300,
          totalProtein: 0,
          totalFat: 0,
          totalCarbs: 0,
        },
        2000
      )
    ).toBe(1700);
  });
});
