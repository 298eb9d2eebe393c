import { randomUUID } from "crypto";
import { z } from "zod";
import type { Db } from "../../db/connection";
import type { DailyAggregator } from "../../core/summary/aggregator";
import { systemClock, type Clock } from "../../core/config";
import type { AppContext } from "../../middleware/resolveContext";
import { writeAuditEvent } from "../../audit/audit";
import { AppError } from "../../utils/errors";
import { isoLocalDay } from "../../utils/dates";
import { boundedNumber, IsoDaySchema } from "../../utils/validation";

export type ActivitiesDeps = {
  db: Db;
  summary: DailyAggregator;
  now?: Clock;
};

export type ActivityRecord = {
  activityId: string;
  userId: string;
  date: string;
  activityName: string;
  durationMinutes: number;
  caloriesBurned: number;
  notes: string;
  createdAt: string;
};

export const ActivityInputSchema = z.object({
  date: IsoDaySchema.optional(),
  activityName: z.string().trim().min(1).max(120),
  durationMinutes: boundedNumber(0, 1440, 0).pipe(z.number().int()),
  caloriesBurned: boundedNumber(0, 2000, 0),
  notes: z.string().trim().max(500).optional().default(""),
});

export function listActivities(db: Db, userId: string, date: string): ActivityRecord[] {
  return db
    .prepare(
      `
      SELECT activityId, userId, date, activityName, durationMinutes, caloriesBurned, notes, createdAt
      FROM activities
      WHERE userId = ? AND date = ?
      ORDER BY createdAt DESC
      `
    )
    .all(userId, date) as ActivityRecord[];
}

export function addActivity(deps: ActivitiesDeps, ctx: AppContext, body: unknown): ActivityRecord {
  const now = deps.now ?? systemClock;
  const input = ActivityInputSchema.parse(body ?? {});
  const createdAt = now();

  const activity: ActivityRecord = {
    activityId: randomUUID(),
    userId: ctx.userId,
    date: input.date ?? isoLocalDay(createdAt),
    activityName: input.activityName,
    durationMinutes: input.durationMinutes,
    caloriesBurned: input.caloriesBurned,
    notes: input.notes,
    createdAt: createdAt.toISOString(),
  };

  deps.db
    .prepare(
      `
      INSERT INTO activities (
        activityId, userId, date, activityName, durationMinutes, caloriesBurned, notes, createdAt
      )
      VALUES (@activityId, @userId, @date, @activityName, @durationMinutes, @caloriesBurned, @notes, @createdAt)
      `
    )
    .run(activity);

  deps.summary.resync(ctx.userId, activity.date);

  writeAuditEvent(deps.db, ctx, {
    action: "ACTIVITY_CREATE",
    targetType: "activity",
    targetId: activity.activityId,
    metadata: { date: activity.date, caloriesBurned: activity.caloriesBurned },
  });

  return activity;
}

/** Deletes one of the caller's activities and resyncs the day it belonged to. */
export function deleteActivity(deps: ActivitiesDeps, ctx: AppContext, activityId: string) {
  const id = String(activityId ?? "").trim();
  if (!id) throw new AppError("INVALID_ACTIVITY_ID");

  const row = deps.db
    .prepare("SELECT date FROM activities WHERE activityId = ? AND userId = ?")
    .get(id, ctx.userId) as { date: string } | undefined;

  // Someone else's activity looks exactly like a missing one.
  if (!row) throw new AppError("ACTIVITY_NOT_FOUND");

  deps.db.prepare("DELETE FROM activities WHERE activityId = ? AND userId = ?").run(id, ctx.userId);

  const summary = deps.summary.resync(ctx.userId, row.date);

  writeAuditEvent(deps.db, ctx, {
    action: "ACTIVITY_DELETE",
    targetType: "activity",
    targetId: id,
    metadata: { date: row.date },
  });

  return { ok: true as const, date: row.date, summary };
}
