import { Router } from "express";
import { z } from "zod";
import type { Db } from "../../db/connection";
import type { DailyAggregator } from "../../core/summary/aggregator";
import { remainingCalories } from "../../core/summary/aggregator";
import { apiOk, getCtx } from "../../middleware/resolveContext";
import { writeAuditEvent } from "../../audit/audit";
import { IsoDaySchema } from "../../utils/validation";
import { getTargetCalories } from "../profile/service";

const MonthParamsSchema = z.object({
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

export function summaryRouter(deps: { db: Db; summary: DailyAggregator; defaultTargetCalories: number }) {
  const r = Router();

  // Lazily materialises the summary for days never written to.
  r.get("/daily/:date", (req, res) => {
    const { userId } = getCtx(req);
    const date = IsoDaySchema.parse(req.params.date);

    const summary = deps.summary.getOrCreate(userId, date);
    const targetCalories = getTargetCalories(deps.db, userId, deps.defaultTargetCalories);

    res.json(
      apiOk(req, {
        ...summary,
        targetCalories,
        remainingCalories: remainingCalories(summary, targetCalories),
      })
    );
  });

  r.get("/calendar/:year/:month", (req, res) => {
    const { userId } = getCtx(req);
    const { year, month } = MonthParamsSchema.parse(req.params);
    const targetCalories = getTargetCalories(deps.db, userId, deps.defaultTargetCalories);

    res.json(apiOk(req, { year, month, targetCalories, days: deps.summary.getMonth(userId, year, month, targetCalories) }));
  });

  r.post("/reconcile", (req, res) => {
    const ctx = getCtx(req);
    const days = deps.summary.reconcile(ctx.userId);

    writeAuditEvent(deps.db, ctx, {
      action: "SUMMARY_RECONCILE",
      targetType: "user",
      targetId: ctx.userId,
      metadata: { days },
    });

    res.json(apiOk(req, { days }));
  });

  return r;
}
