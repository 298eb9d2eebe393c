import { randomUUID } from "crypto";
import { z } from "zod";
import type { Db } from "../../db/connection";
import type { AppContext } from "../../middleware/resolveContext";
import { systemClock, type Clock } from "../../core/config";
import { writeAuditEvent } from "../../audit/audit";
import { AppError } from "../../utils/errors";
import { addDays, isoLocalDay } from "../../utils/dates";
import { IsoDaySchema, optionalNumber } from "../../utils/validation";

export const VitalsInputSchema = z.object({
  date: IsoDaySchema.optional(),
  weight: optionalNumber(0, 500),
  bmi: optionalNumber(0, 100),
  bodyFatPercentage: optionalNumber(0, 100),
  skeletalMusclePercentage: optionalNumber(0, 100),
  fatFreeMass: optionalNumber(0, 500),
  subcutaneousFat: optionalNumber(0, 100),
  visceralFat: optionalNumber(0, 100),
  bodyWaterPercentage: optionalNumber(0, 100),
  muscleMass: optionalNumber(0, 500),
  boneMass: optionalNumber(0, 100),
  proteinPercentage: optionalNumber(0, 100),
  bmr: optionalNumber(0, 10000),
  metabolicAge: optionalNumber(0, 150).pipe(z.number().int().nullable()),
});

export type VitalsInput = z.infer<typeof VitalsInputSchema>;

export type VitalsRecord = Omit<VitalsInput, "date"> & {
  date: string;
  vitalId: string;
  userId: string;
  createdAt: string;
};

const VitalsRangeSchema = z.object({
  from: IsoDaySchema.optional(),
  to: IsoDaySchema.optional(),
});

export function addVitals(db: Db, ctx: AppContext, body: unknown, now: Clock = systemClock): VitalsRecord {
  const input = VitalsInputSchema.parse(body ?? {});
  const createdAt = now();

  const record: VitalsRecord = {
    vitalId: randomUUID(),
    userId: ctx.userId,
    createdAt: createdAt.toISOString(),
    ...input,
    date: input.date ?? isoLocalDay(createdAt),
  };

  db.prepare(
    `
    INSERT INTO vitals (
      vitalId, userId, date, weight, bmi, bodyFatPercentage, skeletalMusclePercentage,
      fatFreeMass, subcutaneousFat, visceralFat, bodyWaterPercentage, muscleMass, boneMass,
      proteinPercentage, bmr, metabolicAge, createdAt
    )
    VALUES (
      @vitalId, @userId, @date, @weight, @bmi, @bodyFatPercentage, @skeletalMusclePercentage,
      @fatFreeMass, @subcutaneousFat, @visceralFat, @bodyWaterPercentage, @muscleMass, @boneMass,
      @proteinPercentage, @bmr, @metabolicAge, @createdAt
    )
    `
  ).run(record);

  writeAuditEvent(db, ctx, {
    action: "VITALS_CREATE",
    targetType: "vitals",
    targetId: record.vitalId,
    metadata: { date: record.date },
  });

  return record;
}

/** Entries in `[from, to]`, oldest first. Defaults to the last 30 days. */
export function listVitals(db: Db, userId: string, query: unknown, now: Clock = systemClock): VitalsRecord[] {
  const q = VitalsRangeSchema.parse(query ?? {});
  const to = q.to ?? isoLocalDay(now());
  const from = q.from ?? addDays(to, -30);
  if (from > to) throw new AppError("INVALID_DATE_RANGE");

  return db
    .prepare(
      `
      SELECT vitalId, userId, date, weight, bmi, bodyFatPercentage, skeletalMusclePercentage,
             fatFreeMass, subcutaneousFat, visceralFat, bodyWaterPercentage, muscleMass, boneMass,
             proteinPercentage, bmr, metabolicAge, createdAt
      FROM vitals
      WHERE userId = ? AND date BETWEEN ? AND ?
      ORDER BY date ASC, createdAt ASC
      `
    )
    .all(userId, from, to) as VitalsRecord[];
}
