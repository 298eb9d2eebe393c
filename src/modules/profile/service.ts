import { z } from "zod";
import type { Db } from "../../db/connection";
import type { AppContext } from "../../middleware/resolveContext";
import { writeAuditEvent } from "../../audit/audit";
import { AppError } from "../../utils/errors";

export type Profile = {
  userId: string;
  name: string | null;
  age: number | null;
  heightCm: number | null;
  targetCalories: number;
};

export const ProfileUpdateSchema = z.object({
  name: z.string().trim().max(120).nullable().optional(),
  age: z.coerce.number().int().min(1).max(150).nullable().optional(),
  heightCm: z.coerce.number().min(50).max(300).nullable().optional(),
  targetCalories: z.coerce.number().int().min(500).max(10000).optional(),
});

export function getProfile(db: Db, userId: string): Profile {
  const row = db
    .prepare("SELECT userId, name, age, heightCm, targetCalories FROM users WHERE userId = ?")
    .get(userId) as Profile | undefined;
  if (!row) throw new AppError("USER_NOT_FOUND");
  return row;
}

export function getTargetCalories(db: Db, userId: string, fallback: number): number {
  const row = db.prepare("SELECT targetCalories FROM users WHERE userId = ?").get(userId) as
    | { targetCalories: number }
    | undefined;
  return row?.targetCalories ?? fallback;
}

/** Partial update: fields left out keep their value, explicit null clears them. */
export function updateProfile(db: Db, ctx: AppContext, body: unknown): Profile {
  const input = ProfileUpdateSchema.parse(body ?? {});
  const current = getProfile(db, ctx.userId);

  const next: Profile = {
    userId: ctx.userId,
    name: input.name === undefined ? current.name : input.name || null,
    age: input.age === undefined ? current.age : input.age,
    heightCm: input.heightCm === undefined ? current.heightCm : input.heightCm,
    targetCalories: input.targetCalories ?? current.targetCalories,
  };

  db.prepare(
    `
    UPDATE users
    SET name = ?, age = ?, heightCm = ?, targetCalories = ?,
        updatedAt = strftime('%Y-%m-%dT%H:%M:%fZ','now')
    WHERE userId = ?
    `
  ).run(next.name, next.age, next.heightCm, next.targetCalories, ctx.userId);

  writeAuditEvent(db, ctx, {
    action: "PROFILE_UPDATE",
    targetType: "user",
    targetId: ctx.userId,
    metadata: { fields: Object.keys(input) },
  });

  return next;
}
