import type { Db } from "../../db/connection";

/** Creates the caller's `users` row on first sight. */
export function ensureUser(db: Db, userId: string, defaultTargetCalories: number): void {
  db.prepare(
    `
    INSERT INTO users (userId, targetCalories)
    VALUES (?, ?)
    ON CONFLICT(userId) DO NOTHING
    `
  ).run(userId, defaultTargetCalories);
}
