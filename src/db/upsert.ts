import type { Db } from "./connection";

export type SqlValue = string | number | null;
export type Row = Record<string, SqlValue>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function assertIdentifier(name: string) {
  if (!IDENTIFIER.test(name)) throw new Error(`INVALID_IDENTIFIER:${name}`);
}

/**
 * Insert-or-update a single row keyed by `key`.
 *
 * This is the only place that spells the dialect's upsert syntax; callers describe
 * the row and never build conflict clauses themselves.
 */
export function upsert(db: Db, table: string, key: Row, fields: Row): void {
  const keyCols = Object.keys(key);
  const fieldCols = Object.keys(fields);
  if (keyCols.length === 0) throw new Error("INVALID_UPSERT_KEY");

  assertIdentifier(table);
  for (const c of [...keyCols, ...fieldCols]) assertIdentifier(c);

  const cols = [...keyCols, ...fieldCols];
  const placeholders = cols.map((c) => `@${c}`).join(", ");

  const onConflict =
    fieldCols.length === 0
      ? "DO NOTHING"
      : `DO UPDATE SET ${fieldCols.map((c) => `${c} = excluded.${c}`).join(", ")}`;

  db.prepare(
    `
    INSERT INTO ${table} (${cols.join(", ")})
    VALUES (${placeholders})
    ON CONFLICT(${keyCols.join(", ")}) ${onConflict}
    `
  ).run({ ...fields, ...key });
}
