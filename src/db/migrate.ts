import fs from "node:fs";
import path from "node:path";
import type { Db } from "./connection";
import { getMigrationsDir } from "./paths";
import { createLogger } from "../utils/logger";

const log = createLogger("migrate");

type MigrationFile = {
  name: string;
  fullPath: string;
};

function ensureSchemaVersionTable(db: Db) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      version TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
    );
  `);
}

export function getCurrentVersion(db: Db): string | null {
  ensureSchemaVersionTable(db);
  const row = db.prepare("SELECT version FROM schema_version WHERE id = 1").get() as
    | { version: string }
    | undefined;
  return row?.version ?? null;
}

function listMigrationFiles(dir: string): MigrationFile[] {
  return fs
    .readdirSync(dir)
    .filter((f) => /^\d{4}_.+\.sql$/.test(f))
    .sort()
    .map((name) => ({ name, fullPath: path.join(dir, name) }));
}

/**
 * Forward-only: runs every migration after the recorded version, in filename order.
 * Returns the names that were applied.
 */
export function runMigrations(db: Db, migrationsDir = getMigrationsDir()): string[] {
  if (!fs.existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const migrationFiles = listMigrationFiles(migrationsDir);
  if (migrationFiles.length === 0) {
    throw new Error(`No migrations found in: ${migrationsDir}`);
  }

  const current = getCurrentVersion(db);
  const startIndex =
    current === null ? 0 : Math.max(0, migrationFiles.findIndex((m) => m.name === current) + 1);

  const toRun = migrationFiles.slice(startIndex);

  const tx = db.transaction(() => {
    for (const m of toRun) {
      db.exec(fs.readFileSync(m.fullPath, "utf8"));
      // Migrations set schema_version themselves; enforce it in case one forgets.
      db.prepare("INSERT OR REPLACE INTO schema_version(id, version) VALUES (1, ?)").run(m.name);
    }
  });

  tx();

  if (toRun.length > 0) log.info(`applied ${toRun.map((m) => m.name).join(", ")}`);
  return toRun.map((m) => m.name);
}
