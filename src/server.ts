import fs from "node:fs";
import path from "node:path";
import { createApp } from "./app";
import { buildCoreConfig, loadEnv, warnOnMissingCredentials } from "./config/env";
import { getDbFilePath } from "./db/paths";
import { openDb } from "./db/connection";
import { runMigrations } from "./db/migrate";
import { createCore } from "./core";
import { createLogger } from "./utils/logger";

const log = createLogger("server");

function ensureDbDir(dbFilePath: string) {
  const dir = path.dirname(dbFilePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

async function main() {
  const env = loadEnv();
  process.env.LOG_LEVEL = env.LOG_LEVEL;

  const config = buildCoreConfig(env);
  warnOnMissingCredentials(config);

  const dbFilePath = getDbFilePath(env);
  ensureDbDir(dbFilePath);

  const db = openDb(dbFilePath);
  runMigrations(db);

  const core = createCore({ db, config });
  const purged = core.cache.purgeExpired();
  if (purged > 0) log.info(`purged ${purged} expired cache entr${purged === 1 ? "y" : "ies"}`);

  const app = createApp({
    db,
    core,
    defaultTargetCalories: config.defaultTargetCalories,
    uploadMaxBytes: env.UPLOAD_MAX_BYTES,
  });

  app.listen(env.PORT, "0.0.0.0", () => {
    log.info(`listening on port ${env.PORT} (DB_ENV=${env.DB_ENV}, DB=${dbFilePath})`);
  });
}

main().catch((err) => {
  log.error(err);
  process.exit(1);
});
