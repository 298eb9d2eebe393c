import { z } from "zod";
import fs from "node:fs";
import path from "node:path";
import type { CoreConfig } from "../core/config";
import { createLogger } from "../utils/logger";

const log = createLogger("env");

function loadDotEnvFileIfPresent(filename = ".env") {
  try {
    const p = path.resolve(process.cwd(), filename);
    if (!fs.existsSync(p)) return;

    const raw = fs.readFileSync(p, "utf8");
    for (const line of raw.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#")) continue;

      const idx = trimmed.indexOf("=");
      if (idx === -1) continue;

      const key = trimmed.slice(0, idx).trim();
      let val = trimmed.slice(idx + 1).trim();

      // strip surrounding quotes
      if (
        (val.startsWith('"') && val.endsWith('"')) ||
        (val.startsWith("'") && val.endsWith("'"))
      ) {
        val = val.slice(1, -1);
      }

      // real environment wins over .env
      if (process.env[key] === undefined) process.env[key] = val;
    }
  } catch (e) {
    log.warn("failed to load .env:", e);
  }
}

// Empty strings in .env mean "not set".
const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : null));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),

  PORT: z.coerce.number().int().min(1).max(65535).default(8787),

  // dev/stage/smoke/prod each get their own SQLite file
  DB_ENV: z.enum(["dev", "stage", "smoke", "prod"]).default("dev"),
  DB_DIR: z.string().default("./db"),

  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),

  GEMINI_API_KEY: optionalSecret,
  GEMINI_MODEL: z.string().default("gemini-1.5-flash"),
  GEMINI_API_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta"),

  FATSECRET_ACCESS_TOKEN: optionalSecret,
  FATSECRET_API_URL: z.string().url().default("https://platform.fatsecret.com/rest/server.api"),

  IMAGE_CACHE_TTL_HOURS: z.coerce.number().positive().default(168),
  API_CACHE_TTL_HOURS: z.coerce.number().positive().default(24),
  IMAGE_CACHE_KEY_CHARS: z.coerce.number().int().min(1).default(100),

  DEFAULT_TARGET_CALORIES: z.coerce.number().int().min(500).max(10000).default(2000),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(6_000_000),
});

export type AppEnv = z.infer<typeof EnvSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv = process.env): AppEnv {
  if (processEnv === process.env) loadDotEnvFileIfPresent(".env");

  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    // Fail fast: no hidden fallbacks
    log.error("invalid environment:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid environment variables");
  }

  return parsed.data;
}

export function buildCoreConfig(env: AppEnv): CoreConfig {
  return {
    gemini: {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
      baseUrl: env.GEMINI_API_URL,
    },
    fatSecret: {
      accessToken: env.FATSECRET_ACCESS_TOKEN,
      baseUrl: env.FATSECRET_API_URL,
    },
    cache: {
      imageTtlHours: env.IMAGE_CACHE_TTL_HOURS,
      apiTtlHours: env.API_CACHE_TTL_HOURS,
      imageKeyChars: env.IMAGE_CACHE_KEY_CHARS,
    },
    defaultTargetCalories: env.DEFAULT_TARGET_CALORIES,
  };
}

/** Start-up notices for credentials that are allowed to be absent. */
export function warnOnMissingCredentials(config: CoreConfig) {
  if (!config.gemini.apiKey) {
    log.warn("GEMINI_API_KEY not set. Meal photo analysis will fail.");
  }
  if (!config.fatSecret.accessToken) {
    log.warn("FATSECRET_ACCESS_TOKEN not set. Unknown foods fall back to generic estimates.");
  }
}
