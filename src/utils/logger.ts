export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(v: string): v is LogLevel {
  return Object.hasOwn(ORDER, v);
}

// Read on every call so tests and the server can change it without re-creating loggers.
function currentLevel(): LogLevel {
  const raw = String(process.env.LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function enabled(level: Exclude<LogLevel, "silent">) {
  return ORDER[level] >= ORDER[currentLevel()];
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled("debug")) console.debug(tag, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.info(tag, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(tag, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(tag, ...args);
    },
  };
}
