import type { LogLevel } from "@/lib/config";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function currentLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL;
  return raw && isLogLevel(raw) ? raw : "info";
}

/**
 * Logger de consola con prefijo `[scope]`, filtrado por LOG_LEVEL.
 */
export function createLogger(scope: string, level: LogLevel = currentLevel()): Logger {
  const threshold = LEVELS[level];
  const prefix = `[${scope}]`;

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
    if (LEVELS[lvl] < threshold) return;
    const args: unknown[] = meta ? [prefix, message, meta] : [prefix, message];
    if (lvl === "error") console.error(...args);
    else if (lvl === "warn") console.warn(...args);
    else if (lvl === "info") console.info(...args);
    else console.debug(...args);
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
  };
}
