/* Console logger with a level threshold; LOG_LEVEL picks the threshold at startup. */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let threshold: LogLevel = "info";

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

const emit = (
  level: LogLevel,
  sink: (...args: unknown[]) => void,
  message: unknown,
  meta?: unknown
) => {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  if (meta === undefined) {
    sink(message);
    return;
  }
  sink(message, meta);
};

export const logger = {
  debug: (message: unknown, meta?: unknown) => emit("debug", console.debug, message, meta),
  info: (message: unknown, meta?: unknown) => emit("info", console.log, message, meta),
  warn: (message: unknown, meta?: unknown) => emit("warn", console.warn, message, meta),
  error: (message: unknown, meta?: unknown) => emit("error", console.error, message, meta)
};
