export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(tag: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

type ConsoleLike = Pick<Console, "debug" | "info" | "warn" | "error">;

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  sink?: ConsoleLike;
};

/**
 * Tagged logger over `console`. Context objects are passed through as the
 * second argument so Node prints them inspected.
 */
export function createConsoleLogger(tag: string, opts: ConsoleLoggerOptions = {}): Logger {
  const level = opts.level ?? "info";
  const sink = opts.sink ?? console;
  const threshold = LEVEL_RANK[level];

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string, context?: LogContext) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const line = `[${tag}] ${message}`;
    if (context === undefined) sink[lvl](line);
    else sink[lvl](line, context);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (sub) => createConsoleLogger(`${tag}:${sub}`, { level, sink }),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
