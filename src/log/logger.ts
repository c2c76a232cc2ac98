// src/log/logger.ts
// Logging port used by the pipeline, tracker and CLI

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger with the same sink and level under another name. */
  child(name: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Where formatted lines go. Tests pass an array-backed sink. */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

/**
 * Console-backed logger. Lines read
 * `2026-01-01T00:00:00.000Z - tlgen.tracker - INFO - message`.
 */
export function createConsoleLogger(
  level: LogLevel = "info",
  name = "tlgen",
  sink: LogSink = consoleSink,
  now: () => Date = () => new Date()
): Logger {
  const threshold = LEVEL_RANK[level];

  const emit = (lvl: Exclude<LogLevel, "silent">, message: string) => {
    if (LEVEL_RANK[lvl] < threshold) return;
    sink(lvl, `${now().toISOString()} - ${name} - ${lvl.toUpperCase()} - ${message}`);
  };

  return {
    debug: (m) => emit("debug", m),
    info: (m) => emit("info", m),
    warn: (m) => emit("warn", m),
    error: (m) => emit("error", m),
    child: (childName) => createConsoleLogger(level, `${name}.${childName}`, sink, now),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
