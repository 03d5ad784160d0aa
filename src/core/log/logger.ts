// src/core/log/logger.ts
// Level-filtered logger over an injectable sink

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type EmitLevel = Exclude<LogLevel, "silent">;

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export type LogSink = (level: EmitLevel, message: string, data?: unknown) => void;

export type Logger = {
  readonly level: LogLevel;
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

/**
 * Default sink: one prefixed line per message on the matching console stream.
 */
export const consoleSink: LogSink = (level, message, data) => {
  const line = `[dispatchkit] ${message}`;
  if (data === undefined) {
    console[level](line);
  } else {
    console[level](line, data);
  }
};

export function createLogger(level: LogLevel, sink: LogSink = consoleSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const emit = (at: EmitLevel) => (message: string, data?: unknown) => {
    if (LOG_LEVELS.indexOf(at) >= threshold) {
      sink(at, message, data);
    }
  };
  return {
    level,
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
