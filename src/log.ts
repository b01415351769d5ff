export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let minLevel: LogLevel = "info";
let sink: LogSink = consoleSink;

/**
 * Sets the process-wide level and output. Jobs call this once at startup;
 * tests pass their own sink to capture lines. Options left out keep their
 * current value.
 */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  minLevel = options.level ?? minLevel;
  sink = options.sink ?? sink;
}

export function resetLogging(): void {
  minLevel = "info";
  sink = consoleSink;
}

export function formatLogLine(level: LogLevel, message: string, at: Date): string {
  return `${at.toISOString()} - ${level.toUpperCase()} - ${message}`;
}

function write(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  sink(level, formatLogLine(level, message, new Date()));
}

export const logger = {
  debug: (message: string) => write("debug", message),
  info: (message: string) => write("info", message),
  warn: (message: string) => write("warn", message),
  error: (message: string) => write("error", message)
};
