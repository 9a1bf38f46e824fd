import fs from "fs";
import path from "path";

/**
 * Structured JSON logger shared by every layer of the chat backend.
 *
 * Entries go to the console and, when a log file is configured, are appended
 * as JSON lines. `log()` entries below the configured level are dropped;
 * `event()` entries are lifecycle records and are always written.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Absolute or cwd-relative path; `undefined` keeps the logger console-only. */
  file?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let options: LoggerOptions = { level: "info" };

export function configureLogger(next: LoggerOptions): void {
  options = {
    level: next.level,
    file: next.file ? path.resolve(next.file) : undefined,
  };
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[options.level];
}

function writeEntry(entry: Record<string, unknown>): void {
  const line = JSON.stringify(entry);

  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }

  if (!options.file) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(options.file), { recursive: true });
    fs.appendFileSync(options.file, line + "\n", { encoding: "utf-8" });
  } catch (err) {
    console.error(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        level: "error",
        message: "Failed to write log file",
        file: options.file,
        error: err instanceof Error ? err.message : String(err),
      })
    );
  }
}

export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!isEnabled(level)) {
      return;
    }

    writeEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry({
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
