import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level: LogLevel;
  /** Absolute or cwd-relative path of the JSON lines file; undefined disables the file sink. */
  filePath?: string | undefined;
  console: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let options: LoggerOptions = {
  level: "info",
  filePath: undefined,
  console: true,
};

/**
 * Applies the logging section of the application config. Called once by the
 * composition root before any component logs.
 */
export function configureLogger(next: LoggerOptions): void {
  options = {
    ...next,
    filePath: next.filePath ? path.resolve(next.filePath) : undefined,
  };
}

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[options.level]) {
    return;
  }

  if (options.console) {
    if (level === "error") {
      console.error(entry);
    } else {
      console.log(entry);
    }
  }

  if (!options.filePath) {
    return;
  }

  try {
    ensureLogDir(options.filePath);
    fs.appendFileSync(options.filePath, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * Structured JSON logger.
 *
 * - log() records { timestamp, level, message, ...meta }
 * - event() records { timestamp, type, ...payload } at info level
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
