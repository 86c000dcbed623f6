import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "info" | "warn" | "error" | "debug";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const logFile = config.observability.logFile
  ? path.resolve(process.cwd(), config.observability.logFile)
  : undefined;

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);

  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function writeEntry(entry: Record<string, unknown>, level: LogLevel): void {
  const line = JSON.stringify(entry) + "\n";

  if (level === "error") {
    console.error(line.trimEnd());
  } else {
    console.log(line.trimEnd());
  }

  if (!logFile) {
    return;
  }

  try {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, line, { encoding: "utf-8" });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.observability.logLevel];
}

/**
 * Structured JSON logger.
 *
 * - ISO timestamp on every entry.
 * - log() records the level and drops entries below LOG_LEVEL.
 * - event() keeps the shape { timestamp, type, ...payload } at info level.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!enabled(level)) {
      return;
    }

    writeEntry(
      {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      },
      level
    );
  },

  event(type: string, payload: Record<string, unknown>): void {
    if (!enabled("info")) {
      return;
    }

    writeEntry(
      {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      },
      "info"
    );
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}
