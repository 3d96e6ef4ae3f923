import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isKnownLevel(level: string): level is keyof typeof LEVEL_WEIGHT {
  return Object.prototype.hasOwnProperty.call(LEVEL_WEIGHT, level);
}

function thresholdFor(level: string): number {
  return isKnownLevel(level) ? LEVEL_WEIGHT[level] : LEVEL_WEIGHT.info;
}

const threshold = thresholdFor(config.observability.logLevel);
const logFile = config.observability.logFile
  ? path.resolve(process.cwd(), config.observability.logFile)
  : null;

function ensureLogDir(file: string): void {
  const dir = path.dirname(file);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (LEVEL_WEIGHT[level] < threshold) {
    return;
  }

  if (level === "error") {
    console.error(entry);
  } else {
    console.log(entry);
  }

  if (!logFile) {
    return;
  }

  try {
    ensureLogDir(logFile);
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * JSON-lines logger.
 *
 * - log() records `{ timestamp, level, message, ...meta }`.
 * - event() records `{ timestamp, type, ...payload }` at info level.
 *
 * Entries below LOG_LEVEL are dropped; `LOG_LEVEL=silent` drops everything.
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
  logger.event(type, payload);
}
