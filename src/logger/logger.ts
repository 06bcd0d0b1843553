/**
 * Micro-logger: console.* with LOG_LEVEL filtering and JSON meta
 *
 * Error values in meta are written as { name, message }.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { LOG_LEVELS } from "@/constants";

function resolveLevel(raw: string | undefined): LogLevel {
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error"
    ? raw
    : "info";
}

// Read from environment, default to 'info'
const currentLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);
const currentLevelValue = LOG_LEVELS[currentLevel];

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  );
}

/**
 * Log message if level is enabled
 */
function log(
  level: LogLevel,
  message: string,
  meta?: LogMeta,
): void {
  if (LOG_LEVELS[level] >= currentLevelValue) {
    const timestamp = new Date().toISOString();
    const formattedMeta = formatMeta(meta);
    const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formattedMeta}`;

    switch (level) {
      case "debug":
      case "info":
        console.log(logMessage);
        break;
      case "warn":
        console.warn(logMessage);
        break;
      case "error":
        console.error(logMessage);
        break;
    }
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Create a logger with bound context (meta merged into all calls)
 *
 * @param context - Meta merged into every entry (e.g. { site: "gupy" })
 * @param minLevel - Optional floor on top of LOG_LEVEL, used for run verbosity
 */
export function withContext(
  context: LogMeta,
  minLevel: LogLevel = "debug",
): Logger {
  const floor = LOG_LEVELS[minLevel];
  const emit =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      if (LOG_LEVELS[level] >= floor) {
        log(level, message, { ...context, ...meta });
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
