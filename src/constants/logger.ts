/**
 * Logger constants: log level priority mapping
 */

import type { LogLevel, Verbosity } from "@/types";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Minimum log level per search verbosity (0 quiet, 1 normal, 2 detailed)
 */
export const VERBOSITY_LOG_LEVELS: Record<Verbosity, LogLevel> = {
  0: "warn",
  1: "info",
  2: "debug",
};
