/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured fields attached to a log entry (site, jobId, identity, ...)
 */
export type LogMeta = Record<string, unknown>;

/**
 * What sources, sessions and the orchestrator log through; built by
 * withContext() from @/logger
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
