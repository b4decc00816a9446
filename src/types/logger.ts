/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

/**
 * Logger interface for structured logging
 *
 * Matches the signature of the project logger module (@/logger), so the
 * module namespace itself can be passed wherever a Logger is expected.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
