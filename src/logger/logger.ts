/**
 * Micro-logger wrapper: minimal logging with level filtering
 * Wraps console.*; the level comes from LOG_LEVEL and can be changed at runtime.
 */

import type { Logger, LogLevel, LogMeta } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env[LOG_LEVEL_ENV]?.toLowerCase();
  return isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

let currentLevelValue = LOG_LEVELS[levelFromEnv()];

/**
 * Change the minimum level at runtime
 */
export function setLevel(level: LogLevel): void {
  currentLevelValue = LOG_LEVELS[level];
}

/**
 * Format meta object as JSON string
 * Error instances are reduced to name and message (JSON.stringify drops them otherwise)
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return (
    " " +
    JSON.stringify(meta, (_key, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value,
    )
  );
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

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
 * Works on top of any Logger, so injected sinks keep their context too.
 */
export function withContext(context: LogMeta, base: Logger = { debug, info, warn, error }): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...context, ...meta }),
    info: (message, meta) => base.info(message, { ...context, ...meta }),
    warn: (message, meta) => base.warn(message, { ...context, ...meta }),
    error: (message, meta) => base.error(message, { ...context, ...meta }),
  };
}
