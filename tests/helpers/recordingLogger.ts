/**
 * Logger that keeps entries in memory for assertions
 */

import type { Logger, LogLevel, LogMeta } from "@/types";

export type LogEntry = {
  level: LogLevel;
  message: string;
  meta?: LogMeta;
};

export type RecordingLogger = Logger & {
  entries: LogEntry[];
  messages(level: LogLevel): string[];
};

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void => {
      entries.push({ level, message, meta });
    };

  return {
    entries,
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    messages: (level) =>
      entries.filter((entry) => entry.level === level).map((entry) => entry.message),
  };
}
