// ============================================
// Log Types
// ============================================

/** Log levels, least severe first. `--debug` turns on `trace`. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * What a transport receives for every message at or above the logger's level.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Fields fixed for the logger, such as its name */
  context?: Readonly<Record<string, unknown>>;
  /** Structured payload: the directory, the command, the error */
  data?: unknown;
}

/**
 * Destination for log entries: the terminal, a JSON-lines stream, a test array.
 */
export interface LogTransport {
  log(entry: LogEntry): void;
}

export interface LoggerOptions {
  /** Least severe level written (default: 'info') */
  level?: LogLevel;
  /** Fields attached to every entry */
  context?: Record<string, unknown>;
}
