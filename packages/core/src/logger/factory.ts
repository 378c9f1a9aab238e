import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: none) */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON lines instead of formatted text (default: false) */
  json?: boolean;
  /** Enable colored console output (default: auto-detect) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
  /** Sink for regular lines, JSON lines included (default: console.log) */
  stdout?: (line: string) => void;
  /** Sink for error console lines (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'tripwire', level: 'debug' });
 *
 * // JSON lines for log shippers
 * const logger = createLogger({ name: 'tripwire', json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    context: options.name ? { logger: options.name } : undefined,
  });

  if (options.console ?? true) {
    if (options.json) {
      logger.addTransport(new JsonTransport({ output: options.stdout }));
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors,
          timestamps: options.timestamps,
          stdout: options.stdout,
          stderr: options.stderr,
        })
      );
    }
  }

  return logger;
}
