import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m", // gray
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m", // green
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

/**
 * Options for ConsoleTransport.
 */
export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Prefix each line with a timestamp (default: true) */
  timestamps?: boolean;
  /** Sink for non-error lines (default: console.log) */
  stdout?: (line: string) => void;
  /** Sink for error lines (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Detect if colors should be enabled by default.
 * Disables colors when:
 * - NO_COLOR environment variable is set
 * - CI environment variable is set
 * - stdout is not a TTY
 */
function shouldEnableColors(): boolean {
  // https://no-color.org/
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }
  if (process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * Format a timestamp as ISO string without milliseconds.
 */
function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

/** Errors serialize to `{}` by default; show their message instead. */
function errorReplacer(_key: string, value: unknown): unknown {
  return value instanceof Error ? value.message : value;
}

/**
 * Console transport with color support.
 * Outputs formatted log messages to stdout/stderr.
 *
 * @example
 * ```typescript
 * const transport = new ConsoleTransport({ colors: true });
 * logger.addTransport(transport);
 * ```
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.useColors
      ? `${LEVEL_COLORS[entry.level]}[${level}]${RESET}`
      : `[${level}]`;

    let output = this.timestamps
      ? `[${formatTimestamp(entry.timestamp)}] ${tag} ${entry.message}`
      : `${tag} ${entry.message}`;

    if (entry.data !== undefined) {
      const dataStr =
        typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data, errorReplacer);
      output += ` ${dataStr}`;
    }

    if (entry.level === "error") {
      this.stderr(output);
    } else {
      this.stdout(output);
    }
  }
}
