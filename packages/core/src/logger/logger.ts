import { LOG_LEVELS, type LogEntry, type LoggerOptions, type LogLevel, type LogTransport } from "./types.js";

/**
 * Leveled logger fanning each entry out to its transports.
 *
 * Components take an optional Logger and stay silent without one.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", context: { logger: "tripwire" } });
 * logger.addTransport(new ConsoleTransport({ timestamps: false }));
 * logger.info(`watching directory: ${dir}`);
 * logger.warn("exit status 2", { command: "make test" });
 * ```
 */
export class Logger {
  readonly level: LogLevel;
  private readonly threshold: number;
  private readonly context?: Readonly<Record<string, unknown>>;
  private readonly transports: LogTransport[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.threshold = LOG_LEVELS.indexOf(this.level);
    if (options.context && Object.keys(options.context).length > 0) {
      this.context = { ...options.context };
    }
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  trace(message: string, data?: unknown): void {
    this.write("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: new Date(), context: this.context, data };
    for (const transport of this.transports) {
      transport.log(entry);
    }
  }
}
