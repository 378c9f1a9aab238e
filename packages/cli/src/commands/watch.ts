/**
 * The watch command: resolve the command table, watch the patterns and
 * dispatch until interrupted.
 *
 * @module cli/commands/watch
 */

import {
  type CommandTable,
  createLogger,
  Dispatcher,
  defaultConfigText,
  type Logger,
  type LogLevel,
  loadConfig,
  oneOffTable,
  RuleTable,
  toError,
} from "@tripwire/core";
import { Chalk } from "chalk";

import type { ShutdownHandle } from "../shutdown.js";

/**
 * Parsed command-line options.
 */
export interface WatchCommandOptions {
  /** One-off command run for every change */
  command?: string;
  restart: boolean;
  /** Seconds, 0 for no limit */
  timeout: number;
  /** Configuration file */
  file?: string;
  maxWatchDirs: number;
  verbose: boolean;
  quiet: boolean;
  debug: boolean;
  json: boolean;
  color: boolean;
  showDefaultConfig: boolean;
}

/**
 * Where the CLI writes and how it learns about interrupts.
 */
export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  shutdown(onSignal: (signal: NodeJS.Signals) => void): ShutdownHandle;
}

export function logLevelFor(options: Pick<WatchCommandOptions, "debug" | "verbose" | "quiet">): LogLevel {
  if (options.debug) {
    return "trace";
  }
  if (options.verbose) {
    return "debug";
  }
  return options.quiet ? "warn" : "info";
}

function resolveCommands(options: WatchCommandOptions, logger: Logger): CommandTable | undefined {
  if (options.command) {
    return oneOffTable(options.command);
  }

  const result = loadConfig({ file: options.file });
  if (!result.ok) {
    logger.error(result.error.message);
    return undefined;
  }
  logger.debug(`configuration: ${result.value.path}`);

  try {
    return new RuleTable(result.value.config.commands);
  } catch (error) {
    logger.error(toError(error).message);
    return undefined;
  }
}

/**
 * Run the watch command. Resolves with the process exit code.
 */
export async function runWatch(
  patterns: readonly string[],
  options: WatchCommandOptions,
  io: CliIo
): Promise<number> {
  if (options.showDefaultConfig) {
    io.stdout(defaultConfigText().trimEnd());
    return 0;
  }

  const paint = new Chalk(options.color ? {} : { level: 0 });
  if (patterns.length === 0) {
    io.stderr(`${paint.red("error:")} no file patterns given (see --help)`);
    return 1;
  }

  const logger = createLogger({
    name: "tripwire",
    level: logLevelFor(options),
    json: options.json,
    colors: options.color ? undefined : false,
    timestamps: false,
    stdout: io.stdout,
    stderr: io.stderr,
  });

  const commands = resolveCommands(options, logger);
  if (!commands) {
    return 1;
  }

  let dispatcher: Dispatcher;
  try {
    dispatcher = await Dispatcher.create(patterns, {
      logger,
      maxWatchDirs: options.maxWatchDirs,
    });
  } catch (error) {
    logger.error(toError(error).message);
    return 1;
  }

  const shutdown = io.shutdown((signal) => logger.debug(`received ${signal}, shutting down`));
  try {
    await dispatcher.run({
      commands,
      timeout: options.timeout,
      restart: options.restart,
      signal: shutdown.signal,
    });
  } finally {
    shutdown.dispose();
    await dispatcher.close();
  }

  logger.debug(`${dispatcher.counter()} command(s) run`);
  return 0;
}
