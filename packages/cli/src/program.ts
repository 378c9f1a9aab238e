import { DEFAULT_MAX_WATCH_DIRS } from "@tripwire/core";
import { Command, CommanderError, InvalidArgumentError } from "commander";

import { type CliIo, runWatch, type WatchCommandOptions } from "./commands/watch.js";
import { listenForShutdown } from "./shutdown.js";
import { version } from "./version.js";

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("not a non-negative integer");
  }
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("not a positive integer");
  }
  return parsed;
}

/**
 * IO bound to the real process.
 */
export function processIo(): CliIo {
  return {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    shutdown: (onSignal) => listenForShutdown(onSignal),
  };
}

/**
 * Build the command-line program. Commander errors are thrown, not exited on.
 */
export function createProgram(
  io: CliIo,
  action: (patterns: string[], options: WatchCommandOptions) => Promise<void>
): Command {
  const program = new Command();

  program
    .name("tripwire")
    .description("Run a command whenever a watched file changes")
    .version(version, "-V, --version")
    .argument("[patterns...]", "files to watch, as paths or globs (quote globs: 'src/**/*.py')")
    .option("-c, --command <command>", "run this for every change instead of the configured rules")
    .option("-r, --restart", "kill the running command when a new change arrives", false)
    .option(
      "-t, --timeout <seconds>",
      "kill a command that runs longer than this (0: no limit)",
      parseNonNegativeInt,
      0
    )
    .option("-f, --file <file>", "configuration file (default: .tripwire.yml lookup)")
    .option(
      "-w, --max-watch-dirs <count>",
      "maximum number of directories to watch",
      parsePositiveInt,
      DEFAULT_MAX_WATCH_DIRS
    )
    .option("-v, --verbose", "log more", false)
    .option("-q, --quiet", "log only warnings and errors", false)
    .option("--debug", "log everything", false)
    .option("--json", "log JSON lines", false)
    .option("--no-color", "disable colors")
    .option("-y, --show-default-config", "print the default configuration and exit", false)
    .addHelpText(
      "after",
      `
Placeholders in commands: {{file}} {{ext}} {{base}} {{base0}} {{dir}} {{abs}}

Examples:
  $ tripwire '*.py'
  $ tripwire -c 'make test' 'src/**/*.c'
  $ tripwire -r -c 'node {{file}}' server.js`
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd()),
    })
    .action(async (patterns: string[], options: WatchCommandOptions) => {
      await action(patterns, options);
    });

  return program;
}

/**
 * Parse `argv` (node and script first) and run. Resolves with the exit code.
 */
export async function main(argv: readonly string[], io: CliIo = processIo()): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, async (patterns, options) => {
    exitCode = await runWatch(patterns, options, io);
  });

  try {
    await program.parseAsync([...argv]);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
