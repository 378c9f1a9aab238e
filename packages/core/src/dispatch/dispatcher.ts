// ============================================
// Dispatcher
// ============================================
// Consumes Logical Events, maps each changed file to a command and runs it,
// either to completion (blocking) or restartably (a newer change kills the
// running command first).

import type { CommandTable } from "../command/types.js";
import { toError } from "../errors/types.js";
import { globMatch } from "../fs/glob.js";
import { cleanPath } from "../fs/path.js";
import { modifiedTime } from "../fs/stat.js";
import type { Logger } from "../logger/logger.js";
import { ProcessSupervisor } from "../process/supervisor.js";
import type { ManagedProcess, Supervisor } from "../process/types.js";
import type { Channel } from "../utils/channel.js";
import { Notifier } from "../watch/notifier.js";
import type { LogicalEvent, NotifierOptions } from "../watch/types.js";

// ============================================
// Constants
// ============================================

/** Default cap on watched directories */
export const DEFAULT_MAX_WATCH_DIRS = 100;

/** Changes closer than this to the previous dispatch are ignored: 10ms */
export const DISPATCH_IGNORE_PERIOD = 10;

// ============================================
// Types
// ============================================

/**
 * What the Dispatcher needs from its event producer; {@link Notifier} is one.
 */
export interface EventStream {
  readonly events: Channel<LogicalEvent>;
  readonly errors: Channel<Error>;
  close(): Promise<void>;
}

export interface DispatcherOptions {
  logger?: Logger;
  /** Cap on watched directories (default: 100) */
  maxWatchDirs?: number;
  /** Supervisor used to run commands (default: ProcessSupervisor) */
  supervisor?: Supervisor;
  /** Event producer; when omitted a Notifier is created for the patterns */
  notifier?: EventStream;
  /** Options for the created Notifier */
  notifierOptions?: Omit<NotifierOptions, "logger">;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
}

export interface RunOptions {
  commands: CommandTable;
  /** Seconds before a command is killed, 0 for no limit (default: 0) */
  timeout?: number;
  /** Kill the running command when a new change arrives (default: false) */
  restart?: boolean;
  /** Interrupt: `run` returns once it aborts */
  signal?: AbortSignal;
}

// ============================================
// Dispatcher
// ============================================

/**
 * Runs a command for every relevant change under the watch patterns.
 *
 * @example
 * ```typescript
 * const dispatcher = await Dispatcher.create(["src/*.py"], { logger });
 * const controller = new AbortController();
 * process.once("SIGINT", () => controller.abort());
 *
 * try {
 *   await dispatcher.run({ commands: new RuleTable(config.commands), signal: controller.signal });
 * } finally {
 *   await dispatcher.close();
 * }
 * ```
 */
export class Dispatcher {
  readonly patterns: readonly string[];

  private readonly notifier: EventStream;
  private readonly supervisor: Supervisor;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly supervisions = new Set<Promise<void>>();
  private _counter = 0;
  private closing?: Promise<void>;

  private constructor(
    patterns: readonly string[],
    notifier: EventStream,
    supervisor: Supervisor,
    options: DispatcherOptions
  ) {
    this.patterns = patterns;
    this.notifier = notifier;
    this.supervisor = supervisor;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Clean `patterns` and start watching them.
   *
   * @throws TooManyTargetsError if the patterns resolve to too many directories
   * @throws TripwireError (WATCH_INIT_FAILED) if watching cannot start
   */
  static async create(
    patterns: readonly string[],
    options: DispatcherOptions = {}
  ): Promise<Dispatcher> {
    const cleaned = patterns.map(cleanPath);
    const notifier =
      options.notifier ??
      (await Notifier.create(cleaned, options.maxWatchDirs ?? DEFAULT_MAX_WATCH_DIRS, {
        ...options.notifierOptions,
        logger: options.logger,
      }));
    const supervisor = options.supervisor ?? new ProcessSupervisor({ logger: options.logger });
    return new Dispatcher(cleaned, notifier, supervisor, options);
  }

  /** Number of commands dispatched so far. */
  counter(): number {
    return this._counter;
  }

  /**
   * Dispatch commands until `signal` aborts or the event stream closes.
   *
   * Command failures and timeouts are logged; they never end the loop. An
   * interrupt kills a blocking command; a restartable command still running
   * on return is left to {@link close}.
   */
  async run(options: RunOptions): Promise<void> {
    const { commands, timeout = 0, restart = false, signal } = options;
    const drainingErrors = this.logErrors(signal);

    let lastDispatchTime = 0;
    let ongoing: ManagedProcess | undefined;

    while (!signal?.aborted) {
      const event = await this.notifier.events.receive(signal);
      if (event === undefined) {
        break;
      }
      this.logger?.debug(`received: ${event.name}`);

      if (!this.matchAny(event.name)) {
        continue;
      }

      if (modifiedTime(event.name) - lastDispatchTime < DISPATCH_IGNORE_PERIOD) {
        continue;
      }

      const match = commands.match(event.name);
      if (!match) {
        this.logger?.debug(`command not found: ${event.name}`);
        continue;
      }

      this._counter++;
      this.logger?.info(`[${match.command}]`);

      if (ongoing?.running) {
        await this.supervisor.kill(ongoing, "Restart");
      }
      ongoing = undefined;

      lastDispatchTime = this.now();
      const proc = this.supervisor.start(match.command);

      if (!restart) {
        await this.execute(proc, timeout, signal);
        continue;
      }

      ongoing = proc;
      this.supervise(proc, timeout);
    }

    await drainingErrors;
  }

  /**
   * Stop watching and kill any command still running. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = Promise.all([this.notifier.close(), this.supervisor.dispose()])
        .then(() => Promise.all(this.supervisions))
        .then(() => undefined);
    }
    return this.closing;
  }

  private matchAny(name: string): boolean {
    return this.patterns.some((pattern) => globMatch(pattern, name));
  }

  private async execute(proc: ManagedProcess, timeout: number, signal?: AbortSignal): Promise<void> {
    const kills: Promise<void>[] = [];
    const interrupt = (): void => {
      kills.push(this.supervisor.kill(proc, "Interrupt"));
    };
    signal?.addEventListener("abort", interrupt, { once: true });
    if (signal?.aborted) {
      interrupt();
    }

    try {
      await this.supervisor.executeOrTimeout(proc, timeout);
    } catch (error) {
      this.logger?.warn(toError(error).message, { command: proc.command });
    } finally {
      signal?.removeEventListener("abort", interrupt);
      await Promise.all(kills);
    }
  }

  private supervise(proc: ManagedProcess, timeout: number): void {
    const supervision = this.execute(proc, timeout).finally(() => {
      this.supervisions.delete(supervision);
    });
    this.supervisions.add(supervision);
  }

  private async logErrors(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      const error = await this.notifier.errors.receive(signal);
      if (error === undefined) {
        return;
      }
      this.logger?.error("watch error", { error });
    }
  }
}
