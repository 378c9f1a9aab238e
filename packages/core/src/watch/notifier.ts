// ============================================
// Notifier
// ============================================
// Turns raw Watch Source events into Logical Events: one per meaningful file
// modification. Write bursts are coalesced per file, renames only count when
// the file was freshly modified, and directories created under a watched
// directory are watched too.

import { ErrorCode } from "@tripwire/shared";

import { TooManyTargetsError, toError, TripwireError } from "../errors/types.js";
import { FsGlob, type Glob } from "../fs/glob.js";
import { cleanPath } from "../fs/path.js";
import { isDir, isFile, modifiedTime } from "../fs/stat.js";
import type { Logger } from "../logger/logger.js";
import { Channel, ChannelClosedError } from "../utils/channel.js";
import { OrderedSet } from "../utils/ordered-set.js";
import { resolveWatchDirectories } from "./resolver.js";
import { ChokidarWatchSource } from "./source.js";
import type { LogicalEvent, NotifierOptions, RawEvent, RawOp, WatchSource } from "./types.js";

// ============================================
// Constants
// ============================================

/** Default minimum gap between two accepted writes of one file: 100ms */
export const DEFAULT_PENDING_PERIOD = 100;

/** Default max age of a renamed file's mtime: 1s */
export const DEFAULT_REGARD_RENAME_AS_MOD_PERIOD = 1000;

// ============================================
// Notifier
// ============================================

/**
 * Event normalizer over a non-recursive Watch Source.
 *
 * Consumers read accepted changes from `events` and source failures from
 * `errors`. Both channels are unbuffered: a slow consumer stalls processing
 * of further raw events.
 *
 * @example
 * ```typescript
 * const notifier = await Notifier.create(["src/**\/*.ts"], 100, { logger });
 *
 * for await (const event of notifier.events) {
 *   console.log(event.name);
 * }
 * ```
 */
export class Notifier {
  readonly events = new Channel<LogicalEvent>();
  readonly errors = new Channel<Error>();

  private readonly source: WatchSource;
  private readonly logger?: Logger;
  private readonly now: () => number;
  private readonly detectCreate: boolean;
  private _pendingPeriod: number;
  private readonly regardRenameAsModPeriod: number;
  private readonly watched = new OrderedSet();
  private readonly times = new Map<string, number>();
  private eventChain: Promise<void> = Promise.resolve();
  private errorChain: Promise<void> = Promise.resolve();
  private closing?: Promise<void>;

  private constructor(source: WatchSource, options: NotifierOptions) {
    this.source = source;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.detectCreate = options.detectCreate ?? true;
    this._pendingPeriod = options.pendingPeriod ?? DEFAULT_PENDING_PERIOD;
    this.regardRenameAsModPeriod =
      options.regardRenameAsModPeriod ?? DEFAULT_REGARD_RENAME_AS_MOD_PERIOD;
  }

  /**
   * Resolve `patterns` into watch directories and start watching them.
   *
   * A directory that cannot be added is logged and skipped.
   *
   * @throws TooManyTargetsError if more than `maxWatchDirs` directories resolve
   * @throws TripwireError (WATCH_INIT_FAILED) if the Watch Source cannot be created
   */
  static async create(
    patterns: readonly string[],
    maxWatchDirs: number,
    options: NotifierOptions = {}
  ): Promise<Notifier> {
    const { logger } = options;
    const glob: Glob = options.glob ?? new FsGlob();

    const dirs = resolveWatchDirectories(patterns, maxWatchDirs, glob);
    if (dirs.length > maxWatchDirs) {
      logger?.error("too many directories to watch", {
        directories: [...dirs.slice(0, maxWatchDirs), "..."],
      });
      throw new TooManyTargetsError(dirs, maxWatchDirs);
    }

    let source: WatchSource;
    try {
      source = options.createWatchSource?.() ?? new ChokidarWatchSource();
    } catch (error) {
      throw new TripwireError("failed to create watch source", ErrorCode.WATCH_INIT_FAILED, {
        cause: error,
      });
    }

    const notifier = new Notifier(source, options);
    source.on("event", (event) => notifier.enqueueEvent(event));
    source.on("error", (error) => notifier.enqueueError(error));

    for (const dir of dirs) {
      await notifier.watch(dir);
    }

    return notifier;
  }

  /** Minimum gap between two accepted writes of one file, in ms. */
  get pendingPeriod(): number {
    return this._pendingPeriod;
  }

  /**
   * Change the write-coalescing window. Applies to the next raw event.
   */
  setPendingPeriod(ms: number): void {
    this._pendingPeriod = ms;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  /** Directories currently watched, in the order they were added. */
  watchedDirectories(): string[] {
    return this.watched.toArray();
  }

  /**
   * Put an event back on `events`. Resolves once a consumer takes it.
   *
   * @throws ChannelClosedError if the notifier is closed
   */
  requeue(event: LogicalEvent): Promise<void> {
    return this.events.send(event);
  }

  /**
   * Resolves once every raw event and error received so far has been
   * processed, including delivery of what was accepted.
   */
  async idle(): Promise<void> {
    await Promise.all([this.eventChain, this.errorChain]);
  }

  /**
   * Stop watching and close both channels. Idempotent.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.events.close();
      this.errors.close();
      this.closing = this.source.close();
    }
    return this.closing;
  }

  // ============================================
  // Raw event processing
  // ============================================

  private enqueueEvent(event: RawEvent): void {
    this.eventChain = this.eventChain
      .then(() => this.handleEvent(event))
      .catch((error: unknown) => this.handleFailure(error));
  }

  private enqueueError(error: Error): void {
    this.errorChain = this.errorChain
      .then(() => this.errors.send(error))
      .catch((failure: unknown) => this.handleFailure(failure));
  }

  private handleFailure(error: unknown): void {
    // Undelivered values after close are dropped
    if (error instanceof ChannelClosedError) {
      return;
    }
    this.logger?.error("failed to process watch event", { error: toError(error) });
  }

  private async handleEvent(event: RawEvent): Promise<void> {
    if (this.closed) {
      return;
    }

    const name = cleanPath(event.path);

    if (event.op === "create" && isDir(name)) {
      await this.watch(name);
    }

    if (!this.shouldExecute(name, event.op)) {
      return;
    }

    const now = this.now();
    this.times.set(name, now);
    this.logger?.debug("accepted change", { name, op: event.op });
    await this.events.send({ name, time: now });
  }

  private shouldExecute(name: string, op: RawOp): boolean {
    const applicable = op === "write" || op === "rename" || (op === "create" && this.detectCreate);
    if (!applicable) {
      this.logger?.trace("skipped: operation not applicable", { name, op });
      return false;
    }

    if (!isFile(name)) {
      this.logger?.trace("skipped: not a file", { name, op });
      return false;
    }

    const mtime = modifiedTime(name);

    if (op === "write" || op === "create") {
      const lastAccepted = this.times.get(name) ?? 0;
      if (mtime - lastAccepted < this._pendingPeriod) {
        this.logger?.trace("skipped: too frequent", { name, op });
        return false;
      }
    }

    if (op === "rename" && this.now() - mtime > this.regardRenameAsModPeriod) {
      this.logger?.trace("skipped: unnatural rename", { name, op });
      return false;
    }

    return true;
  }

  private async watch(dir: string): Promise<void> {
    if (this.closed || this.watched.has(dir)) {
      return;
    }
    try {
      await this.source.add(dir);
    } catch (error) {
      this.logger?.error(`failed to watch directory: ${dir}`, { error: toError(error) });
      return;
    }
    this.watched.add(dir);
    this.logger?.info(`watching directory: ${dir}`);
  }
}
