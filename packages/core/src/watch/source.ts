// ============================================
// Chokidar Watch Source
// ============================================
// One non-recursive chokidar watcher per directory. Chokidar reports
// add/change/unlink; there is no rename, a move shows up as unlink + add.

import { EventEmitter } from "node:events";
import { ErrorCode } from "@tripwire/shared";
import { type FSWatcher, watch } from "chokidar";

import { TripwireError } from "../errors/types.js";
import { isDir } from "../fs/stat.js";
import type { RawOp, WatchSource, WatchSourceEvents } from "./types.js";

/**
 * Chokidar-backed Watch Source.
 *
 * @example
 * ```typescript
 * const source = new ChokidarWatchSource();
 * source.on("event", ({ path, op }) => console.log(op, path));
 * await source.add("src");
 * ```
 */
export class ChokidarWatchSource extends EventEmitter<WatchSourceEvents> implements WatchSource {
  private readonly watchers = new Map<string, FSWatcher>();
  private closed = false;

  /**
   * @throws TripwireError (WATCH_ADD_FAILED) if the source is closed, `dir` is
   * not a directory or chokidar fails before it is ready
   */
  async add(dir: string): Promise<void> {
    if (this.closed) {
      throw addFailed("watch source is closed", dir);
    }
    if (this.watchers.has(dir)) {
      return;
    }
    if (!isDir(dir)) {
      throw addFailed(`not a directory: ${dir}`, dir);
    }

    const watcher = watch(dir, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });
    this.watchers.set(dir, watcher);

    watcher.on("add", (filePath) => this.forward(filePath, "create"));
    watcher.on("addDir", (dirPath) => {
      // chokidar reports the watched root itself at depth 0
      if (dirPath !== dir) {
        this.forward(dirPath, "create");
      }
    });
    watcher.on("change", (filePath) => this.forward(filePath, "write"));
    watcher.on("unlink", (filePath) => this.forward(filePath, "remove"));
    watcher.on("unlinkDir", (dirPath) => this.forward(dirPath, "remove"));

    await new Promise<void>((resolve, reject) => {
      const onReady = (): void => {
        watcher.removeListener("error", onError);
        watcher.on("error", (error) => this.handleError(error));
        resolve();
      };
      const onError = (error: unknown): void => {
        watcher.removeListener("ready", onReady);
        this.watchers.delete(dir);
        const reason = toWatchError(error).message;
        const failure = addFailed(`cannot watch ${dir}: ${reason}`, dir, error);
        watcher.close().then(
          () => reject(failure),
          () => reject(failure)
        );
      };
      watcher.once("ready", onReady);
      watcher.once("error", onError);
    });
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const watchers = [...this.watchers.values()];
    this.watchers.clear();
    await Promise.all(watchers.map((watcher) => watcher.close()));
  }

  private forward(path: string, op: RawOp): void {
    if (!this.closed) {
      this.emit("event", { path, op });
    }
  }

  private handleError(error: unknown): void {
    if (!this.closed) {
      this.emit("error", toWatchError(error));
    }
  }
}

function toWatchError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function addFailed(message: string, dir: string, cause?: unknown): TripwireError {
  return new TripwireError(message, ErrorCode.WATCH_ADD_FAILED, { cause, context: { dir } });
}
