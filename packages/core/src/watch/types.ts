// ============================================
// Watch Types
// ============================================
// Raw events come from a Watch Source (one per process, non-recursive per
// directory). The Notifier turns them into Logical Events.

import type { EventEmitter } from "node:events";

import type { Glob } from "../fs/glob.js";
import type { Logger } from "../logger/logger.js";

// ============================================
// Raw Events
// ============================================

/**
 * Kind of low-level change reported by a Watch Source.
 */
export type RawOp = "create" | "write" | "remove" | "rename" | "chmod";

/**
 * A single low-level filesystem notification.
 */
export interface RawEvent {
  /** Path as reported by the source (not yet cleaned) */
  path: string;
  op: RawOp;
}

/**
 * Events emitted by a Watch Source.
 */
export interface WatchSourceEvents {
  event: [event: RawEvent];
  error: [error: Error];
}

/**
 * Non-recursive directory watcher. Only the entries directly inside an added
 * directory are reported, as `event`; failures are reported as `error`.
 */
export interface WatchSource extends EventEmitter<WatchSourceEvents> {
  /**
   * Start watching `dir`. Resolves once notifications for it are live.
   *
   * @throws Error if the directory cannot be watched
   */
  add(dir: string): Promise<void>;
  /** Stop every watch and release resources. */
  close(): Promise<void>;
}

// ============================================
// Logical Events
// ============================================

/**
 * A change deemed meaningful by the Notifier.
 */
export interface LogicalEvent {
  /** Cleaned file path */
  name: string;
  /** Acceptance time, epoch milliseconds */
  time: number;
}

// ============================================
// Notifier Options
// ============================================

export interface NotifierOptions {
  logger?: Logger;
  /** Pattern expansion used to resolve watch directories (default: FsGlob) */
  glob?: Glob;
  /** Watch Source factory (default: chokidar-backed) */
  createWatchSource?: () => WatchSource;
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  /** Treat `create` like `write` (default: true) */
  detectCreate?: boolean;
  /** Minimum gap between accepted writes of one file, ms (default: 100) */
  pendingPeriod?: number;
  /** Max age of a renamed file's mtime for the rename to count, ms (default: 1000) */
  regardRenameAsModPeriod?: number;
}
