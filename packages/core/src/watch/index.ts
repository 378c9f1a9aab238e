// ============================================
// Watch Module Barrel Export
// ============================================

export {
  DEFAULT_PENDING_PERIOD,
  DEFAULT_REGARD_RENAME_AS_MOD_PERIOD,
  Notifier,
} from "./notifier.js";
export { findRealDirectory, resolveWatchDirectories } from "./resolver.js";
export { ChokidarWatchSource } from "./source.js";
export type {
  LogicalEvent,
  NotifierOptions,
  RawEvent,
  RawOp,
  WatchSource,
  WatchSourceEvents,
} from "./types.js";
