export {
  DEFAULT_MAX_WATCH_DIRS,
  DISPATCH_IGNORE_PERIOD,
  Dispatcher,
  type DispatcherOptions,
  type EventStream,
  type RunOptions,
} from "./dispatcher.js";
