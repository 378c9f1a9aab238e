// ============================================
// Tripwire Core
// ============================================

/**
 * @module @tripwire/core
 *
 * File watching, event normalization and command dispatch: changed files are
 * mapped to shell commands through a rule table and run under a supervisor.
 */

// ============================================
// Command Table
// ============================================
export {
  type CommandMatch,
  type CommandRule,
  type CommandTable,
  oneOffTable,
  placeholderValues,
  RuleTable,
  renderCommand,
} from "./command/index.js";

// ============================================
// Configuration
// ============================================
export {
  CommandRuleSchema,
  type Config,
  type ConfigError,
  type ConfigErrorCode,
  ConfigSchema,
  configCandidates,
  DEFAULT_CONFIG_FILE,
  defaultConfigPath,
  defaultConfigText,
  findConfigFile,
  type LoadConfigOptions,
  type LoadedConfig,
  loadConfig,
  parseConfig,
  readConfigFile,
} from "./config/index.js";

// ============================================
// Dispatch
// ============================================
export {
  DEFAULT_MAX_WATCH_DIRS,
  DISPATCH_IGNORE_PERIOD,
  Dispatcher,
  type DispatcherOptions,
  type EventStream,
  type RunOptions,
} from "./dispatch/index.js";

// ============================================
// Errors
// ============================================
export {
  ErrorCode,
  type ErrorSeverity,
  inferSeverity,
  isTooManyTargetsError,
  isTripwireError,
  ProcessError,
  type ProcessErrorDetails,
  toError,
  TooManyTargetsError,
  TripwireError,
  type TripwireErrorOptions,
} from "./errors/index.js";

// ============================================
// Filesystem
// ============================================
export {
  cleanPath,
  FsGlob,
  type Glob,
  type GlobMatches,
  globMatch,
  isDir,
  isFile,
  modifiedTime,
  toPosixPath,
} from "./fs/index.js";

// ============================================
// Logger
// ============================================
export {
  ConsoleTransport,
  type ConsoleTransportOptions,
  type CreateLoggerOptions,
  createLogger,
  JsonTransport,
  type JsonTransportOptions,
  LOG_LEVELS,
  type LogEntry,
  Logger,
  type LoggerOptions,
  type LogLevel,
  type LogTransport,
} from "./logger/index.js";

// ============================================
// Process Supervision
// ============================================
export {
  detectShell,
  killProcessTree,
  type ManagedProcess,
  type ProcessExit,
  ProcessSupervisor,
  type ShellInvocation,
  type Supervisor,
  type SupervisorOptions,
  type SupervisorStdio,
} from "./process/index.js";

// ============================================
// Utilities
// ============================================
export { Channel, ChannelClosedError, OrderedSet } from "./utils/index.js";

// ============================================
// Watching
// ============================================
export {
  ChokidarWatchSource,
  DEFAULT_PENDING_PERIOD,
  DEFAULT_REGARD_RENAME_AS_MOD_PERIOD,
  findRealDirectory,
  type LogicalEvent,
  Notifier,
  type NotifierOptions,
  type RawEvent,
  type RawOp,
  resolveWatchDirectories,
  type WatchSource,
  type WatchSourceEvents,
} from "./watch/index.js";
