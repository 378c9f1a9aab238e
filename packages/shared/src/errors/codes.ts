// ============================================
// Tripwire Error Codes
// ============================================

/**
 * Centralized error codes for tripwire.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Watch errors
 * - 3xxx: Process errors
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_NOT_FOUND = 1002,
  CONFIG_PARSE_ERROR = 1003,
  CONFIG_READ_FAILED = 1004,

  // Watch Errors (2xxx)
  WATCH_INIT_FAILED = 2001,
  WATCH_TOO_MANY_TARGETS = 2002,
  WATCH_ADD_FAILED = 2003,

  // Process Errors (3xxx)
  PROCESS_SPAWN_FAILED = 3001,
  PROCESS_EXIT_NONZERO = 3002,
  PROCESS_TIMEOUT = 3003,
  PROCESS_KILL_FAILED = 3004,
}
