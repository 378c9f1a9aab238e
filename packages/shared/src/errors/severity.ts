/**
 * Error Severity Types
 *
 * Shared severity definitions for the error system.
 *
 * @module @tripwire/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

// =============================================================================
// Severity Types
// =============================================================================

/**
 * Error severity levels as string literals.
 */
export type ErrorSeverity = "low" | "medium" | "critical";

/**
 * Infers the appropriate severity level from an error code.
 *
 * Severity mapping:
 * - low: Per-event failures the watch loop absorbs (a command failed, a kill failed)
 * - medium: User-correctable errors (bad config, unreadable directory)
 * - critical: Setup errors that prevent watching at all
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    // ═══════════════════════════════════════════
    // Low severity - absorbed by the watch loop
    // ═══════════════════════════════════════════
    case ErrorCode.PROCESS_EXIT_NONZERO:
    case ErrorCode.PROCESS_TIMEOUT:
    case ErrorCode.PROCESS_KILL_FAILED:
      return "low";

    // ═══════════════════════════════════════════
    // Medium severity - User correctable
    // ═══════════════════════════════════════════
    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.CONFIG_READ_FAILED:
    case ErrorCode.WATCH_ADD_FAILED:
    case ErrorCode.PROCESS_SPAWN_FAILED:
      return "medium";

    // ═══════════════════════════════════════════
    // Critical severity - Cannot start watching
    // ═══════════════════════════════════════════
    case ErrorCode.WATCH_INIT_FAILED:
    case ErrorCode.WATCH_TOO_MANY_TARGETS:
      return "critical";
  }
}
