// ============================================
// Tripwire Error Types
// ============================================

import { ErrorCode, type ErrorSeverity, inferSeverity } from "@tripwire/shared";

/**
 * Options for creating a TripwireError.
 */
export interface TripwireErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all tripwire errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class TripwireError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: TripwireErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "TripwireError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Raised when the resolved watch set exceeds the configured directory cap.
 * `directories` holds the partial, over-limit set the resolver stopped at.
 */
export class TooManyTargetsError extends TripwireError {
  public readonly directories: readonly string[];
  public readonly limit: number;

  constructor(directories: readonly string[], limit: number) {
    super(
      `too many directories to watch (more than ${limit})`,
      ErrorCode.WATCH_TOO_MANY_TARGETS,
      { context: { limit, resolved: directories.length } }
    );
    this.name = "TooManyTargetsError";
    this.directories = directories;
    this.limit = limit;
  }
}

/**
 * Details of a finished or aborted subprocess.
 */
export interface ProcessErrorDetails {
  command: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut?: boolean;
  cause?: unknown;
}

/**
 * Raised by the process supervisor when a command does not finish cleanly.
 */
export class ProcessError extends TripwireError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;
  public readonly timedOut: boolean;

  constructor(message: string, code: ErrorCode, details: ProcessErrorDetails) {
    super(message, code, {
      cause: details.cause,
      context: {
        command: details.command,
        exitCode: details.exitCode,
        signal: details.signal,
      },
    });
    this.name = "ProcessError";
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
    this.timedOut = details.timedOut ?? false;
  }
}

/**
 * Type guard for any tripwire error.
 */
export function isTripwireError(error: unknown): error is TripwireError {
  return error instanceof TripwireError;
}

export function isTooManyTargetsError(error: unknown): error is TooManyTargetsError {
  return error instanceof TooManyTargetsError;
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
