// ============================================
// Process Types
// ============================================

import type { Logger } from "../logger/logger.js";
import type { ShellInvocation } from "./shell.js";

/**
 * How a supervised process ended.
 */
export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be started */
  error?: Error;
}

/**
 * A shell command started by the supervisor.
 */
export interface ManagedProcess {
  readonly command: string;
  /** Undefined when spawning failed */
  readonly pid: number | undefined;
  readonly running: boolean;
  /** Settles once the process is gone. Never rejects. */
  readonly exited: Promise<ProcessExit>;
}

/**
 * Starts, awaits and kills shell commands.
 */
export interface Supervisor {
  start(command: string): ManagedProcess;
  /**
   * Wait for `process` to finish, killing it after `timeoutSeconds` (0 = no
   * limit).
   *
   * @throws ProcessError unless the process exits with status 0
   */
  executeOrTimeout(process: ManagedProcess, timeoutSeconds: number): Promise<void>;
  /** Best-effort forced termination. Never rejects. */
  kill(process: ManagedProcess, reason: string): Promise<void>;
  /** Processes started and not yet exited. */
  running(): ManagedProcess[];
  /** Kill every live process. */
  dispose(): Promise<void>;
}

export type SupervisorStdio = "inherit" | "ignore";

export interface SupervisorOptions {
  logger?: Logger;
  /** Child stdio (default: inherit) */
  stdio?: SupervisorStdio;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Override shell detection */
  shell?: ShellInvocation;
}
