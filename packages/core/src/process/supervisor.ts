// ============================================
// Process Supervisor
// ============================================
// Runs shell commands in their own process group so that a kill takes down
// everything the command spawned.

import { type ChildProcess, spawn } from "node:child_process";
import { platform } from "node:os";
import { ErrorCode } from "@tripwire/shared";

import { ProcessError, toError } from "../errors/types.js";
import type { Logger } from "../logger/logger.js";
import { detectShell, killProcessTree, type ShellInvocation } from "./shell.js";
import type {
  ManagedProcess,
  ProcessExit,
  Supervisor,
  SupervisorOptions,
  SupervisorStdio,
} from "./types.js";

class ShellProcess implements ManagedProcess {
  readonly exited: Promise<ProcessExit>;
  private _running = true;

  constructor(
    readonly command: string,
    private readonly child: ChildProcess,
    onExit: (process: ShellProcess) => void
  ) {
    this.exited = new Promise<ProcessExit>((resolve) => {
      const settle = (exit: ProcessExit): void => {
        if (!this._running) {
          return;
        }
        this._running = false;
        onExit(this);
        resolve(exit);
      };
      child.once("error", (error) => settle({ exitCode: null, signal: null, error }));
      child.once("exit", (exitCode, signal) => settle({ exitCode, signal }));
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return this._running;
  }
}

/**
 * Shell-backed {@link Supervisor}.
 *
 * @example
 * ```typescript
 * const supervisor = new ProcessSupervisor({ logger });
 * const proc = supervisor.start("make test");
 * await supervisor.executeOrTimeout(proc, 30);
 * ```
 */
export class ProcessSupervisor implements Supervisor {
  private readonly logger?: Logger;
  private readonly stdio: SupervisorStdio;
  private readonly cwd?: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly shell: ShellInvocation;
  private readonly live = new Set<ShellProcess>();

  constructor(options: SupervisorOptions = {}) {
    this.logger = options.logger;
    this.stdio = options.stdio ?? "inherit";
    this.cwd = options.cwd;
    this.env = options.env ?? process.env;
    this.shell = options.shell ?? detectShell(this.env);
  }

  start(command: string): ManagedProcess {
    const isWindows = platform() === "win32";
    const child = spawn(this.shell.shell, [...this.shell.shellArgs, command], {
      cwd: this.cwd,
      env: this.env,
      stdio: this.stdio,
      // Unix: new process group, so the whole tree can be killed at once
      detached: !isWindows,
      windowsVerbatimArguments: isWindows,
    });

    const proc = new ShellProcess(command, child, (exited) => this.live.delete(exited));
    this.live.add(proc);
    this.logger?.debug("process started", { command, pid: proc.pid });
    return proc;
  }

  async executeOrTimeout(proc: ManagedProcess, timeoutSeconds: number): Promise<void> {
    if (timeoutSeconds <= 0) {
      checkExit(proc.command, await proc.exited);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutSeconds * 1000);
    });

    const outcome = await Promise.race([proc.exited, timedOut]);
    clearTimeout(timer);

    if (outcome === "timeout") {
      await this.kill(proc, "Timeout");
      throw new ProcessError(`timeout: ${proc.command}`, ErrorCode.PROCESS_TIMEOUT, {
        command: proc.command,
        exitCode: null,
        signal: null,
        timedOut: true,
      });
    }

    checkExit(proc.command, outcome);
  }

  async kill(proc: ManagedProcess, reason: string): Promise<void> {
    const { pid } = proc;
    if (!proc.running || pid === undefined) {
      return;
    }

    this.logger?.warn(`${reason}: ${proc.command} (${pid})`);
    try {
      killProcessTree(pid);
    } catch (error) {
      const failure = toError(error);
      this.logger?.error(failure.message, { cause: failure.cause });
      return;
    }
    await proc.exited;
  }

  running(): ManagedProcess[] {
    return [...this.live];
  }

  async dispose(): Promise<void> {
    await Promise.all(this.running().map((proc) => this.kill(proc, "Shutdown")));
  }
}

function checkExit(command: string, exit: ProcessExit): void {
  if (exit.error) {
    throw new ProcessError(`failed to start: ${exit.error.message}`, ErrorCode.PROCESS_SPAWN_FAILED, {
      command,
      exitCode: null,
      signal: null,
      cause: exit.error,
    });
  }
  if (exit.signal) {
    throw new ProcessError(`signal: ${exit.signal}`, ErrorCode.PROCESS_EXIT_NONZERO, {
      command,
      exitCode: exit.exitCode,
      signal: exit.signal,
    });
  }
  if (exit.exitCode !== 0) {
    throw new ProcessError(`exit status ${exit.exitCode}`, ErrorCode.PROCESS_EXIT_NONZERO, {
      command,
      exitCode: exit.exitCode,
      signal: null,
    });
  }
}
