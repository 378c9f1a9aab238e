/**
 * Platform shell detection and process-tree termination.
 *
 * @module process/shell
 */

import { spawnSync } from "node:child_process";
import { platform } from "node:os";
import { ErrorCode } from "@tripwire/shared";

import { TripwireError } from "../errors/types.js";

/**
 * Shell executable and the arguments that precede the command string.
 */
export interface ShellInvocation {
  shell: string;
  shellArgs: string[];
}

/**
 * Detects the shell commands run through.
 *
 * - Windows: `cmd.exe /d /s /c` (`ComSpec` when set)
 * - Unix: `/bin/sh -c` (`SHELL_PATH` when set)
 */
export function detectShell(env: NodeJS.ProcessEnv = process.env): ShellInvocation {
  if (platform() === "win32") {
    return {
      shell: env.ComSpec ?? "cmd.exe",
      shellArgs: ["/d", "/s", "/c"],
    };
  }

  return {
    shell: env.SHELL_PATH ?? "/bin/sh",
    shellArgs: ["-c"],
  };
}

/**
 * Forcibly kills a process and all its descendants.
 *
 * - Windows: `taskkill /pid <pid> /f /t`
 * - Unix: SIGKILL to the process group led by `pid`
 *
 * A group that no longer exists is not an error.
 *
 * @throws TripwireError (PROCESS_KILL_FAILED) if the kill is refused
 */
export function killProcessTree(pid: number): void {
  try {
    if (platform() === "win32") {
      taskkill(pid);
    } else {
      process.kill(-pid, "SIGKILL");
    }
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ESRCH") {
      return;
    }
    throw new TripwireError(`failed to kill process ${pid}`, ErrorCode.PROCESS_KILL_FAILED, {
      cause: error,
      context: { pid },
    });
  }
}

function taskkill(pid: number): void {
  const result = spawnSync("taskkill", ["/pid", String(pid), "/f", "/t"], { stdio: "ignore" });
  if (result.error) {
    throw result.error;
  }
  // 128: no such process
  if (result.status !== 0 && result.status !== 128) {
    throw new Error(`taskkill exited with status ${result.status}`);
  }
}
