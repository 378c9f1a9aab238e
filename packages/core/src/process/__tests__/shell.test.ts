import { platform } from "node:os";
import { ErrorCode } from "@tripwire/shared";
import { describe, expect, it } from "vitest";

import { TripwireError } from "../../errors/types.js";
import { detectShell, killProcessTree } from "../shell.js";

const isWindows = platform() === "win32";

describe("detectShell", () => {
  it.skipIf(isWindows)("should default to /bin/sh -c", () => {
    expect(detectShell({})).toEqual({ shell: "/bin/sh", shellArgs: ["-c"] });
  });

  it.skipIf(isWindows)("should honor SHELL_PATH", () => {
    expect(detectShell({ SHELL_PATH: "/usr/bin/bash" })).toEqual({
      shell: "/usr/bin/bash",
      shellArgs: ["-c"],
    });
  });

  it.runIf(isWindows)("should use cmd.exe on Windows", () => {
    expect(detectShell({})).toEqual({ shell: "cmd.exe", shellArgs: ["/d", "/s", "/c"] });
  });
});

describe("killProcessTree", () => {
  it.skipIf(isWindows)("should ignore a process group that does not exist", () => {
    // Above the largest pid Linux can hand out
    expect(() => killProcessTree(4_194_305)).not.toThrow();
  });

  it.skipIf(isWindows)("should report a refused kill with its pid", () => {
    let failure: unknown;
    try {
      // rejected by process.kill before any signal is sent
      killProcessTree(Number.NaN);
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(TripwireError);
    expect(failure).toMatchObject({
      code: ErrorCode.PROCESS_KILL_FAILED,
      message: "failed to kill process NaN",
      context: { pid: Number.NaN },
    });
  });
});
