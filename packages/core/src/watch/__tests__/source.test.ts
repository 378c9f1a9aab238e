import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ErrorCode } from "@tripwire/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ChokidarWatchSource } from "../source.js";
import type { RawEvent } from "../types.js";

describe("ChokidarWatchSource", () => {
  let tempDir: string;
  let source: ChokidarWatchSource;
  let events: RawEvent[];

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tripwire-source-"));
    source = new ChokidarWatchSource();
    events = [];
    source.on("event", (event) => events.push(event));
  });

  afterEach(async () => {
    await source.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should report a new file as create", async () => {
    await source.add(tempDir);
    const file = path.join(tempDir, "a.txt");

    await fs.writeFile(file, "x");

    await vi.waitFor(() => expect(events).toContainEqual({ path: file, op: "create" }), {
      timeout: 5000,
    });
  });

  it("should report a modified file as write", async () => {
    const file = path.join(tempDir, "b.txt");
    await fs.writeFile(file, "x");
    await source.add(tempDir);

    await fs.appendFile(file, "y");

    await vi.waitFor(() => expect(events).toContainEqual({ path: file, op: "write" }), {
      timeout: 5000,
    });
  });

  it("should reject a path that is not a directory", async () => {
    const file = path.join(tempDir, "c.txt");
    await fs.writeFile(file, "x");

    await expect(source.add(file)).rejects.toMatchObject({
      code: ErrorCode.WATCH_ADD_FAILED,
      message: `not a directory: ${file}`,
      context: { dir: file },
    });
  });

  it("should refuse new directories once closed", async () => {
    await source.close();
    await source.close();

    await expect(source.add(tempDir)).rejects.toMatchObject({
      code: ErrorCode.WATCH_ADD_FAILED,
      message: "watch source is closed",
    });
  });
});
