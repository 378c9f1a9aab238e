import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { isDir, isFile, modifiedTime } from "../stat.js";

describe("filesystem stats", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tripwire-stat-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should tell files and directories apart", async () => {
    const file = path.join(tempDir, "notes.txt");
    await fs.writeFile(file, "hello");

    expect(isFile(file)).toBe(true);
    expect(isDir(file)).toBe(false);
    expect(isDir(tempDir)).toBe(true);
    expect(isFile(tempDir)).toBe(false);
  });

  it("should treat missing paths as neither", () => {
    const missing = path.join(tempDir, "missing.txt");

    expect(isFile(missing)).toBe(false);
    expect(isDir(missing)).toBe(false);
    expect(modifiedTime(missing)).toBe(0);
  });

  it("should report modification time in epoch milliseconds", async () => {
    const file = path.join(tempDir, "dated.txt");
    await fs.writeFile(file, "x");
    const when = new Date("2026-03-01T12:00:00.000Z");
    await fs.utimes(file, when, when);

    expect(modifiedTime(file)).toBe(when.getTime());
  });
});
