import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { defaultConfigText } from "@tripwire/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { CliIo } from "../commands/watch.js";
import { main } from "../program.js";

/**
 * Captures output; interrupts are already delivered so a run returns at once.
 */
function captureIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (line) => out.push(line),
    stderr: (line) => err.push(line),
    shutdown: () => ({ signal: AbortSignal.abort(), dispose: () => {} }),
  };
}

const run = (io: CliIo, ...args: string[]) => main(["node", "tripwire", ...args], io);

describe("tripwire CLI", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "tripwire-cli-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should print the version", async () => {
    const io = captureIo();

    await expect(run(io, "--version")).resolves.toBe(0);
    expect(io.out).toEqual(["0.0.0-dev"]);
  });

  it("should print the default configuration", async () => {
    const io = captureIo();

    await expect(run(io, "-y")).resolves.toBe(0);
    expect(io.out).toEqual([defaultConfigText().trimEnd()]);
  });

  it("should require at least one pattern", async () => {
    const io = captureIo();

    await expect(run(io, "--no-color")).resolves.toBe(1);
    expect(io.err).toEqual(["error: no file patterns given (see --help)"]);
  });

  it("should reject a malformed timeout", async () => {
    const io = captureIo();

    await expect(run(io, "-t", "soon", "*.txt")).resolves.toBe(1);
    expect(io.err.join("\n")).toContain("not a non-negative integer");
  });

  it("should fail on a missing configuration file", async () => {
    const io = captureIo();
    const missing = path.join(tempDir, "missing.yml");

    await expect(run(io, "--no-color", "-f", missing, "*.txt")).resolves.toBe(1);
    expect(io.err).toEqual([`[ERROR] Config file not found: ${missing}`]);
  });

  it("should fail when the patterns resolve to too many directories", async () => {
    for (const name of ["a", "b", "c"]) {
      await fs.mkdir(path.join(tempDir, name));
      await fs.writeFile(path.join(tempDir, name, "x.txt"), "");
    }
    const io = captureIo();

    await expect(
      run(io, "--no-color", "-w", "1", "-c", "true", path.join(tempDir, "*", "*.txt"))
    ).resolves.toBe(1);
    expect(io.err).toContain("[ERROR] too many directories to watch (more than 1)");
  });

  it("should watch and exit cleanly when interrupted", async () => {
    const io = captureIo();

    await expect(
      run(io, "--no-color", "-c", "echo {{file}}", path.join(tempDir, "*.txt"))
    ).resolves.toBe(0);
    expect(io.out).toEqual([`[INFO ] watching directory: ${tempDir}`]);
    expect(io.err).toEqual([]);
  });

  it("should log JSON lines", async () => {
    const io = captureIo();

    await expect(
      run(io, "--json", "-c", "echo {{file}}", path.join(tempDir, "*.txt"))
    ).resolves.toBe(0);

    expect(io.out).toHaveLength(1);
    const line: unknown = JSON.parse(io.out[0] ?? "");
    expect(line).toMatchObject({
      level: "info",
      context: { logger: "tripwire" },
      message: `watching directory: ${tempDir}`,
    });
  });
});
