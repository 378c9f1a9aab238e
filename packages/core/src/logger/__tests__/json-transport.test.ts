import { describe, expect, it } from "vitest";
import { JsonTransport } from "../transports/json.js";
import type { LogEntry } from "../types.js";

describe("JsonTransport", () => {
  const timestamp = new Date("2026-01-05T10:00:00.000Z");

  it("outputs one JSON object per entry", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({ level: "info", message: "notified", timestamp });

    expect(lines).toEqual(['{"time":"2026-01-05T10:00:00.000Z","level":"info","message":"notified"}']);
  });

  it("includes context and data", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });
    const entry: LogEntry = {
      level: "debug",
      message: "skipped",
      timestamp,
      context: { logger: "tripwire" },
      data: { path: "a.txt", reason: "too frequent" },
    };

    transport.log(entry);

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      time: "2026-01-05T10:00:00.000Z",
      level: "debug",
      context: { logger: "tripwire" },
      message: "skipped",
      data: { path: "a.txt", reason: "too frequent" },
    });
  });

  it("serializes Error data by name and message", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({ level: "warn", message: "command failed", timestamp, data: new Error("exit 1") });

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      data: { name: "Error", message: "exit 1" },
    });
  });

  it("serializes nested errors", () => {
    const lines: string[] = [];
    const transport = new JsonTransport({ output: (line) => lines.push(line) });

    transport.log({
      level: "error",
      message: "watch error",
      timestamp,
      data: { error: new Error("inotify limit reached") },
    });

    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      data: { error: { name: "Error", message: "inotify limit reached" } },
    });
  });
});
