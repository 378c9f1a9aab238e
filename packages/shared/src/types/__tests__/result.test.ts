import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../errors/codes.js";
import { Err, Ok, type Result } from "../result.js";

function describeLoad(result: Result<{ commands: string[] }, { code: ErrorCode; message: string }>) {
  return result.ok ? `${result.value.commands.length} rules` : `${result.error.code}: ${result.error.message}`;
}

describe("Ok/Err", () => {
  it("should create an Ok result with a value", () => {
    const result = Ok({ commands: ["make"] });

    expect(result).toEqual({ ok: true, value: { commands: ["make"] } });
    expect(describeLoad(result)).toBe("1 rules");
  });

  it("should create an Err result with an error", () => {
    const error = { code: ErrorCode.CONFIG_NOT_FOUND, message: "Config file not found: a.yml" };
    const result = Err(error);

    expect(result.ok).toBe(false);
    expect(result.error).toBe(error);
    expect(describeLoad(result)).toBe("1002: Config file not found: a.yml");
  });
});
