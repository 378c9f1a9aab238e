import { describe, expect, it } from "vitest";

import { ErrorCode } from "@tripwire/shared";
import { TripwireError } from "../../errors/types.js";
import { oneOffTable, RuleTable } from "../table.js";

describe("RuleTable", () => {
  it("should render the first matching rule", () => {
    const table = new RuleTable([{ ext: ".txt", run: "echo {file}" }]);

    expect(table.match("notes.txt")).toEqual({
      rule: { ext: ".txt", run: "echo {file}" },
      command: "echo notes.txt",
    });
  });

  it("should compare extensions exactly", () => {
    const table = new RuleTable([{ ext: ".ts", run: "tsc {file}" }]);

    expect(table.match("a.tsx")).toBeUndefined();
    expect(table.match("a.TS")).toBeUndefined();
  });

  it("should test regular expressions against the whole path", () => {
    const table = new RuleTable([{ re: "^Dockerfile$", run: "docker build ." }]);

    expect(table.match("Dockerfile")?.command).toBe("docker build .");
    expect(table.match("sub/Dockerfile")).toBeUndefined();
  });

  it("should require both criteria when both are set", () => {
    const table = new RuleTable([{ ext: ".py", re: "^test_", run: "pytest {file}" }]);

    expect(table.match("test_app.py")?.command).toBe("pytest test_app.py");
    expect(table.match("app.py")).toBeUndefined();
    expect(table.match("test_app.rb")).toBeUndefined();
  });

  it("should keep rule order", () => {
    const table = new RuleTable([
      { re: "_test\\.go$", run: "go test" },
      { ext: ".go", run: "go run {file}" },
    ]);

    expect(table.match("x_test.go")?.command).toBe("go test");
    expect(table.match("x.go")?.command).toBe("go run x.go");
  });

  it("should skip unusable rules", () => {
    const table = new RuleTable([
      { ext: ".txt", run: "" },
      { run: "echo never" },
      { ext: ".txt", run: "cat {file}" },
    ]);

    expect(table.size).toBe(1);
    expect(table.match("a.txt")?.command).toBe("cat a.txt");
  });

  it("should not match an empty path", () => {
    expect(oneOffTable("make").match("")).toBeUndefined();
  });

  it("should reject an invalid regular expression", () => {
    const build = () => new RuleTable([{ re: "(", run: "x" }]);

    expect(build).toThrow(TripwireError);
    expect(build).toThrow("invalid regular expression: (");
  });

  it("should use the CONFIG_INVALID code for a bad pattern", () => {
    try {
      new RuleTable([{ re: "[", run: "x" }]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TripwireError);
      if (error instanceof TripwireError) {
        expect(error.code).toBe(ErrorCode.CONFIG_INVALID);
      }
    }
  });
});

describe("oneOffTable", () => {
  it("should match any path", () => {
    const table = oneOffTable("make {base0}");

    expect(table.match("src/main.c")?.command).toBe("make main");
    expect(table.match("README")?.command).toBe("make README");
  });
});
