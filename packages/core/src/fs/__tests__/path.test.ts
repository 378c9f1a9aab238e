import * as path from "node:path";
import { describe, expect, it } from "vitest";

import { cleanPath } from "../path.js";

describe("cleanPath", () => {
  it("should resolve dot segments", () => {
    expect(cleanPath(path.join("src", ".", "lib", "..", "main.ts"))).toBe(
      path.join("src", "main.ts")
    );
  });

  it("should drop a trailing separator", () => {
    expect(cleanPath(`src${path.sep}`)).toBe("src");
  });

  it("should keep a filesystem root as is", () => {
    expect(cleanPath(path.sep)).toBe(path.sep);
  });

  it("should turn an empty path into the current directory", () => {
    expect(cleanPath("")).toBe(".");
  });
});
