import { describe, it, expect } from "vitest";
import { IOError, ParseError, SourceValidationError, UnsupportedFormatError } from "@agentmorph/core";
import { EXIT } from "@agentmorph/shared";
import { categorize } from "../utils/output.js";
import { renderTree } from "../utils/render.js";

describe("categorize", () => {
  it("maps parse errors", () => {
    expect(categorize(new ParseError("Invalid JSON: x"))).toEqual({
      code: "PARSE_ERROR",
      exitCode: EXIT.PARSE_FAILED,
      hints: [],
    });
  });

  it("turns validation errors into hints", () => {
    expect(categorize(new SourceValidationError(["a", "b"]))).toEqual({
      code: "VALIDATION_FAILED",
      exitCode: EXIT.VALIDATION_FAILED,
      hints: ["a", "b"],
    });
  });

  it("maps unsupported formats", () => {
    expect(categorize(new UnsupportedFormatError("toml", "Unsupported")).code).toBe("UNSUPPORTED_FORMAT");
  });

  it("tells a missing file apart from other IO failures", () => {
    const missing = Object.assign(new Error("no such file"), { code: "ENOENT" });
    expect(categorize(new IOError("a.json", "File not found: a.json", { cause: missing }))).toEqual({
      code: "FILE_NOT_FOUND",
      exitCode: EXIT.INPUT_INVALID,
      hints: [],
    });
    expect(categorize(new IOError("a.json", "Failed to read a.json", { cause: new Error("EACCES") })).code).toBe(
      "IO_ERROR",
    );
  });
});

describe("renderTree", () => {
  it("renders JSON with the configured indent", () => {
    expect(renderTree({ a: 1, b: ["x"] }, "json", 2)).toBe('{\n  "a": 1,\n  "b": [\n    "x"\n  ]\n}\n');
  });

  it("renders YAML", () => {
    expect(renderTree({ name: "A", tools: ["x"] }, "yaml", 2)).toBe("name: A\ntools:\n  - x\n");
  });
});
