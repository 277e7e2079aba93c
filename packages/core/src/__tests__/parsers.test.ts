import { describe, it, expect } from "vitest";
import { claudeParser } from "../parsers/claude.js";
import { customParser } from "../parsers/custom.js";
import { nameFromMode, rooParser } from "../parsers/roo.js";
import { ValidationError } from "../errors.js";

function claudeTree() {
  return {
    name: "Code Analyzer",
    description: "Analyzes source code",
    capabilities: ["static-analysis"],
    tools: ["file_reader"],
    system_prompt: "You are a code analyzer.",
  };
}

describe("claudeParser.validate", () => {
  it("accepts a complete agent", () => {
    expect(claudeParser.validate(claudeTree())).toEqual({ valid: true, errors: [] });
  });

  it("reports exactly one error for a contentless agent", () => {
    expect(claudeParser.validate({ name: "X", description: "Y" }).errors).toEqual([
      "Must have at least one of: system_prompt, capabilities, tools",
    ]);
  });

  it("separates missing fields from empty ones", () => {
    expect(claudeParser.validate({ name: "", tools: ["t"] }).errors).toEqual([
      "Field 'name' cannot be empty",
      "Missing required field: 'description'",
    ]);
  });

  it("collects presence and type errors together", () => {
    expect(claudeParser.validate({ tools: 5 }).errors).toEqual([
      "Missing required field: 'name'",
      "Missing required field: 'description'",
      "'tools' must be an array",
    ]);
  });

  it("names the offending list element", () => {
    expect(claudeParser.validate({ ...claudeTree(), tools: [1, "read"] }).errors).toEqual([
      "tools[0] must be a string",
    ]);
  });

  it("rejects a config_schema that is not an object", () => {
    expect(claudeParser.validate({ ...claudeTree(), config_schema: "plain" }).errors).toEqual([
      "'config_schema' must be an object",
    ]);
  });
});

describe("claudeParser.parse", () => {
  it("builds a document and keeps unknown keys as custom fields", () => {
    const result = claudeParser.parse({ ...claudeTree(), extra_flag: true });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const doc = result.value;
    expect(doc.name).toBe("Code Analyzer");
    expect(doc.version).toBe("1.0.0");
    expect(doc.systemPrompt).toBe("You are a code analyzer.");
    expect(doc.customFields).toEqual({ extra_flag: true });
  });

  it("decodes a config_schema given as JSON text", () => {
    const result = claudeParser.parse({ ...claudeTree(), config_schema: '{"type": "object"}' });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.configSchema).toEqual({ type: "object" });
  });

  it("fails with a validation error listing every rule", () => {
    const result = claudeParser.parse({ name: "X", description: "Y" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe(
      "Invalid Claude agent format: Must have at least one of: system_prompt, capabilities, tools",
    );
  });
});

describe("rooParser", () => {
  it("derives the name from the mode slug", () => {
    const result = rooParser.parse({ mode: "code-analyzer", description: "d", tools: ["read"] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe("Code Analyzer");
    expect(result.value.getMetadata("original_mode")).toBe("code-analyzer");
  });

  it("prefers an explicit name", () => {
    const result = rooParser.parse({ mode: "helper", name: "My Helper", description: "d", tools: ["read"] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe("My Helper");
  });

  it("keeps roo-only fields on the document", () => {
    const result = rooParser.parse({
      mode: "helper",
      description: "d",
      system_prompt: "p",
      category: "development",
      icon: "fa-code",
      tags: ["code", "code"],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.category).toBe("development");
    expect(result.value.icon).toBe("fa-code");
    expect(result.value.tags).toEqual(["code"]);
  });

  it("requires mode or name", () => {
    expect(rooParser.validate({ description: "d", tools: ["x"] }).errors).toEqual([
      "Must have either 'mode' or 'name' field",
    ]);
  });

  it("rejects an empty mode", () => {
    expect(rooParser.validate({ mode: "", name: "A", description: "d", tools: ["x"] }).errors).toEqual([
      "Field 'mode' cannot be empty",
    ]);
  });
});

describe("nameFromMode", () => {
  it("title-cases hyphenated slugs", () => {
    expect(nameFromMode("data-science-helper")).toBe("Data Science Helper");
    expect(nameFromMode("QA")).toBe("Qa");
  });
});

describe("customParser", () => {
  const complete = {
    name: "N",
    description: "D",
    capabilities: ["c"],
    tools: ["t"],
    system_prompt: "p",
  };

  it("accepts a complete agent", () => {
    expect(customParser.validate(complete).valid).toBe(true);
  });

  it("requires every agent field", () => {
    expect(customParser.validate({ name: "X", description: "Y" }).errors).toEqual([
      "Missing required field: 'capabilities'",
      "Missing required field: 'tools'",
      "Missing required field: 'system_prompt'",
    ]);
  });

  it("rejects empty required lists", () => {
    expect(customParser.validate({ ...complete, capabilities: [] }).errors).toEqual([
      "Field 'capabilities' cannot be empty",
    ]);
  });

  it("requires config to be an object", () => {
    expect(customParser.validate({ ...complete, config: "abc" }).errors).toEqual([
      "'config' must be an object",
    ]);
  });

  it("accepts a string or object author only", () => {
    expect(customParser.validate({ ...complete, author: { name: "Dev" } }).valid).toBe(true);
    expect(customParser.validate({ ...complete, author: 5 }).errors).toEqual([
      "'author' must be a string or an object",
    ]);
  });

  it("parses author and config", () => {
    const result = customParser.parse({ ...complete, author: "Dev", config: { depth: 2 } });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.author).toBe("Dev");
    expect(result.value.configValue).toEqual({ depth: 2 });
  });
});
