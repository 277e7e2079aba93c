import { describe, it, expect } from "vitest";
import { AgentDocument } from "../ir/document.js";
import { claudeParser } from "../parsers/claude.js";
import { claudeSerializer } from "../serializers/claude.js";
import { customSerializer, defaultSystemPrompt } from "../serializers/custom.js";
import { modeFromName, rooSerializer } from "../serializers/roo.js";

describe("claudeSerializer", () => {
  it("emits only populated fields", () => {
    const doc = AgentDocument.fromTree({
      name: "A",
      description: "B",
      tools: ["t"],
      metadata: { original_mode: "a" },
    });
    expect(claudeSerializer.serialize(doc)).toEqual({
      ok: true,
      value: { name: "A", description: "B", version: "1.0.0", tools: ["t"], metadata: { original_mode: "a" } },
    });
  });

  it("refuses an invalid document", () => {
    const result = claudeSerializer.serialize(AgentDocument.fromTree({ name: "A", description: "B" }));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe(
      "Invalid agent document: Agent must have at least one of: system_prompt, capabilities, tools",
    );
  });

  it("never lets a custom field replace a core key", () => {
    const doc = AgentDocument.fromTree({
      name: "A",
      description: "B",
      systemPrompt: "p",
      customFields: { name: "override", extra: 1 },
    });
    const result = claudeSerializer.serialize(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe("A");
    expect(result.value.extra).toBe(1);
  });

  it("survives a parse/serialize round trip", () => {
    const parsed = claudeParser.parse({
      name: "Reviewer",
      description: "Reviews code",
      capabilities: ["review"],
      config: { strict: true },
      extra_flag: true,
    });
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    const serialized = claudeSerializer.serialize(parsed.value);
    expect(serialized.ok).toBe(true);
    if (!serialized.ok) return;
    const reparsed = claudeParser.parse(serialized.value);
    expect(reparsed.ok).toBe(true);
    if (!reparsed.ok) return;
    expect(reparsed.value.toTree()).toEqual(parsed.value.toTree());
  });
});

describe("rooSerializer", () => {
  it("always emits mode, category, icon and tags", () => {
    const doc = AgentDocument.fromTree({ name: "Code Analyzer", description: "d", systemPrompt: "p" });
    expect(rooSerializer.serialize(doc)).toEqual({
      ok: true,
      value: {
        mode: "code-analyzer",
        name: "Code Analyzer",
        description: "d",
        version: "1.0.0",
        category: "general",
        icon: "fa-robot",
        tags: [],
        system_prompt: "p",
      },
    });
  });

  it("keeps document values over fallbacks", () => {
    const doc = AgentDocument.fromTree({
      name: "A",
      description: "d",
      tools: ["t"],
      category: "development",
      icon: "fa-code",
      tags: ["x"],
    });
    const result = rooSerializer.serialize(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.category).toBe("development");
    expect(result.value.icon).toBe("fa-code");
    expect(result.value.tags).toEqual(["x"]);
  });
});

describe("modeFromName", () => {
  it("lower-cases and replaces each space", () => {
    expect(modeFromName("My Cool  Agent")).toBe("my-cool--agent");
  });
});

describe("customSerializer", () => {
  it("always emits the required agent fields", () => {
    const doc = AgentDocument.fromTree({ name: "N", description: "D", tools: ["x"] });
    expect(customSerializer.serialize(doc)).toEqual({
      ok: true,
      value: {
        name: "N",
        description: "D",
        version: "1.0.0",
        capabilities: [],
        tools: ["x"],
        system_prompt: "You are N, an AI assistant. D",
      },
    });
  });

  it("emits author and config when present", () => {
    const doc = AgentDocument.fromTree({
      name: "N",
      description: "D",
      systemPrompt: "p",
      author: { name: "Dev" },
      configValue: { depth: 1 },
    });
    const result = customSerializer.serialize(doc);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.author).toEqual({ name: "Dev" });
    expect(result.value.config).toEqual({ depth: 1 });
  });
});

describe("defaultSystemPrompt", () => {
  it("combines name and description", () => {
    expect(defaultSystemPrompt("Helper", "Helps out.")).toBe("You are Helper, an AI assistant. Helps out.");
  });
});
