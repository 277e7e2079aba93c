import { describe, it, expect } from "vitest";
import { AgentDocument } from "../ir/document.js";

describe("AgentDocument", () => {
  it("starts with defaults for version and collections", () => {
    const doc = new AgentDocument();
    expect(doc.version).toBe("1.0.0");
    expect(doc.capabilities).toEqual([]);
    expect(doc.tools).toEqual([]);
    expect(doc.tags).toEqual([]);
    expect(doc.metadata).toEqual({});
    expect(doc.customFields).toEqual({});
  });

  it("requires agent content beyond name and description", () => {
    const doc = AgentDocument.fromTree({ name: "X", description: "Y" });
    expect(doc.validate()).toEqual({
      valid: false,
      errors: ["Agent must have at least one of: system_prompt, capabilities, tools"],
    });
  });

  it("reports every missing field at once", () => {
    expect(new AgentDocument().validate().errors).toEqual([
      "Missing required field: 'name'",
      "Missing required field: 'description'",
      "Agent must have at least one of: system_prompt, capabilities, tools",
    ]);
  });

  it("accepts a document with a system prompt only", () => {
    const doc = AgentDocument.fromTree({ name: "X", description: "Y", systemPrompt: "Be helpful." });
    expect(doc.validate().valid).toBe(true);
  });

  it("dedupes tags on construction", () => {
    const doc = AgentDocument.fromTree({ tags: ["a", "b", "a"] });
    expect(doc.tags).toEqual(["a", "b"]);
  });

  it("omits undefined fields from the tree form", () => {
    expect(AgentDocument.fromTree({ name: "A" }).toTree()).toEqual({
      name: "A",
      version: "1.0.0",
      capabilities: [],
      tools: [],
      metadata: {},
      tags: [],
      customFields: {},
    });
  });

  it("rebuilds an equal document from its tree form", () => {
    const doc = AgentDocument.fromTree({
      name: "Reviewer",
      description: "Reviews pull requests",
      capabilities: ["review"],
      configValue: { depth: 2 },
      author: { name: "Dev Team" },
      metadata: { source: "test" },
      customFields: { priority: "high" },
    });
    expect(AgentDocument.fromTree(doc.toTree()).toTree()).toEqual(doc.toTree());
  });

  it("returns deep copies from toTree", () => {
    const doc = AgentDocument.fromTree({ metadata: { nested: { count: 1 } } });
    const tree = doc.toTree();
    tree.metadata = { replaced: true };
    tree.tools?.push("leak");
    expect(doc.metadata).toEqual({ nested: { count: 1 } });
    expect(doc.tools).toEqual([]);
  });

  it("merges capabilities and tools without duplicates", () => {
    const doc = AgentDocument.fromTree({ capabilities: ["a"], tools: ["read"] });
    doc.mergeCapabilities(["a", "b"]);
    doc.mergeTools(["read", "write", "write"]);
    expect(doc.capabilities).toEqual(["a", "b"]);
    expect(doc.tools).toEqual(["read", "write"]);
  });

  it("looks up metadata and custom fields by own key only", () => {
    const doc = new AgentDocument();
    doc.setMetadata("original_mode", "helper");
    doc.setCustomField("extra_flag", true);
    expect(doc.getMetadata("original_mode")).toBe("helper");
    expect(doc.getMetadata("toString")).toBeUndefined();
    expect(doc.getCustomField("extra_flag")).toBe(true);
    expect(doc.getCustomField("missing")).toBeUndefined();
  });

  it("renders a short summary", () => {
    const doc = AgentDocument.fromTree({ name: "A", capabilities: ["x", "y"] });
    expect(doc.toString()).toBe("AgentDocument(name='A', category='', capabilities=2)");
  });
});
