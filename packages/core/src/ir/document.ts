/**
 * AgentDocument — the neutral model every dialect is parsed into and
 * serialized out of.
 */

import { DEFAULT_VERSION } from "@agentmorph/shared";
import { report } from "../errors.js";
import type { ValidationReport } from "../errors.js";
import { cloneJson, isJsonObject, setOwn } from "../tree/json.js";
import type { JsonObject, JsonValue } from "../tree/json.js";

export type AgentAuthor = string | JsonObject;

/** Plain-tree form of an AgentDocument, as produced by `toTree()`. */
export interface AgentTree {
  id?: string;
  name?: string;
  description?: string;
  version?: string;
  category?: string;
  capabilities?: string[];
  tools?: string[];
  systemPrompt?: string;
  configValue?: JsonValue;
  configSchema?: JsonObject;
  metadata?: JsonObject;
  icon?: string;
  author?: AgentAuthor;
  tags?: string[];
  customFields?: JsonObject;
}

function isStringList(value: unknown): boolean {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

export class AgentDocument {
  id?: string;
  name?: string;
  description?: string;
  version: string = DEFAULT_VERSION;
  category?: string;
  capabilities: string[] = [];
  tools: string[] = [];
  systemPrompt?: string;
  configValue?: JsonValue;
  configSchema?: JsonObject;
  metadata: JsonObject = {};
  icon?: string;
  author?: AgentAuthor;
  tags: string[] = [];
  customFields: JsonObject = {};

  static fromTree(tree: AgentTree): AgentDocument {
    const doc = new AgentDocument();
    doc.id = tree.id;
    doc.name = tree.name;
    doc.description = tree.description;
    doc.version = tree.version ?? DEFAULT_VERSION;
    doc.category = tree.category;
    doc.systemPrompt = tree.systemPrompt;
    doc.icon = tree.icon;
    doc.author = tree.author === undefined ? undefined : cloneJson(tree.author);

    doc.capabilities = [...(tree.capabilities ?? [])];
    doc.tools = [...(tree.tools ?? [])];
    for (const tag of tree.tags ?? []) doc.addTag(tag);

    doc.configValue = tree.configValue === undefined ? undefined : cloneJson(tree.configValue);
    doc.configSchema = tree.configSchema === undefined ? undefined : cloneJson(tree.configSchema);
    doc.metadata = cloneJson(tree.metadata ?? {});
    doc.customFields = cloneJson(tree.customFields ?? {});
    return doc;
  }

  /**
   * Plain-tree snapshot. Fields that are `undefined` are omitted; sequences and
   * mappings are always present and deep-copied.
   */
  toTree(): AgentTree {
    const tree: AgentTree = {};
    if (this.id !== undefined) tree.id = this.id;
    if (this.name !== undefined) tree.name = this.name;
    if (this.description !== undefined) tree.description = this.description;
    tree.version = this.version;
    if (this.category !== undefined) tree.category = this.category;
    tree.capabilities = [...this.capabilities];
    tree.tools = [...this.tools];
    if (this.systemPrompt !== undefined) tree.systemPrompt = this.systemPrompt;
    if (this.configValue !== undefined) tree.configValue = cloneJson(this.configValue);
    if (this.configSchema !== undefined) tree.configSchema = cloneJson(this.configSchema);
    tree.metadata = cloneJson(this.metadata);
    if (this.icon !== undefined) tree.icon = this.icon;
    if (this.author !== undefined) tree.author = cloneJson(this.author);
    tree.tags = [...this.tags];
    tree.customFields = cloneJson(this.customFields);
    return tree;
  }

  /**
   * Valid iff name and description are non-empty and at least one of
   * systemPrompt, capabilities, tools carries content.
   */
  validate(): ValidationReport {
    const errors: string[] = [];

    if (!this.name) errors.push("Missing required field: 'name'");
    if (!this.description) errors.push("Missing required field: 'description'");

    if (!this.systemPrompt && this.capabilities.length === 0 && this.tools.length === 0) {
      errors.push("Agent must have at least one of: system_prompt, capabilities, tools");
    }

    // Documents assembled by untyped callers can still carry the wrong shapes.
    if (!isStringList(this.capabilities)) errors.push("'capabilities' must be an array of strings");
    if (!isStringList(this.tools)) errors.push("'tools' must be an array of strings");
    if (!isStringList(this.tags)) errors.push("'tags' must be an array of strings");
    if (!isJsonObject(this.metadata)) errors.push("'metadata' must be an object");
    if (!isJsonObject(this.customFields)) errors.push("'customFields' must be an object");
    if (this.configSchema !== undefined && !isJsonObject(this.configSchema)) {
      errors.push("'configSchema' must be an object");
    }

    return report(errors);
  }

  mergeCapabilities(additional: readonly string[]): void {
    for (const capability of additional) {
      if (!this.capabilities.includes(capability)) this.capabilities.push(capability);
    }
  }

  mergeTools(additional: readonly string[]): void {
    for (const tool of additional) {
      if (!this.tools.includes(tool)) this.tools.push(tool);
    }
  }

  addTag(tag: string): void {
    if (!this.tags.includes(tag)) this.tags.push(tag);
  }

  setMetadata(key: string, value: JsonValue): void {
    setOwn(this.metadata, key, value);
  }

  getMetadata(key: string): JsonValue | undefined {
    return Object.hasOwn(this.metadata, key) ? this.metadata[key] : undefined;
  }

  setCustomField(key: string, value: JsonValue): void {
    setOwn(this.customFields, key, value);
  }

  getCustomField(key: string): JsonValue | undefined {
    return Object.hasOwn(this.customFields, key) ? this.customFields[key] : undefined;
  }

  toString(): string {
    return `AgentDocument(name='${this.name ?? ""}', category='${this.category ?? ""}', capabilities=${this.capabilities.length})`;
  }
}
