/**
 * Custom dialect serializer.
 */

import { ok } from "../errors.js";
import type { ContainerTree } from "../containers/types.js";
import { cloneJson, isBlank } from "../tree/json.js";
import type { DialectSerializer } from "./types.js";
import { checkDocument, withCustomFields } from "./types.js";

export function defaultSystemPrompt(name: string, description: string): string {
  return `You are ${name}, an AI assistant. ${description}`;
}

export const customSerializer: DialectSerializer = {
  dialect: "custom",

  serialize(doc) {
    const identity = checkDocument(doc);
    if (!identity.ok) return identity;
    const { name, description } = identity.value;

    const tree: ContainerTree = {
      name,
      description,
      version: doc.version,
      // Required by the dialect even when empty
      capabilities: [...doc.capabilities],
      tools: [...doc.tools],
      system_prompt: doc.systemPrompt || defaultSystemPrompt(name, description),
    };

    if (doc.category) tree.category = doc.category;
    if (doc.configSchema && !isBlank(doc.configSchema)) tree.config_schema = cloneJson(doc.configSchema);
    if (doc.configValue !== undefined && !isBlank(doc.configValue)) tree.config = cloneJson(doc.configValue);
    if (doc.author !== undefined && !isBlank(doc.author)) tree.author = cloneJson(doc.author);
    if (doc.tags.length > 0) tree.tags = [...doc.tags];
    if (doc.icon) tree.icon = doc.icon;
    if (!isBlank(doc.metadata)) tree.metadata = cloneJson(doc.metadata);

    return ok(withCustomFields(tree, doc.customFields));
  },
};
