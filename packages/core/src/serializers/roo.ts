/**
 * Roo dialect serializer.
 *
 * `mode`, `category`, `icon` and `tags` are mandatory in Roo and always
 * emitted, with fixed fallbacks when the document has no value.
 */

import { DEFAULT_CATEGORY, DEFAULT_ICON } from "@agentmorph/shared";
import { ok } from "../errors.js";
import type { ContainerTree } from "../containers/types.js";
import { cloneJson, isBlank } from "../tree/json.js";
import type { DialectSerializer } from "./types.js";
import { checkDocument, withCustomFields } from "./types.js";

/** "Code Analyzer" → "code-analyzer" */
export function modeFromName(name: string): string {
  return name.toLowerCase().replace(/ /g, "-");
}

export const rooSerializer: DialectSerializer = {
  dialect: "roo",

  serialize(doc) {
    const identity = checkDocument(doc);
    if (!identity.ok) return identity;
    const { name, description } = identity.value;

    const tree: ContainerTree = {
      mode: modeFromName(name),
      name,
      description,
      version: doc.version,
      category: doc.category || DEFAULT_CATEGORY,
      icon: doc.icon || DEFAULT_ICON,
      tags: [...doc.tags],
    };

    if (doc.capabilities.length > 0) tree.capabilities = [...doc.capabilities];
    if (doc.tools.length > 0) tree.tools = [...doc.tools];
    if (doc.systemPrompt) tree.system_prompt = doc.systemPrompt;
    if (doc.configValue !== undefined && !isBlank(doc.configValue)) tree.config = cloneJson(doc.configValue);
    if (!isBlank(doc.metadata)) tree.metadata = cloneJson(doc.metadata);

    return ok(withCustomFields(tree, doc.customFields));
  },
};
