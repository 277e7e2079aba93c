/**
 * Claude dialect serializer.
 */

import { ok } from "../errors.js";
import type { ContainerTree } from "../containers/types.js";
import { cloneJson, isBlank } from "../tree/json.js";
import type { DialectSerializer } from "./types.js";
import { checkDocument, withCustomFields } from "./types.js";

export const claudeSerializer: DialectSerializer = {
  dialect: "claude",

  serialize(doc) {
    const identity = checkDocument(doc);
    if (!identity.ok) return identity;

    const tree: ContainerTree = {
      name: identity.value.name,
      description: identity.value.description,
      version: doc.version,
    };

    if (doc.capabilities.length > 0) tree.capabilities = [...doc.capabilities];
    if (doc.tools.length > 0) tree.tools = [...doc.tools];
    if (doc.systemPrompt) tree.system_prompt = doc.systemPrompt;
    if (doc.configSchema && !isBlank(doc.configSchema)) tree.config_schema = cloneJson(doc.configSchema);
    if (doc.configValue !== undefined && !isBlank(doc.configValue)) tree.config = cloneJson(doc.configValue);
    if (!isBlank(doc.metadata)) tree.metadata = cloneJson(doc.metadata);

    return ok(withCustomFields(tree, doc.customFields));
  },
};
