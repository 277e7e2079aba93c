/**
 * Custom dialect parser — the strictest of the three: every agent field is
 * required and non-empty, and `config` must be an object.
 */

import { DEFAULT_VERSION } from "@agentmorph/shared";
import { z } from "zod";
import type { ContainerTree } from "../containers/types.js";
import { err, ok, report, ValidationError } from "../errors.js";
import type { ValidationReport } from "../errors.js";
import { AgentDocument } from "../ir/document.js";
import type { DialectParser } from "./types.js";
import { checkFields, collectCustomFields, field, requireFields } from "./rules.js";

const REQUIRED = ["name", "description", "capabilities", "tools", "system_prompt"] as const;

const CustomFieldsSchema = z.object({
  name: field.string("name"),
  description: field.string("description"),
  version: field.string("version"),
  category: field.string("category"),
  capabilities: field.stringList("capabilities"),
  tools: field.stringList("tools"),
  system_prompt: field.string("system_prompt"),
  config_schema: field.object("config_schema"),
  config: field.object("config"),
  metadata: field.object("metadata"),
  icon: field.string("icon"),
  author: field.stringOrObject("author"),
  tags: field.stringList("tags"),
});

const RECOGNIZED = new Set(Object.keys(CustomFieldsSchema.shape));

function validate(tree: ContainerTree): ValidationReport {
  return report([
    ...requireFields(tree, REQUIRED),
    ...checkFields(CustomFieldsSchema, tree).errors,
  ]);
}

export const customParser: DialectParser = {
  dialect: "custom",
  humanName: "Custom",
  description:
    "Application-specific custom agent format with comprehensive field support and validation",
  validate,

  parse(tree) {
    const validation = validate(tree);
    const { data } = checkFields(CustomFieldsSchema, tree);
    if (!validation.valid || !data) {
      return err(new ValidationError("Invalid custom agent format", validation.errors));
    }

    return ok(
      AgentDocument.fromTree({
        name: data.name,
        description: data.description,
        version: data.version ?? DEFAULT_VERSION,
        category: data.category,
        capabilities: data.capabilities,
        tools: data.tools,
        systemPrompt: data.system_prompt,
        configSchema: data.config_schema,
        configValue: data.config,
        metadata: data.metadata,
        icon: data.icon,
        author: data.author,
        tags: data.tags,
        customFields: collectCustomFields(tree, RECOGNIZED),
      }),
    );
  },
};
