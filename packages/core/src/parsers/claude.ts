/**
 * Claude dialect parser.
 */

import { DEFAULT_VERSION } from "@agentmorph/shared";
import { z } from "zod";
import type { ContainerTree } from "../containers/types.js";
import { err, ok, report, ValidationError } from "../errors.js";
import type { ValidationReport } from "../errors.js";
import { AgentDocument } from "../ir/document.js";
import type { DialectParser } from "./types.js";
import {
  checkFields,
  collectCustomFields,
  field,
  requireAgentContent,
  requireFields,
} from "./rules.js";

const ClaudeFieldsSchema = z.object({
  name: field.string("name"),
  description: field.string("description"),
  version: field.string("version"),
  capabilities: field.stringList("capabilities"),
  tools: field.stringList("tools"),
  system_prompt: field.string("system_prompt"),
  config_schema: field.object("config_schema"),
  metadata: field.object("metadata"),
  config: field.json(),
});

const RECOGNIZED = new Set(Object.keys(ClaudeFieldsSchema.shape));

function validate(tree: ContainerTree): ValidationReport {
  return report([
    ...requireFields(tree, ["name", "description"]),
    ...requireAgentContent(tree),
    ...checkFields(ClaudeFieldsSchema, tree).errors,
  ]);
}

export const claudeParser: DialectParser = {
  dialect: "claude",
  humanName: "Claude",
  description:
    "Anthropic Claude agent format with name, description, capabilities, tools, and system_prompt fields",
  validate,

  parse(tree) {
    const validation = validate(tree);
    const { data } = checkFields(ClaudeFieldsSchema, tree);
    if (!validation.valid || !data) {
      return err(new ValidationError("Invalid Claude agent format", validation.errors));
    }

    return ok(
      AgentDocument.fromTree({
        name: data.name,
        description: data.description,
        version: data.version ?? DEFAULT_VERSION,
        capabilities: data.capabilities,
        tools: data.tools,
        systemPrompt: data.system_prompt,
        configSchema: data.config_schema,
        metadata: data.metadata,
        configValue: data.config,
        customFields: collectCustomFields(tree, RECOGNIZED),
      }),
    );
  },
};
