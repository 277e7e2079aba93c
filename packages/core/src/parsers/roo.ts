/**
 * Roo dialect parser.
 *
 * Roo identifies an agent by `mode` (a slug) and/or `name`. When `name` is
 * missing it is derived from the slug; the slug itself is always kept in
 * metadata under `original_mode`.
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
  rejectEmpty,
  requireAgentContent,
  requireFields,
} from "./rules.js";

const RooFieldsSchema = z.object({
  mode: field.string("mode"),
  name: field.string("name"),
  description: field.string("description"),
  category: field.string("category"),
  capabilities: field.stringList("capabilities"),
  tools: field.stringList("tools"),
  system_prompt: field.string("system_prompt"),
  icon: field.string("icon"),
  tags: field.stringList("tags"),
  version: field.string("version"),
  metadata: field.object("metadata"),
  config: field.json(),
});

const RECOGNIZED = new Set(Object.keys(RooFieldsSchema.shape));

/** "code-analyzer" → "Code Analyzer" */
export function nameFromMode(mode: string): string {
  return mode
    .replace(/-/g, " ")
    .replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function requireIdentifier(tree: ContainerTree): string[] {
  if (!Object.hasOwn(tree, "mode") && !Object.hasOwn(tree, "name")) {
    return ["Must have either 'mode' or 'name' field"];
  }
  return rejectEmpty(tree, ["mode", "name"]);
}

function validate(tree: ContainerTree): ValidationReport {
  return report([
    ...requireIdentifier(tree),
    ...requireFields(tree, ["description"]),
    ...requireAgentContent(tree),
    ...checkFields(RooFieldsSchema, tree).errors,
  ]);
}

export const rooParser: DialectParser = {
  dialect: "roo",
  humanName: "Roo",
  description:
    "Roo Code agent format with mode, name, description, category, capabilities, tools, icon, and tags fields",
  validate,

  parse(tree) {
    const validation = validate(tree);
    const { data } = checkFields(RooFieldsSchema, tree);
    if (!validation.valid || !data) {
      return err(new ValidationError("Invalid Roo agent format", validation.errors));
    }

    const doc = AgentDocument.fromTree({
      name: data.name ?? (data.mode === undefined ? undefined : nameFromMode(data.mode)),
      description: data.description,
      category: data.category,
      capabilities: data.capabilities,
      tools: data.tools,
      systemPrompt: data.system_prompt,
      icon: data.icon,
      tags: data.tags,
      version: data.version ?? DEFAULT_VERSION,
      metadata: data.metadata,
      configValue: data.config,
      customFields: collectCustomFields(tree, RECOGNIZED),
    });

    if (data.mode !== undefined) doc.setMetadata("original_mode", data.mode);
    return ok(doc);
  },
};
