/**
 * Field-mapping defaults applied between parse and serialize.
 *
 * This layer fills the fields a target dialect expects and reports one warning
 * per value it synthesized. It is independent of the serializers' own
 * fallbacks, which are silent.
 */

import { DEFAULT_CATEGORY, DEFAULT_ICON } from "@agentmorph/shared";
import type { Dialect } from "@agentmorph/shared";
import type { AgentDocument } from "../ir/document.js";
import { defaultSystemPrompt } from "../serializers/custom.js";

type FieldDefault = (doc: AgentDocument) => string | null;

const ROO_DEFAULTS: FieldDefault[] = [
  (doc) => {
    if (doc.icon) return null;
    doc.icon = DEFAULT_ICON;
    return `Field 'icon' was added with default value '${DEFAULT_ICON}'`;
  },
  (doc) => {
    if (doc.category) return null;
    doc.category = DEFAULT_CATEGORY;
    return `Field 'category' was added with default value '${DEFAULT_CATEGORY}'`;
  },
  (doc) => {
    if (doc.tags.length > 0) return null;
    doc.tags = [];
    return "Field 'tags' was initialized as empty array";
  },
];

const CUSTOM_DEFAULTS: FieldDefault[] = [
  (doc) => {
    if (doc.capabilities.length > 0) return null;
    doc.capabilities = [];
    return "Field 'capabilities' was initialized as empty array";
  },
  (doc) => {
    if (doc.tools.length > 0) return null;
    doc.tools = [];
    return "Field 'tools' was initialized as empty array";
  },
  (doc) => {
    if (doc.systemPrompt) return null;
    doc.systemPrompt = defaultSystemPrompt(doc.name ?? "", doc.description ?? "");
    return "Field 'system_prompt' was generated from name and description";
  },
];

const DEFAULTS_BY_TARGET: Readonly<Record<Dialect, readonly FieldDefault[]>> = {
  claude: [],
  roo: ROO_DEFAULTS,
  custom: CUSTOM_DEFAULTS,
};

/** Fill target-specific defaults in place and return one warning per value added. */
export function applyFieldMapping(doc: AgentDocument, target: Dialect): string[] {
  const warnings: string[] = [];
  for (const apply of DEFAULTS_BY_TARGET[target]) {
    const warning = apply(doc);
    if (warning) warnings.push(warning);
  }
  return warnings;
}
