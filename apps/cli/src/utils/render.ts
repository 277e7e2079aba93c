import { stringify } from "yaml";
import type { OutputFormat } from "@agentmorph/shared";
import type { JsonObject } from "@agentmorph/core";

export function renderTree(tree: JsonObject, format: OutputFormat, indent: number): string {
  if (format === "yaml") return stringify(tree, { indent });
  return JSON.stringify(tree, null, indent) + "\n";
}
