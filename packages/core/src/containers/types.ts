import type { ContainerFormat } from "@agentmorph/shared";
import { err, ok, ParseError } from "../errors.js";
import type { Result } from "../errors.js";
import { checkJsonTree, isJsonObject, MAX_TREE_DEPTH } from "../tree/json.js";
import type { JsonObject } from "../tree/json.js";

/** Generic key-value tree produced by a container reader. */
export type ContainerTree = JsonObject;

export interface ContainerReader {
  readonly format: ContainerFormat;
  readonly humanName: string;
  readonly description: string;
  read(text: string): Result<ContainerTree, ParseError>;
}

/**
 * Narrow a freshly parsed value to a container tree.
 * `label` names the syntax in the error message ("JSON", "YAML", ...).
 */
export function toContainerTree(value: unknown, label: string): Result<ContainerTree, ParseError> {
  if (!isJsonObject(value)) {
    return err(new ParseError(`${label} content must be an object`));
  }
  switch (checkJsonTree(value)) {
    case "too_deep":
      return err(new ParseError(`${label} content is nested too deeply (more than ${MAX_TREE_DEPTH} levels)`));
    case "not_json":
      return err(new ParseError(`${label} content holds values that are not JSON-compatible`));
    case "ok":
      return ok(value);
  }
}
