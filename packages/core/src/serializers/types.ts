import type { Dialect } from "@agentmorph/shared";
import type { ContainerTree } from "../containers/types.js";
import { err, ok, ValidationError } from "../errors.js";
import type { Result } from "../errors.js";
import type { AgentDocument } from "../ir/document.js";
import { cloneJson, setOwn } from "../tree/json.js";
import type { JsonObject } from "../tree/json.js";

/**
 * Writes an AgentDocument out as one dialect's tree. Implementations hold no
 * state and refuse to emit a document that fails its own validation.
 */
export interface DialectSerializer {
  readonly dialect: Dialect;
  serialize(doc: AgentDocument): Result<ContainerTree, ValidationError>;
}

export interface Identity {
  name: string;
  description: string;
}

/** Validate the document and hand back the fields every dialect emits. */
export function checkDocument(doc: AgentDocument): Result<Identity, ValidationError> {
  const validation = doc.validate();
  if (!validation.valid || !doc.name || !doc.description) {
    return err(new ValidationError("Invalid agent document", validation.errors));
  }
  return ok({ name: doc.name, description: doc.description });
}

/**
 * Append custom fields after the dialect's own keys. A custom field never
 * replaces a key the serializer already emitted.
 */
export function withCustomFields(core: ContainerTree, customFields: JsonObject): ContainerTree {
  const tree: ContainerTree = { ...core };
  for (const [key, value] of Object.entries(customFields)) {
    if (!Object.hasOwn(tree, key)) setOwn(tree, key, cloneJson(value));
  }
  return tree;
}
