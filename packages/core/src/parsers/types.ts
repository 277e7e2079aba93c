import type { Dialect } from "@agentmorph/shared";
import type { ContainerTree } from "../containers/types.js";
import type { Result, ValidationError, ValidationReport } from "../errors.js";
import type { AgentDocument } from "../ir/document.js";

/**
 * Reads one agent dialect out of a generic container tree.
 * Implementations hold no state and are shared across calls.
 */
export interface DialectParser {
  readonly dialect: Dialect;
  readonly humanName: string;
  readonly description: string;
  /** Every violated rule, never just the first. */
  validate(tree: ContainerTree): ValidationReport;
  parse(tree: ContainerTree): Result<AgentDocument, ValidationError>;
}
