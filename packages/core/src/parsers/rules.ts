/**
 * Validation building blocks shared by the dialect parsers.
 *
 * Presence rules are plain checks over the raw tree; field types are a zod
 * schema whose issues are translated into one message per violation. A blank
 * value (null, "", [], {}, false, 0) counts as absent and skips its type check.
 */

import { z } from "zod";
import type { ContainerTree } from "../containers/types.js";
import { cloneJson, isBlank, jsonValueSchema, normalizeJsonTree, setOwn } from "../tree/json.js";
import type { JsonObject } from "../tree/json.js";

export const AGENT_CONTENT_FIELDS = ["system_prompt", "capabilities", "tools"] as const;

function blankToUndefined(value: unknown): unknown {
  return isBlank(value) ? undefined : value;
}

/** Field schemas; the key is baked into the top-level message. */
export const field = {
  string: (key: string) =>
    z.preprocess(
      blankToUndefined,
      z.string({ invalid_type_error: `'${key}' must be a string` }).optional(),
    ),

  stringList: (key: string) =>
    z.preprocess(
      blankToUndefined,
      z.array(z.string(), { invalid_type_error: `'${key}' must be an array` }).optional(),
    ),

  /** Mapping-shaped; serialized JSON text is accepted and decoded. */
  object: (key: string) =>
    z.preprocess(
      (value) => blankToUndefined(normalizeJsonTree(value)),
      z.record(jsonValueSchema, { invalid_type_error: `'${key}' must be an object` }).optional(),
    ),

  /** Any JSON-like tree; serialized JSON text is accepted and decoded. */
  json: () =>
    z.preprocess((value) => blankToUndefined(normalizeJsonTree(value)), jsonValueSchema.optional()),

  stringOrObject: (key: string) =>
    z.preprocess(
      blankToUndefined,
      z
        .union([z.string(), z.record(jsonValueSchema)], {
          errorMap: () => ({ message: `'${key}' must be a string or an object` }),
        })
        .optional(),
    ),
};

export function formatIssue(issue: z.ZodIssue): string {
  const [key, index] = issue.path;
  if (issue.path.length === 1) return issue.message;
  if (issue.path.length === 2 && typeof index === "number" && issue.code === "invalid_type") {
    return `${String(key)}[${index}] must be a ${issue.expected}`;
  }
  return `'${String(key)}' contains a value that is not JSON-compatible`;
}

export interface FieldCheck<T> {
  data: T | null;
  errors: string[];
}

/** Run the dialect's type schema and collect one message per issue. */
export function checkFields<S extends z.ZodTypeAny>(schema: S, tree: ContainerTree): FieldCheck<z.infer<S>> {
  const result = schema.safeParse(tree);
  if (result.success) return { data: result.data, errors: [] };
  const errors: string[] = [];
  for (const issue of result.error.issues) {
    const message = formatIssue(issue);
    if (!errors.includes(message)) errors.push(message);
  }
  return { data: null, errors };
}

export function requireFields(tree: ContainerTree, keys: readonly string[]): string[] {
  const errors: string[] = [];
  for (const key of keys) {
    if (!Object.hasOwn(tree, key)) {
      errors.push(`Missing required field: '${key}'`);
    } else if (isBlank(tree[key])) {
      errors.push(`Field '${key}' cannot be empty`);
    }
  }
  return errors;
}

/** A present key must not be blank. */
export function rejectEmpty(tree: ContainerTree, keys: readonly string[]): string[] {
  return keys
    .filter((key) => Object.hasOwn(tree, key) && isBlank(tree[key]))
    .map((key) => `Field '${key}' cannot be empty`);
}

export function requireAgentContent(tree: ContainerTree): string[] {
  const hasContent = AGENT_CONTENT_FIELDS.some((key) => !isBlank(tree[key]));
  return hasContent ? [] : [`Must have at least one of: ${AGENT_CONTENT_FIELDS.join(", ")}`];
}

/** Every top-level key the dialect does not recognize, copied verbatim. */
export function collectCustomFields(tree: ContainerTree, recognized: ReadonlySet<string>): JsonObject {
  const custom: JsonObject = {};
  for (const [key, value] of Object.entries(tree)) {
    if (!recognized.has(key)) setOwn(custom, key, cloneJson(value));
  }
  return custom;
}
