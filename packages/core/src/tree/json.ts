/**
 * JSON-like trees — the only value shape that crosses module boundaries.
 */

import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

const primitiveSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([primitiveSchema, z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export const MAX_TREE_DEPTH = 100;

export type TreeCheck = "ok" | "too_deep" | "not_json";

function isPlainContainer(value: object): boolean {
  if (Array.isArray(value)) return true;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check that `value` is made of JSON-compatible values only, with objects
 * and arrays nested at most `limit` levels. Walks with an explicit stack.
 */
export function checkJsonTree(value: unknown, limit: number = MAX_TREE_DEPTH): TreeCheck {
  const pending: Array<{ value: unknown; depth: number }> = [{ value, depth: 0 }];

  for (let entry = pending.pop(); entry; entry = pending.pop()) {
    const current = entry.value;
    if (current === null || typeof current === "string" || typeof current === "boolean") continue;
    if (typeof current === "number") {
      if (!Number.isFinite(current)) return "not_json";
      continue;
    }
    if (typeof current !== "object" || !isPlainContainer(current)) return "not_json";
    if (entry.depth >= limit) return "too_deep";

    const children: unknown[] = Array.isArray(current) ? current : Object.values(current);
    for (const child of children) pending.push({ value: child, depth: entry.depth + 1 });
  }
  return "ok";
}

/** Assign an own property, including keys such as `__proto__`. */
export function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** null, "", [], {}, false and 0 count as "no value". */
export function isBlank(value: unknown): boolean {
  if (value === undefined || value === null || value === "" || value === false || value === 0) {
    return true;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (isJsonObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * A value that arrives as serialized JSON text is replaced by the structure it
 * encodes when that structure is an object or array. Everything else passes
 * through untouched.
 */
export function normalizeJsonTree(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  if (!(trimmed.startsWith("{") || trimmed.startsWith("["))) return value;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return typeof parsed === "object" && parsed !== null ? parsed : value;
  } catch {
    return value;
  }
}

export function cloneJson<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}
