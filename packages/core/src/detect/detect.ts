/**
 * Container format and agent dialect auto-detection.
 */

import { CONTAINER_EXTENSIONS } from "@agentmorph/shared";
import type { ContainerFormat, Dialect } from "@agentmorph/shared";
import { parse as parseYaml } from "yaml";

export type DetectedContainer = ContainerFormat | "unknown";

/** Roo-specific keys; checked first, so they win every tie. */
const ROO_MARKERS = ["mode:", "icon:"];
const CUSTOM_MARKERS = ["config_schema"];

function extensionOf(filename: string): string {
  const base = filename.replace(/^.*[\\/]/, "");
  const dotIndex = base.lastIndexOf(".");
  if (dotIndex <= 0) return "";
  return base.substring(dotIndex).toLowerCase();
}

function parsesAs(parse: (text: string) => unknown, text: string): boolean {
  try {
    parse(text);
    return true;
  } catch {
    return false;
  }
}

/**
 * Detect the container format from the file extension, falling back to a
 * best-effort parse of `content` (JSON first, then YAML) when the extension
 * is not recognized.
 */
export function detectContainerFormat(filename: string, content?: string): DetectedContainer {
  const extension = extensionOf(filename);
  const byExtension = Object.hasOwn(CONTAINER_EXTENSIONS, extension)
    ? CONTAINER_EXTENSIONS[extension]
    : undefined;
  if (byExtension) return byExtension;

  const text = content?.trim();
  if (!text) return "unknown";

  if (parsesAs((source) => JSON.parse(source), text)) return "json";
  if (parsesAs((source) => parseYaml(source), text)) return "yaml";
  return "unknown";
}

/**
 * Detect the agent dialect from raw content.
 * A case-insensitive substring check over the whole document: `mode:` or
 * `icon:` means roo, else `config_schema` means custom, else claude.
 */
export function detectDialect(content: string): Dialect {
  const text = content.toLowerCase();
  if (ROO_MARKERS.some((marker) => text.includes(marker))) return "roo";
  if (CUSTOM_MARKERS.some((marker) => text.includes(marker))) return "custom";
  return "claude";
}
