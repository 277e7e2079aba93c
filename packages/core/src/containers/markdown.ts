/**
 * Markdown container — YAML front matter between `---` lines, followed by a
 * body whose headings are classified into named sections.
 *
 * Structure:
 *   - front matter (optional) — parsed as a YAML mapping
 *   - body — everything after the closing delimiter
 *   - sections — level 1-3 headings matched against a small synonym table
 */

import { parse as parseYaml } from "yaml";
import { err, errorMessage, ok, ParseError } from "../errors.js";
import type { Result } from "../errors.js";
import { isJsonObject } from "../tree/json.js";
import type { JsonValue } from "../tree/json.js";
import type { ContainerReader, ContainerTree } from "./types.js";
import { toContainerTree } from "./types.js";

export type SectionKey = "description" | "instructions" | "tools" | "skills";

export interface MarkdownSections {
  preamble?: string;
  title?: string;
  description?: string;
  instructions?: string;
  tools?: string;
  skills?: string;
}

export interface FrontMatterSplit {
  frontMatter: string | null;
  body: string;
}

const DELIMITER = "---";
const HEADING_REGEX = /^(#{1,3})\s+(.+)$/;
const DESCRIPTION_FALLBACK_LENGTH = 500;

const SECTION_SYNONYMS: ReadonlyArray<[SectionKey, ReadonlySet<string>]> = [
  ["description", new Set(["description", "about", "overview"])],
  ["instructions", new Set(["instructions", "instruction", "system prompt", "prompt"])],
  ["tools", new Set(["tools", "tool"])],
  ["skills", new Set(["skills", "skill", "capabilities"])],
];

function classifyHeading(text: string): SectionKey | undefined {
  const normalized = text.trim().toLowerCase();
  for (const [key, synonyms] of SECTION_SYNONYMS) {
    if (synonyms.has(normalized)) return key;
  }
  return undefined;
}

/**
 * Split off a leading front-matter block. An opening delimiter with no
 * closing one means there is no block and the whole text is body.
 */
export function splitFrontMatter(content: string): FrontMatterSplit {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== DELIMITER) {
    return { frontMatter: null, body: content.trim() };
  }

  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === DELIMITER) {
      return {
        frontMatter: lines.slice(1, i).join("\n"),
        body: lines.slice(i + 1).join("\n").trim(),
      };
    }
  }
  return { frontMatter: null, body: content.trim() };
}

/**
 * Classify the body's headings. Text before the first heading is the
 * preamble; the first level-1 heading that is not a known section is the
 * title. Unknown headings of other levels are ignored.
 */
export function extractSections(body: string): MarkdownSections {
  const sections: MarkdownSections = {};
  const preambleLines: string[] = [];
  let current: { level: number; text: string; lines: string[] } | null = null;

  const flush = (): void => {
    if (!current) return;
    const key = classifyHeading(current.text);
    if (key) {
      sections[key] = current.lines.join("\n").trim();
    } else if (sections.title === undefined && current.level === 1) {
      sections.title = current.text.trim();
    }
  };

  for (const line of body.split(/\r?\n/)) {
    const match = line.match(HEADING_REGEX);
    if (match) {
      flush();
      current = { level: match[1].length, text: match[2], lines: [] };
    } else if (current) {
      current.lines.push(line);
    } else {
      preambleLines.push(line);
    }
  }
  flush();

  const preamble = preambleLines.join("\n").trim();
  if (preamble) sections.preamble = preamble;
  return sections;
}

/**
 * Parse a bullet (`-` / `*`) or numbered (`1.`) list into its items.
 * Lines that are not list items are skipped.
 */
export function parseListSection(text: string): string[] {
  const items: string[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith("- ") || line.startsWith("* ")) {
      items.push(line.slice(2).trim());
    } else if (/^\d+\.\s+/.test(line)) {
      items.push(line.replace(/^\d+\.\s+/, "").trim());
    }
  }
  return items;
}

function firstHeadingText(body: string): string | undefined {
  for (const line of body.split(/\r?\n/)) {
    if (line.startsWith("#")) return line.replace(/^#+/, "").trim();
  }
  return undefined;
}

function readFrontMatter(frontMatter: string | null): Result<ContainerTree, ParseError> {
  if (frontMatter === null) return ok({});

  let value: unknown;
  try {
    value = parseYaml(frontMatter);
  } catch (e) {
    return err(new ParseError(`Invalid YAML in front matter: ${errorMessage(e)}`, { cause: e }));
  }
  if (value === null || value === undefined) return ok({});
  if (!isJsonObject(value)) {
    return err(new ParseError("Front matter must be a YAML mapping"));
  }
  return toContainerTree(value, "Front matter");
}

export function readMarkdown(content: string): Result<ContainerTree, ParseError> {
  const { frontMatter, body } = splitFrontMatter(content);
  const header = readFrontMatter(frontMatter);
  if (!header.ok) return header;

  const tree: ContainerTree = { ...header.value };
  const sections = extractSections(body);
  const has = (key: string): boolean => Object.hasOwn(tree, key);

  if (!has("name")) {
    const name = sections.title ?? firstHeadingText(body);
    if (name !== undefined) tree.name = name;
  }

  if (!has("description")) {
    tree.description = sections.description ?? body.slice(0, DESCRIPTION_FALLBACK_LENGTH);
  }

  if (!has("instructions") && sections.instructions) {
    tree.instructions = sections.instructions;
  }

  // Absent sections still yield empty lists.
  const listField = (section: string | undefined): JsonValue =>
    section ? parseListSection(section) : [];
  if (!has("tools")) tree.tools = listField(sections.tools);
  if (!has("skills")) tree.skills = listField(sections.skills);

  tree.body = body;
  return ok(tree);
}

export const markdownReader: ContainerReader = {
  format: "markdown",
  humanName: "Markdown",
  description: "Markdown with YAML front matter and heading-delimited sections",
  read: readMarkdown,
};
