/**
 * Container readers — raw text to generic key-value trees.
 */

import type { ContainerFormat } from "@agentmorph/shared";
import { jsonReader } from "./json.js";
import { markdownReader } from "./markdown.js";
import type { ContainerReader } from "./types.js";
import { yamlReader } from "./yaml.js";

export const containerReaders: Readonly<Record<ContainerFormat, ContainerReader>> = Object.freeze({
  json: jsonReader,
  yaml: yamlReader,
  markdown: markdownReader,
});

export { jsonReader } from "./json.js";
export { yamlReader } from "./yaml.js";
export {
  markdownReader,
  readMarkdown,
  splitFrontMatter,
  extractSections,
  parseListSection,
} from "./markdown.js";
export type { MarkdownSections, FrontMatterSplit, SectionKey } from "./markdown.js";
export { toContainerTree } from "./types.js";
export type { ContainerReader, ContainerTree } from "./types.js";
