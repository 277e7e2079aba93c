/**
 * Conversion orchestrator — wires container readers, dialect parsers, the
 * field-mapping step and dialect serializers together.
 */

import { readFile } from "node:fs/promises";
import { CONTAINER_FORMATS, DIALECTS } from "@agentmorph/shared";
import type { Dialect } from "@agentmorph/shared";
import type { ContainerTree } from "../containers/types.js";
import { detectDialect } from "../detect/detect.js";
import {
  err,
  errorMessage,
  IOError,
  isNotFound,
  ok,
  report,
  SourceValidationError,
  UnsupportedFormatError,
} from "../errors.js";
import type { ParseError, PipelineError, Result, ValidationReport } from "../errors.js";
import type { AgentDocument } from "../ir/document.js";
import { checkJsonTree, isBlank, MAX_TREE_DEPTH } from "../tree/json.js";
import { applyFieldMapping } from "./field-mapping.js";
import { defaultRegistry, isDialect, resolveContainer, resolveDialect } from "./registry.js";
import type { FormatRegistry } from "./registry.js";

export interface ConversionOutcome {
  targetTree: ContainerTree;
  warnings: string[];
  sourceDialect: Dialect;
  targetDialect: Dialect;
}

export interface FormatDescriptor {
  name: string;
  humanName: string;
  description: string;
  kind: "agent" | "file";
}

export interface ConvertFileOptions {
  registry?: FormatRegistry;
  /** Text source for `path`; defaults to a UTF-8 file read. */
  readText?: (path: string) => Promise<string>;
}

function unsupported(side: "source" | "target", name: string): UnsupportedFormatError {
  return new UnsupportedFormatError(
    name,
    `Unsupported ${side} format: ${name}. Supported formats: ${DIALECTS.join(", ")}`,
  );
}

/**
 * Convert a dialect tree into another dialect.
 * Returns the target tree plus one warning per default the conversion filled in.
 */
export function convert(
  sourceTree: ContainerTree,
  sourceDialect: string,
  targetDialect: string,
  registry: FormatRegistry = defaultRegistry,
): Result<ConversionOutcome, PipelineError> {
  if (!isDialect(sourceDialect)) return err(unsupported("source", sourceDialect));
  if (!isDialect(targetDialect)) return err(unsupported("target", targetDialect));
  if (sourceDialect === targetDialect) {
    return err(new UnsupportedFormatError(sourceDialect, "Source and target formats are the same"));
  }

  if (checkJsonTree(sourceTree) === "too_deep") {
    return err(new SourceValidationError([`Document is nested more than ${MAX_TREE_DEPTH} levels deep`]));
  }

  const parser = registry.parsers[sourceDialect];
  const validation = parser.validate(sourceTree);
  if (!validation.valid) return err(new SourceValidationError(validation.errors));

  const parsed = parser.parse(sourceTree);
  if (!parsed.ok) return parsed;

  const doc = parsed.value;
  const warnings = applyFieldMapping(doc, targetDialect);

  const serialized = registry.serializers[targetDialect].serialize(doc);
  if (!serialized.ok) return serialized;

  return ok({ targetTree: serialized.value, warnings, sourceDialect, targetDialect });
}

/**
 * Move markdown sections into the agent fields they stand for. The reader's
 * `body` and an empty `skills` list are dropped so they do not surface as
 * custom fields.
 */
export function liftMarkdownTree(tree: ContainerTree): { tree: ContainerTree; warnings: string[] } {
  const lifted: ContainerTree = { ...tree };
  const warnings: string[] = [];
  delete lifted.body;

  const instructions = lifted.instructions;
  if (typeof instructions === "string" && instructions && isBlank(lifted.system_prompt)) {
    lifted.system_prompt = instructions;
    delete lifted.instructions;
    warnings.push("Section 'instructions' was mapped to 'system_prompt'");
  }

  const skills = lifted.skills;
  if (isBlank(skills)) {
    delete lifted.skills;
  } else if (isBlank(lifted.capabilities)) {
    lifted.capabilities = skills;
    delete lifted.skills;
    warnings.push("Section 'skills' was mapped to 'capabilities'");
  }

  return { tree: lifted, warnings };
}

/** Dialect sources carry no container hint: try JSON, then YAML. */
function readDialectText(content: string, registry: FormatRegistry): Result<ContainerTree, ParseError> {
  const asJson = registry.containers.json.read(content);
  return asJson.ok ? asJson : registry.containers.yaml.read(content);
}

/**
 * Parse raw JSON or YAML text into an AgentDocument. The dialect is detected
 * from the content when not given.
 */
export function parseToDocument(
  content: string,
  dialect?: string,
  registry: FormatRegistry = defaultRegistry,
): Result<AgentDocument, PipelineError> {
  const resolved = resolveDialect(dialect ?? detectDialect(content));
  if (!resolved.ok) return resolved;

  const read = readDialectText(content, registry);
  if (!read.ok) return read;
  return registry.parsers[resolved.value].parse(read.value);
}

/**
 * Convert raw text. `sourceFormat` is either a dialect name or a container
 * name (`json`, `yaml`/`yml`, `markdown`/`md`); for a container the dialect
 * is detected from the content and reported as the first warning.
 */
export function convertContent(
  content: string,
  sourceFormat: string,
  targetDialect: string,
  registry: FormatRegistry = defaultRegistry,
): Result<ConversionOutcome, PipelineError> {
  const container = resolveContainer(sourceFormat);

  if (container) {
    const read = registry.containers[container].read(content);
    if (!read.ok) return read;

    const dialect = detectDialect(content);
    const warnings = [`Detected agent format: ${dialect}`];
    let tree = read.value;

    if (container === "markdown") {
      const lifted = liftMarkdownTree(tree);
      tree = lifted.tree;
      warnings.push(...lifted.warnings);
    }

    const converted = convert(tree, dialect, targetDialect, registry);
    if (!converted.ok) return converted;
    return ok({ ...converted.value, warnings: [...warnings, ...converted.value.warnings] });
  }

  if (!isDialect(sourceFormat)) {
    return err(
      new UnsupportedFormatError(
        sourceFormat,
        `Unsupported source format: ${sourceFormat}. Supported formats: ${[...DIALECTS, ...CONTAINER_FORMATS].join(", ")}`,
      ),
    );
  }

  const read = readDialectText(content, registry);
  if (!read.ok) return read;
  return convert(read.value, sourceFormat, targetDialect, registry);
}

const readUtf8 = (path: string): Promise<string> => readFile(path, "utf-8");

/** Read a source file, mapping any failure to an IOError. */
export async function readSourceFile(
  path: string,
  readText: (path: string) => Promise<string> = readUtf8,
): Promise<Result<string, IOError>> {
  try {
    return ok(await readText(path));
  } catch (e) {
    const message = isNotFound(e) ? `File not found: ${path}` : `Failed to read ${path}: ${errorMessage(e)}`;
    return err(new IOError(path, message, { cause: e }));
  }
}

export async function convertFile(
  path: string,
  sourceFormat: string,
  targetDialect: string,
  options: ConvertFileOptions = {},
): Promise<Result<ConversionOutcome, PipelineError | IOError>> {
  const { registry = defaultRegistry, readText } = options;
  const content = await readSourceFile(path, readText);
  if (!content.ok) return content;
  return convertContent(content.value, sourceFormat, targetDialect, registry);
}

/**
 * Check that a conversion between two format names is possible. Looks only
 * at the names, never at document content.
 */
export function validateConversion(source: string, target: string): ValidationReport {
  const errors: string[] = [];

  if (!isDialect(source) && !resolveContainer(source)) {
    errors.push(`Unsupported source format: ${source}`);
  }
  if (!isDialect(target)) {
    errors.push(`Unsupported target format: ${target}`);
  }
  // Re-canonicalizing a document in place is not offered.
  if (source === target) {
    errors.push("Source and target formats are the same");
  }

  return report(errors);
}

export function listSupportedFormats(
  registry: FormatRegistry = defaultRegistry,
): Record<string, FormatDescriptor> {
  const formats: Record<string, FormatDescriptor> = {};

  for (const dialect of DIALECTS) {
    const parser = registry.parsers[dialect];
    formats[dialect] = {
      name: dialect,
      humanName: parser.humanName,
      description: parser.description,
      kind: "agent",
    };
  }

  for (const format of CONTAINER_FORMATS) {
    const reader = registry.containers[format];
    formats[format] = {
      name: format,
      humanName: reader.humanName,
      description: reader.description,
      kind: "file",
    };
  }

  return formats;
}
