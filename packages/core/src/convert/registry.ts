/**
 * Format registry — dialect parsers, dialect serializers and container
 * readers, keyed by the closed name unions. Built once, frozen, and passed to
 * the orchestrator by reference.
 */

import { CONTAINER_ALIASES, CONTAINER_FORMATS, DIALECTS } from "@agentmorph/shared";
import type { ContainerFormat, Dialect } from "@agentmorph/shared";
import { containerReaders } from "../containers/index.js";
import type { ContainerReader, ContainerTree } from "../containers/types.js";
import { err, ok, UnsupportedFormatError } from "../errors.js";
import type { ParseError, Result } from "../errors.js";
import { claudeParser, customParser, rooParser } from "../parsers/index.js";
import type { DialectParser } from "../parsers/types.js";
import { claudeSerializer, customSerializer, rooSerializer } from "../serializers/index.js";
import type { DialectSerializer } from "../serializers/types.js";

export interface FormatRegistry {
  readonly parsers: Readonly<Record<Dialect, DialectParser>>;
  readonly serializers: Readonly<Record<Dialect, DialectSerializer>>;
  readonly containers: Readonly<Record<ContainerFormat, ContainerReader>>;
}

export interface RegistryOverrides {
  parsers?: Partial<Record<Dialect, DialectParser>>;
  serializers?: Partial<Record<Dialect, DialectSerializer>>;
  containers?: Partial<Record<ContainerFormat, ContainerReader>>;
}

export function createRegistry(overrides: RegistryOverrides = {}): FormatRegistry {
  return Object.freeze({
    parsers: Object.freeze({
      claude: claudeParser,
      roo: rooParser,
      custom: customParser,
      ...overrides.parsers,
    }),
    serializers: Object.freeze({
      claude: claudeSerializer,
      roo: rooSerializer,
      custom: customSerializer,
      ...overrides.serializers,
    }),
    containers: Object.freeze({ ...containerReaders, ...overrides.containers }),
  });
}

export const defaultRegistry: FormatRegistry = createRegistry();

export function isDialect(name: string): name is Dialect {
  return DIALECTS.some((dialect) => dialect === name);
}

/** Canonical container name for `name`, following aliases (`yml`, `md`). */
export function resolveContainer(name: string): ContainerFormat | undefined {
  if (Object.hasOwn(CONTAINER_ALIASES, name)) return CONTAINER_ALIASES[name];
  return CONTAINER_FORMATS.find((format) => format === name);
}

export function resolveDialect(name: string): Result<Dialect, UnsupportedFormatError> {
  if (isDialect(name)) return ok(name);
  return err(
    new UnsupportedFormatError(
      name,
      `Unsupported format: ${name}. Supported formats: ${DIALECTS.join(", ")}`,
    ),
  );
}

export function getParser(
  format: string,
  registry: FormatRegistry = defaultRegistry,
): Result<DialectParser, UnsupportedFormatError> {
  const dialect = resolveDialect(format);
  return dialect.ok ? ok(registry.parsers[dialect.value]) : dialect;
}

export function getSerializer(
  format: string,
  registry: FormatRegistry = defaultRegistry,
): Result<DialectSerializer, UnsupportedFormatError> {
  const dialect = resolveDialect(format);
  return dialect.ok ? ok(registry.serializers[dialect.value]) : dialect;
}

export function getContainerReader(
  format: string,
  registry: FormatRegistry = defaultRegistry,
): Result<ContainerReader, UnsupportedFormatError> {
  const container = resolveContainer(format);
  if (!container) {
    return err(
      new UnsupportedFormatError(
        format,
        `Unsupported container format: ${format}. Supported formats: ${CONTAINER_FORMATS.join(", ")}`,
      ),
    );
  }
  return ok(registry.containers[container]);
}

/** Read `text` with the container reader registered under `format` (aliases accepted). */
export function readContainer(
  format: string,
  text: string,
  registry: FormatRegistry = defaultRegistry,
): Result<ContainerTree, ParseError | UnsupportedFormatError> {
  const reader = getContainerReader(format, registry);
  return reader.ok ? reader.value.read(text) : reader;
}
