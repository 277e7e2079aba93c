/**
 * Convert module — dialect-to-dialect agent conversion.
 */

export {
  convert,
  convertContent,
  convertFile,
  parseToDocument,
  readSourceFile,
  validateConversion,
  listSupportedFormats,
  liftMarkdownTree,
} from "./universal.js";
export type { ConversionOutcome, ConvertFileOptions, FormatDescriptor } from "./universal.js";
export { applyFieldMapping } from "./field-mapping.js";
export {
  createRegistry,
  defaultRegistry,
  getContainerReader,
  getParser,
  readContainer,
  getSerializer,
  isDialect,
  resolveContainer,
  resolveDialect,
} from "./registry.js";
export type { FormatRegistry, RegistryOverrides } from "./registry.js";
