// Tree + errors
export type { JsonPrimitive, JsonValue, JsonObject, TreeCheck } from "./tree/json.js";
export {
  jsonValueSchema,
  isJsonObject,
  isBlank,
  normalizeJsonTree,
  checkJsonTree,
  setOwn,
  MAX_TREE_DEPTH,
} from "./tree/json.js";
export {
  ok,
  err,
  report,
  errorMessage,
  isNotFound,
  ParseError,
  ValidationError,
  SourceValidationError,
  UnsupportedFormatError,
  IOError,
} from "./errors.js";
export type { Result, ValidationReport, PipelineError } from "./errors.js";

// IR
export { AgentDocument } from "./ir/document.js";
export type { AgentAuthor, AgentTree } from "./ir/document.js";

// Containers
export {
  containerReaders,
  jsonReader,
  yamlReader,
  markdownReader,
  readMarkdown,
  splitFrontMatter,
  extractSections,
  parseListSection,
} from "./containers/index.js";
export type { ContainerReader, ContainerTree, MarkdownSections, SectionKey } from "./containers/index.js";

// Detection
export { detectContainerFormat, detectDialect } from "./detect/detect.js";
export type { DetectedContainer } from "./detect/detect.js";

// Parsers + serializers
export { claudeParser, rooParser, customParser, nameFromMode } from "./parsers/index.js";
export type { DialectParser } from "./parsers/index.js";
export {
  claudeSerializer,
  rooSerializer,
  customSerializer,
  modeFromName,
  defaultSystemPrompt,
} from "./serializers/index.js";
export type { DialectSerializer } from "./serializers/index.js";

// Convert
export {
  convert,
  convertContent,
  convertFile,
  parseToDocument,
  readSourceFile,
  validateConversion,
  listSupportedFormats,
  liftMarkdownTree,
  applyFieldMapping,
  createRegistry,
  defaultRegistry,
  getContainerReader,
  getParser,
  readContainer,
  getSerializer,
  isDialect,
  resolveContainer,
  resolveDialect,
} from "./convert/index.js";
export type {
  ConversionOutcome,
  ConvertFileOptions,
  FormatDescriptor,
  FormatRegistry,
  RegistryOverrides,
} from "./convert/index.js";
