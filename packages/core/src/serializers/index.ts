export { claudeSerializer } from "./claude.js";
export { rooSerializer, modeFromName } from "./roo.js";
export { customSerializer, defaultSystemPrompt } from "./custom.js";
export { checkDocument, withCustomFields } from "./types.js";
export type { DialectSerializer, Identity } from "./types.js";
