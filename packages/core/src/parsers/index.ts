export { claudeParser } from "./claude.js";
export { rooParser, nameFromMode } from "./roo.js";
export { customParser } from "./custom.js";
export {
  AGENT_CONTENT_FIELDS,
  checkFields,
  requireFields,
  requireAgentContent,
  collectCustomFields,
} from "./rules.js";
export type { DialectParser } from "./types.js";
