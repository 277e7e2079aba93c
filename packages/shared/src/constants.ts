export const AGENTMORPH_VERSION = "0.1.0" as const;
export const AGENTMORPH_CONFIG_DIR = ".agentmorph";
export const AGENTMORPH_RC_FILE = ".agentmorphrc";

export const DIALECTS = ["claude", "roo", "custom"] as const;

export type Dialect = (typeof DIALECTS)[number];

export const CONTAINER_FORMATS = ["json", "yaml", "markdown"] as const;

export type ContainerFormat = (typeof CONTAINER_FORMATS)[number];

/** Alternate spellings accepted wherever a container name is expected */
export const CONTAINER_ALIASES: Readonly<Partial<Record<string, ContainerFormat>>> = {
  yml: "yaml",
  md: "markdown",
};

export const CONTAINER_EXTENSIONS: Readonly<Partial<Record<string, ContainerFormat>>> = {
  ".json": "json",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".md": "markdown",
  ".markdown": "markdown",
};

export const DEFAULT_VERSION = "1.0.0";
export const DEFAULT_ICON = "fa-robot";
export const DEFAULT_CATEGORY = "general";

export const OUTPUT_FORMATS = ["json", "yaml"] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

// Exit codes — category-based constants for scripted callers
export const EXIT = {
  SUCCESS: 0,
  GENERAL: 1,
  INPUT_INVALID: 2,
  PARSE_FAILED: 3,
  VALIDATION_FAILED: 4,
  UNSUPPORTED_FORMAT: 5,
  IO_FAILED: 10,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
