import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { AGENTMORPH_CONFIG_DIR, AGENTMORPH_RC_FILE, DIALECTS, OUTPUT_FORMATS } from "@agentmorph/shared";
import { errorMessage } from "@agentmorph/core";

export const AgentmorphConfigSchema = z.object({
  output_format: z.enum(OUTPUT_FORMATS).default("json"),
  indent: z.number().int().min(1).max(8).default(2),
  default_target: z.enum(DIALECTS).optional(),
});

export type AgentmorphConfig = z.infer<typeof AgentmorphConfigSchema>;

export interface IgnoredConfig {
  path: string;
  reason: string;
}

export interface LoadedConfig {
  config: AgentmorphConfig;
  /** Path of the rc file in effect, or null for built-in defaults. */
  source: string | null;
  ignored: IgnoredConfig[];
}

export interface ConfigLocations {
  cwd?: string;
  home?: string;
}

/** Project-local rc first, then the one under ~/.agentmorph. */
export function configCandidates({ cwd = process.cwd(), home = homedir() }: ConfigLocations = {}): string[] {
  return [join(cwd, AGENTMORPH_RC_FILE), join(home, AGENTMORPH_CONFIG_DIR, AGENTMORPH_RC_FILE)];
}

function readRcFile(path: string): { config: AgentmorphConfig } | { reason: string } {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    return { reason: `Invalid JSON: ${errorMessage(e)}` };
  }

  const parsed = AgentmorphConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return { reason: issues.join("; ") };
  }
  return { config: parsed.data };
}

/**
 * Load the first usable rc file. An unreadable or invalid file is skipped
 * and recorded in `ignored`.
 */
export function loadConfig(locations: ConfigLocations = {}): LoadedConfig {
  const ignored: IgnoredConfig[] = [];

  for (const path of configCandidates(locations)) {
    if (!existsSync(path)) continue;
    const result = readRcFile(path);
    if ("config" in result) return { config: result.config, source: path, ignored };
    ignored.push({ path, reason: result.reason });
  }

  return { config: AgentmorphConfigSchema.parse({}), source: null, ignored };
}
