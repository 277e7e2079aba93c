import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { configCandidates, loadConfig } from "../utils/config.js";

let root: string;
let cwd: string;
let home: string;

function writeRc(dir: string, content: string): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, ".agentmorphrc");
  writeFileSync(path, content);
  return path;
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "agentmorph-config-"));
  cwd = join(root, "project");
  home = join(root, "home");
  mkdirSync(cwd, { recursive: true });
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("configCandidates", () => {
  it("lists the project rc before the home rc", () => {
    expect(configCandidates({ cwd, home })).toEqual([
      join(cwd, ".agentmorphrc"),
      join(home, ".agentmorph", ".agentmorphrc"),
    ]);
  });
});

describe("loadConfig", () => {
  it("returns defaults when no rc file exists", () => {
    expect(loadConfig({ cwd, home })).toEqual({
      config: { output_format: "json", indent: 2 },
      source: null,
      ignored: [],
    });
  });

  it("prefers the project rc", () => {
    const path = writeRc(cwd, JSON.stringify({ output_format: "yaml", default_target: "roo" }));
    writeRc(join(home, ".agentmorph"), JSON.stringify({ indent: 4 }));
    expect(loadConfig({ cwd, home })).toEqual({
      config: { output_format: "yaml", indent: 2, default_target: "roo" },
      source: path,
      ignored: [],
    });
  });

  it("falls through an unparsable rc and reports it", () => {
    const broken = writeRc(cwd, "{ not json");
    const fallback = writeRc(join(home, ".agentmorph"), JSON.stringify({ indent: 4 }));
    const loaded = loadConfig({ cwd, home });
    expect(loaded.source).toBe(fallback);
    expect(loaded.config.indent).toBe(4);
    expect(loaded.ignored).toHaveLength(1);
    expect(loaded.ignored[0].path).toBe(broken);
    expect(loaded.ignored[0].reason).toMatch(/^Invalid JSON: /);
  });

  it("rejects out-of-range values", () => {
    const path = writeRc(cwd, JSON.stringify({ indent: 12 }));
    expect(loadConfig({ cwd, home }).ignored).toEqual([
      { path, reason: "indent: Number must be less than or equal to 8" },
    ]);
  });

  it("rejects an unknown default target", () => {
    writeRc(cwd, JSON.stringify({ default_target: "openai" }));
    const loaded = loadConfig({ cwd, home });
    expect(loaded.source).toBeNull();
    expect(loaded.ignored[0].reason).toMatch(/^default_target: /);
  });
});
