import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  buildSystemPrompt,
  enhanceContent,
  formatContextEntry,
  loadRules,
} from "../../src/core/context-assembler.js";
import { ConfigError } from "../../src/types/errors.js";
import type { IToolSpec } from "../../src/types/tool.js";

const tool: IToolSpec = {
  name: "read_file",
  description: "Read a file",
  parameters: [],
  requiresPermission: false,
  handler: async () => ({ success: true, output: "" }),
};

describe("buildSystemPrompt", () => {
  it("lists tools and appends non-empty rules in order", () => {
    const prompt = buildSystemPrompt({ rules: ["  First rule. ", "", "Second rule."], tools: [tool] });

    expect(prompt.endsWith("## Available tools\n- read_file: Read a file\n\n## Rules\nFirst rule.\n\nSecond rule.")).toBe(
      true,
    );
  });

  it("says when no tools are available and omits the rules section", () => {
    const prompt = buildSystemPrompt({ rules: [], tools: [] });

    expect(prompt.endsWith("## Available tools\nNone. Answer from the script alone.")).toBe(true);
    expect(prompt).not.toContain("## Rules");
  });
});

describe("formatContextEntry", () => {
  it.each([
    ["branch=main", "branch: main"],
    [" ticket = 42 ", "ticket: 42"],
    ["a note = with spaces", "a note = with spaces"],
    ["=value", "=value"],
    ["  plain text  ", "plain text"],
  ])("%j → %j", (entry, expected) => {
    expect(formatContextEntry(entry)).toBe(expected);
  });
});

describe("enhanceContent", () => {
  it("returns the script alone without context", () => {
    expect(enhanceContent("Summarise README.md\n")).toBe("Summarise README.md");
  });

  it("appends context entries and strips null bytes", () => {
    expect(enhanceContent("Run\0 it", ["env=prod", "  ", "be careful"])).toBe(
      "Run it\n\n## Additional context\n- env: prod\n- be careful",
    );
  });
});

describe("loadRules", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "scriptloom-rules-"));
    writeFileSync(join(dir, "a.md"), "Rule A");
    writeFileSync(join(dir, "b.md"), "Rule B");
    mkdirSync(join(dir, "folder"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads files in the given order", () => {
    expect(loadRules(["b.md", join(dir, "a.md")], dir)).toEqual(["Rule B", "Rule A"]);
  });

  it("rejects missing files and directories", () => {
    expect(() => loadRules(["missing.md"], dir)).toThrow(
      new ConfigError("rules", "rule file not found: missing.md"),
    );
    expect(() => loadRules(["folder"], dir)).toThrow(ConfigError);
  });
});
