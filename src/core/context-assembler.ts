/**
 * Builds the opening conversation of a run: the system prompt from runtime
 * instructions, the available tools and the configured rules, and the user
 * turn from the script plus any injected context.
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { ConfigError } from "../types/errors.js";
import type { IToolSpec } from "../types/tool.js";
import { sanitizePromptInput } from "../utils/sanitizer.js";
import { logger } from "../utils/logger.js";

const RUNTIME_INSTRUCTIONS = [
  "You are executing a script on behalf of the user.",
  "Carry out the instructions it contains, calling the available tools when an action is needed.",
  "When a tool call fails or is denied, read the reported error and adjust; do not repeat the identical call.",
  "When the script is complete, reply with a short summary of what was done and stop calling tools.",
].join("\n");

export interface ISystemPromptInput {
  readonly rules: readonly string[];
  readonly tools: readonly IToolSpec[];
}

export function buildSystemPrompt(input: ISystemPromptInput): string {
  const sections: string[] = [RUNTIME_INSTRUCTIONS];

  if (input.tools.length > 0) {
    const lines = input.tools.map((tool) => `- ${tool.name}: ${tool.description}`);
    sections.push(`## Available tools\n${lines.join("\n")}`);
  } else {
    sections.push("## Available tools\nNone. Answer from the script alone.");
  }

  const rules = input.rules.map((rule) => rule.trim()).filter((rule) => rule.length > 0);
  if (rules.length > 0) {
    sections.push(`## Rules\n${rules.join("\n\n")}`);
  }

  return sections.join("\n\n");
}

/**
 * Render one context entry; `key=value` becomes `key: value`, anything else
 * is kept as free text.
 */
export function formatContextEntry(entry: string): string {
  const eq = entry.indexOf("=");
  if (eq > 0) {
    const key = entry.slice(0, eq).trim();
    const value = entry.slice(eq + 1).trim();
    if (key.length > 0 && !/\s/.test(key)) {
      return `${key}: ${value}`;
    }
  }
  return entry.trim();
}

export function enhanceContent(script: string, context: readonly string[] = []): string {
  const body = sanitizePromptInput(script).trimEnd();
  const entries = context
    .map((entry) => formatContextEntry(sanitizePromptInput(entry)))
    .filter((entry) => entry.length > 0);

  if (entries.length === 0) {
    return body;
  }
  return `${body}\n\n## Additional context\n${entries.map((e) => `- ${e}`).join("\n")}`;
}

/**
 * Read rule files in order, relative paths resolved against `baseDir`.
 * @throws ConfigError when a file is missing or is not a regular file.
 */
export function loadRules(paths: readonly string[], baseDir: string): string[] {
  return paths.map((path) => {
    const fullPath = isAbsolute(path) ? path : resolve(baseDir, path);
    if (!existsSync(fullPath)) {
      throw new ConfigError("rules", `rule file not found: ${path}`);
    }
    if (!statSync(fullPath).isFile()) {
      throw new ConfigError("rules", `rule path is not a file: ${path}`);
    }
    const content = readFileSync(fullPath, "utf-8");
    logger.debug({ path: fullPath, length: content.length }, "Rule file loaded");
    return content;
  });
}
