/**
 * ToolDefinitionLoader — discovers tool definitions in a directory.
 *
 * Two definition forms are understood:
 *  - declarations (`*.yaml`, `*.yml`, `*.json`, or `tool.{yaml,yml,json}` inside
 *    a sub-directory) describing a shell `command` template;
 *  - modules (`*.mjs`, `*.js`, or `index.{mjs,js}` inside a sub-directory)
 *    whose default export is a tool object with a `handler` function.
 *
 * The loader only parses. Validation against the registry rules happens in
 * ToolRegistry.loadFromDirectory, which receives every candidate together
 * with the path it came from.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { pathToFileURL } from "node:url";
import { execa } from "execa";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { sanitizeShellArg, truncateText } from "../utils/sanitizer.js";
import { TOOL_PARAMETER_TYPES } from "../types/tool.js";
import { filterSensitiveEnv } from "./shell.js";
import type {
  IToolExecutionContext,
  IToolLoadDiagnostic,
  IToolParameter,
  IToolSpec,
  ToolHandler,
} from "../types/tool.js";
import type { IToolResult } from "../types/message.js";

// ── Types ───────────────────────────────────────────────────────────────

/** A parsed definition whose handler may still be missing. */
export type ToolCandidate = Omit<IToolSpec, "handler"> & {
  readonly handler?: ToolHandler | undefined;
};

export interface IToolDefinitionEntry {
  readonly candidate: ToolCandidate;
  readonly path: string;
}

export interface IDiscoveryResult {
  readonly entries: readonly IToolDefinitionEntry[];
  readonly diagnostics: readonly IToolLoadDiagnostic[];
}

// ── Zod Schemas ─────────────────────────────────────────────────────────

const parameterSchema = z.object({
  name: z.string(),
  type: z.enum(TOOL_PARAMETER_TYPES).default("string"),
  description: z.string().default(""),
  required: z.boolean().default(false),
  enum: z.array(z.string()).optional(),
  default: z.unknown().optional(),
});

const jsonSchemaPropertySchema = z.object({
  type: z.enum(TOOL_PARAMETER_TYPES).default("string"),
  description: z.string().default(""),
  enum: z.array(z.string()).optional(),
  default: z.unknown().optional(),
});

const jsonSchemaObjectSchema = z.object({
  type: z.literal("object").optional(),
  properties: z.record(z.string(), jsonSchemaPropertySchema).default({}),
  required: z.array(z.string()).default([]),
});

const parametersSchema = z
  .union([z.array(parameterSchema), jsonSchemaObjectSchema])
  .default([]);

const declarationSchema = z.object({
  name: z.string(),
  description: z.string(),
  parameters: parametersSchema,
  requires_permission: z.boolean().default(true),
  timeout_ms: z.number().int().positive().optional(),
  command: z.string().min(1, "command is required"),
});

const moduleToolSchema = z.object({
  name: z.string(),
  description: z.string(),
  parameters: parametersSchema,
  requiresPermission: z.boolean().default(true),
  timeoutMs: z.number().int().positive().optional(),
  handler: z
    .custom<(args: Readonly<Record<string, unknown>>, context: IToolExecutionContext) => unknown>(
      (value) => typeof value === "function",
      "handler must be a function",
    )
    .optional(),
});

type ParsedParameters = z.infer<typeof parametersSchema>;

const DECLARATION_EXTENSIONS = new Set([".yaml", ".yml", ".json"]);
const MODULE_EXTENSIONS = new Set([".mjs", ".js"]);
const DIRECTORY_ENTRY_FILES = [
  "tool.yaml",
  "tool.yml",
  "tool.json",
  "index.mjs",
  "index.js",
] as const;

const PLACEHOLDER_PATTERN = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_-]*)\s*\}\}/g;
const MAX_COMMAND_OUTPUT = 30_000;

// ── Helpers ─────────────────────────────────────────────────────────────

function toParameters(parsed: ParsedParameters): readonly IToolParameter[] {
  if (Array.isArray(parsed)) {
    return parsed.map((param) => ({
      name: param.name,
      type: param.type,
      description: param.description,
      required: param.required,
      ...(param.enum !== undefined ? { enum: param.enum } : {}),
      ...(param.default !== undefined ? { default: param.default } : {}),
    }));
  }

  const required = new Set(parsed.required);
  return Object.entries(parsed.properties).map(([name, prop]) => ({
    name,
    type: prop.type,
    description: prop.description,
    required: required.has(name),
    ...(prop.enum !== undefined ? { enum: prop.enum } : {}),
    ...(prop.default !== undefined ? { default: prop.default } : {}),
  }));
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Substitute `{{param}}` placeholders with shell-quoted argument values.
 */
export function renderCommand(
  template: string,
  args: Readonly<Record<string, unknown>>,
): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = args[name];
    if (value === undefined || value === null) {
      return "''";
    }
    const text = typeof value === "string" ? value : JSON.stringify(value);
    return sanitizeShellArg(text);
  });
}

function createCommandHandler(template: string): ToolHandler {
  return async (args, context): Promise<IToolResult> => {
    const command = renderCommand(template, args);
    const result = await execa(command, {
      shell: true,
      cwd: context.workingDirectory,
      cancelSignal: context.signal,
      reject: false,
      stripFinalNewline: true,
      extendEnv: false,
      env: { ...filterSensitiveEnv(process.env), TERM: "dumb", NO_COLOR: "1" },
    });

    const stdout = truncateText(result.stdout, MAX_COMMAND_OUTPUT);
    const stderr = truncateText(result.stderr, MAX_COMMAND_OUTPUT);
    const exitCode = result.exitCode ?? -1;

    if (exitCode !== 0 || result.isCanceled) {
      return {
        success: false,
        output: stderr.length > 0 ? `${stdout}\n${stderr}`.trim() : stdout,
        error: result.isCanceled ? "Command was cancelled" : `Command exited with code ${exitCode}`,
      };
    }

    return { success: true, output: stdout };
  };
}

/**
 * Coerce whatever a module handler returned into a ToolResult.
 */
export function normalizeHandlerOutput(value: unknown): IToolResult {
  if (typeof value === "string") {
    return { success: true, output: value };
  }
  if (typeof value === "object" && value !== null && "success" in value) {
    const success = value.success === true;
    const raw = "output" in value ? value.output : "";
    const output = typeof raw === "string" ? raw : JSON.stringify(raw) ?? "";
    const error = "error" in value && typeof value.error === "string" ? value.error : undefined;
    return { success, output, ...(error !== undefined ? { error } : {}) };
  }
  return { success: true, output: JSON.stringify(value) ?? "" };
}

// ── ToolDefinitionLoader Class ──────────────────────────────────────────

export class ToolDefinitionLoader {
  /**
   * Scan a directory (non-recursively, plus one level of tool sub-directories)
   * and parse every definition found. A missing directory yields nothing.
   */
  async discover(dirPath: string): Promise<IDiscoveryResult> {
    let names: string[];
    try {
      names = await readdir(dirPath);
    } catch {
      logger.debug({ dirPath }, "Tool directory not found, skipping");
      return { entries: [], diagnostics: [] };
    }

    const entries: IToolDefinitionEntry[] = [];
    const diagnostics: IToolLoadDiagnostic[] = [];

    for (const name of names.sort()) {
      const fullPath = join(dirPath, name);
      const definitionPath = await this.resolveDefinitionPath(fullPath);
      if (definitionPath === undefined) {
        continue;
      }

      try {
        const candidate = await this.loadDefinition(definitionPath);
        entries.push({ candidate, path: definitionPath });
      } catch (error: unknown) {
        const reason = errorMessage(error);
        logger.warn({ path: definitionPath, error: reason }, "Failed to load tool definition");
        diagnostics.push({ path: definitionPath, reason });
      }
    }

    return { entries, diagnostics };
  }

  /**
   * Parse a single definition file.
   * @throws Error describing why the file is not a usable definition.
   */
  async loadDefinition(filePath: string): Promise<ToolCandidate> {
    const ext = extname(filePath).toLowerCase();
    if (MODULE_EXTENSIONS.has(ext)) {
      return this.loadModule(filePath);
    }
    return this.loadDeclaration(filePath, ext);
  }

  private async resolveDefinitionPath(fullPath: string): Promise<string | undefined> {
    let info;
    try {
      info = await stat(fullPath);
    } catch {
      return undefined;
    }

    if (info.isFile()) {
      const ext = extname(fullPath).toLowerCase();
      return DECLARATION_EXTENSIONS.has(ext) || MODULE_EXTENSIONS.has(ext) ? fullPath : undefined;
    }

    if (!info.isDirectory()) {
      return undefined;
    }

    for (const candidate of DIRECTORY_ENTRY_FILES) {
      const candidatePath = join(fullPath, candidate);
      try {
        const candidateInfo = await stat(candidatePath);
        if (candidateInfo.isFile()) {
          return candidatePath;
        }
      } catch {
        continue;
      }
    }

    logger.debug({ dir: fullPath }, "No tool definition in directory, skipping");
    return undefined;
  }

  private async loadDeclaration(filePath: string, ext: string): Promise<ToolCandidate> {
    const raw = await readFile(filePath, "utf-8");
    const data: unknown = ext === ".json" ? JSON.parse(raw) : parseYaml(raw);

    const result = declarationSchema.safeParse(data);
    if (!result.success) {
      throw new Error(`Invalid tool declaration: ${formatZodIssues(result.error)}`);
    }

    const declaration = result.data;
    return {
      name: declaration.name,
      description: declaration.description,
      parameters: toParameters(declaration.parameters),
      requiresPermission: declaration.requires_permission,
      ...(declaration.timeout_ms !== undefined ? { timeoutMs: declaration.timeout_ms } : {}),
      source: filePath,
      handler: createCommandHandler(declaration.command),
    };
  }

  private async loadModule(filePath: string): Promise<ToolCandidate> {
    const mod: unknown = await import(pathToFileURL(filePath).href);
    const exported = typeof mod === "object" && mod !== null && "default" in mod
      ? mod.default
      : undefined;

    const result = moduleToolSchema.safeParse(exported);
    if (!result.success) {
      throw new Error(`Invalid tool module: ${formatZodIssues(result.error)}`);
    }

    const tool = result.data;
    const rawHandler = tool.handler;

    return {
      name: tool.name,
      description: tool.description,
      parameters: toParameters(tool.parameters),
      requiresPermission: tool.requiresPermission,
      ...(tool.timeoutMs !== undefined ? { timeoutMs: tool.timeoutMs } : {}),
      source: filePath,
      ...(rawHandler !== undefined
        ? {
            handler: async (args, context) =>
              normalizeHandlerOutput(await rawHandler(args, context)),
          }
        : {}),
    };
  }
}
