/**
 * Configuration loader.
 * Reads `.scriptloom/config.json` from the user home and the project, merges
 * project settings over home settings over the built-in defaults, and
 * resolves one agent's settings for a run.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { getProjectConfigPath, getUserConfigPath } from "../utils/pathResolver.js";
import { ConfigError } from "../types/errors.js";
import { DEFAULT_CONFIG, PERMISSION_MODES } from "../types/config.js";
import type {
  IAgentConfig,
  IPermissionConfig,
  IResolvedAgentConfig,
  IScriptloomConfig,
  PermissionMode,
} from "../types/config.js";
import { DEFAULT_MODELS, resolveProviderKind } from "../types/model.js";
import type { ProviderKind } from "../types/model.js";
import type { PermissionPolicy } from "../types/tool.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const ProviderNameSchema = z.string().transform((value, ctx): ProviderKind => {
  const kind = resolveProviderKind(value);
  if (kind === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `unknown provider "${value}" (expected openai, anthropic or google)`,
    });
    return z.NEVER;
  }
  return kind;
});

const PermissionConfigSchema = z.object({
  mode: z.enum(PERMISSION_MODES),
  allowed: z.array(z.string()).default([]),
});

const AgentConfigSchema = z.object({
  name: z.string().min(1),
  provider: ProviderNameSchema,
  model: z.string().min(1).optional(),
  rules: z.array(z.string()).default([]),
  maxTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).optional(),
  baseUrl: z.string().url().optional(),
  permissions: PermissionConfigSchema.default({ mode: "ask", allowed: [] }),
});

const ConfigFileSchema = z.object({
  version: z.string().optional(),
  agents: z.array(AgentConfigSchema).min(1).optional(),
  maxTurns: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  providerTimeoutMs: z.number().int().positive().optional(),
  toolTimeoutMs: z.number().int().positive().optional(),
  maxToolOutputChars: z.number().int().positive().optional(),
  blockedCommands: z.array(z.string()).optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ── Loading ─────────────────────────────────────────────────────────────

export interface ILoadConfigOptions {
  readonly projectRoot: string;
  /** Agent to resolve; defaults to "default", else the first agent. */
  readonly agent?: string | undefined;
  /** Overrides the user config location (tests). */
  readonly userConfigPath?: string | undefined;
}

export interface ILoadedConfig {
  readonly config: IScriptloomConfig;
  /** Files that contributed, project first; empty when only defaults apply. */
  readonly sources: readonly string[];
}

/**
 * Read and validate one config file. Returns undefined when it does not exist.
 * @throws ConfigError when the file is not valid JSON or fails the schema.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    logger.debug({ path }, "Config file not found");
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error: unknown) {
    throw new ConfigError(path, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const validated = ConfigFileSchema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    const where = issue !== undefined && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigError(path, `${where}${issue?.message ?? "invalid"}`);
  }

  logger.info({ path }, "Config loaded");
  return validated.data;
}

function toAgentConfig(agent: NonNullable<ConfigFile["agents"]>[number]): IAgentConfig {
  return {
    name: agent.name,
    provider: agent.provider,
    model: agent.model ?? DEFAULT_MODELS[agent.provider],
    rules: agent.rules,
    maxTokens: agent.maxTokens,
    ...(agent.temperature !== undefined ? { temperature: agent.temperature } : {}),
    ...(agent.baseUrl !== undefined ? { baseUrl: agent.baseUrl } : {}),
    permissions: agent.permissions,
  };
}

/** Project agents replace home agents of the same name; order is home then new project agents. */
function mergeAgents(
  base: readonly IAgentConfig[],
  overlay: readonly IAgentConfig[],
): IAgentConfig[] {
  const merged = base.map((agent) => overlay.find((o) => o.name === agent.name) ?? agent);
  for (const agent of overlay) {
    if (!merged.some((m) => m.name === agent.name)) {
      merged.push(agent);
    }
  }
  return merged;
}

function applyFile(base: IScriptloomConfig, file: ConfigFile): IScriptloomConfig {
  const agents = file.agents?.map(toAgentConfig);
  return {
    version: file.version ?? base.version,
    agents: agents !== undefined ? mergeAgents(base.agents, agents) : base.agents,
    maxTurns: file.maxTurns ?? base.maxTurns,
    maxRetries: file.maxRetries ?? base.maxRetries,
    providerTimeoutMs: file.providerTimeoutMs ?? base.providerTimeoutMs,
    toolTimeoutMs: file.toolTimeoutMs ?? base.toolTimeoutMs,
    maxToolOutputChars: file.maxToolOutputChars ?? base.maxToolOutputChars,
    blockedCommands: file.blockedCommands ?? base.blockedCommands,
  };
}

/**
 * Merge the project file over the user file over the defaults.
 * Agents from a file replace the default agent list rather than extending it.
 */
export function loadScriptloomConfig(
  options: Pick<ILoadConfigOptions, "projectRoot" | "userConfigPath">,
): ILoadedConfig {
  const userPath = options.userConfigPath ?? getUserConfigPath();
  const projectPath = getProjectConfigPath(options.projectRoot);

  const userFile = loadConfigFile(userPath);
  const projectFile = projectPath !== userPath ? loadConfigFile(projectPath) : undefined;

  let config = DEFAULT_CONFIG;
  let fileAgentsSeen = false;
  const sources: string[] = [];

  for (const [path, file] of [[userPath, userFile], [projectPath, projectFile]] as const) {
    if (file === undefined) {
      continue;
    }
    // Defaults only apply while no file has declared agents
    const base: IScriptloomConfig = !fileAgentsSeen && file.agents !== undefined
      ? { ...config, agents: [] }
      : config;
    fileAgentsSeen ||= file.agents !== undefined;
    config = applyFile(base, file);
    sources.unshift(path);
  }

  return { config, sources };
}

/**
 * Resolve the settings of one agent merged with the run-wide limits.
 * @throws ConfigError for an unknown agent name or an invalid config file.
 */
export function loadConfig(options: ILoadConfigOptions): IResolvedAgentConfig {
  const { config, sources } = loadScriptloomConfig(options);
  const wanted = options.agent;

  const agent = wanted !== undefined
    ? config.agents.find((a) => a.name === wanted)
    : config.agents.find((a) => a.name === "default") ?? config.agents[0];

  if (agent === undefined) {
    const known = config.agents.map((a) => a.name).join(", ");
    throw new ConfigError(
      "agent",
      wanted !== undefined
        ? `no agent named "${wanted}" (known: ${known.length > 0 ? known : "none"})`
        : "no agents configured",
    );
  }

  return {
    ...agent,
    maxTurns: config.maxTurns,
    maxRetries: config.maxRetries,
    providerTimeoutMs: config.providerTimeoutMs,
    toolTimeoutMs: config.toolTimeoutMs,
    maxToolOutputChars: config.maxToolOutputChars,
    blockedCommands: config.blockedCommands,
    origin: sources.length > 0 ? sources.join(", ") : "defaults",
  };
}

// ── Overrides ───────────────────────────────────────────────────────────

export interface IAgentOverrides {
  readonly provider?: string | undefined;
  readonly model?: string | undefined;
  readonly permissionMode?: string | undefined;
  readonly allowed?: readonly string[] | undefined;
  readonly maxTurns?: number | undefined;
  readonly rules?: readonly string[] | undefined;
}

function parsePermissionMode(value: string): PermissionMode {
  const mode = PERMISSION_MODES.find((m) => m === value);
  if (mode === undefined) {
    throw new ConfigError("permission-mode", `expected one of ${PERMISSION_MODES.join(", ")}, got "${value}"`);
  }
  return mode;
}

/**
 * Apply command-line overrides on top of resolved settings.
 * Changing the provider without a model switches to that provider's default model.
 * @throws ConfigError for an unknown provider, permission mode or a non-positive turn limit.
 */
export function applyAgentOverrides(
  settings: IResolvedAgentConfig,
  overrides: IAgentOverrides,
): IResolvedAgentConfig {
  let provider = settings.provider;
  let model = settings.model;
  let baseUrl = settings.baseUrl;

  if (overrides.provider !== undefined) {
    const kind = resolveProviderKind(overrides.provider);
    if (kind === undefined) {
      throw new ConfigError("provider", `unknown provider "${overrides.provider}"`);
    }
    if (kind !== provider) {
      provider = kind;
      model = DEFAULT_MODELS[kind];
      baseUrl = undefined;
    }
  }
  if (overrides.model !== undefined) {
    model = overrides.model;
  }

  if (overrides.maxTurns !== undefined && (!Number.isInteger(overrides.maxTurns) || overrides.maxTurns < 1)) {
    throw new ConfigError("max-turns", "must be a positive integer");
  }

  const permissions: IPermissionConfig = {
    mode: overrides.permissionMode !== undefined
      ? parsePermissionMode(overrides.permissionMode)
      : settings.permissions.mode,
    allowed: overrides.allowed ?? settings.permissions.allowed,
  };

  return {
    ...settings,
    provider,
    model,
    baseUrl,
    permissions,
    rules: overrides.rules !== undefined ? [...settings.rules, ...overrides.rules] : settings.rules,
    maxTurns: overrides.maxTurns ?? settings.maxTurns,
  };
}

// ── Permission Policy ───────────────────────────────────────────────────

export function toPermissionPolicy(permissions: IPermissionConfig): PermissionPolicy {
  switch (permissions.mode) {
    case "allow-all":
      return { kind: "allow_all" };
    case "deny-unlisted":
      return { kind: "deny_unlisted", allowed: new Set(permissions.allowed) };
    case "ask":
      return { kind: "ask_interactive" };
  }
}
