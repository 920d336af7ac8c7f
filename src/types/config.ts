/**
 * Configuration file shape and defaults.
 */

import type { ProviderKind } from "./model.js";

// ── Permission Configuration ─────────────────────────────────────────────

export type PermissionMode = "allow-all" | "deny-unlisted" | "ask";

export const PERMISSION_MODES: readonly [PermissionMode, ...PermissionMode[]] = [
  "allow-all",
  "deny-unlisted",
  "ask",
];

export interface IPermissionConfig {
  readonly mode: PermissionMode;
  /** Tool names allowed under `deny-unlisted`. */
  readonly allowed: readonly string[];
}

// ── Agent Configuration ──────────────────────────────────────────────────

export interface IAgentConfig {
  readonly name: string;
  readonly provider: ProviderKind;
  readonly model: string;
  readonly rules: readonly string[];
  readonly maxTokens: number;
  readonly temperature?: number | undefined;
  readonly baseUrl?: string | undefined;
  readonly permissions: IPermissionConfig;
}

// ── Global Configuration ─────────────────────────────────────────────────

export interface IScriptloomConfig {
  readonly version: string;
  readonly agents: readonly IAgentConfig[];
  readonly maxTurns: number;
  readonly maxRetries: number;
  readonly providerTimeoutMs: number;
  readonly toolTimeoutMs: number;
  readonly maxToolOutputChars: number;
  readonly blockedCommands: readonly string[];
}

/** One agent's settings merged with the run-wide limits. */
export interface IResolvedAgentConfig extends IAgentConfig {
  readonly maxTurns: number;
  readonly maxRetries: number;
  readonly providerTimeoutMs: number;
  readonly toolTimeoutMs: number;
  readonly maxToolOutputChars: number;
  readonly blockedCommands: readonly string[];
  /** Where the configuration was read from, or "defaults". */
  readonly origin: string;
}

// ── Default Configuration ────────────────────────────────────────────────

export const DEFAULT_CONFIG: IScriptloomConfig = {
  version: "1.0.0",
  agents: [
    {
      name: "default",
      provider: "anthropic",
      model: "claude-sonnet-4-5",
      rules: [],
      maxTokens: 4096,
      permissions: {
        mode: "ask",
        allowed: [],
      },
    },
  ],
  maxTurns: 25,
  maxRetries: 3,
  providerTimeoutMs: 120_000,
  toolTimeoutMs: 120_000,
  maxToolOutputChars: 20_000,
  blockedCommands: ["rm -rf /", "git push --force"],
};
