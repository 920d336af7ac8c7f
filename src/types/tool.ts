/**
 * Tool and permission types.
 */

import type { IToolResult } from "./message.js";

// ── Tool Parameters ──────────────────────────────────────────────────────

export type ToolParameterType =
  | "string"
  | "number"
  | "integer"
  | "boolean"
  | "array"
  | "object";

export const TOOL_PARAMETER_TYPES: readonly [ToolParameterType, ...ToolParameterType[]] = [
  "string",
  "number",
  "integer",
  "boolean",
  "array",
  "object",
];

export interface IToolParameter {
  readonly name: string;
  readonly type: ToolParameterType;
  readonly description: string;
  readonly required: boolean;
  readonly default?: unknown;
  readonly enum?: readonly string[] | undefined;
}

// ── Tool Spec ────────────────────────────────────────────────────────────

export interface IToolExecutionContext {
  readonly workingDirectory: string;
  /** Aborted on run cancellation or when the tool's own timeout elapses. */
  readonly signal: AbortSignal;
}

export type ToolHandler = (
  args: Readonly<Record<string, unknown>>,
  context: IToolExecutionContext,
) => Promise<IToolResult>;

export interface IToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly IToolParameter[];
  readonly requiresPermission: boolean;
  readonly timeoutMs?: number | undefined;
  /** File the definition was loaded from; undefined for built-ins. */
  readonly source?: string | undefined;
  readonly handler: ToolHandler;
}

// ── Permission Policy ────────────────────────────────────────────────────

export type PermissionPolicy =
  | { readonly kind: "allow_all" }
  | { readonly kind: "deny_unlisted"; readonly allowed: ReadonlySet<string> }
  | { readonly kind: "ask_interactive" };

export type PermissionDecision = "allow" | "deny" | "ask";

/** The interactive surface consulted for `ask` decisions. */
export interface IConfirmer {
  confirm(toolName: string, args: Readonly<Record<string, unknown>>): Promise<boolean>;
}

// ── Tool Loading ─────────────────────────────────────────────────────────

export interface IToolLoadDiagnostic {
  readonly path: string;
  readonly toolName?: string | undefined;
  readonly reason: string;
}

export interface IToolLoadReport {
  readonly loaded: readonly string[];
  readonly diagnostics: readonly IToolLoadDiagnostic[];
}

// ── Built-in Tool Options ────────────────────────────────────────────────

export interface IBuiltinToolOptions {
  /** Every path a built-in touches must resolve inside this directory. */
  readonly projectRoot: string;
  /** Substrings that make the shell tool refuse a command. */
  readonly blockedCommands?: readonly string[] | undefined;
  readonly fetch?: typeof fetch | undefined;
  /** Approves `ask` decisions inside call_agent's nested runs. */
  readonly confirmer?: IConfirmer | undefined;
}
