/**
 * Run lifecycle types shared by the interpreter, its event bus and the CLI.
 */

import type { IMessage, StopReason } from "./message.js";

export type RunState =
  | "init"
  | "awaiting_model"
  | "executing_tools"
  | "done"
  | "failed";

export interface IRunResult {
  /** Text of the last assistant message. */
  readonly finalText: string;
  readonly transcript: readonly IMessage[];
  /** True when the final model turn hit the output length limit. */
  readonly truncated: boolean;
  /** Number of model turns taken. */
  readonly turns: number;
}

export interface IRunOptions {
  /** Extra context appended to the script, in order. */
  readonly context?: readonly string[] | undefined;
  readonly signal?: AbortSignal | undefined;
}

// ── Run Events ───────────────────────────────────────────────────────────

export interface IRunEventMap {
  "run:state": { readonly state: RunState; readonly turn: number };
  "model:turn": {
    readonly turn: number;
    readonly stopReason: StopReason;
    readonly toolCalls: number;
  };
  "tool:call": {
    readonly id: string;
    readonly name: string;
    readonly args: Readonly<Record<string, unknown>>;
  };
  "tool:result": {
    readonly id: string;
    readonly name: string;
    readonly success: boolean;
    readonly denied: boolean;
    readonly durationMs: number;
  };
}

export type RunEventName = keyof IRunEventMap;
