/**
 * Conversation message types.
 * Messages are a discriminated union on `role`; a Conversation is the
 * append-only ordered list a single run builds up.
 */

// ── Tool Calls ───────────────────────────────────────────────────────────

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export interface IToolCallRequest {
  /** Provider-assigned (or generated) id, unique within a turn. */
  readonly id: string;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /** Set when the provider's argument payload could not be parsed. */
  readonly argumentError?: string | undefined;
}

export interface IToolResult {
  readonly success: boolean;
  readonly output: string | JsonValue;
  readonly error?: string | undefined;
}

// ── Messages ─────────────────────────────────────────────────────────────

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface ISystemMessage {
  readonly role: "system";
  readonly content: string;
}

export interface IUserMessage {
  readonly role: "user";
  readonly content: string;
}

export interface IAssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly toolCalls: readonly IToolCallRequest[];
}

export interface IToolMessage {
  readonly role: "tool";
  readonly toolCallId: string;
  readonly toolName: string;
  readonly result: IToolResult;
}

export type IMessage = ISystemMessage | IUserMessage | IAssistantMessage | IToolMessage;

// ── Provider Turn ────────────────────────────────────────────────────────

export type StopReason = "tool_calls_pending" | "natural_stop" | "length_limit";

export interface IProviderTurn {
  readonly assistantText?: string | undefined;
  readonly toolCalls: readonly IToolCallRequest[];
  readonly stopReason: StopReason;
}

/**
 * Render a tool result as the plain text most providers expect.
 */
export function formatToolResult(result: IToolResult): string {
  const output = typeof result.output === "string"
    ? result.output
    : JSON.stringify(result.output);
  if (result.success) {
    return output;
  }
  const error = result.error ?? "Tool failed";
  return output.length > 0 ? `Error: ${error}\n${output}` : `Error: ${error}`;
}
