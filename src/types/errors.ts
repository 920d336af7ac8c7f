/**
 * Scriptloom typed error hierarchy.
 * Every error carries a stable code, a user-facing message and the component
 * that raised it. Fatal errors additionally carry the run's terminal state and
 * the transcript at the point of failure once the interpreter has seen them.
 */

import type { IMessage } from "./message.js";

export type ErrorComponent =
  | "config"
  | "interpreter"
  | "provider"
  | "tool-registry"
  | "tool"
  | "permission-gate";

export interface IErrorContext {
  readonly diagnosticMessage?: string | undefined;
  readonly suggestedRecovery?: string | undefined;
  readonly cause?: unknown;
}

export abstract class ScriptloomError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  abstract readonly component: ErrorComponent;
  /** Whether resending the same request may succeed. */
  readonly retryable: boolean = false;
  diagnosticMessage?: string | undefined;
  suggestedRecovery?: string | undefined;
  terminalState?: "failed" | undefined;
  transcript?: readonly IMessage[] | undefined;

  constructor(message: string, context?: IErrorContext) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = this.constructor.name;
    this.diagnosticMessage = context?.diagnosticMessage;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Config Errors ────────────────────────────────────────────────────────

export class ConfigError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_CONFIG_001" as const;
  readonly component = "config" as const;
  readonly userMessage: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`);
    this.userMessage = `Invalid configuration "${key}": ${reason}`;
  }
}

// ── Provider Errors ──────────────────────────────────────────────────────

export class ProviderAuthError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_AUTH_001" as const;
  readonly component = "provider" as const;
  readonly userMessage: string;

  constructor(provider: string, detail?: string) {
    super(`Authentication failed for provider: ${provider}`, {
      diagnosticMessage: detail,
      suggestedRecovery: "Check the API key environment variable for this provider.",
    });
    this.userMessage = `Authentication failed for ${provider}. Check your API key.`;
  }
}

export class ProviderRateLimitError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_RATE_001" as const;
  readonly component = "provider" as const;
  override readonly retryable = true;
  readonly userMessage: string;
  readonly retryAfterMs: number | undefined;

  constructor(provider: string, retryAfterMs?: number) {
    super(`Rate limited by ${provider}`, {
      suggestedRecovery: "Wait and retry, or switch to a different provider.",
    });
    this.retryAfterMs = retryAfterMs;
    this.userMessage = retryAfterMs !== undefined
      ? `Rate limited by ${provider}. Retry in ${Math.ceil(retryAfterMs / 1000)}s.`
      : `Rate limited by ${provider}.`;
  }
}

export class ProviderTimeoutError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_TIMEOUT_001" as const;
  readonly component = "provider" as const;
  override readonly retryable = true;
  readonly userMessage: string;

  constructor(provider: string, timeoutMs: number) {
    super(`Request to ${provider} timed out after ${timeoutMs}ms`);
    this.userMessage = `${provider} did not answer within ${Math.ceil(timeoutMs / 1000)}s.`;
  }
}

export class ProviderUnavailableError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_UNAVAILABLE_001" as const;
  readonly component = "provider" as const;
  override readonly retryable = true;
  readonly userMessage: string;

  constructor(provider: string, detail: string) {
    super(`Provider ${provider} unavailable: ${detail}`);
    this.userMessage = `${provider} is temporarily unavailable.`;
  }
}

export class ProviderRequestError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_REQUEST_001" as const;
  readonly component = "provider" as const;
  readonly userMessage: string;
  readonly status: number;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} rejected the request (${status})`, { diagnosticMessage: body });
    this.status = status;
    this.userMessage = `${provider} rejected the request with HTTP ${status}. Check the model name and settings.`;
  }
}

export class ProviderResponseError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_RESPONSE_001" as const;
  readonly component = "provider" as const;
  readonly userMessage: string;

  constructor(provider: string, reason: string) {
    super(`Unreadable response from ${provider}: ${reason}`);
    this.userMessage = `The response from ${provider} could not be understood: ${reason}`;
  }
}

export class ProviderRetryExhaustedError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_PROVIDER_RETRY_001" as const;
  readonly component = "provider" as const;
  readonly userMessage: string;

  constructor(provider: string, attempts: number, lastError: unknown) {
    super(`Gave up on ${provider} after ${attempts} attempts`, { cause: lastError });
    const last = lastError instanceof ScriptloomError ? lastError.userMessage : String(lastError);
    this.userMessage = `${provider} kept failing after ${attempts} attempts. Last error: ${last}`;
  }
}

// ── Tool Registry Errors ─────────────────────────────────────────────────

export class DuplicateToolError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_DUP_001" as const;
  readonly component = "tool-registry" as const;
  readonly userMessage: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.userMessage = `A tool named "${toolName}" is already registered.`;
  }
}

export class InvalidToolSpecError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_SPEC_001" as const;
  readonly component = "tool-registry" as const;
  readonly userMessage: string;

  constructor(toolName: string, reason: string) {
    super(`Invalid tool spec "${toolName}": ${reason}`);
    this.userMessage = `Tool "${toolName}" is invalid: ${reason}`;
  }
}

// ── Tool Invocation Errors (absorbed into the conversation) ──────────────

export class ToolNotFoundError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_MISSING_001" as const;
  readonly component = "tool-registry" as const;
  readonly userMessage: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.userMessage = `Tool "${toolName}" does not exist.`;
  }
}

export class ToolArgumentError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_ARGS_001" as const;
  readonly component = "tool" as const;
  readonly userMessage: string;

  constructor(toolName: string, reason: string) {
    super(`Invalid arguments for ${toolName}: ${reason}`);
    this.userMessage = `Invalid arguments for "${toolName}": ${reason}`;
  }
}

export class ToolTimeoutError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_TIMEOUT_001" as const;
  readonly component = "tool" as const;
  readonly userMessage: string;

  constructor(toolName: string, timeoutMs: number) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
    this.userMessage = `Tool "${toolName}" timed out after ${Math.ceil(timeoutMs / 1000)}s.`;
  }
}

export class PermissionDeniedError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_TOOL_PERM_001" as const;
  readonly component = "permission-gate" as const;
  readonly userMessage: string;

  constructor(toolName: string, reason: string) {
    super(`Permission denied for ${toolName}: ${reason}`);
    this.userMessage = `Permission denied for tool "${toolName}": ${reason}`;
  }
}

// ── Run Errors ───────────────────────────────────────────────────────────

export class RunLimitExceededError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_RUN_LIMIT_001" as const;
  readonly component = "interpreter" as const;
  readonly userMessage: string;
  readonly maxTurns: number;

  constructor(maxTurns: number) {
    super(`Run exceeded the maximum of ${maxTurns} model turns`, {
      suggestedRecovery: "Raise maxTurns or simplify the script.",
    });
    this.maxTurns = maxTurns;
    this.userMessage = `Stopped after ${maxTurns} turns: the model kept requesting tools.`;
  }
}

export class RunCancelledError extends ScriptloomError {
  readonly code = "SCRIPTLOOM_RUN_CANCEL_001" as const;
  readonly component = "interpreter" as const;
  readonly userMessage = "Run cancelled.";

  constructor(reason?: string) {
    super(reason !== undefined ? `Run cancelled: ${reason}` : "Run cancelled");
  }
}

// ── Discriminated Error Unions ───────────────────────────────────────────

export type ProviderError =
  | ProviderAuthError
  | ProviderRateLimitError
  | ProviderTimeoutError
  | ProviderUnavailableError
  | ProviderRequestError
  | ProviderResponseError
  | ProviderRetryExhaustedError;

export type ToolError =
  | DuplicateToolError
  | InvalidToolSpecError
  | ToolNotFoundError
  | ToolArgumentError
  | ToolTimeoutError
  | PermissionDeniedError;

export type RunError =
  | ConfigError
  | RunLimitExceededError
  | RunCancelledError;

export type AnyScriptloomError = ProviderError | ToolError | RunError;

export function isRetryableError(error: unknown): boolean {
  return error instanceof ScriptloomError && error.retryable;
}
