/**
 * Interpreter — drives one script through the model/tool conversation loop.
 *
 * States: init → awaiting_model → executing_tools → … → done | failed.
 * Tool-level problems (unknown tool, bad arguments, denial, handler failure,
 * timeout) become failed tool results the model can react to; provider and
 * run-level problems end the run with a ScriptloomError that carries the
 * transcript up to the failure.
 */

import { performance } from "node:perf_hooks";
import {
  ConfigError,
  PermissionDeniedError,
  ProviderRateLimitError,
  ProviderResponseError,
  ProviderRetryExhaustedError,
  RunCancelledError,
  RunLimitExceededError,
  ScriptloomError,
  ToolArgumentError,
  ToolNotFoundError,
  ToolTimeoutError,
  isRetryableError,
} from "../types/errors.js";
import type { IMessage, IProviderTurn, IToolCallRequest, IToolResult } from "../types/message.js";
import type { IProviderConfig } from "../types/model.js";
import type { IRunOptions, IRunResult, RunState } from "../types/run.js";
import type { IConfirmer, IToolSpec, PermissionPolicy } from "../types/tool.js";
import { DEFAULT_CONFIG } from "../types/config.js";
import { validateProviderConfig } from "../config/provider-config.js";
import { createProviderAdapter } from "../providers/index.js";
import type { IProviderAdapter, IProviderOptions, ProviderAdapterFactory } from "../providers/types.js";
import type { ToolRegistry } from "../tools/registry.js";
import { validateToolArguments } from "../tools/arguments.js";
import { logger } from "../utils/logger.js";
import { withRetry, RetryExhaustedError } from "../utils/retry.js";
import type { IRetryOptions } from "../utils/retry.js";
import { redactToolArgs, truncateText } from "../utils/sanitizer.js";
import { PermissionGate } from "./permission-gate.js";
import { EventBus } from "./event-bus.js";
import { Conversation } from "./conversation.js";
import { buildSystemPrompt, enhanceContent } from "./context-assembler.js";

// ── Options ─────────────────────────────────────────────────────────────

export interface IRunLimits {
  /** Model turns allowed before a run that still requests tools is stopped. */
  readonly maxTurns: number;
  /** Resends of a failed provider request, on retryable errors only. */
  readonly maxRetries: number;
  /** Default handler timeout for tools that declare none. */
  readonly toolTimeoutMs: number;
  readonly maxToolOutputChars: number;
}

export const DEFAULT_RUN_LIMITS: IRunLimits = {
  maxTurns: DEFAULT_CONFIG.maxTurns,
  maxRetries: DEFAULT_CONFIG.maxRetries,
  toolTimeoutMs: DEFAULT_CONFIG.toolTimeoutMs,
  maxToolOutputChars: DEFAULT_CONFIG.maxToolOutputChars,
};

export interface IInterpreterOptions {
  readonly provider: IProviderConfig;
  readonly registry: ToolRegistry;
  readonly policy: PermissionPolicy;
  /** Consulted for `ask` decisions; without one every ask is declined. */
  readonly confirmer?: IConfirmer | undefined;
  /** Rule texts placed in the system prompt, in order. */
  readonly rules?: readonly string[] | undefined;
  readonly workingDirectory?: string | undefined;
  readonly limits?: Partial<IRunLimits> | undefined;
  readonly createAdapter?: ProviderAdapterFactory | undefined;
  readonly providerOptions?: IProviderOptions | undefined;
  /** Backoff tuning; tests pass an instant `sleep`. */
  readonly retry?: Partial<Pick<IRetryOptions, "baseDelayMs" | "maxDelayMs" | "sleep">> | undefined;
}

interface IToolOutcome {
  readonly result: IToolResult;
  readonly denied: boolean;
}

function failedResult(error: string): IToolResult {
  return { success: false, output: "", error };
}

function throwIfCancelled(signal: AbortSignal | undefined, where: string): void {
  if (signal?.aborted === true) {
    throw new RunCancelledError(where);
  }
}

function assertPositiveInteger(key: string, value: number, allowZero = false): void {
  if (!Number.isInteger(value) || value < (allowZero ? 0 : 1)) {
    throw new ConfigError(key, `must be a ${allowZero ? "non-negative" : "positive"} integer, got ${value}`);
  }
}

// ── Interpreter ─────────────────────────────────────────────────────────

export class Interpreter {
  /** Run lifecycle events; listeners see every run of this interpreter. */
  readonly events = new EventBus();

  private readonly provider: IProviderConfig;
  private readonly registry: ToolRegistry;
  private readonly gate: PermissionGate;
  private readonly rules: readonly string[];
  private readonly workingDirectory: string;
  private readonly limits: IRunLimits;
  private readonly createAdapter: ProviderAdapterFactory;
  private readonly providerOptions: IProviderOptions | undefined;
  private readonly retry: Partial<Pick<IRetryOptions, "baseDelayMs" | "maxDelayMs" | "sleep">>;

  /**
   * @throws ConfigError when the provider configuration or a limit is invalid.
   */
  constructor(options: IInterpreterOptions) {
    this.provider = validateProviderConfig(options.provider);
    this.registry = options.registry;
    this.gate = new PermissionGate(options.policy, options.confirmer);
    this.rules = [...(options.rules ?? [])];
    this.workingDirectory = options.workingDirectory ?? process.cwd();
    this.limits = { ...DEFAULT_RUN_LIMITS, ...options.limits };
    this.createAdapter = options.createAdapter ?? createProviderAdapter;
    this.providerOptions = options.providerOptions;
    this.retry = options.retry ?? {};

    assertPositiveInteger("maxTurns", this.limits.maxTurns);
    assertPositiveInteger("maxRetries", this.limits.maxRetries, true);
    assertPositiveInteger("toolTimeoutMs", this.limits.toolTimeoutMs);
    assertPositiveInteger("maxToolOutputChars", this.limits.maxToolOutputChars);
  }

  getPolicy(): PermissionPolicy {
    return this.gate.getPolicy();
  }

  /**
   * Run a script to completion.
   *
   * @throws ScriptloomError with `terminalState: "failed"` and the transcript
   *   on configuration, authentication, request, retry-exhaustion, turn-limit
   *   or cancellation failures.
   */
  async run(script: string, options?: IRunOptions): Promise<IRunResult> {
    const signal = options?.signal;
    const conversation = new Conversation();
    let turns = 0;

    const enter = (state: RunState): void => {
      logger.debug({ state, turn: turns }, "Run state");
      this.events.emit("run:state", { state, turn: turns });
    };

    try {
      enter("init");
      const adapter = this.createAdapter(this.provider, this.providerOptions);
      const tools = this.registry.list();
      conversation.append({ role: "system", content: buildSystemPrompt({ rules: this.rules, tools }) });
      conversation.append({ role: "user", content: enhanceContent(script, options?.context ?? []) });
      logger.info(
        { provider: adapter.kind, model: adapter.model, tools: tools.length },
        "Run started",
      );

      for (;;) {
        throwIfCancelled(signal, "before requesting the next model turn");
        if (turns >= this.limits.maxTurns) {
          throw new RunLimitExceededError(this.limits.maxTurns);
        }

        enter("awaiting_model");
        turns++;

        let turn: IProviderTurn;
        try {
          turn = await this.requestTurn(adapter, conversation, tools, signal);
        } catch (error: unknown) {
          if (!(error instanceof ProviderResponseError)) {
            throw error;
          }
          logger.warn({ turn: turns, error: error.message }, "Unreadable model response, asking again");
          conversation.append({ role: "assistant", content: "", toolCalls: [] });
          conversation.append({
            role: "system",
            content: `The previous response could not be read (${error.userMessage}). Please answer again.`,
          });
          continue;
        }

        this.events.emit("model:turn", {
          turn: turns,
          stopReason: turn.stopReason,
          toolCalls: turn.toolCalls.length,
        });
        const text = turn.assistantText ?? "";

        if (turn.stopReason === "length_limit") {
          if (turn.toolCalls.length > 0) {
            logger.warn(
              { turn: turns, dropped: turn.toolCalls.map((call) => call.toolName) },
              "Dropping tool calls from a truncated model turn",
            );
          }
          conversation.append({ role: "assistant", content: text, toolCalls: [] });
          return this.finish(conversation, text, turns, true);
        }

        if (turn.toolCalls.length === 0) {
          conversation.append({ role: "assistant", content: text, toolCalls: [] });
          return this.finish(conversation, text, turns, false);
        }

        conversation.append({ role: "assistant", content: text, toolCalls: turn.toolCalls });
        enter("executing_tools");
        await this.executeToolCalls(turn.toolCalls, conversation, signal);
      }
    } catch (error: unknown) {
      throw this.fail(error, conversation, turns);
    }
  }

  // ── Model Turns ─────────────────────────────────────────────────────

  private async requestTurn(
    adapter: IProviderAdapter,
    conversation: Conversation,
    tools: readonly IToolSpec[],
    signal: AbortSignal | undefined,
  ): Promise<IProviderTurn> {
    try {
      return await withRetry(
        (attempt) => {
          throwIfCancelled(signal, "while waiting for the model");
          if (attempt > 0) {
            logger.info({ provider: adapter.kind, attempt }, "Resending model request");
          }
          return adapter.send(conversation.snapshot(), tools, { signal });
        },
        {
          ...this.retry,
          maxRetries: this.limits.maxRetries,
          signal,
          shouldRetry: (error) => isRetryableError(error),
          delayHintMs: (error) =>
            error instanceof ProviderRateLimitError ? error.retryAfterMs : undefined,
        },
      );
    } catch (error: unknown) {
      if (error instanceof RetryExhaustedError) {
        throw new ProviderRetryExhaustedError(adapter.kind, error.attempts, error.lastError);
      }
      throw error;
    }
  }

  // ── Tool Execution ──────────────────────────────────────────────────

  private async executeToolCalls(
    calls: readonly IToolCallRequest[],
    conversation: Conversation,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    for (const [index, call] of calls.entries()) {
      if (signal?.aborted === true) {
        // Answer every remaining call so the transcript stays well-formed
        for (const skipped of calls.slice(index)) {
          this.appendResult(conversation, skipped, failedResult("Run cancelled before this call ran."));
        }
        throw new RunCancelledError("while executing tools");
      }

      this.events.emit("tool:call", { id: call.id, name: call.toolName, args: call.arguments });
      logger.debug({ toolName: call.toolName, args: redactToolArgs(call.arguments) }, "Tool call");

      const started = performance.now();
      const outcome = await this.executeToolCall(call, signal);
      const durationMs = Math.round(performance.now() - started);

      this.appendResult(conversation, call, outcome.result);
      this.events.emit("tool:result", {
        id: call.id,
        name: call.toolName,
        success: outcome.result.success,
        denied: outcome.denied,
        durationMs,
      });
      logger.debug(
        { toolName: call.toolName, success: outcome.result.success, denied: outcome.denied, durationMs },
        "Tool result",
      );
    }
  }

  private async executeToolCall(
    call: IToolCallRequest,
    signal: AbortSignal | undefined,
  ): Promise<IToolOutcome> {
    if (call.argumentError !== undefined) {
      return {
        result: failedResult(new ToolArgumentError(call.toolName, call.argumentError).userMessage),
        denied: false,
      };
    }

    const spec = this.registry.get(call.toolName);
    if (spec === undefined) {
      return { result: failedResult(new ToolNotFoundError(call.toolName).userMessage), denied: false };
    }

    const permission = await this.gate.authorize(call.toolName, call.arguments, spec);
    if (!permission.allowed) {
      const reason = permission.reason ?? "not permitted";
      return {
        result: failedResult(new PermissionDeniedError(call.toolName, reason).userMessage),
        denied: true,
      };
    }

    try {
      validateToolArguments(spec, call.arguments);
    } catch (error: unknown) {
      if (error instanceof ToolArgumentError) {
        return { result: failedResult(error.userMessage), denied: false };
      }
      throw error;
    }

    return { result: await this.runHandler(spec, call.arguments, signal), denied: false };
  }

  /**
   * Run a handler under its timeout. A timeout aborts the handler's signal and
   * settles with a failed result. A run cancellation only aborts the signal;
   * the handler's own result is still awaited and recorded.
   */
  private async runHandler(
    spec: IToolSpec,
    args: Readonly<Record<string, unknown>>,
    signal: AbortSignal | undefined,
  ): Promise<IToolResult> {
    const timeoutMs = spec.timeoutMs ?? this.limits.toolTimeoutMs;
    const controller = new AbortController();
    const cleanup: Array<() => void> = [];

    const timedOut = new Promise<IToolResult>((resolve) => {
      const timer = setTimeout(() => {
        const error = new ToolTimeoutError(spec.name, timeoutMs);
        controller.abort(error);
        logger.warn({ toolName: spec.name, timeoutMs }, "Tool timed out");
        resolve(failedResult(error.userMessage));
      }, timeoutMs);
      cleanup.push(() => clearTimeout(timer));
    });

    const runSignal = signal;
    if (runSignal !== undefined) {
      const forwardAbort = (): void => {
        logger.debug({ toolName: spec.name }, "Run cancelled, waiting for the running tool");
        controller.abort(runSignal.reason);
      };
      if (runSignal.aborted) {
        forwardAbort();
      } else {
        runSignal.addEventListener("abort", forwardAbort, { once: true });
        cleanup.push(() => runSignal.removeEventListener("abort", forwardAbort));
      }
    }

    try {
      return await Promise.race([this.invokeHandler(spec, args, controller.signal), timedOut]);
    } finally {
      for (const release of cleanup) {
        release();
      }
    }
  }

  private async invokeHandler(
    spec: IToolSpec,
    args: Readonly<Record<string, unknown>>,
    signal: AbortSignal,
  ): Promise<IToolResult> {
    try {
      return await spec.handler(args, { workingDirectory: this.workingDirectory, signal });
    } catch (error: unknown) {
      const message = error instanceof ScriptloomError
        ? error.userMessage
        : error instanceof Error ? error.message : String(error);
      logger.warn({ toolName: spec.name, error: message }, "Tool handler threw");
      return failedResult(message);
    }
  }

  private appendResult(conversation: Conversation, call: IToolCallRequest, result: IToolResult): void {
    conversation.append({
      role: "tool",
      toolCallId: call.id,
      toolName: call.toolName,
      result: this.capOutput(result),
    });
  }

  private capOutput(result: IToolResult): IToolResult {
    const max = this.limits.maxToolOutputChars;
    if (typeof result.output === "string") {
      return result.output.length > max ? { ...result, output: truncateText(result.output, max) } : result;
    }
    const serialized = JSON.stringify(result.output);
    return serialized.length > max ? { ...result, output: truncateText(serialized, max) } : result;
  }

  // ── Terminal States ─────────────────────────────────────────────────

  private finish(
    conversation: Conversation,
    finalText: string,
    turns: number,
    truncated: boolean,
  ): IRunResult {
    this.events.emit("run:state", { state: "done", turn: turns });
    logger.info({ turns, truncated }, "Run finished");
    return { finalText, transcript: conversation.snapshot(), truncated, turns };
  }

  private fail(error: unknown, conversation: Conversation, turns: number): unknown {
    const message = error instanceof ScriptloomError
      ? error.userMessage
      : error instanceof Error ? error.message : String(error);
    const marker: IMessage = { role: "system", content: `Run failed: ${message}` };
    conversation.append(marker);

    this.events.emit("run:state", { state: "failed", turn: turns });
    logger.error(
      {
        turns,
        code: error instanceof ScriptloomError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      },
      "Run failed",
    );

    if (error instanceof ScriptloomError) {
      error.terminalState = "failed";
      error.transcript = conversation.snapshot();
    }
    return error;
  }
}
