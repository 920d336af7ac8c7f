/**
 * OpenAI adapter — chat completions over fetch.
 * Also serves any OpenAI-compatible endpoint through `baseUrl`.
 */

import { z } from "zod";
import { logger } from "../utils/logger.js";
import { DEFAULT_BASE_URLS } from "../types/model.js";
import type { IProviderConfig } from "../types/model.js";
import { formatToolResult } from "../types/message.js";
import type {
  IMessage,
  IProviderTurn,
  IToolCallRequest,
  StopReason,
} from "../types/message.js";
import type { IToolSpec } from "../types/tool.js";
import { toProviderSchema } from "../tools/schema.js";
import type { IOpenAIToolDescriptor } from "../tools/schema.js";
import { decodeToolArguments, parseWireResponse, postJson } from "./http.js";
import type { IProviderAdapter, IProviderOptions, ISendOptions } from "./types.js";

const PROVIDER_NAME = "openai" as const;

// ── Wire Types ──────────────────────────────────────────────────────────

interface IOpenAIToolCall {
  readonly id: string;
  readonly type: "function";
  readonly function: { readonly name: string; readonly arguments: string };
}

export type OpenAIMessage =
  | { readonly role: "system" | "user"; readonly content: string }
  | {
      readonly role: "assistant";
      readonly content: string | null;
      readonly tool_calls?: readonly IOpenAIToolCall[];
    }
  | { readonly role: "tool"; readonly tool_call_id: string; readonly content: string };

export interface IOpenAIRequestBody {
  readonly model: string;
  readonly messages: readonly OpenAIMessage[];
  readonly max_tokens: number;
  readonly temperature?: number;
  readonly tools?: readonly IOpenAIToolDescriptor[];
}

const responseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().optional(),
                }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1, "no choices in response"),
});

type OpenAIResponse = z.infer<typeof responseSchema>;

// ── Translation ─────────────────────────────────────────────────────────

export function convertMessages(conversation: readonly IMessage[]): OpenAIMessage[] {
  return conversation.map((msg): OpenAIMessage => {
    switch (msg.role) {
      case "system":
      case "user":
        return { role: msg.role, content: msg.content };
      case "assistant":
        if (msg.toolCalls.length === 0) {
          return { role: "assistant", content: msg.content };
        }
        return {
          role: "assistant",
          content: msg.content.length > 0 ? msg.content : null,
          tool_calls: msg.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.toolName, arguments: JSON.stringify(call.arguments) },
          })),
        };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId, content: formatToolResult(msg.result) };
    }
  });
}

function mapFinishReason(reason: string | null | undefined, hasToolCalls: boolean): StopReason {
  if (reason === "length") {
    return "length_limit";
  }
  // "tool_calls" / "function_call" without any parsed call is treated as a stop
  return hasToolCalls ? "tool_calls_pending" : "natural_stop";
}

export function parseResponse(data: OpenAIResponse): IProviderTurn {
  const choice = data.choices[0];
  if (choice === undefined) {
    return { toolCalls: [], stopReason: "natural_stop" };
  }

  const toolCalls: IToolCallRequest[] = (choice.message.tool_calls ?? []).map((call) => {
    const decoded = decodeToolArguments(call.function.arguments);
    return {
      id: call.id,
      toolName: call.function.name,
      arguments: decoded.arguments,
      ...(decoded.error !== undefined ? { argumentError: decoded.error } : {}),
    };
  });

  const content = choice.message.content;
  return {
    ...(content !== null && content !== undefined ? { assistantText: content } : {}),
    toolCalls,
    stopReason: mapFinishReason(choice.finish_reason, toolCalls.length > 0),
  };
}

// ── OpenAIAdapter Class ─────────────────────────────────────────────────

export class OpenAIAdapter implements IProviderAdapter {
  readonly kind = PROVIDER_NAME;
  readonly model: string;

  private readonly config: IProviderConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: IProviderConfig, options?: IProviderOptions) {
    this.config = config;
    this.model = config.model;
    this.fetchImpl = options?.fetch ?? globalThis.fetch;
  }

  buildRequestBody(conversation: readonly IMessage[], tools: readonly IToolSpec[]): IOpenAIRequestBody {
    return {
      model: this.config.model,
      messages: convertMessages(conversation),
      max_tokens: this.config.maxTokens,
      ...(this.config.temperature !== undefined ? { temperature: this.config.temperature } : {}),
      ...(tools.length > 0 ? { tools: toProviderSchema(tools, "openai") } : {}),
    };
  }

  async send(
    conversation: readonly IMessage[],
    tools: readonly IToolSpec[],
    options?: ISendOptions,
  ): Promise<IProviderTurn> {
    const baseUrl = this.config.baseUrl ?? DEFAULT_BASE_URLS.openai;
    const data = await postJson({
      provider: PROVIDER_NAME,
      url: `${baseUrl.replace(/\/+$/, "")}/chat/completions`,
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      body: this.buildRequestBody(conversation, tools),
      timeoutMs: this.config.timeoutMs,
      fetch: this.fetchImpl,
      signal: options?.signal,
    });

    const turn = parseResponse(parseWireResponse(PROVIDER_NAME, responseSchema, data));
    logger.debug(
      { provider: PROVIDER_NAME, model: this.model, stopReason: turn.stopReason, toolCalls: turn.toolCalls.length },
      "Model turn received",
    );
    return turn;
  }
}
