/**
 * Anthropic adapter — Messages API over fetch.
 *
 * Leading system messages become the top-level `system` field; system notes
 * appearing later are sent as user text. Tool calls and results travel as
 * `tool_use` / `tool_result` content blocks, and consecutive messages of the
 * same role are merged since the API requires alternation.
 */

import { z } from "zod";
import { logger } from "../utils/logger.js";
import { DEFAULT_BASE_URLS } from "../types/model.js";
import type { IProviderConfig } from "../types/model.js";
import { formatToolResult } from "../types/message.js";
import type { IMessage, IProviderTurn, IToolCallRequest, StopReason } from "../types/message.js";
import type { IToolSpec } from "../types/tool.js";
import { toProviderSchema } from "../tools/schema.js";
import type { IAnthropicToolDescriptor } from "../tools/schema.js";
import { parseWireResponse, postJson, toArgumentRecord } from "./http.js";
import type { IProviderAdapter, IProviderOptions, ISendOptions } from "./types.js";

const PROVIDER_NAME = "anthropic" as const;
export const ANTHROPIC_API_VERSION = "2023-06-01";

// ── Wire Types ──────────────────────────────────────────────────────────

export type AnthropicContentBlock =
  | { readonly type: "text"; readonly text: string }
  | {
      readonly type: "tool_use";
      readonly id: string;
      readonly name: string;
      readonly input: Readonly<Record<string, unknown>>;
    }
  | {
      readonly type: "tool_result";
      readonly tool_use_id: string;
      readonly content: string;
      readonly is_error?: boolean;
    };

export interface IAnthropicMessage {
  readonly role: "user" | "assistant";
  readonly content: AnthropicContentBlock[];
}

export interface IAnthropicRequestBody {
  readonly model: string;
  readonly max_tokens: number;
  readonly system?: string;
  readonly messages: readonly IAnthropicMessage[];
  readonly temperature?: number;
  readonly tools?: readonly IAnthropicToolDescriptor[];
}

const responseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      id: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown().optional(),
    }),
  ),
  stop_reason: z.string().nullish(),
});

type AnthropicResponse = z.infer<typeof responseSchema>;

// ── Translation ─────────────────────────────────────────────────────────

function toBlocks(msg: IMessage): { role: "user" | "assistant"; blocks: AnthropicContentBlock[] } {
  switch (msg.role) {
    case "system":
    case "user":
      return { role: "user", blocks: [{ type: "text", text: msg.content }] };
    case "assistant": {
      const blocks: AnthropicContentBlock[] = [];
      if (msg.content.length > 0) {
        blocks.push({ type: "text", text: msg.content });
      }
      for (const call of msg.toolCalls) {
        blocks.push({ type: "tool_use", id: call.id, name: call.toolName, input: call.arguments });
      }
      return { role: "assistant", blocks };
    }
    case "tool":
      return {
        role: "user",
        blocks: [
          {
            type: "tool_result",
            tool_use_id: msg.toolCallId,
            content: formatToolResult(msg.result),
            ...(msg.result.success ? {} : { is_error: true }),
          },
        ],
      };
  }
}

export function convertConversation(conversation: readonly IMessage[]): {
  readonly system: string | undefined;
  readonly messages: IAnthropicMessage[];
} {
  const systemParts: string[] = [];
  let index = 0;
  for (; index < conversation.length; index++) {
    const msg = conversation[index];
    if (msg === undefined || msg.role !== "system") {
      break;
    }
    systemParts.push(msg.content);
  }

  const messages: IAnthropicMessage[] = [];
  for (const msg of conversation.slice(index)) {
    const { role, blocks } = toBlocks(msg);
    if (blocks.length === 0) {
      continue;
    }
    const previous = messages[messages.length - 1];
    if (previous !== undefined && previous.role === role) {
      previous.content.push(...blocks);
    } else {
      messages.push({ role, content: blocks });
    }
  }

  return { system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined, messages };
}

function mapStopReason(reason: string | null | undefined, hasToolCalls: boolean): StopReason {
  if (reason === "max_tokens") {
    return "length_limit";
  }
  return hasToolCalls ? "tool_calls_pending" : "natural_stop";
}

export function parseResponse(data: AnthropicResponse): IProviderTurn {
  const texts: string[] = [];
  const toolCalls: IToolCallRequest[] = [];

  for (const block of data.content) {
    if (block.type === "text" && block.text !== undefined) {
      texts.push(block.text);
    } else if (block.type === "tool_use" && block.id !== undefined && block.name !== undefined) {
      const decoded = toArgumentRecord(block.input);
      toolCalls.push({
        id: block.id,
        toolName: block.name,
        arguments: decoded.arguments,
        ...(decoded.error !== undefined ? { argumentError: decoded.error } : {}),
      });
    }
  }

  return {
    ...(texts.length > 0 ? { assistantText: texts.join("") } : {}),
    toolCalls,
    stopReason: mapStopReason(data.stop_reason, toolCalls.length > 0),
  };
}

// ── AnthropicAdapter Class ──────────────────────────────────────────────

export class AnthropicAdapter implements IProviderAdapter {
  readonly kind = PROVIDER_NAME;
  readonly model: string;

  private readonly config: IProviderConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(config: IProviderConfig, options?: IProviderOptions) {
    this.config = config;
    this.model = config.model;
    this.fetchImpl = options?.fetch ?? globalThis.fetch;
  }

  buildRequestBody(conversation: readonly IMessage[], tools: readonly IToolSpec[]): IAnthropicRequestBody {
    const { system, messages } = convertConversation(conversation);
    return {
      model: this.config.model,
      max_tokens: this.config.maxTokens,
      ...(system !== undefined ? { system } : {}),
      messages,
      ...(this.config.temperature !== undefined ? { temperature: this.config.temperature } : {}),
      ...(tools.length > 0 ? { tools: toProviderSchema(tools, "anthropic") } : {}),
    };
  }

  async send(
    conversation: readonly IMessage[],
    tools: readonly IToolSpec[],
    options?: ISendOptions,
  ): Promise<IProviderTurn> {
    const baseUrl = this.config.baseUrl ?? DEFAULT_BASE_URLS.anthropic;
    const data = await postJson({
      provider: PROVIDER_NAME,
      url: `${baseUrl.replace(/\/+$/, "")}/messages`,
      headers: {
        "x-api-key": this.config.apiKey,
        "anthropic-version": ANTHROPIC_API_VERSION,
      },
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
