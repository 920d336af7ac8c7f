/**
 * Gemini (Google) adapter — generateContent over fetch.
 *
 * Function calls carry no id on this API, so one is generated per call; the
 * matching function response is addressed by tool name, in order.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { DEFAULT_BASE_URLS } from "../types/model.js";
import type { IProviderConfig } from "../types/model.js";
import type {
  IMessage,
  IProviderTurn,
  IToolCallRequest,
  IToolResult,
  JsonValue,
  StopReason,
} from "../types/message.js";
import type { IToolSpec } from "../types/tool.js";
import { toProviderSchema } from "../tools/schema.js";
import type { IGoogleFunctionDeclaration } from "../tools/schema.js";
import { parseWireResponse, postJson, toArgumentRecord } from "./http.js";
import type { IProviderAdapter, IProviderOptions, ISendOptions } from "./types.js";

const PROVIDER_NAME = "google" as const;

// ── Wire Types ──────────────────────────────────────────────────────────

export type GeminiPart =
  | { readonly text: string }
  | {
      readonly functionCall: {
        readonly name: string;
        readonly args: Readonly<Record<string, unknown>>;
      };
    }
  | {
      readonly functionResponse: {
        readonly name: string;
        readonly response: Readonly<Record<string, JsonValue>>;
      };
    };

export interface IGeminiContent {
  readonly role: "user" | "model";
  readonly parts: GeminiPart[];
}

export interface IGeminiRequestBody {
  readonly contents: readonly IGeminiContent[];
  readonly systemInstruction?: { readonly parts: readonly { readonly text: string }[] };
  readonly tools?: readonly { readonly functionDeclarations: readonly IGoogleFunctionDeclaration[] }[];
  readonly generationConfig: {
    readonly maxOutputTokens: number;
    readonly temperature?: number;
  };
}

const responseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  functionCall: z
                    .object({
                      id: z.string().optional(),
                      name: z.string(),
                      args: z.unknown().optional(),
                    })
                    .optional(),
                }),
              )
              .default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .min(1, "no candidates in response"),
});

type GeminiResponse = z.infer<typeof responseSchema>;

// ── Translation ─────────────────────────────────────────────────────────

function toFunctionResponse(result: IToolResult): Record<string, JsonValue> {
  if (result.success) {
    return { output: result.output };
  }
  const error = result.error ?? "Tool failed";
  return typeof result.output === "string" && result.output.length === 0
    ? { error }
    : { error, output: result.output };
}

function toContent(msg: IMessage): IGeminiContent {
  switch (msg.role) {
    case "system":
    case "user":
      return { role: "user", parts: [{ text: msg.content }] };
    case "assistant": {
      const parts: GeminiPart[] = [];
      if (msg.content.length > 0) {
        parts.push({ text: msg.content });
      }
      for (const call of msg.toolCalls) {
        parts.push({ functionCall: { name: call.toolName, args: call.arguments } });
      }
      return { role: "model", parts };
    }
    case "tool":
      return {
        role: "user",
        parts: [
          { functionResponse: { name: msg.toolName, response: toFunctionResponse(msg.result) } },
        ],
      };
  }
}

export function convertConversation(conversation: readonly IMessage[]): {
  readonly systemInstruction: string | undefined;
  readonly contents: IGeminiContent[];
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

  const contents: IGeminiContent[] = [];
  for (const msg of conversation.slice(index)) {
    const content = toContent(msg);
    if (content.parts.length === 0) {
      continue;
    }
    const previous = contents[contents.length - 1];
    if (previous !== undefined && previous.role === content.role) {
      previous.parts.push(...content.parts);
    } else {
      contents.push(content);
    }
  }

  return {
    systemInstruction: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    contents,
  };
}

function mapFinishReason(reason: string | undefined, hasToolCalls: boolean): StopReason {
  if (reason === "MAX_TOKENS") {
    return "length_limit";
  }
  return hasToolCalls ? "tool_calls_pending" : "natural_stop";
}

export function parseResponse(data: GeminiResponse, generateId: () => string): IProviderTurn {
  const candidate = data.candidates[0];
  const texts: string[] = [];
  const toolCalls: IToolCallRequest[] = [];

  for (const part of candidate?.content?.parts ?? []) {
    if (part.functionCall !== undefined) {
      const decoded = toArgumentRecord(part.functionCall.args);
      toolCalls.push({
        id: part.functionCall.id ?? generateId(),
        toolName: part.functionCall.name,
        arguments: decoded.arguments,
        ...(decoded.error !== undefined ? { argumentError: decoded.error } : {}),
      });
    } else if (part.text !== undefined) {
      texts.push(part.text);
    }
  }

  return {
    ...(texts.length > 0 ? { assistantText: texts.join("") } : {}),
    toolCalls,
    stopReason: mapFinishReason(candidate?.finishReason, toolCalls.length > 0),
  };
}

// ── GeminiAdapter Class ─────────────────────────────────────────────────

export class GeminiAdapter implements IProviderAdapter {
  readonly kind = PROVIDER_NAME;
  readonly model: string;

  private readonly config: IProviderConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly generateId: () => string;

  constructor(config: IProviderConfig, options?: IProviderOptions) {
    this.config = config;
    this.model = config.model;
    this.fetchImpl = options?.fetch ?? globalThis.fetch;
    this.generateId = options?.generateId ?? (() => `call_${randomUUID()}`);
  }

  buildRequestBody(conversation: readonly IMessage[], tools: readonly IToolSpec[]): IGeminiRequestBody {
    const { systemInstruction, contents } = convertConversation(conversation);
    return {
      contents,
      ...(systemInstruction !== undefined
        ? { systemInstruction: { parts: [{ text: systemInstruction }] } }
        : {}),
      ...(tools.length > 0
        ? { tools: [{ functionDeclarations: toProviderSchema(tools, "google") }] }
        : {}),
      generationConfig: {
        maxOutputTokens: this.config.maxTokens,
        ...(this.config.temperature !== undefined ? { temperature: this.config.temperature } : {}),
      },
    };
  }

  async send(
    conversation: readonly IMessage[],
    tools: readonly IToolSpec[],
    options?: ISendOptions,
  ): Promise<IProviderTurn> {
    const baseUrl = this.config.baseUrl ?? DEFAULT_BASE_URLS.google;
    const model = encodeURIComponent(this.config.model);
    const data = await postJson({
      provider: PROVIDER_NAME,
      url: `${baseUrl.replace(/\/+$/, "")}/models/${model}:generateContent`,
      headers: { "x-goog-api-key": this.config.apiKey },
      body: this.buildRequestBody(conversation, tools),
      timeoutMs: this.config.timeoutMs,
      fetch: this.fetchImpl,
      signal: options?.signal,
    });

    const turn = parseResponse(parseWireResponse(PROVIDER_NAME, responseSchema, data), this.generateId);
    logger.debug(
      { provider: PROVIDER_NAME, model: this.model, stopReason: turn.stopReason, toolCalls: turn.toolCalls.length },
      "Model turn received",
    );
    return turn;
  }
}
