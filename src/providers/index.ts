/**
 * Provider layer — barrel export and adapter factory.
 */

import type { IProviderConfig } from "../types/model.js";
import { OpenAIAdapter } from "./openai-adapter.js";
import { AnthropicAdapter } from "./anthropic-adapter.js";
import { GeminiAdapter } from "./gemini-adapter.js";
import type { IProviderAdapter, IProviderOptions } from "./types.js";

export type {
  IProviderAdapter,
  IProviderOptions,
  ISendOptions,
  ProviderAdapterFactory,
} from "./types.js";
export { OpenAIAdapter } from "./openai-adapter.js";
export { AnthropicAdapter, ANTHROPIC_API_VERSION } from "./anthropic-adapter.js";
export { GeminiAdapter } from "./gemini-adapter.js";
export {
  postJson,
  parseRetryAfter,
  parseWireResponse,
  decodeToolArguments,
  toArgumentRecord,
} from "./http.js";
export type { IJsonPostRequest } from "./http.js";

/**
 * Pick the adapter implementation for a provider kind.
 */
export function createProviderAdapter(
  config: IProviderConfig,
  options?: IProviderOptions,
): IProviderAdapter {
  switch (config.kind) {
    case "openai":
      return new OpenAIAdapter(config, options);
    case "anthropic":
      return new AnthropicAdapter(config, options);
    case "google":
      return new GeminiAdapter(config, options);
  }
}
