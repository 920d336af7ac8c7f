/**
 * Unified provider interface.
 * Each vendor adapter translates the conversation and tool specs into its
 * wire shape and the reply back into a ProviderTurn.
 */

import type { IMessage, IProviderTurn } from "../types/message.js";
import type { IProviderConfig, ProviderKind } from "../types/model.js";
import type { IToolSpec } from "../types/tool.js";

export interface ISendOptions {
  readonly signal?: AbortSignal | undefined;
}

export interface IProviderAdapter {
  readonly kind: ProviderKind;
  readonly model: string;

  /** Send the whole conversation and return the next assistant turn. */
  send(
    conversation: readonly IMessage[],
    tools: readonly IToolSpec[],
    options?: ISendOptions,
  ): Promise<IProviderTurn>;
}

/**
 * Options for constructing a provider adapter.
 */
export interface IProviderOptions {
  /** Injected in tests; defaults to the global fetch. */
  readonly fetch?: typeof fetch | undefined;
  /** Id source for function calls the vendor leaves unnamed. */
  readonly generateId?: (() => string) | undefined;
}

export type ProviderAdapterFactory = (
  config: IProviderConfig,
  options?: IProviderOptions,
) => IProviderAdapter;
