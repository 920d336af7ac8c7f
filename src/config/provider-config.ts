/**
 * Provider configuration: API key resolution and validation.
 */

import { z } from "zod";
import { ConfigError } from "../types/errors.js";
import { PROVIDER_API_KEY_ENV, PROVIDER_KINDS } from "../types/model.js";
import type { IProviderConfig, ProviderKind } from "../types/model.js";
import type { IResolvedAgentConfig } from "../types/config.js";

const ProviderConfigSchema = z.object({
  kind: z.enum(PROVIDER_KINDS),
  model: z.string().min(1, "model must not be empty"),
  apiKey: z.string().min(1, "API key must not be empty"),
  baseUrl: z.string().url().optional(),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2).optional(),
  timeoutMs: z.number().int().positive(),
});

/**
 * @throws ConfigError naming the first offending field.
 */
export function validateProviderConfig(config: IProviderConfig): IProviderConfig {
  const result = ProviderConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue !== undefined && issue.path.length > 0 ? issue.path.join(".") : "provider";
    throw new ConfigError(key, issue?.message ?? "invalid provider configuration");
  }
  return config;
}

/**
 * First non-empty API key among the provider's environment variables.
 */
export function findApiKey(
  kind: ProviderKind,
  env: Readonly<Record<string, string | undefined>> = process.env,
): string | undefined {
  for (const name of PROVIDER_API_KEY_ENV[kind]) {
    const value = env[name]?.trim();
    if (value !== undefined && value.length > 0) {
      return value;
    }
  }
  return undefined;
}

/**
 * Build the provider configuration for an agent, taking the key from the environment.
 * @throws ConfigError when no key is set or a field is invalid.
 */
export function resolveProviderConfig(
  settings: IResolvedAgentConfig,
  env: Readonly<Record<string, string | undefined>> = process.env,
): IProviderConfig {
  const apiKey = findApiKey(settings.provider, env);
  if (apiKey === undefined) {
    throw new ConfigError(
      "apiKey",
      `set ${PROVIDER_API_KEY_ENV[settings.provider].join(" or ")} for provider ${settings.provider}`,
    );
  }

  return validateProviderConfig({
    kind: settings.provider,
    model: settings.model,
    apiKey,
    ...(settings.baseUrl !== undefined ? { baseUrl: settings.baseUrl } : {}),
    maxTokens: settings.maxTokens,
    ...(settings.temperature !== undefined ? { temperature: settings.temperature } : {}),
    timeoutMs: settings.providerTimeoutMs,
  });
}
