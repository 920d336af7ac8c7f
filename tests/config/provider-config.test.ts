import { findApiKey, resolveProviderConfig, validateProviderConfig } from "../../src/config/provider-config.js";
import { ConfigError } from "../../src/types/errors.js";
import { DEFAULT_CONFIG } from "../../src/types/config.js";
import type { IResolvedAgentConfig } from "../../src/types/config.js";
import type { IProviderConfig } from "../../src/types/model.js";

const settings: IResolvedAgentConfig = {
  name: "default",
  provider: "anthropic",
  model: "claude-sonnet-4-5",
  rules: [],
  maxTokens: 4096,
  permissions: { mode: "ask", allowed: [] },
  maxTurns: DEFAULT_CONFIG.maxTurns,
  maxRetries: DEFAULT_CONFIG.maxRetries,
  providerTimeoutMs: 60_000,
  toolTimeoutMs: DEFAULT_CONFIG.toolTimeoutMs,
  maxToolOutputChars: DEFAULT_CONFIG.maxToolOutputChars,
  blockedCommands: [],
  origin: "defaults",
};

describe("findApiKey", () => {
  it("takes the first non-empty variable", () => {
    expect(findApiKey("google", { GOOGLE_API_KEY: "  ", GEMINI_API_KEY: "test-secret" })).toBe("test-secret");
    expect(findApiKey("openai", {})).toBeUndefined();
  });
});

describe("resolveProviderConfig", () => {
  it("builds the provider configuration from settings and environment", () => {
    expect(resolveProviderConfig(settings, { ANTHROPIC_API_KEY: "test-secret" })).toEqual({
      kind: "anthropic",
      model: "claude-sonnet-4-5",
      apiKey: "test-secret",
      maxTokens: 4096,
      timeoutMs: 60_000,
    });
  });

  it("carries base URL and temperature when set", () => {
    const config = resolveProviderConfig(
      { ...settings, provider: "openai", model: "local-model", baseUrl: "http://localhost:8000/v1", temperature: 0 },
      { OPENAI_API_KEY: "test-secret" },
    );
    expect(config.baseUrl).toBe("http://localhost:8000/v1");
    expect(config.temperature).toBe(0);
  });

  it("names the variable to set when no key is found", () => {
    expect(() => resolveProviderConfig(settings, {})).toThrow(
      new ConfigError("apiKey", "set ANTHROPIC_API_KEY for provider anthropic"),
    );
  });
});

describe("validateProviderConfig", () => {
  const valid: IProviderConfig = {
    kind: "openai",
    model: "gpt-4o",
    apiKey: "test-secret",
    maxTokens: 100,
    timeoutMs: 1000,
  };

  it("returns a valid configuration unchanged", () => {
    expect(validateProviderConfig(valid)).toBe(valid);
  });

  it.each([
    [{ ...valid, model: "" }, "model", "model must not be empty"],
    [{ ...valid, apiKey: "" }, "apiKey", "API key must not be empty"],
    [{ ...valid, temperature: 3 }, "temperature", "Number must be less than or equal to 2"],
  ])("rejects %j", (config, key, reason) => {
    expect(() => validateProviderConfig(config)).toThrow(new ConfigError(key, reason));
  });
});
