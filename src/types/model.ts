/**
 * Provider identifiers and per-run provider configuration.
 */

// ── Provider Identifiers ─────────────────────────────────────────────────

export type ProviderKind = "openai" | "anthropic" | "google";

export const PROVIDER_KINDS: readonly [ProviderKind, ...ProviderKind[]] = [
  "openai",
  "anthropic",
  "google",
];

/** Alternative names accepted on the command line and in config files. */
export const PROVIDER_ALIASES: Readonly<Record<string, ProviderKind>> = {
  openai: "openai",
  gpt: "openai",
  anthropic: "anthropic",
  claude: "anthropic",
  google: "google",
  gemini: "google",
};

/** Environment variables consulted, in order, for each provider's API key. */
export const PROVIDER_API_KEY_ENV: Readonly<Record<ProviderKind, readonly string[]>> = {
  openai: ["OPENAI_API_KEY"],
  anthropic: ["ANTHROPIC_API_KEY"],
  google: ["GOOGLE_API_KEY", "GEMINI_API_KEY"],
};

export const DEFAULT_MODELS: Readonly<Record<ProviderKind, string>> = {
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-5",
  google: "gemini-2.5-flash",
};

export const DEFAULT_BASE_URLS: Readonly<Record<ProviderKind, string>> = {
  openai: "https://api.openai.com/v1",
  anthropic: "https://api.anthropic.com/v1",
  google: "https://generativelanguage.googleapis.com/v1beta",
};

// ── Provider Configuration ───────────────────────────────────────────────

export interface IProviderConfig {
  readonly kind: ProviderKind;
  readonly model: string;
  readonly apiKey: string;
  readonly baseUrl?: string | undefined;
  readonly maxTokens: number;
  readonly temperature?: number | undefined;
  /** Bounded wait for a single `send`. */
  readonly timeoutMs: number;
}

export function resolveProviderKind(name: string): ProviderKind | undefined {
  return PROVIDER_ALIASES[name.toLowerCase()];
}
