import type { Config } from "../config";
import { log } from "../config";
import type { GenerationSettings, ProviderName, TextGenerator } from "../types";
import { AnthropicTextGenerator } from "./anthropic";
import { GeminiTextGenerator } from "./gemini";
import { OpenAITextGenerator } from "./openai";

/** Stand-in used when no credential is configured; every call fails. */
export class UnconfiguredTextGenerator implements TextGenerator {
  readonly provider = "unconfigured" as const;

  constructor(private readonly reason: string) {}

  async generate(): Promise<string> {
    throw new Error(this.reason);
  }
}

const KEY_NAMES: Record<ProviderName, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GEMINI_API_KEY",
};

function apiKeyFor(cfg: Config, provider: ProviderName): string | null {
  switch (provider) {
    case "openai":
      return cfg.openaiApiKey;
    case "anthropic":
      return cfg.anthropicApiKey;
    case "gemini":
      return cfg.geminiApiKey;
  }
}

/** Explicit LLM_PROVIDER wins; otherwise the first provider with a key. */
export function resolveProvider(cfg: Config): ProviderName | null {
  if (cfg.provider !== "auto") {
    return apiKeyFor(cfg, cfg.provider) ? cfg.provider : null;
  }
  const order: ProviderName[] = ["openai", "anthropic", "gemini"];
  return order.find((p) => apiKeyFor(cfg, p) !== null) ?? null;
}

export function defaultModel(cfg: Config, provider: TextGenerator["provider"]): string {
  switch (provider) {
    case "anthropic":
      return cfg.anthropicModel;
    case "gemini":
      return cfg.geminiModel;
    default:
      return cfg.openaiModel;
  }
}

export function createTextGenerator(cfg: Config): TextGenerator {
  const provider = resolveProvider(cfg);
  const apiKey = provider ? apiKeyFor(cfg, provider) : null;

  if (!provider || !apiKey) {
    const wanted =
      cfg.provider === "auto"
        ? "OPENAI_API_KEY, ANTHROPIC_API_KEY or GEMINI_API_KEY"
        : KEY_NAMES[cfg.provider];
    const reason = `Missing ${wanted}. Set it in your environment or .env file.`;
    log("warn", reason);
    return new UnconfiguredTextGenerator(reason);
  }

  switch (provider) {
    case "openai":
      return new OpenAITextGenerator(apiKey, cfg.llmRequestTimeoutMs);
    case "anthropic":
      return new AnthropicTextGenerator(apiKey, cfg.llmRequestTimeoutMs);
    case "gemini":
      return new GeminiTextGenerator(apiKey, cfg.llmRequestTimeoutMs);
  }
}

export function resolveSettings(
  cfg: Config,
  generator: TextGenerator,
  overrides: { model?: string; temperature?: number } = {}
): GenerationSettings {
  return {
    model: overrides.model ?? defaultModel(cfg, generator.provider),
    temperature: overrides.temperature ?? cfg.temperature,
  };
}
