/**
 * Text-generation provider tests. The SDK clients are mocked; nothing
 * leaves the process.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import path from "path";

const mocks = vi.hoisted(() => ({
  openaiCtor: vi.fn(),
  openaiCreate: vi.fn(),
  anthropicCtor: vi.fn(),
  anthropicCreate: vi.fn(),
  geminiCtor: vi.fn(),
  geminiGetModel: vi.fn(),
  geminiGenerate: vi.fn(),
}));

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: mocks.openaiCreate } };
    constructor(opts: unknown) {
      mocks.openaiCtor(opts);
    }
  },
}));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: mocks.anthropicCreate };
    constructor(opts: unknown) {
      mocks.anthropicCtor(opts);
    }
  },
}));

vi.mock("@google/generative-ai", () => ({
  GoogleGenerativeAI: class {
    getGenerativeModel = mocks.geminiGetModel;
    constructor(apiKey: string) {
      mocks.geminiCtor(apiKey);
    }
  },
}));

import { loadConfig } from "../src/config";
import {
  createTextGenerator,
  resolveProvider,
  resolveSettings,
  UnconfiguredTextGenerator,
} from "../src/llm/generator";
import { OpenAITextGenerator } from "../src/llm/openai";
import { AnthropicTextGenerator } from "../src/llm/anthropic";
import { GeminiTextGenerator } from "../src/llm/gemini";

beforeEach(() => {
  vi.clearAllMocks();
  mocks.geminiGetModel.mockReturnValue({ generateContent: mocks.geminiGenerate });
});

// ─── Providers ───────────────────────────────────────────────────────────────

describe("OpenAITextGenerator", () => {
  it("sends one user message with model and temperature", async () => {
    mocks.openaiCreate.mockResolvedValue({ choices: [{ message: { content: "OpenAI letter" } }] });
    const generator = new OpenAITextGenerator("test-key", 5000);

    await expect(generator.generate("prompt", "gpt-4o-mini", 0.2)).resolves.toBe("OpenAI letter");
    expect(mocks.openaiCtor).toHaveBeenCalledWith({ apiKey: "test-key", timeout: 5000 });
    expect(mocks.openaiCreate).toHaveBeenCalledWith({
      model: "gpt-4o-mini",
      temperature: 0.2,
      messages: [{ role: "user", content: "prompt" }],
    });
  });

  it("returns empty text when the completion has no content", async () => {
    mocks.openaiCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const generator = new OpenAITextGenerator("test-key", 5000);
    await expect(generator.generate("prompt", "gpt-4o-mini", 0)).resolves.toBe("");
  });

  it("propagates client errors", async () => {
    mocks.openaiCreate.mockRejectedValue(new Error("401 Unauthorized"));
    const generator = new OpenAITextGenerator("test-key", 5000);
    await expect(generator.generate("prompt", "gpt-4o-mini", 0)).rejects.toThrow("401 Unauthorized");
  });
});

describe("AnthropicTextGenerator", () => {
  it("returns the first text block", async () => {
    mocks.anthropicCreate.mockResolvedValue({
      content: [
        { type: "tool_use", id: "tool_1", name: "noop", input: {} },
        { type: "text", text: "Claude letter" },
      ],
    });
    const generator = new AnthropicTextGenerator("test-key", 5000);

    await expect(generator.generate("prompt", "claude-sonnet-4-20250514", 0.3)).resolves.toBe(
      "Claude letter"
    );
    expect(mocks.anthropicCreate).toHaveBeenCalledWith({
      model: "claude-sonnet-4-20250514",
      max_tokens: 4096,
      temperature: 0.3,
      messages: [{ role: "user", content: "prompt" }],
    });
  });

  it("returns empty text when there is no text block", async () => {
    mocks.anthropicCreate.mockResolvedValue({ content: [] });
    const generator = new AnthropicTextGenerator("test-key", 5000);
    await expect(generator.generate("prompt", "claude-sonnet-4-20250514", 0)).resolves.toBe("");
  });
});

describe("GeminiTextGenerator", () => {
  it("configures temperature and timeout on the model", async () => {
    mocks.geminiGenerate.mockResolvedValue({ response: { text: () => "Gemini letter" } });
    const generator = new GeminiTextGenerator("test-key", 5000);

    await expect(generator.generate("prompt", "gemini-2.0-flash", 0.3)).resolves.toBe("Gemini letter");
    expect(mocks.geminiCtor).toHaveBeenCalledWith("test-key");
    expect(mocks.geminiGetModel).toHaveBeenCalledWith(
      { model: "gemini-2.0-flash", generationConfig: { temperature: 0.3 } },
      { timeout: 5000 }
    );
    expect(mocks.geminiGenerate).toHaveBeenCalledWith("prompt");
  });
});

// ─── Provider selection ──────────────────────────────────────────────────────

describe("createTextGenerator", () => {
  it("returns an unconfigured generator that always fails when no key is set", async () => {
    const generator = createTextGenerator(loadConfig({}));
    expect(generator).toBeInstanceOf(UnconfiguredTextGenerator);
    await expect(generator.generate("prompt", "gpt-4o-mini", 0)).rejects.toThrow(
      "Missing OPENAI_API_KEY, ANTHROPIC_API_KEY or GEMINI_API_KEY. Set it in your environment or .env file."
    );
  });

  it("prefers OpenAI, then Anthropic, then Gemini in auto mode", () => {
    expect(resolveProvider(loadConfig({ OPENAI_API_KEY: "test-key", ANTHROPIC_API_KEY: "test-key" }))).toBe("openai");
    expect(resolveProvider(loadConfig({ ANTHROPIC_API_KEY: "test-key", GEMINI_API_KEY: "test-key" }))).toBe("anthropic");
    expect(resolveProvider(loadConfig({ GEMINI_API_KEY: "test-key" }))).toBe("gemini");
  });

  it("honours an explicit provider", () => {
    const cfg = loadConfig({ LLM_PROVIDER: "gemini", OPENAI_API_KEY: "test-key", GEMINI_API_KEY: "test-key" });
    expect(createTextGenerator(cfg)).toBeInstanceOf(GeminiTextGenerator);
  });

  it("does not fall back when the explicit provider has no key", async () => {
    const cfg = loadConfig({ LLM_PROVIDER: "anthropic", OPENAI_API_KEY: "test-key" });
    const generator = createTextGenerator(cfg);
    expect(generator.provider).toBe("unconfigured");
    await expect(generator.generate("prompt", "x", 0)).rejects.toThrow("Missing ANTHROPIC_API_KEY.");
  });

  it("passes the key and timeout to the client", () => {
    createTextGenerator(loadConfig({ OPENAI_API_KEY: "test-key", LLM_REQUEST_TIMEOUT_MS: "1500" }));
    expect(mocks.openaiCtor).toHaveBeenCalledWith({ apiKey: "test-key", timeout: 1500 });
  });
});

describe("resolveSettings", () => {
  it("uses the provider's configured model and the configured temperature", () => {
    const cfg = loadConfig({ ANTHROPIC_API_KEY: "test-key", LETTER_TEMPERATURE: "0.4" });
    const generator = createTextGenerator(cfg);
    expect(resolveSettings(cfg, generator)).toEqual({
      model: "claude-sonnet-4-20250514",
      temperature: 0.4,
    });
  });

  it("applies per-request overrides", () => {
    const cfg = loadConfig({ OPENAI_API_KEY: "test-key" });
    const generator = createTextGenerator(cfg);
    expect(resolveSettings(cfg, generator, { model: "gpt-4o", temperature: 0 })).toEqual({
      model: "gpt-4o",
      temperature: 0,
    });
  });
});

// ─── Configuration ───────────────────────────────────────────────────────────

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});
    expect(cfg).toMatchObject({
      logLevel: "info",
      provider: "auto",
      openaiApiKey: null,
      openaiModel: "gpt-4o-mini",
      geminiModel: "gemini-2.0-flash",
      temperature: 0.2,
      llmRequestTimeoutMs: 60000,
      instructionsPath: path.resolve("./canonical_insurance_letter_instructions.txt"),
      outputDir: path.resolve("./letters"),
    });
  });

  it("clamps temperature and ignores unparseable numbers", () => {
    expect(loadConfig({ LETTER_TEMPERATURE: "1.5" }).temperature).toBe(1);
    expect(loadConfig({ LETTER_TEMPERATURE: "abc" }).temperature).toBe(0.2);
    expect(loadConfig({ LLM_REQUEST_TIMEOUT_MS: "soon" }).llmRequestTimeoutMs).toBe(60000);
  });

  it("treats blank keys as missing and unknown providers as auto", () => {
    const cfg = loadConfig({ OPENAI_API_KEY: "   ", LLM_PROVIDER: "Bogus" });
    expect(cfg.openaiApiKey).toBeNull();
    expect(cfg.provider).toBe("auto");
  });
});
