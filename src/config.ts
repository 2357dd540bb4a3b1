import path from "path";

import type { ProviderName } from "./types";

type Env = Record<string, string | undefined>;

function env(source: Env, key: string, fallback: string): string {
  const v = source[key]?.trim();
  return v ? v : fallback;
}

function envInt(source: Env, key: string, fallback: number): number {
  const v = source[key];
  if (!v) return fallback;
  const n = parseInt(v, 10);
  return isNaN(n) ? fallback : n;
}

function envFloat(source: Env, key: string, fallback: number): number {
  const v = source[key];
  if (!v) return fallback;
  const n = parseFloat(v);
  return isNaN(n) ? fallback : n;
}

function envSecret(source: Env, key: string): string | null {
  const v = source[key]?.trim();
  return v ? v : null;
}

export type ProviderSetting = ProviderName | "auto";

function envProvider(source: Env): ProviderSetting {
  const v = env(source, "LLM_PROVIDER", "auto").toLowerCase();
  if (v === "openai" || v === "anthropic" || v === "gemini") return v;
  return "auto";
}

export interface Config {
  logLevel: string;
  provider: ProviderSetting;
  openaiApiKey: string | null;
  openaiModel: string;
  anthropicApiKey: string | null;
  anthropicModel: string;
  geminiApiKey: string | null;
  geminiModel: string;
  temperature: number;
  llmRequestTimeoutMs: number;
  instructionsPath: string;
  outputDir: string;
}

export function loadConfig(source: Env = process.env): Config {
  return {
    logLevel: env(source, "LOG_LEVEL", "info"),
    provider: envProvider(source),
    openaiApiKey: envSecret(source, "OPENAI_API_KEY"),
    openaiModel: env(source, "OPENAI_MODEL", "gpt-4o-mini"),
    anthropicApiKey: envSecret(source, "ANTHROPIC_API_KEY"),
    anthropicModel: env(source, "ANTHROPIC_MODEL", "claude-sonnet-4-20250514"),
    geminiApiKey: envSecret(source, "GEMINI_API_KEY"),
    geminiModel: env(source, "GEMINI_MODEL", "gemini-2.0-flash"),
    temperature: Math.min(1, Math.max(0, envFloat(source, "LETTER_TEMPERATURE", 0.2))),
    llmRequestTimeoutMs: envInt(source, "LLM_REQUEST_TIMEOUT_MS", 60000),
    instructionsPath: path.resolve(
      env(source, "INSTRUCTIONS_PATH", "./canonical_insurance_letter_instructions.txt")
    ),
    outputDir: path.resolve(env(source, "OUTPUT_DIR", "./letters")),
  };
}

export const config = loadConfig();

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;

type LogLevel = keyof typeof LEVELS;

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

// stdout carries the MCP transport, so every line goes to stderr.
export function log(level: LogLevel, message: string, meta?: unknown): void {
  const configured = config.logLevel.toLowerCase();
  const threshold = isLogLevel(configured) ? LEVELS[configured] : LEVELS.info;
  if (LEVELS[level] < threshold) return;

  const detail = meta instanceof Error ? { name: meta.name, message: meta.message } : meta;
  const line =
    detail !== undefined
      ? `[claim-letter-mcp] [${level.toUpperCase()}] ${message} ${JSON.stringify(detail)}`
      : `[claim-letter-mcp] [${level.toUpperCase()}] ${message}`;
  process.stderr.write(line + "\n");
}
