/**
 * The three letter stages. Each is one prompt plus one call to the
 * text-generation capability; none keeps state between calls.
 */

import { LETTER_PROMPTS } from "../constants/prompts";
import type { GenerationSettings, LetterRequest, StageName, TextGenerator } from "../types";
import { GenerationFailedError, getErrorMessage } from "../utils/errors";

export interface StageContext {
  generator: TextGenerator;
  settings: GenerationSettings;
}

async function invoke(stage: StageName, prompt: string, ctx: StageContext): Promise<string> {
  let output: string;
  try {
    output = await ctx.generator.generate(prompt, ctx.settings.model, ctx.settings.temperature);
  } catch (err) {
    throw new GenerationFailedError(stage, getErrorMessage(err), err);
  }

  const text = output.trim();
  if (!text) {
    throw new GenerationFailedError(stage, "text generation returned an empty response");
  }
  return text;
}

function requireInput(stage: StageName, label: string, value: string): void {
  if (!value.trim()) {
    throw new GenerationFailedError(stage, `${label} is empty`);
  }
}

export async function draftLetter(
  request: LetterRequest,
  instructions: string,
  ctx: StageContext
): Promise<string> {
  requireInput("drafting", "instruction excerpt", instructions);
  return invoke("drafting", LETTER_PROMPTS.drafting(request, instructions), ctx);
}

export async function formatLetter(draft: string, ctx: StageContext): Promise<string> {
  requireInput("formatting", "draft text", draft);
  return invoke("formatting", LETTER_PROMPTS.formatting(draft), ctx);
}

export async function applyCompliance(
  formatted: string,
  request: LetterRequest,
  ctx: StageContext
): Promise<string> {
  requireInput("compliance", "formatted text", formatted);
  return invoke("compliance", LETTER_PROMPTS.compliance(formatted, request), ctx);
}
