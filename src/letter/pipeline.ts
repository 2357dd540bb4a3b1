/**
 * Letter pipeline: instruction selection → drafting → formatting → compliance.
 *
 * Stages run strictly in order and each consumes the previous stage's full
 * output. Any failure aborts the run; later stages are never invoked and no
 * partial letter is returned.
 */

import { LETTER_TYPES } from "../constants/letter-types";
import type {
  CanonicalInstructionSet,
  GenerationSettings,
  LetterRequest,
  LetterResult,
  StageName,
  StageRecord,
  TextGenerator,
} from "../types";
import { letterId } from "../utils/hash";
import { log } from "../config";
import { selectInstructions } from "./instructions";
import { applyCompliance, draftLetter, formatLetter, type StageContext } from "./stages";
import { auditFinalLetter, checkIdentifiers } from "./verify";
import { letterFileName } from "./download";

export interface PipelineDeps {
  instructions: CanonicalInstructionSet;
  generator: TextGenerator;
  settings: GenerationSettings;
  /** Injectable clock for deterministic ids in tests. */
  now?: () => Date;
}

async function timed(
  stage: StageName,
  records: StageRecord[],
  run: () => Promise<string>
): Promise<string> {
  const started = Date.now();
  log("debug", `Stage ${stage} started`);
  const text = await run();
  const record = { stage, characters: text.length, durationMs: Date.now() - started };
  records.push(record);
  log("info", `Stage ${stage} finished`, record);
  return text;
}

export async function runLetterPipeline(
  request: LetterRequest,
  deps: PipelineDeps
): Promise<LetterResult> {
  const createdAt = (deps.now ?? (() => new Date()))().toISOString();
  const definition = LETTER_TYPES[request.letterType];
  const ctx: StageContext = { generator: deps.generator, settings: deps.settings };
  const stages: StageRecord[] = [];

  log("info", "Generating letter", {
    letterType: request.letterType,
    provider: deps.generator.provider,
    model: deps.settings.model,
  });

  const excerpt = selectInstructions(deps.instructions, request.letterType);

  const draft = await timed("drafting", stages, () => draftLetter(request, excerpt, ctx));
  const formatted = await timed("formatting", stages, () => formatLetter(draft, ctx));
  const warnings = checkIdentifiers("formatting", formatted, request);
  const finalText = await timed("compliance", stages, () =>
    applyCompliance(formatted, request, ctx)
  );
  warnings.push(...auditFinalLetter(finalText, request));

  if (warnings.length > 0) {
    log("warn", "Letter audit found missing content", { warnings });
  }

  return {
    letterId: letterId(request.letterType, request.policyNumber, request.claimNumber, createdAt),
    letterType: request.letterType,
    letterTypeLabel: definition.label,
    createdAt,
    provider: deps.generator.provider,
    model: deps.settings.model,
    temperature: deps.settings.temperature,
    stages,
    fullText: finalText,
    fileName: letterFileName(request),
    mimeType: "text/plain",
    warnings,
  };
}
