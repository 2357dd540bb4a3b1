/**
 * run_demo.ts: End-to-end demonstration of claim-letter-mcp.
 *
 * Run with:  npm run demo
 *
 * This script:
 *  1. Loads the canonical instruction document
 *  2. Loads the sample letter request
 *  3. Runs drafting → formatting → compliance with the configured provider
 *  4. Prints the final letter and audit warnings, then saves it to OUTPUT_DIR
 */

import "dotenv/config";

import fs from "fs";
import path from "path";

import { config } from "../src/config";
import { loadCanonicalInstructions } from "../src/letter/instructions";
import { runLetterPipeline } from "../src/letter/pipeline";
import { saveLetter } from "../src/letter/download";
import { createTextGenerator, resolveSettings } from "../src/llm/generator";
import { toLetterRequest } from "../src/schemas/tool-schemas";

const EXAMPLES_DIR = path.join(__dirname);

async function main() {
  console.log("=".repeat(60));
  console.log("claim-letter-mcp DEMO");
  console.log("=".repeat(60));

  const instructions = await loadCanonicalInstructions(config.instructionsPath);
  console.log(`\n[1] Instructions loaded from: ${instructions.sourcePath}`);

  const raw: unknown = JSON.parse(
    fs.readFileSync(path.join(EXAMPLES_DIR, "sample_letter_request.json"), "utf-8")
  );
  const request = toLetterRequest(raw);
  console.log(`[2] Request: ${request.letterType} for ${request.insuredName} (${request.policyNumber} / ${request.claimNumber})`);

  const generator = createTextGenerator(config);
  const settings = resolveSettings(config, generator);
  console.log(`[3] Running pipeline with ${generator.provider} / ${settings.model}...`);

  const letter = await runLetterPipeline(request, { instructions, generator, settings });
  for (const stage of letter.stages) {
    console.log(`  ✓ ${stage.stage}: ${stage.characters} chars in ${stage.durationMs}ms`);
  }

  console.log("\n" + "─".repeat(60));
  console.log(letter.fullText);
  console.log("─".repeat(60));

  if (letter.warnings.length > 0) {
    console.log("\nAudit warnings:");
    for (const w of letter.warnings) console.log(`  ⚠ ${w}`);
  }

  const savedPath = await saveLetter(letter, config.outputDir);
  console.log(`\n[4] Saved: ${savedPath}`);
}

main().catch((err) => {
  console.error("Demo failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
