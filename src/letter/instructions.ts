/**
 * Canonical instruction set: loading, parsing and per-type excerpt selection.
 *
 * The document is split on level-two headings ("## Denial Letter"). A heading
 * names either a letter type (by label or alias) or the general section whose
 * rules apply to every letter. Text before the first heading is ignored.
 */

import fs from "fs/promises";
import path from "path";

import {
  GENERAL_SECTION_NAMES,
  LETTER_TYPES,
  normalizeTypeName,
  parseLetterType,
} from "../constants/letter-types";
import type { CanonicalInstructionSet, LetterType } from "../types";
import { InstructionNotFoundError, InstructionsUnavailableError } from "../utils/errors";
import { log } from "../config";

const HEADING_RE = /^##\s+(.+?)\s*#*\s*$/;

const GENERAL_KEYS = new Set(GENERAL_SECTION_NAMES.map(normalizeTypeName));

interface Section {
  heading: string;
  body: string;
}

function splitSections(text: string): Section[] {
  const sections: Section[] = [];
  let current: { heading: string; lines: string[] } | null = null;

  for (const line of text.replace(/\r\n/g, "\n").split("\n")) {
    const match = HEADING_RE.exec(line);
    if (match) {
      if (current) sections.push({ heading: current.heading, body: current.lines.join("\n").trim() });
      current = { heading: match[1], lines: [] };
    } else if (current) {
      current.lines.push(line);
    }
  }
  if (current) sections.push({ heading: current.heading, body: current.lines.join("\n").trim() });

  return sections;
}

export function parseCanonicalInstructions(
  rawText: string,
  sourcePath = "<inline>"
): CanonicalInstructionSet {
  const excerpts = new Map<LetterType, string>();
  let general: string | null = null;

  for (const section of splitSections(rawText)) {
    if (!section.body) continue;

    if (GENERAL_KEYS.has(normalizeTypeName(section.heading))) {
      general = general ? `${general}\n\n${section.body}` : section.body;
      continue;
    }

    const letterType = parseLetterType(section.heading);
    if (!letterType) {
      log("debug", "Ignoring instruction section with unknown heading", { heading: section.heading });
      continue;
    }
    const existing = excerpts.get(letterType);
    excerpts.set(letterType, existing ? `${existing}\n\n${section.body}` : section.body);
  }

  return Object.freeze({ sourcePath, rawText, general, excerpts });
}

export async function loadCanonicalInstructions(filePath: string): Promise<CanonicalInstructionSet> {
  const resolved = path.resolve(filePath);
  let rawText: string;
  try {
    rawText = await fs.readFile(resolved, "utf-8");
  } catch (err) {
    throw new InstructionsUnavailableError(resolved, err);
  }

  const set = parseCanonicalInstructions(rawText, resolved);
  log("info", "Loaded canonical instructions", {
    sourcePath: resolved,
    letterTypes: [...set.excerpts.keys()],
    hasGeneralSection: set.general !== null,
  });
  return set;
}

/**
 * Excerpt for one letter type, general rules first.
 * Unsupported types and types with no excerpt are fatal for the request.
 */
export function selectInstructions(set: CanonicalInstructionSet, letterType: string): string {
  const parsed = parseLetterType(letterType);
  const excerpt = parsed ? set.excerpts.get(parsed) : undefined;
  if (!parsed || !excerpt) {
    throw new InstructionNotFoundError(letterType);
  }

  const heading = `${LETTER_TYPES[parsed].label.toUpperCase()} INSTRUCTIONS:`;
  return set.general
    ? `GENERAL INSTRUCTIONS:\n${set.general}\n\n${heading}\n${excerpt}`
    : `${heading}\n${excerpt}`;
}

export function previewInstructions(
  set: CanonicalInstructionSet,
  letterType?: string,
  maxChars = 6000
): string {
  const text = letterType ? selectInstructions(set, letterType) : set.rawText;
  return text.length > maxChars ? `${text.slice(0, maxChars)}\n...\n` : text;
}
