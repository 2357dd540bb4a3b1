import fs from "fs/promises";
import path from "path";

import { LETTER_TYPES } from "../constants/letter-types";
import type { LetterRequest, LetterResult } from "../types";
import { log } from "../config";

const safeSegment = (value: string) => value.trim().replace(/[^A-Za-z0-9._-]/g, "_");

/** e.g. denial_letter_P-1002_C-5531.txt */
export function letterFileName(request: LetterRequest): string {
  const slug = LETTER_TYPES[request.letterType].fileSlug;
  return `${slug}_${safeSegment(request.policyNumber)}_${safeSegment(request.claimNumber)}.txt`;
}

/** Write the final letter as UTF-8 plain text; returns the absolute path. */
export async function saveLetter(result: LetterResult, dir: string): Promise<string> {
  const target = path.resolve(dir, result.fileName);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, result.fullText.endsWith("\n") ? result.fullText : `${result.fullText}\n`, "utf-8");
  log("info", "Saved letter", { letterId: result.letterId, path: target });
  return target;
}
