import type { LetterType } from "../types";

export interface LetterTypeDefinition {
  type: LetterType;
  label: string;
  /** Alternate names accepted from the form and matched against instruction headings. */
  aliases: string[];
  fileSlug: string;
  complianceChecklist: string[];
  /** Deterministic audit: at least one of these must appear in the final letter. */
  requiredPhrases: RegExp[];
}

export const LETTER_TYPES: Record<LetterType, LetterTypeDefinition> = {
  CoverageDecision: {
    type: "CoverageDecision",
    label: "Coverage Decision",
    aliases: ["CoverageDecision", "Coverage Decision Letter", "Coverage Determination"],
    fileSlug: "coverage_decision",
    complianceChecklist: [
      "States the coverage decision clearly and the policy provisions it rests on",
      "Explains the insured's right to request a review or dispute the decision",
      "Includes how to submit a dispute and where to send supporting documents",
    ],
    requiredPhrases: [/\breview\b/i, /\bdispute\b/i, /\breconsideration\b/i],
  },
  Denial: {
    type: "Denial",
    label: "Denial Letter",
    aliases: ["Denial", "Claim Denial", "Denial of Claim"],
    fileSlug: "denial_letter",
    complianceChecklist: [
      "States the specific reason for the denial and the policy language relied on",
      "Includes appeal/reconsideration rights and step-by-step appeal instructions",
      "Explains the right to contact the state insurance department",
    ],
    requiredPhrases: [/\bappeal/i, /\breconsideration\b/i],
  },
  RequestForInfo: {
    type: "RequestForInfo",
    label: "Request for Additional Information",
    aliases: ["RequestForInfo", "Request for Information", "Additional Information Request", "RFI"],
    fileSlug: "request_for_additional_information",
    complianceChecklist: [
      "Lists each item of information or documentation being requested",
      "States how the information can be submitted",
      "Explains what happens to the claim if no response is received by the deadline",
    ],
    requiredPhrases: [/\binformation\b/i, /\bdocument/i],
  },
};

export const LETTER_TYPE_VALUES = [
  "CoverageDecision",
  "Denial",
  "RequestForInfo",
] as const satisfies readonly LetterType[];

/** Headings that hold rules shared by every letter type. */
export const GENERAL_SECTION_NAMES = ["General Requirements", "General", "All Letters"];

/** Lower-case, alphanumerics only: "Denial Letter" → "denialletter". */
export const normalizeTypeName = (name: string): string =>
  name.toLowerCase().replace(/[^a-z0-9]/g, "");

export function parseLetterType(value: string): LetterType | null {
  const wanted = normalizeTypeName(value);
  if (!wanted) return null;

  for (const definition of Object.values(LETTER_TYPES)) {
    const names = [definition.type, definition.label, ...definition.aliases];
    if (names.some((name) => normalizeTypeName(name) === wanted)) {
      return definition.type;
    }
  }
  return null;
}
