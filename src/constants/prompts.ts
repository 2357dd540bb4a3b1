import { LETTER_TYPES } from "./letter-types";
import type { LetterRequest } from "../types";

const phoneOrNA = (request: LetterRequest) => request.contactPhone ?? "N/A";

const deadlineText = (days: number) =>
  days === 0 ? "0 days (a response is required immediately)" : `${days} days`;

export const LETTER_PROMPTS = {
  drafting: (request: LetterRequest, instructions: string) =>
    [
      "You are a senior insurance correspondence specialist.",
      "You strictly follow the canonical instruction set and produce clear, complete letters.",
      "",
      "You MUST follow the canonical instruction set below.",
      "",
      "CANONICAL INSTRUCTIONS:",
      instructions,
      "",
      "INPUTS:",
      `- Letter Type: ${LETTER_TYPES[request.letterType].label}`,
      `- Company Name: ${request.companyName}`,
      `- Insured Name: ${request.insuredName}`,
      `- Policy Number: ${request.policyNumber}`,
      `- Claim Number: ${request.claimNumber}`,
      `- Claims Dept Phone: ${phoneOrNA(request)}`,
      `- Response Deadline (days): ${request.responseDeadlineDays}`,
      `- Additional Notes: ${request.notes ?? "None"}`,
      "",
      "TASK:",
      "Generate a complete insurance letter with required sections, placeholders resolved,",
      "and type-specific content. Include the policy number and claim number verbatim.",
      "Include compliance/regulatory notice per the canonical instructions.",
      "Return the letter text only.",
    ].join("\n"),

  formatting: (draft: string) =>
    [
      "You are an expert in professional insurance document formatting.",
      "You preserve content but improve structure and readability.",
      "",
      "Take the draft below and format it professionally.",
      "Requirements:",
      "- Clear header block (company/address/date if required)",
      "- Subject line",
      "- Salutation, section headings and a closing with signature block",
      "- Consistent spacing",
      "- Keep all content; do not add new facts and do not remove any sentence.",
      "- Keep every identifier (policy number, claim number) exactly as written.",
      "- Do not remove compliance or regulatory language.",
      "Return the formatted letter only.",
      "",
      "---DRAFT---",
      draft,
      "---END DRAFT---",
    ].join("\n"),

  compliance: (formatted: string, request: LetterRequest) => {
    const definition = LETTER_TYPES[request.letterType];
    return [
      "You are an insurance compliance officer.",
      "You check for regulatory notice, appeal rights, timelines, and that identifiers are present.",
      "",
      "Review the formatted letter below for compliance.",
      "Checklist:",
      `- Company name (${request.companyName}), policy number (${request.policyNumber}) and claim number (${request.claimNumber}) present`,
      `- Correct letter type cues present for a ${definition.label}`,
      "- Compliance/regulatory notice present",
      ...definition.complianceChecklist.map((item) => `- ${item}`),
      `- Mentions the response deadline of ${deadlineText(request.responseDeadlineDays)} and contact phone ${phoneOrNA(request)}`,
      "",
      "If anything is missing or weak, add or strengthen it while staying professional.",
      "Keep the header block, salutation, section headings and closing exactly as structured.",
      "Return ONLY the final compliant letter.",
      "",
      "---LETTER---",
      formatted,
      "---END LETTER---",
    ].join("\n");
  },
} as const;
