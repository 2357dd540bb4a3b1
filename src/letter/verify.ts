/**
 * Deterministic audit of generated letters.
 *
 * The formatting and compliance stages are generative rewrites, so nothing
 * guarantees they keep what earlier stages put in. These checks look for the
 * mandatory content after each stage and report what is missing as warnings;
 * they never block the letter.
 */

import { LETTER_TYPES } from "../constants/letter-types";
import type { LetterRequest } from "../types";

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const ONES = [
  "zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine",
  "ten", "eleven", "twelve", "thirteen", "fourteen", "fifteen", "sixteen",
  "seventeen", "eighteen", "nineteen",
];
const TENS = ["", "", "twenty", "thirty", "forty", "fifty", "sixty", "seventy", "eighty", "ninety"];

/** 0-99 in words, e.g. 45 -> "forty-five". */
function spellDays(days: number): string {
  if (days < 20) return ONES[days];
  const tens = TENS[Math.floor(days / 10)];
  return days % 10 === 0 ? tens : `${tens}-${ONES[days % 10]}`;
}

/** Case-insensitive, whitespace-tolerant match that does not run into a longer identifier. */
function mentions(text: string, value: string): boolean {
  const pattern = escapeRegExp(value.trim()).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![A-Za-z0-9])${pattern}(?![A-Za-z0-9])`, "i").test(text);
}

/** Phone numbers are compared on digits only; a leading country code 1 is optional. */
function mentionsPhone(text: string, phone: string): boolean {
  const digits = phone.replace(/\D/g, "");
  if (!digits) return mentions(text, phone);
  const textDigits = text.replace(/\D/g, "");
  const local = digits.length === 11 && digits.startsWith("1") ? digits.slice(1) : digits;
  return textDigits.includes(digits) || textDigits.includes(local);
}

/** "30 days", "30-day", "thirty (30) days", "thirty calendar days". */
function mentionsDeadline(text: string, days: number): boolean {
  if (days === 0) {
    return /\b(?:0|zero)\s+days?\b|\bimmediate(ly)?\b|\bwithout delay\b/i.test(text);
  }
  const words = spellDays(days).replace("-", "[\\s-]");
  const unit = "\\s*(?:-\\s*)?(?:calendar\\s+|business\\s+)?days?\\b";
  return new RegExp(`\\b(?:${words}\\s*\\(\\s*${days}\\s*\\)|${words}|${days})${unit}`, "i").test(text);
}

/** The identifiers every stage after drafting must carry forward. */
export function checkIdentifiers(stage: string, text: string, request: LetterRequest): string[] {
  const warnings: string[] = [];
  if (!mentions(text, request.policyNumber)) {
    warnings.push(`${stage}: policy number ${request.policyNumber} is missing`);
  }
  if (!mentions(text, request.claimNumber)) {
    warnings.push(`${stage}: claim number ${request.claimNumber} is missing`);
  }
  return warnings;
}

export function auditFinalLetter(text: string, request: LetterRequest): string[] {
  const definition = LETTER_TYPES[request.letterType];
  const warnings = checkIdentifiers("compliance", text, request);

  if (!mentions(text, request.companyName)) {
    warnings.push(`compliance: company name "${request.companyName}" is missing`);
  }
  if (!mentionsDeadline(text, request.responseDeadlineDays)) {
    warnings.push(
      `compliance: response deadline of ${request.responseDeadlineDays} days is not stated`
    );
  }
  if (request.contactPhone && !mentionsPhone(text, request.contactPhone)) {
    warnings.push(`compliance: contact phone ${request.contactPhone} is missing`);
  }
  if (!definition.requiredPhrases.some((re) => re.test(text))) {
    warnings.push(`compliance: no ${definition.label.toLowerCase()} notice language found`);
  }
  return warnings;
}
