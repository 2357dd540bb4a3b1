import { z } from "zod";

import { LETTER_TYPE_VALUES, parseLetterType } from "../constants/letter-types";
import type { LetterRequest } from "../types";
import { InvalidLetterRequestError } from "../utils/errors";

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

/** Accepts the enum value or any label/alias ("Denial Letter", "RFI", ...). */
export const letterTypeSchema = z
  .string()
  .min(1)
  .transform((value, ctx) => {
    const parsed = parseLetterType(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unsupported letter type "${value}". Expected one of: ${LETTER_TYPE_VALUES.join(", ")}`,
      });
      return z.NEVER;
    }
    return parsed;
  })
  .describe("Letter type: CoverageDecision, Denial or RequestForInfo (labels accepted)");

export const letterRequestSchema = z.object({
  letter_type: letterTypeSchema,
  company_name: z.string().trim().min(1).describe("Insurance company issuing the letter"),
  insured_name: z.string().trim().min(1).describe("Full name of the insured"),
  policy_number: z.string().trim().min(1).describe("Policy number, e.g. P-4903497"),
  claim_number: z.string().trim().min(1).describe("Claim number, e.g. C-8627060"),
  contact_phone: optionalText.describe("Claims department phone number"),
  response_deadline_days: z
    .number()
    .int()
    .min(0)
    .max(90)
    .default(30)
    .describe("Days the recipient has to respond; 0 means immediately"),
  notes: optionalText.describe("Additional instructions or context for the letter"),
});

export type LetterRequestInput = z.input<typeof letterRequestSchema>;

export const generateLetterSchema = letterRequestSchema.extend({
  model: z.string().trim().min(1).optional().describe("Override the configured model"),
  temperature: z.number().min(0).max(1).optional().describe("Sampling temperature, 0–1"),
  save_to_file: z
    .boolean()
    .optional()
    .default(false)
    .describe("Also write the letter as a .txt file in OUTPUT_DIR"),
});

export const previewInstructionsSchema = z.object({
  letter_type: letterTypeSchema.optional(),
  max_chars: z.number().int().min(1).optional().default(6000),
});

/** Validate raw form input and freeze it into a LetterRequest. */
export function toLetterRequest(input: unknown): LetterRequest {
  const result = letterRequestSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidLetterRequestError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
    );
  }
  return fromParsedRequest(result.data);
}

export function fromParsedRequest(data: z.output<typeof letterRequestSchema>): LetterRequest {
  return Object.freeze({
    letterType: data.letter_type,
    companyName: data.company_name,
    insuredName: data.insured_name,
    policyNumber: data.policy_number,
    claimNumber: data.claim_number,
    contactPhone: data.contact_phone,
    responseDeadlineDays: data.response_deadline_days,
    notes: data.notes,
  });
}
