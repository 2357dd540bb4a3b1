import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";

import type { StageName } from "../types";

export type LetterErrorCode =
  | "INSTRUCTION_NOT_FOUND"
  | "INSTRUCTIONS_UNAVAILABLE"
  | "GENERATION_FAILED"
  | "INVALID_REQUEST";

export class LetterError extends Error {
  constructor(
    readonly code: LetterErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The instruction document has no usable excerpt for the requested letter type. */
export class InstructionNotFoundError extends LetterError {
  constructor(readonly letterType: string) {
    super(
      "INSTRUCTION_NOT_FOUND",
      `No canonical instruction excerpt found for letter type "${letterType}".`
    );
  }
}

export class InstructionsUnavailableError extends LetterError {
  constructor(readonly sourcePath: string, cause?: unknown) {
    super(
      "INSTRUCTIONS_UNAVAILABLE",
      `Canonical instruction file not found or unreadable: ${sourcePath}`,
      { cause }
    );
  }
}

export class GenerationFailedError extends LetterError {
  constructor(readonly stage: StageName, reason: string, cause?: unknown) {
    super("GENERATION_FAILED", `Generation failed at ${stage} stage: ${reason}`, { cause });
  }
}

export class InvalidLetterRequestError extends LetterError {
  constructor(readonly issues: string[]) {
    super("INVALID_REQUEST", `Invalid letter request: ${issues.join("; ")}`);
  }
}

export const getErrorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

export function toMcpError(err: unknown): McpError {
  if (err instanceof McpError) return err;
  if (err instanceof InvalidLetterRequestError || err instanceof InstructionNotFoundError) {
    return new McpError(ErrorCode.InvalidParams, `[${err.code}] ${err.message}`);
  }
  if (err instanceof LetterError) {
    return new McpError(ErrorCode.InternalError, `[${err.code}] ${err.message}`);
  }
  return new McpError(ErrorCode.InternalError, getErrorMessage(err));
}
