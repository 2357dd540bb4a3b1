import { createHash } from "crypto";

/** Deterministic SHA-256 hash truncated to 16 hex chars. */
export function shortHash(input: string): string {
  return createHash("sha256").update(input).digest("hex").slice(0, 16);
}

/** Letter ID, deterministic per type + policy + claim + createdAt. */
export function letterId(...parts: string[]): string {
  return `ltr_${shortHash(parts.join("|"))}`;
}
