// ─── Letter Types ────────────────────────────────────────────────────────────

export type LetterType = "CoverageDecision" | "Denial" | "RequestForInfo";

export type StageName = "drafting" | "formatting" | "compliance";

export type ProviderName = "openai" | "anthropic" | "gemini";

// ─── Letter Request ──────────────────────────────────────────────────────────

/** One submission of the claim form. Frozen once built; never mutated. */
export interface LetterRequest {
  readonly letterType: LetterType;
  readonly companyName: string;
  readonly insuredName: string;
  readonly policyNumber: string;
  readonly claimNumber: string;
  readonly contactPhone?: string;
  /** 0 is valid: the recipient must respond immediately. */
  readonly responseDeadlineDays: number;
  readonly notes?: string;
}

// ─── Canonical Instructions ──────────────────────────────────────────────────

export interface CanonicalInstructionSet {
  readonly sourcePath: string;
  readonly rawText: string;
  /** Rules shared by every letter type; prepended to each excerpt. */
  readonly general: string | null;
  readonly excerpts: ReadonlyMap<LetterType, string>;
}

// ─── Text Generation ─────────────────────────────────────────────────────────

/** Opaque text-generation capability. Retries and timeouts belong to the client. */
export interface TextGenerator {
  readonly provider: ProviderName | "unconfigured";
  generate(prompt: string, model: string, temperature: number): Promise<string>;
}

export interface GenerationSettings {
  model: string;
  temperature: number;
}

// ─── Pipeline Output ─────────────────────────────────────────────────────────

export interface StageRecord {
  stage: StageName;
  characters: number;
  durationMs: number;
}

export interface LetterResult {
  letterId: string;
  letterType: LetterType;
  letterTypeLabel: string;
  createdAt: string;
  provider: TextGenerator["provider"];
  model: string;
  temperature: number;
  stages: StageRecord[];
  fullText: string;
  fileName: string;
  mimeType: "text/plain";
  /** Items the deterministic audit could not find in the generated text. */
  warnings: string[];
}
