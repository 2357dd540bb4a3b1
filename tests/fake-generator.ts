import type { StageName, TextGenerator } from "../src/types";

export interface RecordedCall {
  prompt: string;
  model: string;
  temperature: number;
}

/** Which stage built a prompt, judged by the delimiters each template uses. */
export function stageOf(prompt: string): StageName {
  if (prompt.includes("---LETTER---")) return "compliance";
  if (prompt.includes("---DRAFT---")) return "formatting";
  return "drafting";
}

/** In-process stand-in for a provider; records every call. */
export class FakeTextGenerator implements TextGenerator {
  readonly provider = "openai" as const;
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: (stage: StageName, prompt: string) => string) {}

  async generate(prompt: string, model: string, temperature: number): Promise<string> {
    this.calls.push({ prompt, model, temperature });
    return this.respond(stageOf(prompt), prompt);
  }

  stages(): StageName[] {
    return this.calls.map((c) => stageOf(c.prompt));
  }
}

export const scripted = (responses: Record<StageName, string>) =>
  new FakeTextGenerator((stage) => responses[stage]);

export const failing = (message: string) =>
  new FakeTextGenerator(() => {
    throw new Error(message);
  });
