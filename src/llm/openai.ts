import OpenAI from "openai";

import type { TextGenerator } from "../types";

export class OpenAITextGenerator implements TextGenerator {
  readonly provider = "openai" as const;
  private readonly client: OpenAI;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new OpenAI({ apiKey, timeout: timeoutMs });
  }

  async generate(prompt: string, model: string, temperature: number): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model,
      temperature,
      messages: [{ role: "user", content: prompt }],
    });
    return completion.choices[0]?.message?.content ?? "";
  }
}
