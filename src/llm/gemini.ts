import { GoogleGenerativeAI } from "@google/generative-ai";

import type { TextGenerator } from "../types";

export class GeminiTextGenerator implements TextGenerator {
  readonly provider = "gemini" as const;
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string, private readonly timeoutMs: number) {
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(prompt: string, model: string, temperature: number): Promise<string> {
    const generativeModel = this.client.getGenerativeModel(
      { model, generationConfig: { temperature } },
      { timeout: this.timeoutMs }
    );
    const response = await generativeModel.generateContent(prompt);
    return response.response.text();
  }
}
