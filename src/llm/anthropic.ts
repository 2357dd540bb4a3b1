import Anthropic from "@anthropic-ai/sdk";

import type { TextGenerator } from "../types";

export class AnthropicTextGenerator implements TextGenerator {
  readonly provider = "anthropic" as const;
  private readonly client: Anthropic;

  constructor(apiKey: string, timeoutMs: number) {
    this.client = new Anthropic({ apiKey, timeout: timeoutMs });
  }

  async generate(prompt: string, model: string, temperature: number): Promise<string> {
    const response = await this.client.messages.create({
      model,
      max_tokens: 4096,
      temperature,
      messages: [{ role: "user", content: prompt }],
    });

    const textContent = response.content.find((c) => c.type === "text");
    if (textContent && textContent.type === "text") {
      return textContent.text;
    }
    return "";
  }
}
