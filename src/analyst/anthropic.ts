/**
 * Claude analyst via the Anthropic Messages API
 */

import Anthropic from "@anthropic-ai/sdk";
import { AnalystError } from "@oracles/core";
import { ANALYST_TEMPERATURE, BaseAnalyst } from "./base.js";

export class AnthropicAnalyst extends BaseAnalyst {
  private readonly client: Anthropic;

  constructor(apiKey: string, model: string) {
    super("anthropic", model);
    this.client = new Anthropic({ apiKey });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: 1024,
      temperature: ANALYST_TEMPERATURE,
      system: `${systemPrompt} Respond with JSON only.`,
      messages: [{ role: "user", content: userPrompt }],
    });

    const textBlock = response.content.find((block) => block.type === "text");
    if (!textBlock || textBlock.type !== "text") {
      throw new AnalystError("No text response from Claude", this.provider);
    }
    return textBlock.text;
  }
}
