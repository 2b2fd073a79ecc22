/**
 * OpenAI-compatible analysts: OpenAI, Groq and OpenRouter all speak the
 * chat completions API, only the base URL differs.
 */

import OpenAI from "openai";
import { AnalystError } from "@oracles/core";
import { ANALYST_TEMPERATURE, BaseAnalyst } from "./base.js";

export type ChatCompletionsProvider = "openai" | "groq" | "openrouter";

export const CHAT_COMPLETIONS_BASE_URLS: Record<ChatCompletionsProvider, string | undefined> = {
  openai: undefined,
  groq: "https://api.groq.com/openai/v1",
  openrouter: "https://openrouter.ai/api/v1",
};

export class ChatCompletionsAnalyst extends BaseAnalyst {
  private readonly client: OpenAI;

  constructor(provider: ChatCompletionsProvider, apiKey: string, model: string) {
    super(provider, model);
    this.client = new OpenAI({ apiKey, baseURL: CHAT_COMPLETIONS_BASE_URLS[provider] });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const res = await this.client.chat.completions.create({
      model: this.model,
      temperature: ANALYST_TEMPERATURE,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    });

    const content = res.choices[0]?.message.content;
    if (!content) {
      throw new AnalystError("Empty completion", this.provider);
    }
    return content;
  }
}
