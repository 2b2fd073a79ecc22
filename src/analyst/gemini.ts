/**
 * Gemini analyst via @google/genai
 */

import { GoogleGenAI } from "@google/genai";
import { AnalystError } from "@oracles/core";
import { ANALYST_TEMPERATURE, BaseAnalyst } from "./base.js";

export class GeminiAnalyst extends BaseAnalyst {
  private readonly client: GoogleGenAI;

  constructor(apiKey: string, model: string) {
    super("gemini", model);
    this.client = new GoogleGenAI({ apiKey });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.model,
      contents: userPrompt,
      config: {
        systemInstruction: systemPrompt,
        temperature: ANALYST_TEMPERATURE,
        responseMimeType: "application/json",
      },
    });

    const text = response.text;
    if (!text) {
      throw new AnalystError("Empty response from Gemini", this.provider);
    }
    return text;
  }
}
