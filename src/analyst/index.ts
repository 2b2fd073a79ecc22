/**
 * Analysts
 * LLM providers that produce pYes / confidence / rationale for a question
 */

import type { AnalystSettings } from "@oracles/core";
import { AnthropicAnalyst } from "./anthropic.js";
import { GeminiAnalyst } from "./gemini.js";
import { ChatCompletionsAnalyst } from "./openai.js";
import type { Analyst } from "./types.js";

export type { Analyst, Analysis, AnalysisSubject } from "./types.js";
export { BaseAnalyst } from "./base.js";
export { parseAnalysis } from "./parse.js";
export { buildUserPrompt, FORECAST_SYSTEM_PROMPT } from "./prompts.js";

/**
 * Analyst for the configured provider, or undefined when none is configured
 */
export function createAnalyst(settings: AnalystSettings | undefined): Analyst | undefined {
  if (!settings) return undefined;

  switch (settings.provider) {
    case "openai":
    case "groq":
    case "openrouter":
      return new ChatCompletionsAnalyst(settings.provider, settings.apiKey, settings.model);
    case "anthropic":
      return new AnthropicAnalyst(settings.apiKey, settings.model);
    case "gemini":
      return new GeminiAnalyst(settings.apiKey, settings.model);
  }
}
