/**
 * Base Analyst
 * Prompt building, output parsing and error wrapping shared by the providers
 */

import { AnalystError, isOraclesError, logger, type ChildLogger, type LlmProvider } from "@oracles/core";
import { buildUserPrompt, FORECAST_SYSTEM_PROMPT } from "./prompts.js";
import { parseAnalysis } from "./parse.js";
import type { Analysis, AnalysisSubject, Analyst } from "./types.js";

export const ANALYST_TEMPERATURE = 0.2;

export abstract class BaseAnalyst implements Analyst {
  readonly provider: LlmProvider;
  readonly model: string;

  protected readonly log: ChildLogger;

  constructor(provider: LlmProvider, model: string) {
    this.provider = provider;
    this.model = model;
    this.log = logger.child({ component: "analyst", provider, model });
  }

  /**
   * One completion; returns the raw model text
   */
  protected abstract complete(systemPrompt: string, userPrompt: string): Promise<string>;

  async analyze(subject: AnalysisSubject): Promise<Analysis> {
    const startTime = Date.now();

    let text: string;
    try {
      text = await this.complete(FORECAST_SYSTEM_PROMPT, buildUserPrompt(subject));
    } catch (error) {
      if (isOraclesError(error)) throw error;
      throw new AnalystError(
        `${this.provider} request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.provider,
        { cause: error instanceof Error ? error : undefined }
      );
    }

    const analysis = parseAnalysis(text, this.provider);
    this.log.debug("Analysis complete", {
      durationMs: Date.now() - startTime,
      pYes: analysis.pYes,
      confidence: analysis.confidence,
    });
    return analysis;
  }
}
