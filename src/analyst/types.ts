/**
 * Analyst Types
 * Interface for the LLM step that turns a question into a forecast
 */

import type { LlmProvider } from "@oracles/core";

/**
 * What the analyst is asked about: a v1 market or a v2 round task
 */
export interface AnalysisSubject {
  title: string;
  description?: string;
  category?: string;
  /** Outcome labels of a multi-outcome market; empty or absent for binary questions */
  outcomes?: string[];
  resolutionRule?: string | null;
}

export interface Analysis {
  /** Clamped to [0.01, 0.99] */
  pYes: number;
  /** Clamped to [0, 1] */
  confidence: number;
  rationale: string;
  selectedOutcome?: string;
}

export interface Analyst {
  readonly provider: LlmProvider;
  readonly model: string;

  analyze(subject: AnalysisSubject): Promise<Analysis>;
}
