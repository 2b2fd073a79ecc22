/**
 * Forecasting prompts shared by every provider
 */

import type { AnalysisSubject } from "./types.js";

export const FORECAST_SYSTEM_PROMPT =
  "You are an expert forecaster. Analyze the market and return JSON: " +
  '{"p_yes": <float 0.01-0.99>, "confidence": <float 0.0-1.0>, ' +
  '"rationale": "<1-2 sentences>", "selected_outcome": "<exact outcome name or null>"} ' +
  "Rules: " +
  "- If the market has multiple outcomes listed, set selected_outcome to the exact name of the outcome you believe will win. " +
  "- If binary, set selected_outcome to null. " +
  "- p_yes is your probability that selected_outcome (or YES) wins. " +
  "- Be calibrated. If unsure, set confidence low.";

export function buildUserPrompt(subject: AnalysisSubject): string {
  const lines = [`Market: ${subject.title}`, `Details: ${subject.description || "No description"}`];

  if (subject.category) {
    lines.push(`Category: ${subject.category}`);
  }
  if (subject.outcomes && subject.outcomes.length > 1) {
    lines.push(`Outcomes: ${subject.outcomes.join(" | ")}`);
  }
  if (subject.resolutionRule) {
    lines.push(`Resolution rule: ${subject.resolutionRule}`);
  }

  return lines.join("\n");
}
