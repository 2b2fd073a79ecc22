/**
 * Parsing of model output into an Analysis
 */

import { z } from "zod";
import { AnalystError } from "@oracles/core";
import { clampProbability, clampUnit } from "../strategy/stake.js";
import type { Analysis } from "./types.js";

const looseNumber = z
  .union([z.number(), z.string().transform((s) => parseFloat(s))])
  .nullable()
  .optional()
  .transform((v) => v ?? undefined);

export const AnalysisResponseSchema = z.object({
  p_yes: looseNumber,
  confidence: looseNumber,
  rationale: z.string().nullable().optional().transform((v) => v ?? ""),
  selected_outcome: z.string().nullable().optional(),
}).passthrough();

/**
 * Extract the first JSON object from model text and clamp its values
 */
export function parseAnalysis(text: string, provider: string): Analysis {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new AnalystError(`Could not find JSON in response: ${text.slice(0, 200)}`, provider);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (error) {
    throw new AnalystError("Malformed JSON in response", provider, {
      cause: error instanceof Error ? error : undefined,
      context: { text: jsonMatch[0].slice(0, 200) },
    });
  }

  const result = AnalysisResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new AnalystError(
      `Unexpected analysis shape: ${result.error.issues.map((i) => i.path.join(".")).join(", ")}`,
      provider
    );
  }

  const selected = result.data.selected_outcome?.trim();

  return {
    pYes: clampProbability(result.data.p_yes),
    confidence: clampUnit(result.data.confidence),
    rationale: result.data.rationale,
    selectedOutcome: selected && selected.toLowerCase() !== "null" ? selected : undefined,
  };
}
