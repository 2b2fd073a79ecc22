/**
 * ORACLES.run API Types
 * Zod schemas for validating API responses
 */

import { z } from "zod";

const numeric = z.union([z.string(), z.number()]).transform((val) =>
  typeof val === "string" ? parseFloat(val) || 0 : val
);

// Absent, null or unparsable values become undefined instead of 0
const maybeNumber = z
  .union([z.string(), z.number()])
  .optional()
  .nullable()
  .transform((val) => {
    const n = typeof val === "string" ? parseFloat(val) : val;
    return typeof n === "number" && Number.isFinite(n) ? n : undefined;
  });

const maybeUnit = maybeNumber.transform((n) => (n !== undefined && n >= 0 && n <= 1 ? n : undefined));

// ============ v1: Markets & Forecasts ============

export const MarketOutcomeSchema = z.object({
  name: z.string().optional().nullable(),
  question: z.string().optional().nullable(),
}).passthrough();

export type MarketOutcome = z.infer<typeof MarketOutcomeSchema>;

export const MarketSchema = z.object({
  slug: z.string(),
  title: z.string().optional().nullable().transform((v) => v ?? ""),
  description: z.string().optional().nullable().transform((v) => v ?? ""),
  category: z.string().optional().nullable().transform((v) => v ?? ""),
  status: z.string().optional().nullable(),
  deadline_at: z.string().optional().nullable(),
  market_prob: numeric.optional().nullable().transform((v) => v ?? 0.5),
  forecasts_count: numeric.optional().nullable().transform((v) => v ?? 0),
  is_polymarket_hot: z.boolean().optional().nullable(),
  polymarket_outcomes: z.array(MarketOutcomeSchema).optional().nullable().transform((v) => v ?? []),
}).passthrough();

export type Market = z.infer<typeof MarketSchema>;

export const MarketsResponseSchema = z.array(MarketSchema);

export const ForecastScoreSchema = z.object({
  brier: numeric,
  pnl_points: numeric.optional().nullable().transform((v) => v ?? 0),
}).passthrough();

export const ForecastRecordSchema = z.object({
  id: z.string().optional(),
  market_slug: z.string().optional().nullable(),
  p_yes: maybeNumber,
  confidence: maybeNumber,
  stake_units: numeric.optional().nullable().transform((v) => v ?? 0),
  selected_outcome: z.string().optional().nullable(),
  rationale: z.string().optional().nullable(),
  created_at: z.string().optional().nullable(),
  updated_at: z.string().optional().nullable(),
  score: ForecastScoreSchema.optional().nullable(),
}).passthrough();

export type ForecastRecord = z.infer<typeof ForecastRecordSchema>;

export const MyForecastsResponseSchema = z.object({
  forecasts: z.array(ForecastRecordSchema).optional().nullable().transform((v) => v ?? []),
}).passthrough();

export type MyForecastsResponse = z.infer<typeof MyForecastsResponseSchema>;

export const ForecastResultSchema = z.object({
  ok: z.boolean().optional(),
  forecast_id: z.string().optional().nullable(),
}).passthrough();

export type ForecastResult = z.infer<typeof ForecastResultSchema>;

// ============ v2: Rounds, Tasks & Predictions ============

export const RoundSchema = z.object({
  id: z.string(),
  ends_at: z.string().optional().nullable(),
  status: z.string().optional().nullable(),
}).passthrough();

export type Round = z.infer<typeof RoundSchema>;

export const TaskSchema = z.object({
  pack_market_id: z.string().optional().nullable(),
  question: z.string().optional().nullable().transform((v) => v ?? ""),
  category: z.string().optional().nullable().transform((v) => v ?? ""),
  market_kind: z.string().optional().nullable(),
  weight: numeric.optional().nullable().transform((v) => v ?? 1),
  resolution_rule: z.string().optional().nullable(),
  external_ref: z.string().optional().nullable(),
  close_at: z.string().optional().nullable(),
}).passthrough();

export type Task = z.infer<typeof TaskSchema>;

export const RoundRulesSchema = z.object({
  /** Undefined when missing or outside [0, 1] */
  min_confidence: maybeUnit,
  max_markets: maybeNumber,
}).passthrough();

export type RoundRules = z.infer<typeof RoundRulesSchema>;

export const TasksResponseSchema = z.object({
  round: RoundSchema.optional().nullable().transform((v) => v ?? undefined),
  tasks: z.array(TaskSchema).optional().nullable().transform((v) => v ?? []),
  rules: RoundRulesSchema.optional().nullable().transform((v) => v ?? undefined),
}).passthrough();

export type TasksResponse = z.infer<typeof TasksResponseSchema>;

export const PredictionRecordSchema = z.object({
  pack_market_id: z.string().optional().nullable(),
  round_id: z.string().optional().nullable(),
  question: z.string().optional().nullable(),
  p_yes: maybeNumber,
  confidence: maybeNumber,
  stake: maybeNumber,
  round_status: z.string().optional().nullable(),
  is_active: z.boolean().optional().nullable(),
  updated_at: z.string().optional().nullable(),
}).passthrough();

export type PredictionRecord = z.infer<typeof PredictionRecordSchema>;

export const MyPredictionsResponseSchema = z.object({
  predictions: z.array(PredictionRecordSchema).optional().nullable().transform((v) => v ?? []),
}).passthrough();

export type MyPredictionsResponse = z.infer<typeof MyPredictionsResponseSchema>;

export const BatchItemErrorSchema = z.object({
  pack_market_id: z.string().optional().nullable().transform((v) => v ?? "?"),
  error: z.string().optional().nullable().transform((v) => v ?? "?"),
}).passthrough();

export const BatchResultSchema = z.object({
  ok: z.boolean().optional().transform((v) => v ?? false),
  upserted: numeric.optional().nullable().transform((v) => v ?? 0),
  errors: z.array(BatchItemErrorSchema).optional().nullable().transform((v) => v ?? []),
}).passthrough();

export type BatchResult = z.infer<typeof BatchResultSchema>;

// ============ Registration ============

export const RegisterResultSchema = z.object({
  agent_id: z.string(),
  api_key: z.string(),
}).passthrough();

export type RegisterResult = z.infer<typeof RegisterResultSchema>;

// ============ Helpers ============

/**
 * Outcome labels of a multi-outcome market; empty for binary markets
 */
export function outcomeNames(market: Pick<Market, "polymarket_outcomes">): string[] {
  return market.polymarket_outcomes
    .map((o) => o.question ?? o.name ?? "")
    .filter((name) => name.length > 0);
}

/**
 * Existing forecasts keyed by market slug
 */
export function indexForecastsBySlug(forecasts: ForecastRecord[]): Map<string, ForecastRecord> {
  const indexed = new Map<string, ForecastRecord>();
  for (const f of forecasts) {
    if (f.market_slug) indexed.set(f.market_slug, f);
  }
  return indexed;
}

/**
 * Existing predictions keyed by pack market id
 */
export function indexPredictionsById(predictions: PredictionRecord[]): Map<string, PredictionRecord> {
  const indexed = new Map<string, PredictionRecord>();
  for (const p of predictions) {
    if (p.pack_market_id) indexed.set(p.pack_market_id, p);
  }
  return indexed;
}
