/**
 * Request payloads for the two signed endpoints
 *
 * v1 forecasts go to /agent-forecast one market at a time; v2 predictions go to
 * /agent-predictions-batch under a round id, at most 50 per request.
 */

import { z } from "zod";
import { ValidationError } from "@oracles/core";

export const MAX_RATIONALE_LENGTH = 2000;
export const MAX_PREDICTION_RATIONALE_LENGTH = 500;
export const MAX_BATCH_SIZE = 50;

const probability = z.number().min(0).max(1);

export const ForecastSchema = z.object({
  market_slug: z.string().min(1),
  p_yes: probability,
  confidence: probability,
  stake_units: z.number().min(0.1).max(100),
  rationale: z.string().max(MAX_RATIONALE_LENGTH),
  selected_outcome: z.string().min(1).optional(),
});

export type Forecast = z.infer<typeof ForecastSchema>;

export const PredictionSchema = z.object({
  pack_market_id: z.string().min(1),
  p_yes: probability,
  confidence: probability,
  stake: z.number().int().min(0).max(100),
  rationale_500: z.string().max(MAX_PREDICTION_RATIONALE_LENGTH).optional(),
});

export type Prediction = z.infer<typeof PredictionSchema>;

export const PredictionBatchSchema = z.object({
  round_id: z.string().min(1),
  predictions: z.array(PredictionSchema).min(1).max(MAX_BATCH_SIZE),
});

export type PredictionBatch = z.infer<typeof PredictionBatchSchema>;

/**
 * Everything that gets signed, tagged by endpoint
 */
export type SignedPayload =
  | { kind: "forecast"; forecast: Forecast }
  | { kind: "predictions"; batch: PredictionBatch };

export interface ForecastInput {
  marketSlug: string;
  pYes: number;
  confidence?: number;
  stakeUnits?: number;
  rationale?: string;
  selectedOutcome?: string;
}

export interface PredictionInput {
  packMarketId: string;
  pYes: number;
  confidence: number;
  stake: number;
  rationale?: string;
}

function round4(value: number): number {
  return Number(value.toFixed(4));
}

/**
 * Parse with a zod schema, reporting the first issue as a ValidationError
 */
export function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue?.path.join(".") || undefined;
  throw new ValidationError(
    `Invalid ${what}${field ? ` (${field})` : ""}: ${issue?.message ?? "unknown issue"}`,
    { field, context: { issues: result.error.issues.length } }
  );
}

/**
 * Build a v1 forecast body.
 * When the market's outcome list is given, a selected outcome must match one entry exactly.
 */
export function buildForecast(input: ForecastInput, outcomes?: string[]): Forecast {
  if (input.selectedOutcome !== undefined && outcomes && outcomes.length > 0) {
    if (!outcomes.includes(input.selectedOutcome)) {
      throw new ValidationError(`Unknown outcome "${input.selectedOutcome}" for ${input.marketSlug}`, {
        field: "selected_outcome",
        expected: outcomes.join(" | "),
        received: input.selectedOutcome,
      });
    }
  }

  const forecast: Forecast = {
    market_slug: input.marketSlug,
    p_yes: round4(input.pYes),
    confidence: round4(input.confidence ?? 0.5),
    stake_units: input.stakeUnits ?? 1,
    rationale: (input.rationale ?? "").slice(0, MAX_RATIONALE_LENGTH),
  };
  if (input.selectedOutcome) {
    forecast.selected_outcome = input.selectedOutcome;
  }

  return validate(ForecastSchema, forecast, "forecast");
}

/**
 * Build a single v2 prediction
 */
export function buildPrediction(input: PredictionInput): Prediction {
  const prediction: Prediction = {
    pack_market_id: input.packMarketId,
    p_yes: round4(input.pYes),
    confidence: round4(input.confidence),
    stake: input.stake,
  };
  if (input.rationale) {
    prediction.rationale_500 = input.rationale.slice(0, MAX_PREDICTION_RATIONALE_LENGTH);
  }

  return validate(PredictionSchema, prediction, "prediction");
}

/**
 * Wrap predictions for one round; rejects empty and oversized batches
 */
export function buildPredictionBatch(roundId: string, predictions: unknown[]): PredictionBatch {
  if (predictions.length > MAX_BATCH_SIZE) {
    throw new ValidationError(`Maximum ${MAX_BATCH_SIZE} predictions per batch, got ${predictions.length}`, {
      field: "predictions",
      expected: `<= ${MAX_BATCH_SIZE}`,
      received: String(predictions.length),
    });
  }
  return validate(PredictionBatchSchema, { round_id: roundId, predictions }, "prediction batch");
}

/**
 * Split a prediction list into API-sized batches
 */
export function chunkPredictions<T>(items: T[], size = MAX_BATCH_SIZE): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
