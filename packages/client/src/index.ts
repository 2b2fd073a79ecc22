/**
 * @oracles/client
 * ORACLES.run API client, payload builders and request signing
 */

// Types
export {
  MarketOutcomeSchema,
  type MarketOutcome,
  MarketSchema,
  type Market,
  MarketsResponseSchema,
  ForecastRecordSchema,
  type ForecastRecord,
  MyForecastsResponseSchema,
  type MyForecastsResponse,
  ForecastResultSchema,
  type ForecastResult,
  RoundSchema,
  type Round,
  TaskSchema,
  type Task,
  RoundRulesSchema,
  type RoundRules,
  TasksResponseSchema,
  type TasksResponse,
  PredictionRecordSchema,
  type PredictionRecord,
  MyPredictionsResponseSchema,
  type MyPredictionsResponse,
  BatchResultSchema,
  type BatchResult,
  RegisterResultSchema,
  type RegisterResult,

  // Helper functions
  outcomeNames,
  indexForecastsBySlug,
  indexPredictionsById,
} from "./types.js";

// Payloads
export {
  ForecastSchema,
  type Forecast,
  PredictionSchema,
  type Prediction,
  PredictionBatchSchema,
  type PredictionBatch,
  type SignedPayload,
  type ForecastInput,
  type PredictionInput,
  MAX_RATIONALE_LENGTH,
  MAX_PREDICTION_RATIONALE_LENGTH,
  MAX_BATCH_SIZE,
  validate,
  buildForecast,
  buildPrediction,
  buildPredictionBatch,
  chunkPredictions,
} from "./payloads.js";

// Signing
export {
  signBody,
  serializePayload,
  authHeaders,
  SIGNED_ENDPOINTS,
  type SignedBody,
} from "./signing.js";

// Client
export {
  OraclesClient,
  createClient,
  getOraclesClient,
  resetClient,
  MAX_MARKETS_LIMIT,
  MAX_HISTORY_LIMIT,
  type OraclesClientOptions,
} from "./client.js";
