/**
 * Round Loop (v2)
 *
 * agent-tasks -> my-predictions -> analyze each task -> size stakes ->
 * submit the collected predictions in batches of at most 50.
 */

import { ApiError, NetworkError, errorMessage, logger, type ChildLogger } from "@oracles/core";
import {
  buildPrediction,
  chunkPredictions,
  indexPredictionsById,
  type OraclesClient,
  type Prediction,
  type PredictionRecord,
} from "@oracles/client";
import { calcStake, clampProbability, clampUnit, effectiveConfidence } from "../strategy/stake.js";
import { decideRevote } from "../strategy/revote.js";
import { sleep as defaultSleep, type PipelineDeps, type StrategyOptions } from "./types.js";

export interface RoundLoopOptions extends StrategyOptions {
  analysisDelayMs: number;
  pack?: string;
  customer?: string;
}

export interface BatchOutcome {
  size: number;
  upserted: number;
  errors: Array<{ packMarketId: string; error: string }>;
  failed?: string;
}

export interface RoundSummary {
  roundId?: string;
  endsAt?: string;
  minConfidence: number;
  tasks: number;
  analyzed: number;
  alreadyVoted: number;
  skipped: number;
  submitted: number;
  errors: number;
  batches: BatchOutcome[];
}

export type RoundLoopDeps = PipelineDeps<"getTasks" | "myPredictions" | "submitPredictions">;

async function fetchExistingPredictions(
  client: Pick<OraclesClient, "myPredictions">,
  roundId: string,
  log: ChildLogger
): Promise<Map<string, PredictionRecord>> {
  try {
    const data = await client.myPredictions({ roundId, status: "open", limit: 200 });
    return indexPredictionsById(data.predictions);
  } catch (error) {
    if (!(error instanceof ApiError || error instanceof NetworkError)) throw error;
    log.warn("Could not fetch existing predictions", { error: errorMessage(error) });
    return new Map();
  }
}

export async function runRoundLoop(deps: RoundLoopDeps, options: RoundLoopOptions): Promise<RoundSummary> {
  const pause = deps.sleep ?? defaultSleep;
  let log = logger.child({ component: "round-loop" });

  const data = await deps.client.getTasks({ pack: options.pack, customer: options.customer });
  // The schema drops a rule threshold outside [0, 1]
  const minConfidence = data.rules?.min_confidence ?? options.minConfidence;

  const summary: RoundSummary = {
    roundId: data.round?.id,
    endsAt: data.round?.ends_at ?? undefined,
    minConfidence,
    tasks: data.tasks.length,
    analyzed: 0,
    alreadyVoted: 0,
    skipped: 0,
    submitted: 0,
    errors: 0,
    batches: [],
  };

  const round = data.round;
  if (!round) {
    log.info("No open round found", { pack: options.pack, customer: options.customer });
    return summary;
  }
  log = log.child({ roundId: round.id });

  if (data.tasks.length === 0) {
    log.info("No tasks in this round");
    return summary;
  }

  const existing = await fetchExistingPredictions(deps.client, round.id, log);
  const predictions: Prediction[] = [];

  for (const task of data.tasks) {
    const packMarketId = task.pack_market_id;
    if (!packMarketId) {
      log.warn("Skipping task without pack_market_id", { question: task.question });
      summary.errors++;
      continue;
    }
    const tlog = log.child({ packMarketId });

    const decision = decideRevote({
      mode: options.revote,
      hasExisting: existing.has(packMarketId),
      deadlineAt: task.close_at ?? round.ends_at,
      now: deps.now?.(),
    });
    if (!decision.submit) {
      tlog.info("Already predicted, skipping");
      summary.alreadyVoted++;
      continue;
    }

    try {
      const analysis = await deps.analyst.analyze({
        title: task.question,
        category: task.category,
        resolutionRule: task.resolution_rule,
      });
      summary.analyzed++;

      const pYes = clampProbability(analysis.pYes);
      const confidence = clampUnit(analysis.confidence);
      const stake = calcStake(effectiveConfidence(pYes, confidence), {
        minConfidence,
        maxStake: options.maxStake,
      });

      if (stake === 0) {
        tlog.info("Confidence below threshold, skipping", { confidence, minConfidence });
        summary.skipped++;
      } else {
        predictions.push(
          buildPrediction({ packMarketId, pYes, confidence, stake, rationale: analysis.rationale })
        );
        tlog.info("Prediction collected", { pYes, confidence, stake });
      }
    } catch (error) {
      tlog.error("Task failed", error);
      summary.errors++;
    }

    await pause(options.analysisDelayMs);
  }

  if (predictions.length === 0) {
    log.info("No predictions to submit");
    return summary;
  }

  const batches = chunkPredictions(predictions);
  for (const [i, batch] of batches.entries()) {
    log.info(`Submitting batch ${i + 1}/${batches.length}`, { size: batch.length });
    try {
      const result = await deps.client.submitPredictions(round.id, batch);
      if (result.ok) {
        summary.submitted += result.upserted;
        summary.errors += result.errors.length;
        summary.batches.push({
          size: batch.length,
          upserted: result.upserted,
          errors: result.errors.map((e) => ({ packMarketId: e.pack_market_id, error: e.error })),
        });
      } else {
        summary.errors += batch.length;
        summary.batches.push({ size: batch.length, upserted: 0, errors: [], failed: "Batch rejected" });
      }
    } catch (error) {
      log.error("Batch failed", error);
      summary.errors += batch.length;
      summary.batches.push({ size: batch.length, upserted: 0, errors: [], failed: errorMessage(error) });
    }
  }

  log.metric("predictions_submitted", summary.submitted);
  return summary;
}
