/**
 * Forecast Loop (v1)
 *
 * list-markets -> my-forecasts -> for each market: revote check -> analyze ->
 * size stake -> sign + submit -> pause. Strictly sequential; a failure on one
 * market is logged and the loop moves on. Only the market list fetch is fatal.
 */

import { ApiError, NetworkError, errorMessage, isRetryableError, logger, type ChildLogger } from "@oracles/core";
import {
  buildForecast,
  indexForecastsBySlug,
  MAX_HISTORY_LIMIT,
  outcomeNames,
  type ForecastRecord,
  type Market,
  type OraclesClient,
} from "@oracles/client";
import { calcStake, clampProbability, clampUnit, effectiveConfidence } from "../strategy/stake.js";
import { decideRevote } from "../strategy/revote.js";
import { sleep as defaultSleep, type PipelineDeps, type StrategyOptions } from "./types.js";

export interface ForecastLoopOptions extends StrategyOptions {
  submitDelayMs: number;
  limit?: number;
  category?: string;
}

export type MarketStatus = "submitted" | "skipped" | "already-voted" | "expired" | "failed";

export interface MarketResult {
  slug: string;
  status: MarketStatus;
  pYes?: number;
  confidence?: number;
  stake?: number;
  selectedOutcome?: string;
  error?: string;
  /** Failed for a reason a later run may not hit (rate limit, outage) */
  retryable?: boolean;
}

export interface LoopSummary {
  total: number;
  submitted: number;
  skipped: number;
  alreadyVoted: number;
  expired: number;
  failed: number;
  results: MarketResult[];
}

export type ForecastLoopDeps = PipelineDeps<"listMarkets" | "myForecasts" | "submitForecast">;

/**
 * Existing open forecasts, read page by page until a short page.
 * Only an unreachable or failing endpoint counts as "no history"; a response
 * that does not validate aborts the run rather than risk re-voting.
 */
export async function fetchExistingForecasts(
  client: Pick<OraclesClient, "myForecasts">,
  log: ChildLogger
): Promise<Map<string, ForecastRecord>> {
  const existing = new Map<string, ForecastRecord>();
  let offset = 0;

  for (;;) {
    let page: ForecastRecord[];
    try {
      const data = await client.myForecasts({ status: "open", limit: MAX_HISTORY_LIMIT, offset });
      page = data.forecasts;
    } catch (error) {
      if (!(error instanceof ApiError || error instanceof NetworkError)) throw error;
      log.warn("Could not fetch existing forecasts", { error: errorMessage(error), offset });
      return existing;
    }

    const before = existing.size;
    for (const [slug, record] of indexForecastsBySlug(page)) {
      existing.set(slug, record);
    }

    // A server that ignores offset would repeat the same page forever
    if (page.length < MAX_HISTORY_LIMIT || existing.size === before) {
      return existing;
    }
    offset += page.length;
  }
}

async function processMarket(
  market: Market,
  existing: Map<string, ForecastRecord>,
  deps: ForecastLoopDeps,
  options: ForecastLoopOptions,
  log: ChildLogger
): Promise<MarketResult> {
  const slug = market.slug;
  const mlog = log.child({ marketSlug: slug });

  if (market.status === "closed") {
    mlog.info("Deadline passed, skipping");
    return { slug, status: "expired" };
  }

  const previous = existing.get(slug);
  const decision = decideRevote({
    mode: options.revote,
    hasExisting: previous !== undefined,
    deadlineAt: market.deadline_at,
    now: deps.now?.(),
  });

  if (!decision.submit) {
    mlog.info("Already voted, skipping", {
      votedAt: previous?.updated_at ?? previous?.created_at ?? "unknown",
      pYes: previous?.p_yes,
      confidence: previous?.confidence,
    });
    return { slug, status: "already-voted" };
  }
  if (decision.reason !== "new") {
    mlog.info("Re-voting", { reason: decision.reason, secondsToDeadline: decision.secondsToDeadline });
  }

  const outcomes = outcomeNames(market);
  const analysis = await deps.analyst.analyze({
    title: market.title,
    description: market.description,
    category: market.category,
    outcomes,
  });

  const pYes = clampProbability(analysis.pYes);
  const confidence = clampUnit(analysis.confidence);
  const selectedOutcome = outcomes.length > 1 ? analysis.selectedOutcome : undefined;
  const binary = outcomes.length <= 1 && !selectedOutcome;

  const stake = calcStake(effectiveConfidence(pYes, confidence, binary), options);
  if (stake === 0) {
    mlog.info("Confidence below threshold, skipping", { confidence, minConfidence: options.minConfidence });
    return { slug, status: "skipped", pYes, confidence, stake };
  }

  const forecast = buildForecast(
    {
      marketSlug: slug,
      pYes,
      confidence,
      stakeUnits: stake,
      rationale: analysis.rationale,
      selectedOutcome,
    },
    outcomes
  );
  await deps.client.submitForecast(forecast);

  mlog.info("Forecast submitted", { pYes, confidence, stake, selectedOutcome });
  return { slug, status: "submitted", pYes, confidence, stake, selectedOutcome };
}

export async function runForecastLoop(deps: ForecastLoopDeps, options: ForecastLoopOptions): Promise<LoopSummary> {
  const log = logger.child({ component: "forecast-loop" });
  const pause = deps.sleep ?? defaultSleep;

  const markets = await deps.client.listMarkets({
    status: "open",
    limit: options.limit ?? 100,
    category: options.category,
  });
  log.info(`Found ${markets.length} open markets`);

  const existing = await fetchExistingForecasts(deps.client, log);
  log.info(`Found ${existing.size} existing forecasts on open markets`);

  const results: MarketResult[] = [];
  for (const market of markets) {
    let result: MarketResult;
    try {
      result = await processMarket(market, existing, deps, options, log);
    } catch (error) {
      log.error("Market failed", error, { marketSlug: market.slug });
      result = {
        slug: market.slug,
        status: "failed",
        error: errorMessage(error),
        retryable: isRetryableError(error),
      };
    }
    results.push(result);

    if (result.status === "submitted") {
      await pause(options.submitDelayMs);
    }
  }

  const count = (status: MarketStatus) => results.filter((r) => r.status === status).length;
  const summary: LoopSummary = {
    total: markets.length,
    submitted: count("submitted"),
    skipped: count("skipped"),
    alreadyVoted: count("already-voted"),
    expired: count("expired"),
    failed: count("failed"),
    results,
  };

  log.metric("forecasts_submitted", summary.submitted);
  return summary;
}

export interface UnvotedMarket {
  slug: string;
  title: string;
  description: string;
  category: string;
  deadline_at: string;
  current_prob: number;
  forecasts_count: number;
  outcomes?: string[];
}

export interface UnvotedListing {
  total: number;
  alreadyVoted: number;
  unvoted: UnvotedMarket[];
}

/**
 * Markets not yet voted on, for analysis outside this process
 */
export async function listUnvotedMarkets(
  client: Pick<OraclesClient, "listMarkets" | "myForecasts">
): Promise<UnvotedListing> {
  const log = logger.child({ component: "forecast-loop" });
  const markets = await client.listMarkets({ status: "open", limit: 100 });
  const existing = await fetchExistingForecasts(client, log);

  const unvoted = markets
    .filter((m) => !existing.has(m.slug))
    .map((m): UnvotedMarket => {
      const item: UnvotedMarket = {
        slug: m.slug,
        title: m.title,
        description: m.description,
        category: m.category,
        deadline_at: m.deadline_at ?? "",
        current_prob: m.market_prob,
        forecasts_count: m.forecasts_count,
      };
      const outcomes = outcomeNames(m);
      if (outcomes.length > 1) item.outcomes = outcomes;
      return item;
    });

  return { total: markets.length, alreadyVoted: existing.size, unvoted };
}
