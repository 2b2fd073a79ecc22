/**
 * Console rendering for command output
 */

import {
  outcomeNames,
  type BatchResult,
  type ForecastRecord,
  type Market,
  type PredictionRecord,
  type TasksResponse,
} from "@oracles/client";
import type { LoopSummary } from "../pipeline/forecast-loop.js";
import type { RoundSummary } from "../pipeline/round-loop.js";

const RULE = "=".repeat(70);

export function percent(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function fixed(value: number | undefined, digits: number): string {
  return value === undefined ? "?" : value.toFixed(digits);
}

export function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}…` : id;
}

export function renderMarkets(markets: Market[]): string[] {
  const lines = ["", RULE, `  ORACLES.run: ${markets.length} Open Markets`, RULE, ""];

  for (const m of markets) {
    const deadline = (m.deadline_at ?? "?").slice(0, 10);
    const hot = m.is_polymarket_hot ? " 🔥" : "";
    lines.push(`  📊 ${m.title}${hot}`);
    lines.push(`     slug: ${m.slug}`);
    lines.push(
      `     prob: ${percent(m.market_prob)} | votes: ${m.forecasts_count} | deadline: ${deadline} | cat: ${m.category}`
    );
    const outcomes = outcomeNames(m);
    if (outcomes.length > 1) {
      lines.push(`     outcomes: ${outcomes.join(", ")}`);
    }
    lines.push("");
  }

  return lines;
}

export function renderForecast(f: ForecastRecord): string {
  const outcome = f.selected_outcome ? ` [${f.selected_outcome}]` : "";
  const score = f.score
    ? ` | brier: ${f.score.brier.toFixed(3)} | pnl: ${f.score.pnl_points.toFixed(1)}`
    : "";
  return `  ${f.market_slug ?? "?"}${outcome}: p=${fixed(f.p_yes, 2)} conf=${fixed(f.confidence, 2)} stake=${f.stake_units}${score}`;
}

export function renderHistory(forecasts: ForecastRecord[]): string[] {
  return ["", `  Found ${forecasts.length} forecasts`, "", ...forecasts.map(renderForecast)];
}

export function renderTasks(data: TasksResponse, pack?: string): string[] {
  const round = data.round;
  if (!round) {
    const lines = ["", "  ⏳ No open round found."];
    if (pack) lines.push(`     (filtered by pack: ${pack})`);
    return lines;
  }

  const ends = (round.ends_at ?? "?").slice(0, 19).replace("T", " ");
  const lines = ["", RULE, `  Round: ${shortId(round.id)}`, `  Ends:  ${ends} UTC`, `  Tasks: ${data.tasks.length}`];
  if (data.rules) {
    lines.push(
      `  Rules: min_confidence=${data.rules.min_confidence ?? "?"}, max_markets=${data.rules.max_markets ?? "?"}`
    );
  }
  lines.push(RULE, "");

  for (const t of data.tasks) {
    const close = t.close_at ? ` | close: ${t.close_at.slice(0, 16)}` : "";
    lines.push(`  📊 ${t.question || "?"}`);
    lines.push(`     id: ${t.pack_market_id ?? "?"}`);
    lines.push(`     cat: ${t.category || "?"} | kind: ${t.market_kind ?? "?"} | weight: ${t.weight}${close}`);
    if (t.resolution_rule) lines.push(`     rule: ${t.resolution_rule}`);
    if (t.external_ref) lines.push(`     ref: ${t.external_ref}`);
    lines.push("");
  }

  return lines;
}

export function renderPredictions(predictions: PredictionRecord[]): string[] {
  const lines = ["", `  Found ${predictions.length} predictions`, ""];
  for (const p of predictions) {
    lines.push(`  📊 ${(p.question ?? "?").slice(0, 60)}`);
    lines.push(`     p=${fixed(p.p_yes, 2)} conf=${fixed(p.confidence, 2)} stake=${p.stake ?? "?"}`);
    lines.push(`     round: ${p.round_status ?? "?"} | market active: ${p.is_active ?? "?"}`);
    lines.push("");
  }
  return lines;
}

export function renderBatchResult(result: BatchResult): string[] {
  const lines = [`✅ Batch submitted: ${result.upserted} predictions upserted`];
  if (result.errors.length > 0) {
    lines.push(`   ⚠️  ${result.errors.length} errors:`);
    for (const e of result.errors) {
      lines.push(`      ${shortId(e.pack_market_id)}: ${e.error}`);
    }
  }
  return lines;
}

export function renderLoopSummary(summary: LoopSummary): string[] {
  const lines = [""];
  for (const r of summary.results) {
    switch (r.status) {
      case "submitted": {
        const outcome = r.selectedOutcome ? ` outcome=${r.selectedOutcome}` : "";
        lines.push(
          `  ✓ ${r.slug}: p=${(r.pYes ?? 0).toFixed(2)} conf=${(r.confidence ?? 0).toFixed(2)} stake=${r.stake ?? 0}${outcome}`
        );
        break;
      }
      case "skipped":
        lines.push(`  SKIP ${r.slug} (confidence ${(r.confidence ?? 0).toFixed(2)})`);
        break;
      case "already-voted":
        lines.push(`  ALREADY VOTED ${r.slug}`);
        break;
      case "expired":
        lines.push(`  EXPIRED ${r.slug}`);
        break;
      case "failed":
        lines.push(`  ✗ ${r.slug}: ${r.error ?? "unknown error"}${r.retryable ? " (retryable)" : ""}`);
        break;
    }
  }

  lines.push(
    "",
    `  Markets: ${summary.total} | Submitted: ${summary.submitted} | Skipped: ${summary.skipped} | ` +
      `Already voted: ${summary.alreadyVoted} | Expired: ${summary.expired} | Failed: ${summary.failed}`
  );
  return lines;
}

export function renderRoundSummary(summary: RoundSummary): string[] {
  if (!summary.roundId) {
    return ["No open round found."];
  }

  const bar = "═".repeat(39);
  return [
    "",
    bar,
    `Round:     ${summary.roundId}`,
    `Analyzed:  ${summary.analyzed} tasks`,
    `Submitted: ${summary.submitted} predictions`,
    `Skipped:   ${summary.skipped} (low confidence)`,
    `Voted:     ${summary.alreadyVoted} (already predicted)`,
    `Errors:    ${summary.errors}`,
    bar,
  ];
}
