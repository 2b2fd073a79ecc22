/**
 * CLI commands, one per ORACLES.run endpoint plus the two autonomous loops
 */

import { readFile } from "fs/promises";
import { ApiError, ValidationError, type Config } from "@oracles/core";
import {
  buildForecast,
  buildPrediction,
  buildPredictionBatch,
  MAX_MARKETS_LIMIT,
  type OraclesClient,
} from "@oracles/client";
import type { Analyst } from "../analyst/index.js";
import { listUnvotedMarkets, runForecastLoop } from "../pipeline/forecast-loop.js";
import { runRoundLoop } from "../pipeline/round-loop.js";
import type { Sleep } from "../pipeline/types.js";
import { describeRevoteMode, revoteModeFromFlags } from "../strategy/revote.js";
import {
  hasSwitch,
  oneOf,
  optionalNumber,
  optionalString,
  requireNumber,
  requireString,
  type CommandName,
  type Flags,
} from "./args.js";
import {
  renderBatchResult,
  renderHistory,
  renderLoopSummary,
  renderMarkets,
  renderPredictions,
  renderRoundSummary,
  renderTasks,
  shortId,
} from "./render.js";

export interface CommandContext {
  config: Config;
  client: OraclesClient;
  analyst?: Analyst;
  out: (line: string) => void;
  readStdin: () => Promise<string>;
  sleep?: Sleep;
}

export interface CommandSpec {
  usage: string;
  description: string;
  /** Needs ORACLE_AGENT_ID and ORACLE_API_KEY */
  auth: boolean;
  run: (ctx: CommandContext, flags: Flags) => Promise<void>;
}

function printJson(ctx: CommandContext, value: unknown): void {
  ctx.out(JSON.stringify(value, null, 2));
}

function printLines(ctx: CommandContext, lines: string[]): void {
  for (const line of lines) ctx.out(line);
}

function strategyOptions(config: Config) {
  return {
    minConfidence: config.strategy.minConfidence,
    maxStake: config.strategy.maxStake,
    revote: revoteModeFromFlags(config.strategy.allowRevote, config.strategy.revoteDeadlineWithinSeconds),
  };
}

async function readPredictionsFile(ctx: CommandContext, file: string): Promise<unknown[]> {
  let raw: string;
  if (file === "-") {
    raw = await ctx.readStdin();
  } else {
    try {
      raw = await readFile(file, "utf8");
    } catch (error) {
      throw new ValidationError(`File not found: ${file}`, {
        field: "file",
        context: { cause: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, {
      field: "file",
    });
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError("JSON must be an array of prediction objects", {
      field: "file",
      expected: "array",
      received: typeof parsed,
    });
  }
  return parsed;
}

// ============ v1 ============

const markets: CommandSpec = {
  usage: "markets [--category <cat>] [--limit <n>] [--json]",
  description: "List open markets",
  auth: false,
  async run(ctx, flags) {
    const list = await ctx.client.listMarkets({
      status: "open",
      limit: optionalNumber(flags, "limit") ?? 100,
      category: optionalString(flags, "category"),
    });
    if (hasSwitch(flags, "json")) {
      printJson(ctx, list);
      return;
    }
    printLines(ctx, renderMarkets(list));
  },
};

const forecast: CommandSpec = {
  usage:
    "forecast --slug <slug> --p_yes <p> [--confidence 0.8] [--stake 5] [--rationale <text>] [--outcome <name>]",
  description: "Submit one forecast",
  auth: true,
  async run(ctx, flags) {
    const slug = requireString(flags, "slug");
    const body = buildForecast({
      marketSlug: slug,
      pYes: requireNumber(flags, "p_yes"),
      confidence: optionalNumber(flags, "confidence") ?? 0.8,
      stakeUnits: optionalNumber(flags, "stake") ?? 5,
      rationale: optionalString(flags, "rationale"),
      selectedOutcome: optionalString(flags, "outcome"),
    });

    const result = await ctx.client.submitForecast(body);
    ctx.out(`✅ Forecast submitted! ID: ${result.forecast_id ?? "?"}`);
    ctx.out(
      `   market: ${slug} | p_yes: ${body.p_yes} | conf: ${body.confidence} | stake: ${body.stake_units}`
    );
  },
};

const history: CommandSpec = {
  usage: "history [--status open|settled] [--limit <n>] [--offset <n>] [--json]",
  description: "View past forecasts",
  auth: true,
  async run(ctx, flags) {
    const data = await ctx.client.myForecasts({
      status: oneOf(flags, "status", ["open", "settled"] as const),
      limit: optionalNumber(flags, "limit") ?? 50,
      offset: optionalNumber(flags, "offset"),
    });
    if (hasSwitch(flags, "json")) {
      printJson(ctx, data);
      return;
    }
    printLines(ctx, renderHistory(data.forecasts));
  },
};

const auto: CommandSpec = {
  usage: "auto [--v2] [--pack <slug>] [--customer <slug>] [--category <cat>] [--dry-run]",
  description: "Autonomous loop: analyze and submit (lists work instead without an LLM key or with --dry-run)",
  auth: true,
  async run(ctx, flags) {
    const { config } = ctx;
    const strategy = strategyOptions(config);
    const pack = optionalString(flags, "pack") ?? config.filters.pack;
    const customer = optionalString(flags, "customer") ?? config.filters.customer;
    const analyst = hasSwitch(flags, "dry-run") ? undefined : ctx.analyst;

    if (hasSwitch(flags, "v2")) {
      if (!analyst) {
        const data = await ctx.client.getTasks({ pack, customer });
        printLines(ctx, renderTasks(data, pack));
        if (data.round) {
          ctx.out(`  Submit with: predict --round ${data.round.id} --market <PACK_MARKET_ID> --p_yes <N>`);
          ctx.out(`  Or:          batch --round ${data.round.id} --file preds.json`);
        }
        return;
      }

      ctx.out(`Model: ${analyst.provider}/${analyst.model} | Revote: ${describeRevoteMode(strategy.revote)}`);
      const summary = await runRoundLoop(
        { client: ctx.client, analyst, sleep: ctx.sleep },
        { ...strategy, analysisDelayMs: config.strategy.analysisDelayMs, pack, customer }
      );
      printLines(ctx, renderRoundSummary(summary));
      return;
    }

    if (!analyst) {
      const listing = await listUnvotedMarkets(ctx.client);
      ctx.out(
        `  Total open: ${listing.total} | Already voted: ${listing.alreadyVoted} | Remaining: ${listing.unvoted.length}`
      );
      if (listing.unvoted.length === 0) {
        ctx.out("  ✅ All markets have been voted on!");
        return;
      }
      printJson(ctx, listing.unvoted);
      ctx.out("  Use 'forecast' to submit predictions for each market above.");
      return;
    }

    ctx.out(`Model: ${analyst.provider}/${analyst.model} | Revote: ${describeRevoteMode(strategy.revote)}`);
    const summary = await runForecastLoop(
      { client: ctx.client, analyst, sleep: ctx.sleep },
      {
        ...strategy,
        submitDelayMs: config.strategy.submitDelayMs,
        limit: MAX_MARKETS_LIMIT,
        category: optionalString(flags, "category"),
      }
    );
    printLines(ctx, renderLoopSummary(summary));
  },
};

// ============ v2 ============

const tasks: CommandSpec = {
  usage: "tasks [--pack <slug>] [--customer <slug>] [--json]",
  description: "Fetch the current round and its tasks",
  auth: false,
  async run(ctx, flags) {
    const pack = optionalString(flags, "pack") ?? ctx.config.filters.pack;
    const customer = optionalString(flags, "customer") ?? ctx.config.filters.customer;
    const data = await ctx.client.getTasks({ pack, customer });
    if (hasSwitch(flags, "json")) {
      printJson(ctx, data);
      return;
    }
    printLines(ctx, renderTasks(data, pack));
  },
};

const predict: CommandSpec = {
  usage:
    "predict --round <id> --market <id> --p_yes <p> [--confidence 0.8] [--stake 5] [--rationale <text>]",
  description: "Submit a single prediction",
  auth: true,
  async run(ctx, flags) {
    const roundId = requireString(flags, "round");
    const prediction = buildPrediction({
      packMarketId: requireString(flags, "market"),
      pYes: requireNumber(flags, "p_yes"),
      confidence: optionalNumber(flags, "confidence") ?? 0.8,
      stake: optionalNumber(flags, "stake") ?? 5,
      rationale: optionalString(flags, "rationale"),
    });

    const result = await ctx.client.submitPredictions(roundId, [prediction]);
    if (!result.ok) {
      throw new ApiError("Prediction rejected", { endpoint: "/agent-predictions-batch" });
    }

    ctx.out("✅ Prediction submitted!");
    ctx.out(`   round: ${shortId(roundId)} | market: ${shortId(prediction.pack_market_id)}`);
    ctx.out(`   p_yes: ${prediction.p_yes} | conf: ${prediction.confidence} | stake: ${prediction.stake}`);
    for (const e of result.errors) {
      ctx.out(`   ⚠️  ${shortId(e.pack_market_id)}: ${e.error}`);
    }
  },
};

const batch: CommandSpec = {
  usage: "batch --round <id> --file <path|->",
  description: "Submit up to 50 predictions from a JSON array",
  auth: true,
  async run(ctx, flags) {
    const roundId = requireString(flags, "round");
    const items = await readPredictionsFile(ctx, requireString(flags, "file"));
    const { predictions } = buildPredictionBatch(roundId, items);

    const result = await ctx.client.submitPredictions(roundId, predictions);
    if (!result.ok) {
      throw new ApiError("Batch rejected", { endpoint: "/agent-predictions-batch" });
    }
    printLines(ctx, renderBatchResult(result));
  },
};

const status: CommandSpec = {
  usage: "status [--round <id>] [--status open|closed|scored|all] [--json]",
  description: "Check existing predictions",
  auth: true,
  async run(ctx, flags) {
    const data = await ctx.client.myPredictions({
      roundId: optionalString(flags, "round"),
      status: oneOf(flags, "status", ["open", "closed", "scored", "all"] as const) ?? "open",
      limit: 100,
    });
    if (hasSwitch(flags, "json")) {
      printJson(ctx, data);
      return;
    }
    printLines(ctx, renderPredictions(data.predictions));
  },
};

// ============ Registration ============

const register: CommandSpec = {
  usage: "register --name <name> --invite <code>",
  description: "Register a new agent",
  auth: false,
  async run(ctx, flags) {
    const result = await ctx.client.register({
      name: requireString(flags, "name"),
      inviteCode: requireString(flags, "invite"),
    });
    ctx.out("✅ Agent registered!");
    ctx.out(`   ORACLE_AGENT_ID=${result.agent_id}`);
    ctx.out(`   ORACLE_API_KEY=${result.api_key}`);
    ctx.out("   The API key is shown once; store it now.");
  },
};

export const COMMANDS: Record<Exclude<CommandName, "help">, CommandSpec> = {
  markets,
  forecast,
  history,
  auto,
  tasks,
  predict,
  batch,
  status,
  register,
};

export function helpText(): string {
  const lines = [
    "ORACLES.run agent",
    "",
    "USAGE:",
    "  npm start -- <command> [options]",
    "",
    "COMMANDS:",
  ];
  for (const spec of Object.values(COMMANDS)) {
    lines.push(`  ${spec.usage}`, `      ${spec.description}${spec.auth ? " (needs credentials)" : ""}`);
  }
  lines.push(
    "",
    "OPTIONS:",
    "  -v, --verbose    Enable debug logging",
    "",
    "ENVIRONMENT:",
    "  ORACLE_AGENT_ID, ORACLE_API_KEY       agent credentials",
    "  ORACLE_PACK, ORACLE_CUSTOMER          v2 task filters",
    "  ALLOW_REVOTE=1 | REVOTE_DEADLINE_WITHIN=<seconds>",
    "  LLM_PROVIDER + OPENAI_/ANTHROPIC_/GEMINI_/GROQ_/OPENROUTER_API_KEY (and _MODEL)"
  );
  return lines.join("\n");
}
