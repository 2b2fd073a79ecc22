import { describe, expect, it } from "vitest";
import { ValidationError } from "@oracles/core";
import {
  MAX_RATIONALE_LENGTH,
  buildForecast,
  buildPrediction,
  buildPredictionBatch,
  chunkPredictions,
} from "../payloads.js";

describe("buildForecast", () => {
  it("rounds probabilities and fills defaults", () => {
    expect(buildForecast({ marketSlug: "eth-flip", pYes: 0.123456 })).toEqual({
      market_slug: "eth-flip",
      p_yes: 0.1235,
      confidence: 0.5,
      stake_units: 1,
      rationale: "",
    });
  });

  it("keeps field order stable for signing", () => {
    const forecast = buildForecast(
      { marketSlug: "m", pYes: 0.65, confidence: 0.8, stakeUnits: 5, rationale: "r", selectedOutcome: "A" },
      ["A", "B"]
    );
    expect(JSON.stringify(forecast)).toBe(
      '{"market_slug":"m","p_yes":0.65,"confidence":0.8,"stake_units":5,"rationale":"r","selected_outcome":"A"}'
    );
  });

  it("truncates long rationales", () => {
    const forecast = buildForecast({ marketSlug: "m", pYes: 0.5, rationale: "x".repeat(2500) });
    expect(forecast.rationale).toHaveLength(MAX_RATIONALE_LENGTH);
  });

  it("rejects an outcome the market does not list", () => {
    expect(() =>
      buildForecast({ marketSlug: "election", pYes: 0.6, selectedOutcome: "C" }, ["A", "B"])
    ).toThrow('Unknown outcome "C" for election');
  });

  it("reports the offending field", () => {
    try {
      buildForecast({ marketSlug: "m", pYes: 1.2 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe("p_yes");
        expect(error.message).toMatch(/^Invalid forecast \(p_yes\): /);
      }
    }
  });

  it("rejects stakes below 0.1", () => {
    expect(() => buildForecast({ marketSlug: "m", pYes: 0.5, stakeUnits: 0.05 })).toThrow(
      /Invalid forecast \(stake_units\)/
    );
  });
});

describe("buildPrediction", () => {
  it("sets rationale_500 only when given", () => {
    expect(buildPrediction({ packMarketId: "pm-1", pYes: 0.6, confidence: 0.7, stake: 8 })).toEqual({
      pack_market_id: "pm-1",
      p_yes: 0.6,
      confidence: 0.7,
      stake: 8,
    });
    const withRationale = buildPrediction({
      packMarketId: "pm-1",
      pYes: 0.6,
      confidence: 0.7,
      stake: 8,
      rationale: "y".repeat(600),
    });
    expect(withRationale.rationale_500).toHaveLength(500);
  });

  it("requires an integer stake", () => {
    expect(() => buildPrediction({ packMarketId: "pm-1", pYes: 0.6, confidence: 0.7, stake: 3.5 })).toThrow(
      ValidationError
    );
  });
});

describe("buildPredictionBatch", () => {
  const item = { pack_market_id: "pm-1", p_yes: 0.6, confidence: 0.7, stake: 8 };

  it("rejects more than 50 items", () => {
    const items = Array.from({ length: 51 }, () => item);
    expect(() => buildPredictionBatch("round-1", items)).toThrow("Maximum 50 predictions per batch, got 51");
  });

  it("rejects an empty batch", () => {
    expect(() => buildPredictionBatch("round-1", [])).toThrow(ValidationError);
  });

  it("validates each item", () => {
    expect(() => buildPredictionBatch("round-1", [{ ...item, p_yes: 2 }])).toThrow(
      /Invalid prediction batch \(predictions\.0\.p_yes\)/
    );
  });
});

describe("chunkPredictions", () => {
  it("splits into batches of 50", () => {
    const chunks = chunkPredictions(Array.from({ length: 120 }, (_, i) => i));
    expect(chunks.map((c) => c.length)).toEqual([50, 50, 20]);
    expect(chunks[2]?.[0]).toBe(100);
  });
});
