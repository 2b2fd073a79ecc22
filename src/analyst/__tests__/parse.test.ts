import { describe, expect, it } from "vitest";
import { AnalystError } from "@oracles/core";
import { parseAnalysis } from "../parse.js";

describe("parseAnalysis", () => {
  it("reads JSON wrapped in prose or fences", () => {
    const text = 'Here you go:\n```json\n{"p_yes": 0.7, "confidence": 0.8, "rationale": "Momentum", "selected_outcome": null}\n```';

    expect(parseAnalysis(text, "openai")).toEqual({
      pYes: 0.7,
      confidence: 0.8,
      rationale: "Momentum",
      selectedOutcome: undefined,
    });
  });

  it("clamps out-of-range values", () => {
    const analysis = parseAnalysis('{"p_yes": 1.5, "confidence": -0.2, "rationale": "x"}', "groq");
    expect(analysis.pYes).toBe(0.99);
    expect(analysis.confidence).toBe(0);
  });

  it("accepts numeric strings", () => {
    const analysis = parseAnalysis('{"p_yes": "0.3", "confidence": "0.6"}', "gemini");
    expect(analysis).toEqual({ pYes: 0.3, confidence: 0.6, rationale: "", selectedOutcome: undefined });
  });

  it("falls back for missing fields", () => {
    expect(parseAnalysis("{}", "openai")).toEqual({
      pYes: 0.5,
      confidence: 0,
      rationale: "",
      selectedOutcome: undefined,
    });
  });

  it("trims the selected outcome and ignores a literal null", () => {
    expect(parseAnalysis('{"selected_outcome": " Team B "}', "openai").selectedOutcome).toBe("Team B");
    expect(parseAnalysis('{"selected_outcome": "null"}', "openai").selectedOutcome).toBeUndefined();
    expect(parseAnalysis('{"selected_outcome": ""}', "openai").selectedOutcome).toBeUndefined();
  });

  it("fails when no JSON is present", () => {
    expect(() => parseAnalysis("I cannot answer that.", "anthropic")).toThrow(AnalystError);
    expect(() => parseAnalysis("I cannot answer that.", "anthropic")).toThrow(
      "Could not find JSON in response: I cannot answer that."
    );
  });

  it("fails on malformed JSON", () => {
    expect(() => parseAnalysis('{"p_yes": 0.7,}', "openai")).toThrow("Malformed JSON in response");
  });

  it("fails on a wrongly typed rationale", () => {
    expect(() => parseAnalysis('{"p_yes": 0.7, "rationale": 42}', "openai")).toThrow(
      "Unexpected analysis shape: rationale"
    );
  });
});
