/**
 * Configuration loading tests
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_BASE_URL, loadConfig, requireCredentials } from "../config.js";
import { ConfigError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.api.baseUrl).toBe(DEFAULT_BASE_URL);
    expect(config.agent).toEqual({ id: undefined, apiKey: undefined });
    expect(config.strategy).toEqual({
      minConfidence: 0.55,
      maxStake: 20,
      submitDelayMs: 1500,
      analysisDelayMs: 1000,
      allowRevote: false,
      revoteDeadlineWithinSeconds: 0,
    });
    expect(config.analyst).toBeUndefined();
    expect(config.env.logLevel).toBe("info");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ ORACLE_AGENT_ID: "", ORACLE_API_KEY: "  ", MIN_CONFIDENCE: "" });

    expect(config.agent.id).toBeUndefined();
    expect(config.agent.apiKey).toBeUndefined();
    expect(config.strategy.minConfidence).toBe(0.55);
  });

  it("reads credentials, filters and revote flags", () => {
    const config = loadConfig({
      ORACLE_AGENT_ID: "agent-1",
      ORACLE_API_KEY: "test-secret",
      ORACLE_PACK: "btc-daily",
      ALLOW_REVOTE: "1",
      REVOTE_DEADLINE_WITHIN: "3600",
      MAX_STAKE: "50",
    });

    expect(config.agent).toEqual({ id: "agent-1", apiKey: "test-secret" });
    expect(config.filters.pack).toBe("btc-daily");
    expect(config.strategy.allowRevote).toBe(true);
    expect(config.strategy.revoteDeadlineWithinSeconds).toBe(3600);
    expect(config.strategy.maxStake).toBe(50);
  });

  it("strips trailing slashes from the base URL", () => {
    const config = loadConfig({ ORACLE_BASE_URL: "https://api.test/v1/" });
    expect(config.api.baseUrl).toBe("https://api.test/v1");
  });

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ MIN_CONFIDENCE: "1.5" })).toThrow(ConfigError);
    expect(() => loadConfig({ MIN_CONFIDENCE: "1.5" })).toThrow(/MIN_CONFIDENCE/);
  });

  describe("analyst selection", () => {
    it("picks the first provider with a key", () => {
      const config = loadConfig({ ANTHROPIC_API_KEY: "test-key", GROQ_API_KEY: "test-key-2" });
      expect(config.analyst).toEqual({
        provider: "anthropic",
        apiKey: "test-key",
        model: "claude-sonnet-4-20250514",
      });
    });

    it("honours LLM_PROVIDER and a model override", () => {
      const config = loadConfig({
        LLM_PROVIDER: "groq",
        OPENAI_API_KEY: "test-key",
        GROQ_API_KEY: "test-key-2",
        GROQ_MODEL: "llama-test",
      });
      expect(config.analyst).toEqual({ provider: "groq", apiKey: "test-key-2", model: "llama-test" });
    });

    it("fails when LLM_PROVIDER has no key", () => {
      expect(() => loadConfig({ LLM_PROVIDER: "gemini" })).toThrow(
        "LLM_PROVIDER=gemini but GEMINI_API_KEY is not set"
      );
    });
  });
});

describe("requireCredentials", () => {
  it("returns id and key", () => {
    const config = loadConfig({ ORACLE_AGENT_ID: "agent-1", ORACLE_API_KEY: "test-secret" });
    expect(requireCredentials(config)).toEqual({ agentId: "agent-1", apiKey: "test-secret" });
  });

  it("names every missing variable", () => {
    const config = loadConfig({});
    expect(() => requireCredentials(config)).toThrow(
      "Missing required environment variable(s): ORACLE_AGENT_ID, ORACLE_API_KEY"
    );
  });
});
