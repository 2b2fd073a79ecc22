import crypto from "crypto";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ApiError, ConfigError, NetworkError, ValidationError, logger } from "@oracles/core";
import { OraclesClient } from "../client.js";
import { buildForecast } from "../payloads.js";

const BASE_URL = "https://api.test/v1";

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function callAt(mock: Mock<typeof fetch>, index: number) {
  const call = mock.mock.calls[index];
  if (!call) throw new Error(`fetch call ${index} missing`);
  const [input, init] = call;
  return { url: String(input), init, headers: new Headers(init?.headers) };
}

describe("OraclesClient", () => {
  let mockFetch: Mock<typeof fetch>;
  let client: OraclesClient;

  beforeEach(() => {
    logger.setHandlers([]);
    mockFetch = vi.fn<typeof fetch>();
    client = new OraclesClient({
      baseUrl: `${BASE_URL}/`,
      credentials: { agentId: "agent-1", apiKey: "test-secret" },
      fetch: mockFetch,
    });
  });

  afterEach(() => {
    logger.resetHandlers();
  });

  describe("listMarkets", () => {
    it("requests open markets and fills defaults", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse([{ slug: "btc-100k", title: "BTC above 100k?", market_prob: "0.42" }])
      );

      const markets = await client.listMarkets();

      const { url, headers } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/list-markets?status=open&limit=100`);
      expect(headers.get("X-Agent-Id")).toBeNull();
      expect(markets).toHaveLength(1);
      expect(markets[0]).toMatchObject({
        slug: "btc-100k",
        description: "",
        market_prob: 0.42,
        forecasts_count: 0,
        polymarket_outcomes: [],
      });
    });

    it("caps the limit at 200", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([]));

      await client.listMarkets({ limit: 500, category: "crypto" });

      expect(callAt(mockFetch, 0).url).toBe(`${BASE_URL}/list-markets?status=open&limit=200&category=crypto`);
    });

    it("rejects an unexpected response shape", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ markets: [] }));

      await expect(client.listMarkets()).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("myForecasts", () => {
    it("sends identity headers without a signature", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ forecasts: [{ market_slug: "btc-100k", p_yes: 0.7, confidence: 0.8 }] }));

      const result = await client.myForecasts({ limit: 1000 });

      const { url, headers } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/my-forecasts?limit=100`);
      expect(headers.get("X-Agent-Id")).toBe("agent-1");
      expect(headers.get("X-Api-Key")).toBe("test-secret");
      expect(headers.get("X-Signature")).toBeNull();
      expect(result.forecasts[0]?.stake_units).toBe(0);
    });

    it("pages with offset and tolerates null numbers", async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({
          forecasts: [
            { market_slug: "a", p_yes: 0.5, confidence: 0.5 },
            { market_slug: "b", p_yes: "n/a", confidence: null },
          ],
        })
      );

      const result = await client.myForecasts({ status: "open", limit: 100, offset: 100 });

      expect(callAt(mockFetch, 0).url).toBe(`${BASE_URL}/my-forecasts?status=open&limit=100&offset=100`);
      expect(result.forecasts[1]).toMatchObject({ market_slug: "b", p_yes: undefined, confidence: undefined });
    });

    it("fails without credentials before any request", async () => {
      const anonymous = new OraclesClient({ baseUrl: BASE_URL, fetch: mockFetch });

      await expect(anonymous.myForecasts()).rejects.toBeInstanceOf(ConfigError);
      expect(anonymous.hasCredentials).toBe(false);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("submitForecast", () => {
    it("signs the exact body it sends", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, forecast_id: "f-1" }));
      const forecast = buildForecast({ marketSlug: "btc-100k", pYes: 0.7, confidence: 0.8, stakeUnits: 12 });

      const result = await client.submitForecast(forecast);

      const { url, init, headers } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/agent-forecast`);
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe(
        '{"market_slug":"btc-100k","p_yes":0.7,"confidence":0.8,"stake_units":12,"rationale":""}'
      );
      expect(headers.get("Content-Type")).toBe("application/json");
      expect(headers.get("X-Signature")).toBe(
        crypto.createHmac("sha256", "test-secret").update(String(init?.body)).digest("hex")
      );
      expect(result.forecast_id).toBe("f-1");
    });

    it("surfaces the server's error message", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: "Market closed" }, 409));
      const forecast = buildForecast({ marketSlug: "old-market", pYes: 0.5 });

      const error = await client.submitForecast(forecast).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.message).toBe("HTTP 409 from /agent-forecast");
        expect(error.statusCode).toBe(409);
        expect(error.remoteError).toBe("Market closed");
        expect(error.retryable).toBe(false);
      }
    });

    it("keeps non-JSON error bodies in the context", async () => {
      mockFetch.mockResolvedValueOnce(new Response("Bad Gateway", { status: 502 }));
      const forecast = buildForecast({ marketSlug: "m", pYes: 0.5 });

      const error = await client.submitForecast(forecast).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      if (error instanceof ApiError) {
        expect(error.remoteError).toBeUndefined();
        expect(error.context).toEqual({ body: "Bad Gateway" });
      }
    });

    it("wraps transport failures", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
      const forecast = buildForecast({ marketSlug: "m", pYes: 0.5 });

      await expect(client.submitForecast(forecast)).rejects.toThrow(
        new NetworkError("Failed to reach /agent-forecast: fetch failed")
      );
    });
  });

  describe("v2", () => {
    it("passes pack and customer filters to /agent-tasks", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ round: null, tasks: null }));

      const result = await client.getTasks({ pack: "btc-daily", customer: "acme" });

      const { url, headers } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/agent-tasks?pack=btc-daily&customer=acme`);
      expect(headers.get("X-Agent-Id")).toBe("agent-1");
      expect(result.round).toBeUndefined();
      expect(result.tasks).toEqual([]);
    });

    it("drops status=all from /my-predictions", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ predictions: [] }));

      await client.myPredictions({ roundId: "round-1", status: "all", limit: 200 });

      expect(callAt(mockFetch, 0).url).toBe(`${BASE_URL}/my-predictions?round_id=round-1&limit=200`);
    });

    it("signs prediction batches", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ ok: true, upserted: 1 }));

      const result = await client.submitPredictions("round-1", [
        { pack_market_id: "pm-1", p_yes: 0.6, confidence: 0.7, stake: 8 },
      ]);

      const { url, init, headers } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/agent-predictions-batch`);
      expect(init?.body).toBe(
        '{"round_id":"round-1","predictions":[{"pack_market_id":"pm-1","p_yes":0.6,"confidence":0.7,"stake":8}]}'
      );
      expect(headers.get("X-Signature")).toBe(
        crypto.createHmac("sha256", "test-secret").update(String(init?.body)).digest("hex")
      );
      expect(result).toMatchObject({ ok: true, upserted: 1, errors: [] });
    });

    it("refuses oversized batches locally", async () => {
      const predictions = Array.from({ length: 51 }, (_, i) => ({
        pack_market_id: `pm-${i}`,
        p_yes: 0.6,
        confidence: 0.7,
        stake: 8,
      }));

      await expect(client.submitPredictions("round-1", predictions)).rejects.toBeInstanceOf(ValidationError);
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe("register", () => {
    it("posts the name and invite code", async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ agent_id: "agent-9", api_key: "test-secret-9" }));
      const anonymous = new OraclesClient({ baseUrl: BASE_URL, fetch: mockFetch });

      const result = await anonymous.register({ name: "my-bot", inviteCode: "test-invite" });

      const { url, init } = callAt(mockFetch, 0);
      expect(url).toBe(`${BASE_URL}/register-agent`);
      expect(init?.body).toBe('{"name":"my-bot","invite_code":"test-invite"}');
      expect(result).toMatchObject({ agent_id: "agent-9", api_key: "test-secret-9" });
    });
  });
});
