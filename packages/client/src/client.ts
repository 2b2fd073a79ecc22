/**
 * ORACLES.run API Client
 * Public market/task reads, authenticated history reads and signed submissions
 */

import {
  getConfig,
  logger,
  ApiError,
  ConfigError,
  NetworkError,
  DEFAULT_BASE_URL,
  errorMessage,
  type AgentCredentials,
  type ChildLogger,
  type Config,
} from "@oracles/core";
import type { z } from "zod";
import {
  MarketsResponseSchema,
  MyForecastsResponseSchema,
  ForecastResultSchema,
  TasksResponseSchema,
  MyPredictionsResponseSchema,
  BatchResultSchema,
  RegisterResultSchema,
  type Market,
  type MyForecastsResponse,
  type ForecastResult,
  type TasksResponse,
  type MyPredictionsResponse,
  type BatchResult,
  type RegisterResult,
} from "./types.js";
import {
  buildPredictionBatch,
  validate,
  type Forecast,
  type Prediction,
  type SignedPayload,
} from "./payloads.js";
import { authHeaders, serializePayload, SIGNED_ENDPOINTS } from "./signing.js";

export const MAX_MARKETS_LIMIT = 200;
export const MAX_HISTORY_LIMIT = 100;

const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_TIMEOUT_MS = 60_000;

type QueryValue = string | number | undefined;

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface RequestOptions<T> {
  method: "GET" | "POST";
  params?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: string;
  schema: ResponseSchema<T>;
  timeoutMs?: number;
}

export interface OraclesClientOptions {
  baseUrl?: string;
  credentials?: AgentCredentials;
  fetch?: typeof fetch;
  timeoutMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * ORACLES.run API Client
 */
export class OraclesClient {
  private log: ChildLogger;
  private readonly baseUrl: string;
  private readonly credentials?: AgentCredentials;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  constructor(options: OraclesClientOptions = {}) {
    this.log = logger.child({ component: "oracles-client" });
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.credentials = options.credentials;
    // Late-bound so a stubbed global fetch is picked up
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  get hasCredentials(): boolean {
    return this.credentials !== undefined;
  }

  private buildUrl(path: string, params: Record<string, QueryValue> = {}): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== "") search.set(key, String(value));
    }
    const query = search.toString();
    return `${this.baseUrl}${path}${query ? `?${query}` : ""}`;
  }

  private requireCredentials(endpoint: string): AgentCredentials {
    if (!this.credentials) {
      throw new ConfigError(`ORACLE_AGENT_ID and ORACLE_API_KEY are required for ${endpoint}`, {
        endpoint,
      });
    }
    return this.credentials;
  }

  /**
   * Make a request and validate the JSON answer
   */
  async request<T>(path: string, options: RequestOptions<T>): Promise<T> {
    const url = this.buildUrl(path, options.params);
    this.log.debug("API request", { method: options.method, path });

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method: options.method,
        headers: { Accept: "application/json", ...options.headers },
        body: options.body,
        signal: AbortSignal.timeout(options.timeoutMs ?? this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new NetworkError(
        `Failed to reach ${path}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    const data = parseJson(text);

    if (!response.ok) {
      const remoteError = isRecord(data) && typeof data.error === "string" ? data.error : undefined;
      throw new ApiError(`HTTP ${response.status} from ${path}`, {
        statusCode: response.status,
        endpoint: path,
        remoteError,
        context: remoteError ? undefined : { body: text.slice(0, 200) },
      });
    }

    return validate(options.schema, data, `response from ${path}`);
  }

  /**
   * Sign and POST a payload. The serialized string is the transmitted body.
   */
  private async submit<T>(payload: SignedPayload, schema: ResponseSchema<T>, timeoutMs?: number): Promise<T> {
    const endpoint = SIGNED_ENDPOINTS[payload.kind];
    const credentials = this.requireCredentials(endpoint);
    const signed = serializePayload(payload, credentials.apiKey);

    return this.request(endpoint, {
      method: "POST",
      headers: authHeaders(credentials, signed),
      body: signed.body,
      schema,
      timeoutMs,
    });
  }

  // ============ v1 ============

  /**
   * Open markets (public)
   */
  async listMarkets(options: { status?: string; limit?: number; category?: string } = {}): Promise<Market[]> {
    return this.request("/list-markets", {
      method: "GET",
      params: {
        status: options.status ?? "open",
        limit: Math.min(options.limit ?? 100, MAX_MARKETS_LIMIT),
        category: options.category,
      },
      schema: MarketsResponseSchema,
    });
  }

  /**
   * The agent's own forecast history
   */
  async myForecasts(options: { status?: string; limit?: number; offset?: number } = {}): Promise<MyForecastsResponse> {
    const credentials = this.requireCredentials("/my-forecasts");
    return this.request("/my-forecasts", {
      method: "GET",
      params: {
        status: options.status,
        limit: Math.min(options.limit ?? 100, MAX_HISTORY_LIMIT),
        offset: options.offset,
      },
      headers: authHeaders(credentials),
      schema: MyForecastsResponseSchema,
    });
  }

  /**
   * Submit one forecast
   */
  async submitForecast(forecast: Forecast): Promise<ForecastResult> {
    this.log.debug("Submitting forecast", { marketSlug: forecast.market_slug });
    return this.submit({ kind: "forecast", forecast }, ForecastResultSchema);
  }

  // ============ v2 ============

  /**
   * Current open round and its tasks. Identity headers go along when configured.
   */
  async getTasks(options: { pack?: string; customer?: string } = {}): Promise<TasksResponse> {
    return this.request("/agent-tasks", {
      method: "GET",
      params: { pack: options.pack, customer: options.customer },
      headers: this.credentials ? authHeaders(this.credentials) : undefined,
      schema: TasksResponseSchema,
    });
  }

  /**
   * The agent's own predictions, optionally for one round
   */
  async myPredictions(options: { roundId?: string; status?: string; limit?: number } = {}): Promise<MyPredictionsResponse> {
    const credentials = this.requireCredentials("/my-predictions");
    return this.request("/my-predictions", {
      method: "GET",
      params: {
        round_id: options.roundId,
        status: options.status === "all" ? undefined : options.status,
        limit: options.limit ?? 100,
      },
      headers: authHeaders(credentials),
      schema: MyPredictionsResponseSchema,
    });
  }

  /**
   * Submit up to 50 predictions for a round
   */
  async submitPredictions(roundId: string, predictions: Prediction[]): Promise<BatchResult> {
    const batch = buildPredictionBatch(roundId, predictions);
    this.log.debug("Submitting prediction batch", { roundId, count: batch.predictions.length });
    return this.submit({ kind: "predictions", batch }, BatchResultSchema, BATCH_TIMEOUT_MS);
  }

  // ============ Registration ============

  /**
   * Register a new agent with an invite code
   */
  async register(options: { name: string; inviteCode: string }): Promise<RegisterResult> {
    return this.request("/register-agent", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: options.name, invite_code: options.inviteCode }),
      schema: RegisterResultSchema,
    });
  }
}

/**
 * Build a client from loaded configuration
 */
export function createClient(config: Config, options: Pick<OraclesClientOptions, "fetch"> = {}): OraclesClient {
  const credentials = config.agent.id && config.agent.apiKey
    ? { agentId: config.agent.id, apiKey: config.agent.apiKey }
    : undefined;

  return new OraclesClient({
    baseUrl: config.api.baseUrl,
    credentials,
    fetch: options.fetch,
  });
}

let clientInstance: OraclesClient | null = null;

/**
 * Get client singleton built from environment configuration
 */
export function getOraclesClient(): OraclesClient {
  if (!clientInstance) {
    clientInstance = createClient(getConfig());
  }
  return clientInstance;
}

/**
 * Reset client (for testing)
 */
export function resetClient(): void {
  clientInstance = null;
}
