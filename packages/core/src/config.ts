/**
 * Configuration Management
 * Loads and validates configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

export const DEFAULT_BASE_URL = "https://sjtxbkmmicwmkqrmyqln.supabase.co/functions/v1";

export const LLM_PROVIDERS = ["openai", "anthropic", "gemini", "groq", "openrouter"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const DEFAULT_MODELS: Record<LlmProvider, string> = {
  openai: "gpt-4o",
  anthropic: "claude-sonnet-4-20250514",
  gemini: "gemini-2.5-flash",
  groq: "llama-3.3-70b-versatile",
  openrouter: "openai/gpt-4o",
};

// dotenv leaves unset keys as "" when written as KEY=
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const flag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((v) => v === "1" || v?.toLowerCase() === "true")
);

const envSchema = z.object({
  // ORACLES.run identity
  ORACLE_AGENT_ID: optionalString,
  ORACLE_API_KEY: optionalString,
  ORACLE_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url("ORACLE_BASE_URL must be a valid URL").default(DEFAULT_BASE_URL)
  ),
  ORACLE_PACK: optionalString,
  ORACLE_CUSTOMER: optionalString,

  // Revote policy
  ALLOW_REVOTE: flag,
  REVOTE_DEADLINE_WITHIN: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0, "REVOTE_DEADLINE_WITHIN must be >= 0").default(0)
  ),

  // Stake sizing and pacing
  MIN_CONFIDENCE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(0.55)),
  MAX_STAKE: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(100).default(20)),
  SUBMIT_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(1500)),
  ANALYSIS_DELAY_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(1000)),

  // LLM providers
  LLM_PROVIDER: z.preprocess(blankToUndefined, z.enum(LLM_PROVIDERS).optional()),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: optionalString,
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: optionalString,
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENROUTER_MODEL: optionalString,

  // General
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(["debug", "info", "warn", "error"]).default("info")),
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(["development", "production", "test"]).default("development")
  ),
});

export type Env = z.infer<typeof envSchema>;

export interface AgentCredentials {
  agentId: string;
  apiKey: string;
}

export interface AnalystSettings {
  provider: LlmProvider;
  apiKey: string;
  model: string;
}

export interface Config {
  agent: {
    id?: string;
    apiKey?: string;
  };

  api: {
    baseUrl: string;
  };

  filters: {
    pack?: string;
    customer?: string;
  };

  strategy: {
    minConfidence: number;
    maxStake: number;
    submitDelayMs: number;
    analysisDelayMs: number;
    allowRevote: boolean;
    revoteDeadlineWithinSeconds: number;
  };

  /** Undefined when no provider key is configured */
  analyst?: AnalystSettings;

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    nodeEnv: "development" | "production" | "test";
  };
}

const PROVIDER_ENV: Record<LlmProvider, { key: keyof Env; model: keyof Env }> = {
  openai: { key: "OPENAI_API_KEY", model: "OPENAI_MODEL" },
  anthropic: { key: "ANTHROPIC_API_KEY", model: "ANTHROPIC_MODEL" },
  gemini: { key: "GEMINI_API_KEY", model: "GEMINI_MODEL" },
  groq: { key: "GROQ_API_KEY", model: "GROQ_MODEL" },
  openrouter: { key: "OPENROUTER_API_KEY", model: "OPENROUTER_MODEL" },
};

function readProvider(env: Env, provider: LlmProvider): AnalystSettings | undefined {
  const apiKey = env[PROVIDER_ENV[provider].key];
  if (typeof apiKey !== "string") {
    return undefined;
  }
  const model = env[PROVIDER_ENV[provider].model];
  return {
    provider,
    apiKey,
    model: typeof model === "string" ? model : DEFAULT_MODELS[provider],
  };
}

/**
 * Pick the LLM provider: LLM_PROVIDER when set, else the first one with a key
 */
function resolveAnalyst(env: Env): AnalystSettings | undefined {
  if (env.LLM_PROVIDER) {
    const settings = readProvider(env, env.LLM_PROVIDER);
    if (!settings) {
      throw new ConfigError(
        `LLM_PROVIDER=${env.LLM_PROVIDER} but ${PROVIDER_ENV[env.LLM_PROVIDER].key} is not set`,
        { provider: env.LLM_PROVIDER }
      );
    }
    return settings;
  }

  for (const provider of LLM_PROVIDERS) {
    const settings = readProvider(env, provider);
    if (settings) return settings;
  }
  return undefined;
}

/**
 * Load and validate configuration
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const env = parseResult.data;

  return {
    agent: {
      id: env.ORACLE_AGENT_ID,
      apiKey: env.ORACLE_API_KEY,
    },

    api: {
      baseUrl: env.ORACLE_BASE_URL.replace(/\/+$/, ""),
    },

    filters: {
      pack: env.ORACLE_PACK,
      customer: env.ORACLE_CUSTOMER,
    },

    strategy: {
      minConfidence: env.MIN_CONFIDENCE,
      maxStake: env.MAX_STAKE,
      submitDelayMs: env.SUBMIT_DELAY_MS,
      analysisDelayMs: env.ANALYSIS_DELAY_MS,
      allowRevote: env.ALLOW_REVOTE,
      revoteDeadlineWithinSeconds: env.REVOTE_DEADLINE_WITHIN,
    },

    analyst: resolveAnalyst(env),

    env: {
      logLevel: env.LOG_LEVEL,
      nodeEnv: env.NODE_ENV,
    },
  };
}

let configInstance: Config | null = null;

/**
 * Get configuration (lazy-loaded singleton)
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset config (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

/**
 * Agent id and key, required by every authenticated endpoint
 */
export function requireCredentials(config: Config): AgentCredentials {
  const missing: string[] = [];
  if (!config.agent.id) missing.push("ORACLE_AGENT_ID");
  if (!config.agent.apiKey) missing.push("ORACLE_API_KEY");

  if (!config.agent.id || !config.agent.apiKey) {
    throw new ConfigError(`Missing required environment variable(s): ${missing.join(", ")}`, {
      missing,
    });
  }

  return { agentId: config.agent.id, apiKey: config.agent.apiKey };
}
