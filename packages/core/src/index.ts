/**
 * @oracles/core
 * Configuration, logging and errors shared by the client and the agent
 */

// Config
export {
  loadConfig,
  getConfig,
  resetConfig,
  requireCredentials,
  DEFAULT_BASE_URL,
  DEFAULT_MODELS,
  LLM_PROVIDERS,
  type Config,
  type Env,
  type AgentCredentials,
  type AnalystSettings,
  type LlmProvider,
} from "./config.js";

// Logger
export {
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogHandler,
  type ChildLogger,
} from "./logger.js";

// Errors
export {
  OraclesError,
  ConfigError,
  ApiError,
  NetworkError,
  ValidationError,
  AnalystError,
  isOraclesError,
  isRetryableError,
  errorMessage,
} from "./errors.js";
