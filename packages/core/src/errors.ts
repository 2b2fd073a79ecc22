/**
 * Custom Error Types
 * Structured errors for the agent, the API client and the analysts
 */

/**
 * Base error class for all agent errors
 */
export class OraclesError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "OraclesError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration errors (missing or malformed environment)
 */
export class ConfigError extends OraclesError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", { context, retryable: false });
    this.name = "ConfigError";
  }
}

/**
 * Non-2xx answer from the ORACLES.run API.
 * `remoteError` carries the response body's `error` field when there is one.
 */
export class ApiError extends OraclesError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;
  public readonly remoteError?: string;

  constructor(
    message: string,
    options?: {
      cause?: Error;
      statusCode?: number;
      endpoint?: string;
      remoteError?: string;
      context?: Record<string, unknown>;
    }
  ) {
    const status = options?.statusCode;
    const retryable = status !== undefined && (status === 429 || status >= 500);
    super(message, "API_ERROR", { ...options, retryable });
    this.name = "ApiError";
    this.statusCode = options?.statusCode;
    this.endpoint = options?.endpoint;
    this.remoteError = options?.remoteError;
  }
}

/**
 * Network/connectivity errors
 */
export class NetworkError extends OraclesError {
  constructor(message: string, cause?: Error) {
    super(message, "NETWORK_ERROR", { cause, retryable: true });
    this.name = "NetworkError";
  }
}

/**
 * Validation errors (payloads, responses, CLI input)
 */
export class ValidationError extends OraclesError {
  public readonly field?: string;
  public readonly expected?: string;
  public readonly received?: string;

  constructor(
    message: string,
    options?: {
      field?: string;
      expected?: string;
      received?: string;
      context?: Record<string, unknown>;
    }
  ) {
    super(message, "VALIDATION_ERROR", { context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
    this.expected = options?.expected;
    this.received = options?.received;
  }
}

/**
 * LLM provider errors
 */
export class AnalystError extends OraclesError {
  public readonly provider: string;

  constructor(
    message: string,
    provider: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message, "ANALYST_ERROR", options);
    this.name = "AnalystError";
    this.provider = provider;
  }
}

/**
 * Type guard to check if error is one of ours
 */
export function isOraclesError(error: unknown): error is OraclesError {
  return error instanceof OraclesError;
}

/**
 * Whether a later run could succeed with the same input (rate limit, network)
 */
export function isRetryableError(error: unknown): boolean {
  return isOraclesError(error) && error.retryable;
}

/**
 * One-line description of any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof ApiError && error.remoteError) {
    return `${error.message} (${error.remoteError})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
