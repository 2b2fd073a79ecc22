/**
 * Request signing
 *
 * X-Signature is the lowercase hex HMAC-SHA256 of the exact request body, keyed
 * with the agent's API key. The body string is produced once and the same string
 * is hashed and sent; re-encoding it after signing breaks verification.
 */

import crypto from "crypto";
import type { AgentCredentials } from "@oracles/core";
import type { SignedPayload } from "./payloads.js";

export interface SignedBody {
  body: string;
  signature: string;
}

export const SIGNED_ENDPOINTS: Record<SignedPayload["kind"], string> = {
  forecast: "/agent-forecast",
  predictions: "/agent-predictions-batch",
};

/**
 * HMAC-SHA256(secret, body) as lowercase hex
 */
export function signBody(body: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(body, "utf8").digest("hex");
}

/**
 * Serialize a payload once and sign that exact string
 */
export function serializePayload(payload: SignedPayload, secret: string): SignedBody {
  const body = payload.kind === "forecast"
    ? JSON.stringify(payload.forecast)
    : JSON.stringify(payload.batch);

  return { body, signature: signBody(body, secret) };
}

/**
 * Identity headers, plus X-Signature when a signed body goes with the request
 */
export function authHeaders(credentials: AgentCredentials, signed?: SignedBody): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "X-Agent-Id": credentials.agentId,
    "X-Api-Key": credentials.apiKey,
  };
  if (signed) {
    headers["X-Signature"] = signed.signature;
  }
  return headers;
}
