/**
 * Shared pipeline types
 */

import type { OraclesClient } from "@oracles/client";
import type { Analyst } from "../analyst/index.js";
import type { RevoteMode } from "../strategy/revote.js";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export interface PipelineDeps<TClient extends keyof OraclesClient> {
  client: Pick<OraclesClient, TClient>;
  analyst: Analyst;
  sleep?: Sleep;
  now?: () => Date;
}

export interface StrategyOptions {
  minConfidence: number;
  maxStake: number;
  revote: RevoteMode;
}
