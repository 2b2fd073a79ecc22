#!/usr/bin/env node
/**
 * ORACLES.run agent - CLI entry point
 *
 * USAGE:
 *   npm start -- markets
 *   npm start -- auto                  # v1 loop over open markets
 *   npm start -- auto --v2 --pack btc  # v2 loop over the current round
 */

import "dotenv/config";

import { runCli } from "./cli/run.js";

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
