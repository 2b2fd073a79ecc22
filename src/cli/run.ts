/**
 * CLI runner: parse -> configure -> dispatch, returning the exit code
 *
 *   0  success
 *   1  configuration error or failed command
 *   2  usage error
 */

import {
  ConfigError,
  errorMessage,
  getConfig,
  loadConfig,
  logger,
  requireCredentials,
  type Config,
} from "@oracles/core";
import { createClient } from "@oracles/client";
import { createAnalyst, type Analyst } from "../analyst/index.js";
import type { Sleep } from "../pipeline/types.js";
import { parseArgs, UsageError, type ParsedArgs } from "./args.js";
import { COMMANDS, helpText } from "./commands.js";

export interface CliDeps {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Explicit environment instead of process.env */
  env?: NodeJS.ProcessEnv;
  fetch?: typeof fetch;
  analyst?: Analyst;
  sleep?: Sleep;
  readStdin?: () => Promise<string>;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

export const processDeps: CliDeps = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export async function runCli(argv: string[], deps: CliDeps = processDeps): Promise<number> {
  let args: ParsedArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    deps.err(`Error: ${errorMessage(error)}`);
    deps.err("Run with 'help' for usage.");
    return 2;
  }

  if (args.command === "help") {
    deps.out(helpText());
    return 0;
  }

  let config: Config;
  try {
    config = deps.env ? loadConfig(deps.env) : getConfig();
  } catch (error) {
    deps.err(`Configuration error: ${errorMessage(error)}`);
    return 1;
  }

  logger.setLevel(args.verbose ? "debug" : config.env.logLevel);
  const log = logger.child({ command: args.command });
  const spec = COMMANDS[args.command];

  try {
    if (spec.auth) {
      requireCredentials(config);
    }

    await spec.run(
      {
        config,
        client: createClient(config, { fetch: deps.fetch }),
        analyst: deps.analyst ?? createAnalyst(config.analyst),
        out: deps.out,
        readStdin: deps.readStdin ?? readProcessStdin,
        sleep: deps.sleep,
      },
      args.flags
    );
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      deps.err(`Error: ${error.message}`);
      deps.err(`Usage: ${spec.usage}`);
      return 2;
    }
    if (error instanceof ConfigError) {
      deps.err(`Configuration error: ${error.message}`);
      deps.err("Set ORACLE_AGENT_ID and ORACLE_API_KEY (see .env.example).");
      return 1;
    }

    log.debug("Command failed", { error: errorMessage(error) });
    deps.err(`❌ ${errorMessage(error)}`);
    return 1;
  }
}
