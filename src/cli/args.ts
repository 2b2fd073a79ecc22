/**
 * Command-line parsing
 *
 *   oracles <command> [--flag value | --flag=value | --switch] [-v]
 */

import { OraclesError } from "@oracles/core";

export const COMMAND_NAMES = [
  "markets",
  "forecast",
  "history",
  "auto",
  "tasks",
  "predict",
  "batch",
  "status",
  "register",
  "help",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type Flags = Record<string, string | true>;

export interface ParsedArgs {
  command: CommandName;
  flags: Flags;
  verbose: boolean;
}

// Flags that never take a value
const SWITCHES = new Set(["json", "dry-run", "v2", "verbose", "help"]);

/**
 * Bad command line; the CLI exits with status 2
 */
export class UsageError extends OraclesError {
  constructor(message: string) {
    super(message, "USAGE_ERROR", { retryable: false });
    this.name = "UsageError";
  }
}

function isCommandName(value: string): value is CommandName {
  return (COMMAND_NAMES as readonly string[]).includes(value);
}

export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Flags = {};
  let command: CommandName | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
    } else if (arg === "-h") {
      flags.help = true;
    } else if (arg.startsWith("--")) {
      const eq = arg.indexOf("=");
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (!name) {
        throw new UsageError(`Malformed flag: ${arg}`);
      }

      if (eq !== -1) {
        flags[name] = arg.slice(eq + 1);
      } else if (SWITCHES.has(name)) {
        flags[name] = true;
      } else {
        const value = argv[i + 1];
        if (value === undefined || value.startsWith("--")) {
          throw new UsageError(`Missing value for --${name}`);
        }
        flags[name] = value;
        i++;
      }
    } else if (!command) {
      if (!isCommandName(arg)) {
        throw new UsageError(`Unknown command: ${arg}`);
      }
      command = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (!command || flags.help === true) {
    command = "help";
  }

  return { command, flags, verbose };
}

export function optionalString(flags: Flags, name: string): string | undefined {
  const value = flags[name];
  if (value === true) {
    throw new UsageError(`--${name} needs a value`);
  }
  return value;
}

export function requireString(flags: Flags, name: string): string {
  const value = optionalString(flags, name);
  if (value === undefined || value === "") {
    throw new UsageError(`Missing required flag --${name}`);
  }
  return value;
}

export function optionalNumber(flags: Flags, name: string): number | undefined {
  const raw = optionalString(flags, name);
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (raw.trim() === "" || Number.isNaN(value)) {
    throw new UsageError(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function requireNumber(flags: Flags, name: string): number {
  const value = optionalNumber(flags, name);
  if (value === undefined) {
    throw new UsageError(`Missing required flag --${name}`);
  }
  return value;
}

export function hasSwitch(flags: Flags, name: string): boolean {
  return flags[name] === true;
}

export function oneOf<T extends string>(flags: Flags, name: string, allowed: readonly T[]): T | undefined {
  const value = optionalString(flags, name);
  if (value === undefined) return undefined;
  const match = allowed.find((a) => a === value);
  if (!match) {
    throw new UsageError(`--${name} must be one of: ${allowed.join(", ")}`);
  }
  return match;
}
