/**
 * Command-line option parsing
 *
 * Every flag is a single character. `-f` and `-F` belong to this tool; the
 * rest are declared only so they can be validated and handed on to the
 * wrapped utility. `-h` is one of those, so help lives on `--help`.
 */

import { Command, CommanderError } from "commander";
import { FLAGS, OptionParseError } from "@check-collectd/core";
import type { FlagName, InvocationArgs } from "@check-collectd/core";
import { logger } from "./logger.js";

export type ParsedOptions =
  | { kind: "run"; args: InvocationArgs }
  | { kind: "info"; text: string }
  | { kind: "invalid"; error: OptionParseError };

const FLAG_OPTIONS: Record<FlagName, [flags: string, description: string]> = {
  f: ["-f <format>", "printf-style format applied to OK results"],
  F: ["-F <format>", "printf-style format applied to WARNING and CRITICAL results"],
  w: ["-w <range>", "warning range"],
  c: ["-c <range>", "critical range"],
  s: ["-s <socket>", "path to the collectd unixsock socket"],
  n: ["-n <value>", "value specification (plugin/type)"],
  H: ["-H <host>", "hostname the value belongs to"],
  g: ["-g <consolidation>", "none, average, sum or percentage"],
  d: ["-d <ds>", "data source to check"],
  h: ["-h", "passed on to the wrapped utility"],
  m: ["-m", "treat NaN values as critical"],
};

/**
 * Build the commander program; output is captured so callers decide where
 * it is written
 */
function createProgram(version: string, output: { out: string; err: string }): Command {
  const program = new Command()
    .name("check_collectd")
    .description("Re-render collectd-nagios status lines through printf-style formats")
    .version(version, "--version", "output the version number")
    .helpOption("--help", "display help for command")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        output.out += str;
      },
      writeErr: (str) => {
        output.err += str;
      },
    });

  for (const flag of FLAGS) {
    const [flags, description] = FLAG_OPTIONS[flag];
    program.option(flags, description);
  }

  return program;
}

/**
 * Pull the declared flags out of commander's option bag
 */
function toInvocationArgs(opts: Record<string, unknown>): InvocationArgs {
  const args: InvocationArgs = {};
  for (const flag of FLAGS) {
    const value = opts[flag];
    if (value === true || typeof value === "string") {
      args[flag] = value;
    }
  }
  return args;
}

/**
 * Parse user arguments (without the node and script entries)
 *
 * Unknown flags, missing values and stray arguments come back as `invalid`
 * so the caller decides when to report them.
 */
export function parseOptions(argv: readonly string[], version: string): ParsedOptions {
  const output = { out: "", err: "" };
  const program = createProgram(version, output);

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === "commander.helpDisplayed" || err.code === "commander.version") {
        return { kind: "info", text: output.out };
      }
      logger.debug("options.rejected", { code: err.code, stderr: output.err.trim() });
      const reason = err.message.replace(/^error: /, "");
      return { kind: "invalid", error: new OptionParseError(argv, reason, { cause: err }) };
    }
    throw err;
  }

  return { kind: "run", args: toInvocationArgs(program.opts()) };
}
