/**
 * Argument relay: splits the tool's own format flags from the flags that
 * belong to the wrapped utility and rebuilds the utility's argv
 */

import type {
  FlagName,
  FormatFlagName,
  InvocationArgs,
  PluginConfig,
  RelayedFlagName,
} from "./types.js";

/**
 * Every flag the command line accepts, in relay order
 */
export const FLAGS: readonly FlagName[] = ["f", "F", "w", "c", "s", "n", "H", "g", "d", "h", "m"];

/**
 * Flags that take no value
 */
export const BOOLEAN_FLAGS: ReadonlySet<FlagName> = new Set<FlagName>(["h", "m"]);

const FORMAT_FLAGS: ReadonlySet<FlagName> = new Set<FlagName>(["f", "F"]);

export function isFormatFlag(flag: FlagName): flag is FormatFlagName {
  return FORMAT_FLAGS.has(flag);
}

export function isRelayedFlag(flag: FlagName): flag is RelayedFlagName {
  return !FORMAT_FLAGS.has(flag);
}

/**
 * True when a parsed value means "flag given without an argument"
 */
function isBareFlag(flag: FlagName, value: string | true): boolean {
  return value === true || (BOOLEAN_FLAGS.has(flag) && value === "1");
}

/**
 * Build the argv handed to the wrapped utility
 *
 * The result is an argument vector, not a command line: values are passed
 * through untouched and never reach a shell.
 */
export function relayArguments(args: InvocationArgs): string[] {
  const argv: string[] = [];

  for (const flag of FLAGS) {
    const value = args[flag];
    if (value === undefined || !isRelayedFlag(flag)) {
      continue;
    }

    if (isBareFlag(flag, value)) {
      argv.push(`-${flag}`);
    } else if (value !== true) {
      argv.push(`-${flag}`, value);
    }
  }

  return argv;
}

/**
 * Split parsed flags into the format strings and the relayed set
 */
export function buildConfig(args: InvocationArgs, utility: string): PluginConfig {
  const relayed: InvocationArgs = {};
  let okFormat: string | undefined;
  let problemFormat: string | undefined;

  for (const flag of FLAGS) {
    const value = args[flag];
    if (value === undefined) {
      continue;
    }

    if (isFormatFlag(flag)) {
      // A format flag given without text behaves as if it were absent
      const text = value === true ? undefined : value;
      if (flag === "f") {
        okFormat = text;
      } else {
        problemFormat = text;
      }
    } else {
      relayed[flag] = value;
    }
  }

  return { okFormat, problemFormat, relayed, utility };
}
