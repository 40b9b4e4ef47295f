/**
 * Core types for check-collectd
 */

/**
 * Monitoring-plugin exit codes
 */
export const PluginStatus = {
  OK: 0,
  WARNING: 1,
  CRITICAL: 2,
  UNKNOWN: 3,
} as const;

export type PluginStatus = (typeof PluginStatus)[keyof typeof PluginStatus];

/**
 * Single-character flags accepted on the command line
 */
export type FlagName = "f" | "F" | "w" | "c" | "s" | "n" | "H" | "g" | "d" | "h" | "m";

/**
 * Flags this tool consumes itself; never handed to the wrapped utility
 */
export type FormatFlagName = "f" | "F";

/**
 * Flags forwarded to the wrapped utility
 */
export type RelayedFlagName = Exclude<FlagName, FormatFlagName>;

/**
 * Parsed flag values: `true` for a boolean flag that was present,
 * the raw string for a valued flag
 */
export type InvocationArgs = Partial<Record<FlagName, string | true>>;

/**
 * Configuration for a single plugin run, built once from the parsed flags
 */
export interface PluginConfig {
  /** Format applied when the wrapped utility reports OK (`-f`) */
  okFormat?: string;
  /** Format applied on WARNING or CRITICAL (`-F`) */
  problemFormat?: string;
  /** Flags forwarded to the wrapped utility */
  relayed: InvocationArgs;
  /** Name or path of the wrapped utility */
  utility: string;
}

/**
 * Captured output of the wrapped utility
 */
export interface SubprocessResult {
  status: PluginStatus;
  stdout: string;
}

/**
 * Consolidation formula applied by the wrapped utility
 */
export type ConsolidationKind = "average" | "percent" | "sum";

/**
 * `<label>: <value> <kind> |<perfdata>`
 */
export interface ConsolidatedLine {
  kind: "consolidated";
  label: string;
  /** Value text exactly as printed upstream */
  value: string;
  consolidation: ConsolidationKind;
  perfdata: string;
}

/**
 * `<label>: ... critical, ... warning, ... ok |<perfdata>`
 */
export interface ThresholdLine {
  kind: "threshold";
  label: string;
  perfdata: string;
}

/**
 * `ERROR: ... Server error: No such value ...`
 */
export interface ServerErrorLine {
  kind: "server-error";
  detail: string;
}

/**
 * Anything the matchers do not recognize
 */
export interface RawLine {
  kind: "raw";
  text: string;
}

export type StatusLine = ConsolidatedLine | ThresholdLine | ServerErrorLine | RawLine;

/**
 * Final text and exit code of a plugin run
 */
export interface PluginOutput {
  status: PluginStatus;
  /** Message including its trailing newline */
  message: string;
}
