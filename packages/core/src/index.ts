/**
 * check-collectd core
 *
 * Parses the status line of a monitoring check and re-renders it through a
 * printf-style format, leaving the performance data untouched
 */

// Re-export types
export type {
  FlagName,
  FormatFlagName,
  RelayedFlagName,
  InvocationArgs,
  PluginConfig,
  SubprocessResult,
  ConsolidationKind,
  ConsolidatedLine,
  ThresholdLine,
  ServerErrorLine,
  RawLine,
  StatusLine,
  PluginOutput,
} from "./types.js";
export { PluginStatus } from "./types.js";

// Re-export utilities
export { sprintf, toNumber } from "./printf.js";
export {
  FLAGS,
  BOOLEAN_FLAGS,
  isFormatFlag,
  isRelayedFlag,
  relayArguments,
  buildConfig,
} from "./relay.js";
export { normalizeOkay, parseStatusLine, extractPerfValues } from "./status-line.js";
export {
  toPluginStatus,
  selectFormat,
  substitutionArgs,
  formatUnknown,
  renderOutput,
} from "./render.js";

// Re-export errors
export {
  CheckCollectdError,
  PreflightError,
  OptionParseError,
  InvocationError,
  UpstreamServerError,
} from "./errors.js";
