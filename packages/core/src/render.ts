/**
 * Output rendering: picks a format for the utility's exit code and
 * re-renders the parsed status line through it
 */

import { UpstreamServerError } from "./errors.js";
import { sprintf } from "./printf.js";
import { extractPerfValues, normalizeOkay, parseStatusLine } from "./status-line.js";
import { PluginStatus } from "./types.js";
import type {
  ConsolidatedLine,
  PluginConfig,
  PluginOutput,
  SubprocessResult,
  ThresholdLine,
} from "./types.js";

/**
 * Coerce any exit code into one of the four plugin states
 */
export function toPluginStatus(code: number): PluginStatus {
  switch (code) {
    case PluginStatus.OK:
      return PluginStatus.OK;
    case PluginStatus.WARNING:
      return PluginStatus.WARNING;
    case PluginStatus.CRITICAL:
      return PluginStatus.CRITICAL;
    default:
      return PluginStatus.UNKNOWN;
  }
}

/**
 * OK takes `-f`, WARNING and CRITICAL take `-F`, UNKNOWN takes nothing.
 * Blank formats count as absent.
 */
export function selectFormat(
  config: Pick<PluginConfig, "okFormat" | "problemFormat">,
  status: PluginStatus
): string | undefined {
  let format: string | undefined;
  switch (status) {
    case PluginStatus.OK:
      format = config.okFormat;
      break;
    case PluginStatus.WARNING:
    case PluginStatus.CRITICAL:
      format = config.problemFormat;
      break;
    default:
      format = undefined;
  }

  return format !== undefined && format.trim() !== "" ? format : undefined;
}

/**
 * Substitution arguments: the label, the consolidated value when there is
 * one, then every perfdata value in the order printed
 */
export function substitutionArgs(line: ConsolidatedLine | ThresholdLine): string[] {
  const perfValues = extractPerfValues(line.perfdata);
  return line.kind === "consolidated"
    ? [line.label, line.value, ...perfValues]
    : [line.label, ...perfValues];
}

/**
 * Message printed for an error, always as an UNKNOWN plugin line
 */
export function formatUnknown(message: string): string {
  return `UNKNOWN: ${message}\n`;
}

/**
 * Turn the utility's reply into the final plugin output
 */
export function renderOutput(result: SubprocessResult, config: PluginConfig): PluginOutput {
  const text = normalizeOkay(result.stdout);
  const line = parseStatusLine(text);

  if (line.kind === "server-error") {
    const err = new UpstreamServerError(line.detail);
    return { status: err.status, message: formatUnknown(err.message) };
  }

  const format = selectFormat(config, result.status);
  if (format === undefined || line.kind === "raw") {
    return { status: result.status, message: `${text}\n` };
  }

  return {
    status: result.status,
    message: `${sprintf(format, substitutionArgs(line))} |${line.perfdata}\n`,
  };
}
