/**
 * CLI error handling and exit code mapping
 */

import { CheckCollectdError, PluginStatus } from "@check-collectd/core";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: PluginStatus;

  constructor(message: string, options?: { exitCode?: PluginStatus; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? PluginStatus.UNKNOWN;
  }
}

/**
 * Map errors to plugin exit codes
 *
 * A monitoring system reads anything that went wrong inside the check as
 * UNKNOWN, so every path ends in 3 unless an error says otherwise.
 */
export function mapErrorToStatus(error: unknown): PluginStatus {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CheckCollectdError) {
    return error.status;
  }

  return PluginStatus.UNKNOWN;
}

/**
 * Format an error for the single plugin output line
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    // Plugin output is one line; keep the first
    let message = error.message.split(/\r?\n/, 1)[0] ?? "";

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += ` (cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)})`;
    }

    return message;
  }

  return String(error);
}
