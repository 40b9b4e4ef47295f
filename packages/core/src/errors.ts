/**
 * Error types for check-collectd
 *
 * Invariants:
 * - Every error reports UNKNOWN to the monitoring system
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 */

import { PluginStatus } from "./types.js";

/**
 * Base class for all check-collectd errors
 */
export abstract class CheckCollectdError extends Error {
  abstract readonly code: string;
  readonly status: PluginStatus = PluginStatus.UNKNOWN;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the wrapped utility cannot be found on PATH
 */
export class PreflightError extends CheckCollectdError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly utility: string,
    options?: ErrorOptions
  ) {
    super(`${utility} not found in PATH`, options);
  }
}

/**
 * Thrown when command-line flags are unknown or malformed
 */
export class OptionParseError extends CheckCollectdError {
  readonly code = "E_OPTIONS";

  constructor(
    public readonly args: readonly string[],
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Invalid arguments "${args.join(" ")}": ${reason}`, options);
  }
}

/**
 * Thrown when the wrapped utility could not be run to completion
 */
export class InvocationError extends CheckCollectdError {
  readonly code = "E_INVOKE";

  constructor(
    public readonly command: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to run ${command}: ${reason}`, options);
  }
}

/**
 * Raised when the daemon has no value for the requested identifier
 */
export class UpstreamServerError extends CheckCollectdError {
  readonly code = "E_SERVER";

  constructor(
    public readonly detail: string,
    options?: ErrorOptions
  ) {
    super(detail, options);
  }
}
