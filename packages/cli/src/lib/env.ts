/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { CliError } from "./errors.js";

export const DEFAULT_UTILITY = "collectd-nagios";

// Node fires longer timers after 1 ms
const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

const SettingsSchema = z.object({
  CHECK_COLLECTD_UTILITY: z
    .string()
    .trim()
    .min(1, "CHECK_COLLECTD_UTILITY must not be empty")
    .default(DEFAULT_UTILITY),
  CHECK_COLLECTD_TIMEOUT: z
    .string()
    .regex(/^\d+$/, "CHECK_COLLECTD_TIMEOUT must be a non-negative integer (milliseconds)")
    .transform((value, ctx) => {
      const ms = Number.parseInt(value, 10);
      if (ms > MAX_TIMEOUT_MS) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `CHECK_COLLECTD_TIMEOUT must be at most ${MAX_TIMEOUT_MS} ms`,
        });
        return z.NEVER;
      }
      return ms;
    })
    .default("0"),
});

export interface Settings {
  /** Name or path of the wrapped utility */
  utility: string;
  /** Subprocess timeout in milliseconds; 0 disables it */
  timeoutMs: number;
}

/**
 * Resolve settings from environment variables
 * @throws CliError when a variable holds an unusable value
 */
export function loadSettings(env: NodeJS.ProcessEnv): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new CliError(`Invalid configuration: ${message}`);
  }

  const { CHECK_COLLECTD_UTILITY, CHECK_COLLECTD_TIMEOUT } = parsed.data;
  return {
    utility: expandTilde(CHECK_COLLECTD_UTILITY),
    timeoutMs: CHECK_COLLECTD_TIMEOUT,
  };
}

/**
 * CHECK_COLLECTD_DEBUG=1 turns on debug logs and timing metrics
 */
export function isVerbose(env: NodeJS.ProcessEnv): boolean {
  return env.CHECK_COLLECTD_DEBUG === "1";
}
