/**
 * Locating and running the wrapped checking utility
 */

import { access, constants, stat } from "node:fs/promises";
import * as path from "node:path";
import { execa } from "execa";
import { InvocationError, toPluginStatus } from "@check-collectd/core";
import type { SubprocessResult } from "@check-collectd/core";
import { logger } from "./logger.js";

export interface InvokeOptions {
  /** Kill the utility after this many milliseconds; 0 waits forever */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

async function isExecutableFile(file: string): Promise<boolean> {
  try {
    const info = await stat(file);
    if (!info.isFile()) {
      return false;
    }
    await access(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve an executable the way a shell would: names containing a path
 * separator are checked directly, bare names are looked up on PATH
 * @returns Absolute path, or null when nothing executable was found
 */
export async function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? ""
): Promise<string | null> {
  const candidates =
    name.includes("/") || name.includes(path.sep)
      ? [path.resolve(name)]
      : searchPath
          .split(path.delimiter)
          .filter(Boolean)
          .map((dir) => path.resolve(dir, name));

  for (const candidate of candidates) {
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Run the utility with an argument vector (never through a shell) and
 * capture its stdout and exit code. stderr passes straight through.
 * @throws InvocationError when the process cannot start, times out or dies on a signal
 */
export async function invokeUtility(
  file: string,
  args: readonly string[],
  options: InvokeOptions = {}
): Promise<SubprocessResult> {
  const { timeoutMs = 0, env } = options;

  logger.debug("invoke.start", { file, args });

  const command = [file, ...args].join(" ");
  const result = await execa(file, args, {
    shell: false,
    reject: false,
    stdin: "ignore",
    stderr: "inherit",
    timeout: timeoutMs,
    env,
  }).catch((err: unknown) => {
    throw new InvocationError(command, err instanceof Error ? err.message : String(err), {
      cause: err,
    });
  });

  if (result.timedOut) {
    throw new InvocationError(command, `timed out after ${timeoutMs} ms`);
  }

  if (result.signal) {
    throw new InvocationError(command, `terminated by ${result.signal}`);
  }

  if (typeof result.exitCode !== "number") {
    const reason =
      "originalMessage" in result && typeof result.originalMessage === "string"
        ? result.originalMessage
        : "process did not start";
    throw new InvocationError(command, reason, { cause: result });
  }

  logger.debug("invoke.done", { exitCode: result.exitCode });

  return {
    status: toPluginStatus(result.exitCode),
    stdout: result.stdout,
  };
}
