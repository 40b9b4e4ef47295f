/**
 * One plugin run: parse flags, run the wrapped utility, re-render its line
 */

import {
  PluginStatus,
  PreflightError,
  buildConfig,
  formatUnknown,
  relayArguments,
  renderOutput,
} from "@check-collectd/core";
import type { PluginOutput } from "@check-collectd/core";
import { isVerbose, loadSettings } from "./lib/env.js";
import { formatCliError, mapErrorToStatus } from "./lib/errors.js";
import { findExecutable, invokeUtility } from "./lib/invoke.js";
import { logger } from "./lib/logger.js";
import { parseOptions } from "./lib/options.js";
import { Telemetry } from "./lib/telemetry.js";

async function check(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  version: string,
  telemetry: Telemetry
): Promise<PluginOutput> {
  const settings = loadSettings(env);

  const parsed = parseOptions(argv, version);
  if (parsed.kind === "info") {
    return { status: PluginStatus.OK, message: parsed.text };
  }

  // A missing utility is reported ahead of bad flags
  const file = await findExecutable(settings.utility, env.PATH ?? "");
  if (file === null) {
    throw new PreflightError(settings.utility);
  }

  if (parsed.kind === "invalid") {
    throw parsed.error;
  }

  const config = buildConfig(parsed.args, settings.utility);
  const result = await telemetry.time("check.invoke", () =>
    invokeUtility(file, relayArguments(config.relayed), {
      timeoutMs: settings.timeoutMs,
      env,
    })
  );

  const output = renderOutput(result, config);
  logger.debug("check.done", { upstream: result.status, status: output.status });
  return output;
}

/**
 * Run the check and produce the plugin output; never throws
 * @param argv - User arguments, without the node and script entries
 * @param env - Environment holding PATH and the CHECK_COLLECTD_* settings
 * @param version - Reported by --version
 */
export async function runCheck(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  version: string
): Promise<PluginOutput> {
  const verbose = isVerbose(env);
  logger.setLevel(verbose ? "debug" : "warn");
  const telemetry = new Telemetry({ verbose });

  try {
    return await telemetry.time("check.run", () => check(argv, env, version, telemetry));
  } catch (err) {
    // The failure already reaches stdout as the UNKNOWN line
    logger.debug("check.failed", {
      err_code: err instanceof Error ? err.name : "UNKNOWN",
      err_message: formatCliError(err, true),
    });
    return { status: mapErrorToStatus(err), message: formatUnknown(formatCliError(err)) };
  }
}
