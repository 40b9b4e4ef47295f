/**
 * Fake checking utilities
 *
 * Writes a small /bin/sh script that prints a fixed status line, exits with
 * a fixed code and records the argv it was called with.
 */

import { chmod, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface FakeUtilityOptions {
  /** Line printed on stdout */
  stdout: string;
  /** Exit code (default: 0) */
  exitCode?: number;
  /** Text printed on stderr */
  stderr?: string;
  /** Make the script unexecutable */
  executable?: boolean;
  /** Shell commands run after the arguments are recorded, before any output */
  run?: string;
}

export interface FakeUtility {
  /** Absolute path of the script */
  path: string;
  /** Arguments received by the most recent run */
  recordedArgs(): Promise<string[]>;
}

/**
 * Quote text for a POSIX shell single-quoted string
 */
function shellQuote(text: string): string {
  return `'${text.replace(/'/g, "'\\''")}'`;
}

/**
 * Write an executable fake utility into `dir`
 * @param dir - Directory to place the script in (put it on PATH to find it)
 * @param name - File name, e.g. "collectd-nagios"
 */
export async function writeFakeUtility(
  dir: string,
  name: string,
  options: FakeUtilityOptions
): Promise<FakeUtility> {
  const { stdout, exitCode = 0, stderr, executable = true, run } = options;
  const scriptPath = join(dir, name);
  const argsPath = join(dir, `${name}.args`);

  const lines = [
    "#!/bin/sh",
    `: > ${shellQuote(argsPath)}`,
    `for arg in "$@"; do printf '%s\\n' "$arg" >> ${shellQuote(argsPath)}; done`,
  ];
  if (run !== undefined) {
    lines.push(run);
  }
  lines.push(`printf '%s\\n' ${shellQuote(stdout)}`);
  if (stderr !== undefined) {
    lines.push(`printf '%s\\n' ${shellQuote(stderr)} >&2`);
  }
  lines.push(`exit ${exitCode}`, "");

  await writeFile(scriptPath, lines.join("\n"), "utf8");
  await chmod(scriptPath, executable ? 0o755 : 0o644);

  return {
    path: scriptPath,
    async recordedArgs(): Promise<string[]> {
      const content = await readFile(argsPath, "utf8");
      return content === "" ? [] : content.replace(/\n$/, "").split("\n");
    },
  };
}
