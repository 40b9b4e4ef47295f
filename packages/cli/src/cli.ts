#!/usr/bin/env node

/**
 * check_collectd entry point
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { runCheck } from "./check.js";
import { writeStdout } from "./lib/io.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson: unknown = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));

function readVersion(pkg: unknown): string {
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

const output = await runCheck(process.argv.slice(2), process.env, readVersion(packageJson));

writeStdout(output.message);
process.exitCode = output.status;
