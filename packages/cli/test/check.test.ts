/**
 * End-to-end tests for a plugin run against a fake utility on PATH
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { createTempDir, removeDir, writeFakeUtility } from "@check-collectd/testkit";
import { PluginStatus } from "@check-collectd/core";
import { runCheck } from "../src/check.js";

describe("runCheck", () => {
  let dir: string;
  let env: NodeJS.ProcessEnv;

  beforeEach(async () => {
    dir = await createTempDir();
    env = { PATH: dir };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it("should reformat threshold lines with -F on CRITICAL", async () => {
    const fake = await writeFakeUtility(dir, "collectd-nagios", {
      stdout: "CRITICAL: critical 1, warning 0, okay 0 |load=0.7;;;; load=0.5;;;; load=0.3;;;;",
      exitCode: 2,
    });

    const output = await runCheck(
      ["-F", "Load %s: %f, %f, %f", "-n", "load/load", "-g", "none"],
      env,
      "1.2.3"
    );

    expect(output).toEqual({
      status: PluginStatus.CRITICAL,
      message:
        "Load CRITICAL: 0.700000, 0.500000, 0.300000 |load=0.7;;;; load=0.5;;;; load=0.3;;;;\n",
    });
    expect(await fake.recordedArgs()).toEqual(["-n", "load/load", "-g", "none"]);
  });

  it("should reformat consolidated lines with -f on OK", async () => {
    await writeFakeUtility(dir, "collectd-nagios", {
      stdout: "OK: 852 sum |shortterm=0.5;;;;",
      exitCode: 0,
    });

    const output = await runCheck(["-f", "%s: total %f", "-g", "sum"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.OK,
      message: "OK: total 852.000000 |shortterm=0.5;;;;\n",
    });
  });

  it("should turn server errors into UNKNOWN whatever the exit code", async () => {
    await writeFakeUtility(dir, "collectd-nagios", {
      stdout: "ERROR: Server error: No such value found",
      exitCode: 0,
    });

    const output = await runCheck(["-f", "%s"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.UNKNOWN,
      message: "UNKNOWN: Server error: No such value found\n",
    });
  });

  it("should pass the normalized line through when no format is given", async () => {
    await writeFakeUtility(dir, "collectd-nagios", {
      stdout: "OKAY: 0 critical, 0 warning, 1 okay | value=1.000000;;;;",
      exitCode: 0,
    });

    const output = await runCheck(["-n", "load/load"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.OK,
      message: "OK: 0 critical, 0 warning, 1 ok | value=1.000000;;;;\n",
    });
  });

  it("should relay flags without the format strings", async () => {
    const fake = await writeFakeUtility(dir, "collectd-nagios", { stdout: "OK: 1 sum |x=1;;;;" });

    await runCheck(
      ["-f", "%s", "-F", "%s", "-m", "-H", "web01; touch pwned", "-s", "/run/collectd.sock"],
      env,
      "1.2.3"
    );

    expect(await fake.recordedArgs()).toEqual([
      "-s",
      "/run/collectd.sock",
      "-H",
      "web01; touch pwned",
      "-m",
    ]);
  });

  it("should report UNKNOWN for out-of-range exit codes", async () => {
    await writeFakeUtility(dir, "collectd-nagios", { stdout: "OK: 1 sum |x=1;;;;", exitCode: 7 });

    const output = await runCheck(["-f", "%s"], env, "1.2.3");

    expect(output).toEqual({ status: PluginStatus.UNKNOWN, message: "OK: 1 sum |x=1;;;;\n" });
  });

  it("should fail with UNKNOWN when the utility is missing", async () => {
    const output = await runCheck(["-n", "load/load"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.UNKNOWN,
      message: "UNKNOWN: collectd-nagios not found in PATH\n",
    });
  });

  it("should honor CHECK_COLLECTD_UTILITY", async () => {
    await writeFakeUtility(dir, "my-check", { stdout: "WARNING: 3 average |x=3;;;;", exitCode: 1 });

    const output = await runCheck(
      ["-F", "%s at %.1f"],
      { ...env, CHECK_COLLECTD_UTILITY: "my-check" },
      "1.2.3"
    );

    expect(output).toEqual({ status: PluginStatus.WARNING, message: "WARNING at 3.0 |x=3;;;;\n" });
  });

  it("should fail with UNKNOWN on bad options without running the utility", async () => {
    const fake = await writeFakeUtility(dir, "collectd-nagios", { stdout: "OK: 1 sum |x=1;;;;" });

    const output = await runCheck(["-x"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.UNKNOWN,
      message: "UNKNOWN: Invalid arguments \"-x\": unknown option '-x'\n",
    });
    await expect(fake.recordedArgs()).rejects.toThrow();
  });

  it("should report a missing utility ahead of bad options", async () => {
    const output = await runCheck(["-x"], env, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.UNKNOWN,
      message: "UNKNOWN: collectd-nagios not found in PATH\n",
    });
  });

  it("should keep stderr quiet on failures outside debug mode", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await runCheck(["-n", "load/load"], env, "1.2.3");

    expect(write).not.toHaveBeenCalled();
  });

  it("should write timing metrics when CHECK_COLLECTD_DEBUG is set", async () => {
    await writeFakeUtility(dir, "collectd-nagios", { stdout: "OK: 1 sum |x=1;;;;" });
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);

    await runCheck(["-f", "%s"], { ...env, CHECK_COLLECTD_DEBUG: "1" }, "1.2.3");

    const metrics = write.mock.calls
      .map((call) => String(call[0]))
      .filter((line) => line.startsWith("metric "));
    expect(metrics).toHaveLength(2);
    expect(metrics[0]).toMatch(/^metric check\.invoke duration_ms=\d+ outcome=ok\n$/);
    expect(metrics[1]).toMatch(/^metric check\.run duration_ms=\d+ outcome=ok\n$/);
  });

  it("should fail with UNKNOWN on bad configuration", async () => {
    const output = await runCheck([], { ...env, CHECK_COLLECTD_TIMEOUT: "soon" }, "1.2.3");

    expect(output).toEqual({
      status: PluginStatus.UNKNOWN,
      message:
        "UNKNOWN: Invalid configuration: CHECK_COLLECTD_TIMEOUT must be a non-negative integer (milliseconds)\n",
    });
  });

  it("should print the version", async () => {
    expect(await runCheck(["--version"], env, "1.2.3")).toEqual({
      status: PluginStatus.OK,
      message: "1.2.3\n",
    });
  });
});
