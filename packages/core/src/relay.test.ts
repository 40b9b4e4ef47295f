import { describe, it, expect } from "vitest";
import { buildConfig, relayArguments } from "./relay.js";
import type { InvocationArgs } from "./types.js";

describe("relayArguments", () => {
  it("should relay boolean flags as bare flags", () => {
    expect(relayArguments({ m: true, h: true })).toEqual(["-h", "-m"]);
  });

  it("should treat the value 1 on a boolean flag as a bare flag", () => {
    expect(relayArguments({ m: "1" })).toEqual(["-m"]);
  });

  it("should keep a literal 1 on a valued flag", () => {
    expect(relayArguments({ w: "1" })).toEqual(["-w", "1"]);
  });

  it("should relay values byte-for-byte as separate arguments", () => {
    const args: InvocationArgs = {
      s: "/var/run/collectd socket",
      n: "load/load",
      H: "web01; rm -rf /",
      d: "$(shortterm)",
      w: "'0:2'",
    };
    expect(relayArguments(args)).toEqual([
      "-w",
      "'0:2'",
      "-s",
      "/var/run/collectd socket",
      "-n",
      "load/load",
      "-H",
      "web01; rm -rf /",
      "-d",
      "$(shortterm)",
    ]);
  });

  it("should never relay the format flags", () => {
    const argv = relayArguments({ f: "%s", F: "%s %f", n: "load/load" });
    expect(argv).toEqual(["-n", "load/load"]);
    expect(argv).not.toContain("-f");
    expect(argv).not.toContain("-F");
  });

  it("should relay nothing for empty input", () => {
    expect(relayArguments({})).toEqual([]);
  });
});

describe("buildConfig", () => {
  it("should split format strings from relayed flags", () => {
    const config = buildConfig(
      { f: "%s ok", F: "%s bad", n: "load/load", m: true },
      "collectd-nagios"
    );

    expect(config).toEqual({
      okFormat: "%s ok",
      problemFormat: "%s bad",
      relayed: { n: "load/load", m: true },
      utility: "collectd-nagios",
    });
  });

  it("should leave formats undefined when not given", () => {
    const config = buildConfig({ H: "web01" }, "collectd-nagios");
    expect(config.okFormat).toBeUndefined();
    expect(config.problemFormat).toBeUndefined();
    expect(relayArguments(config.relayed)).toEqual(["-H", "web01"]);
  });
});
