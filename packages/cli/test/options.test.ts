/**
 * Unit tests for command-line option parsing
 */

import { describe, it, expect } from "vitest";
import { OptionParseError } from "@check-collectd/core";
import { parseOptions } from "../src/lib/options.js";

describe("parseOptions", () => {
  it("should collect valued and boolean flags", () => {
    const parsed = parseOptions(["-f", "%s ok", "-n", "load/load", "-m"], "1.2.3");
    expect(parsed).toEqual({
      kind: "run",
      args: { f: "%s ok", n: "load/load", m: true },
    });
  });

  it("should keep case-distinct flags apart", () => {
    const parsed = parseOptions(["-f", "ok %s", "-F", "bad %s", "-H", "web01"], "1.2.3");
    expect(parsed).toEqual({
      kind: "run",
      args: { f: "ok %s", F: "bad %s", H: "web01" },
    });
  });

  it("should treat -h as a relayed flag rather than help", () => {
    expect(parseOptions(["-h"], "1.2.3")).toEqual({ kind: "run", args: { h: true } });
  });

  it("should return nothing for an empty command line", () => {
    expect(parseOptions([], "1.2.3")).toEqual({ kind: "run", args: {} });
  });

  it("should print help on --help", () => {
    const parsed = parseOptions(["--help"], "1.2.3");
    expect(parsed.kind).toBe("info");
    if (parsed.kind === "info") {
      expect(parsed.text).toContain("Usage: check_collectd");
      expect(parsed.text).toContain("-F <format>");
    }
  });

  it("should print the version on --version", () => {
    expect(parseOptions(["--version"], "1.2.3")).toEqual({ kind: "info", text: "1.2.3\n" });
  });

  it("should reject unknown flags", () => {
    const parsed = parseOptions(["-x"], "1.2.3");
    expect(parsed.kind).toBe("invalid");
    if (parsed.kind === "invalid") {
      expect(parsed.error).toBeInstanceOf(OptionParseError);
      expect(parsed.error.message).toBe("Invalid arguments \"-x\": unknown option '-x'");
    }
  });

  it("should reject a valued flag without its value", () => {
    const parsed = parseOptions(["-n"], "1.2.3");
    expect(parsed.kind).toBe("invalid");
    if (parsed.kind === "invalid") {
      expect(parsed.error.message).toContain("argument missing");
    }
  });

  it("should reject stray positional arguments", () => {
    const parsed = parseOptions(["-n", "load/load", "extra"], "1.2.3");
    expect(parsed.kind).toBe("invalid");
    if (parsed.kind === "invalid") {
      expect(parsed.error.message).toContain("too many arguments");
    }
  });
});
