/**
 * Status-line parsing
 *
 * The wrapped utility prints one of a handful of fixed shapes. Each matcher
 * below turns one shape into a tagged StatusLine; the first match wins and
 * anything unmatched becomes a raw line.
 */

import type { ConsolidationKind, StatusLine } from "./types.js";

const NUMBER = String.raw`[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?`;

const CONSOLIDATED = new RegExp(
  String.raw`^([^|]+?): (${NUMBER}|nan|-?inf) (average|percent(?:age)?|sum) ?\|(.*)$`
);
const THRESHOLD = /^([^|]+?): [^|]*critical[^|]*warning[^|]*ok[^|]*\|(.*)$/;
const SERVER_ERROR = /^ERROR: (.*Server error: No such value.*)$/;

// name=value;;;; with the four threshold fields left empty upstream
const PERF_VALUE = new RegExp(String.raw`[^\s=]+=(${NUMBER});;;;`, "g");

type Matcher = (text: string) => StatusLine | null;

function toConsolidationKind(text: string): ConsolidationKind {
  if (text === "average" || text === "sum") {
    return text;
  }
  return "percent";
}

const matchers: readonly Matcher[] = [
  (text) => {
    const m = CONSOLIDATED.exec(text);
    if (!m) return null;
    return {
      kind: "consolidated",
      label: m[1] ?? "",
      value: m[2] ?? "",
      consolidation: toConsolidationKind(m[3] ?? ""),
      perfdata: m[4] ?? "",
    };
  },
  (text) => {
    const m = THRESHOLD.exec(text);
    if (!m) return null;
    return { kind: "threshold", label: m[1] ?? "", perfdata: m[2] ?? "" };
  },
  (text) => {
    const m = SERVER_ERROR.exec(text);
    if (!m) return null;
    return { kind: "server-error", detail: m[1] ?? "" };
  },
];

/**
 * Replace the utility's `OKAY`/`okay` spelling with `OK`/`ok`
 */
export function normalizeOkay(text: string): string {
  return text.replace(/OKAY/g, "OK").replace(/okay/g, "ok");
}

/**
 * Classify one line of (already normalized) utility output
 */
export function parseStatusLine(text: string): StatusLine {
  for (const match of matchers) {
    const line = match(text);
    if (line) {
      return line;
    }
  }
  return { kind: "raw", text };
}

/**
 * Numeric values of `name=value;;;;` tokens, in order, as printed
 */
export function extractPerfValues(perfdata: string): string[] {
  return Array.from(perfdata.matchAll(PERF_VALUE), (m) => m[1] ?? "");
}
