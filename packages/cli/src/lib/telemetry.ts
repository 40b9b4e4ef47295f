/**
 * Timing metrics for debug runs, written as `metric <key> k=v ...` lines
 */

import { writeStderr } from "./io.js";

export type MetricFields = Record<string, string | number | boolean>;

const LINE_BREAKS = /[\r\n]+/g;

function flatten(part: string | number | boolean): string {
  return String(part).replace(LINE_BREAKS, " ").trim();
}

export function formatMetric(key: string, fields: MetricFields): string {
  const pairs = Object.entries(fields).map(([name, value]) => `${flatten(name)}=${flatten(value)}`);
  return ["metric", flatten(key), ...pairs].join(" ") + "\n";
}

export interface TelemetryOptions {
  /** Metrics are written only in debug mode */
  verbose: boolean;
  /** Defaults to stderr */
  write?: (line: string) => void;
}

export class Telemetry {
  readonly #verbose: boolean;
  readonly #write: (line: string) => void;

  constructor(options: TelemetryOptions) {
    this.#verbose = options.verbose;
    this.#write = options.write ?? writeStderr;
  }

  emit(key: string, fields: MetricFields): void {
    if (this.#verbose) {
      this.#write(formatMetric(key, fields));
    }
  }

  /**
   * Run `fn` and emit its duration and outcome, whether it resolves or throws
   */
  async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const started = performance.now();
    let outcome: "ok" | "error" = "error";

    try {
      const result = await fn();
      outcome = "ok";
      return result;
    } finally {
      this.emit(label, {
        duration_ms: Math.round(performance.now() - started),
        outcome,
      });
    }
  }
}
