/**
 * Structured logging to stderr
 * stdout carries the plugin status line and nothing else
 */

import { writeStderr } from "./io.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "warn") {
    this.#minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    writeStderr(JSON.stringify(logEvent) + "\n");
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

// Shared by one run; runCheck sets the level from its environment
export const logger = new Logger();
