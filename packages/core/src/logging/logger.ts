// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/**
 * Logger: leveled console output plus the rotating decision trace file.
 * The trace file receives one block per routing decision, written after the
 * decision reaches a terminal state.
 */

import { appendFileSync, renameSync, statSync } from "fs";

import type { LogLevel } from "../config/config.js";

const LOG_MAX_BYTES = 10 * 1024 * 1024; // 10 MB
const PREFIX = "[FleetRoute]";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Append a finished decision trace to the trace file. */
  trace(lines: string[]): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Trace file path; empty or undefined disables the file. */
  file?: string;
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;
  private readonly file: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_ORDER[options.level ?? "INFO"];
    this.file = options.file ? options.file : undefined;
  }

  debug(message: string): void {
    if (this.enabled("DEBUG")) console.debug(`${PREFIX} ${message}`);
  }

  info(message: string): void {
    if (this.enabled("INFO")) console.log(`${PREFIX} ${message}`);
  }

  warn(message: string): void {
    if (this.enabled("WARNING")) console.warn(`${PREFIX} ${message}`);
  }

  error(message: string): void {
    if (this.enabled("ERROR")) console.error(`${PREFIX} ${message}`);
  }

  trace(lines: string[]): void {
    if (!this.file) return;
    try {
      rotateIfNeeded(this.file);
      appendFileSync(this.file, lines.join("\n") + "\n\n", "utf8");
    } catch (err) {
      // A broken trace file must not fail routing; say so once per write.
      console.warn(`${PREFIX} could not write decision trace to '${this.file}': ${String(err)}`);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

function rotateIfNeeded(file: string): void {
  let size: number;
  try {
    size = statSync(file).size;
  } catch {
    return; // not created yet
  }
  if (size >= LOG_MAX_BYTES) {
    renameSync(file, `${file}.1`);
  }
}

/** Discards everything. Used by tests and embedders that bring their own logging. */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  trace(): void {}
}
