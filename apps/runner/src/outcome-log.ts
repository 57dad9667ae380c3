/**
 * Outcome Log
 *
 * Plaintext, line-per-event log of a regression run. Lines look like
 *   [2024-03-09 14:05:00] [SUCCESS]   PASS: Status code matches for 'valid key'
 * and are mirrored to the structured logger so they also reach the console.
 */

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { Logger } from "pino";
import { log } from "./logger.js";
import { formatTimestamp, SystemTimeProvider, type TimeProvider } from "./domain/time.js";

export type OutcomeLevel = "INFO" | "SUCCESS" | "ERROR";

export interface OutcomeLogOptions {
  clock?: TimeProvider;
  logger?: Logger;
}

export class OutcomeLog {
  private readonly clock: TimeProvider;
  private readonly logger: Logger;

  constructor(readonly filePath: string, options: OutcomeLogOptions = {}) {
    this.clock = options.clock ?? new SystemTimeProvider();
    this.logger = options.logger ?? log.runner;
  }

  /**
   * Truncate the file and write the run header.
   */
  start(): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, `--- API Test Log - ${formatTimestamp(this.clock.now())} ---\n\n`);
  }

  info(message: string): void {
    this.write("INFO", message);
  }

  success(message: string): void {
    this.write("SUCCESS", message);
  }

  error(message: string): void {
    this.write("ERROR", message);
  }

  write(level: OutcomeLevel, message: string): void {
    const entry = formatOutcomeLine(this.clock.now(), level, message);
    appendFileSync(this.filePath, `${entry}\n`);

    switch (level) {
      case "INFO":
        this.logger.info(message);
        break;
      case "SUCCESS":
        this.logger.info({ outcome: "success" }, message);
        break;
      case "ERROR":
        this.logger.error(message);
        break;
    }
  }
}

export function formatOutcomeLine(at: Date | number, level: OutcomeLevel, message: string): string {
  return `[${formatTimestamp(at)}] [${level}] ${message}`;
}
