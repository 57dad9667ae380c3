/**
 * Time provider abstraction for testable time-dependent code.
 * Allows injecting mock time in tests.
 */

import { format } from "date-fns";

export interface TimeProvider {
  /** Get current timestamp in milliseconds */
  now(): number;
}

/**
 * Default time provider using system clock.
 */
export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Mock time provider for testing.
 * Allows controlling time in unit tests.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  /** Advance time by specified milliseconds */
  advanceBy(ms: number): void {
    this.currentTime += ms;
  }

  /** Set time to specific value */
  setTime(time: number): void {
    this.currentTime = time;
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

// =============================================================================
// Formatting (local time)
// =============================================================================

/** `2024-03-09 14:05:00`, used in log lines and the report header */
export function formatTimestamp(date: Date | number): string {
  return format(date, "yyyy-MM-dd HH:mm:ss");
}

/** `2024-03-09_14-05-00`, safe for file names */
export function formatFileStamp(date: Date | number): string {
  return format(date, "yyyy-MM-dd_HH-mm-ss");
}
