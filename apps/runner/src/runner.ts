/**
 * Request Runner
 *
 * Sends every case in file order, one at a time, waiting `delayMs` after each
 * request. The outcome log gets one "Running Test" line per case followed by
 * its PASS/FAIL line(s).
 */

import type { TestCase } from "./cases/types.js";
import type { RequestOutcome, SubmitFn } from "./http/kgx3-client.js";
import type { OutcomeLog } from "./outcome-log.js";
import { sleep as defaultSleep, SystemTimeProvider, type Sleep, type TimeProvider } from "./domain/time.js";

export const TIMEOUT_STATUS = "Timeout";
export const REQUEST_ERROR_STATUS = "Request Error";

/** A numeric HTTP status, or a label for requests that never got one */
export type ObservedStatus = number | typeof TIMEOUT_STATUS | typeof REQUEST_ERROR_STATUS;

export interface CaseResult {
  row: number;
  testCase: string;
  expectedStatus: number | null;
  statusCode: ObservedStatus;
  /** null when no response arrived */
  responseTimeMs: number | null;
  passed: boolean;
}

export interface SuiteRun {
  results: CaseResult[];
  startedAt: number;
  completedAt: number;
  /** Wall-clock time for the whole loop, delays included */
  durationMs: number;
}

export interface RunnerOptions {
  send: SubmitFn;
  outcomeLog: OutcomeLog;
  delayMs: number;
  /** Raw (non-JSON) bodies are cut to this many characters */
  bodyLogLimit: number;
  sleep?: Sleep;
  clock?: TimeProvider;
}

/**
 * Body line for a mismatch: pretty JSON when it parses, otherwise the start
 * of the raw text.
 */
export function formatResponseBody(body: string, limit: number): string {
  try {
    const parsed: unknown = JSON.parse(body);
    return `    Response Body: ${JSON.stringify(parsed, null, 2)}`;
  } catch {
    return `    Raw Response Body: ${body.slice(0, limit)}`;
  }
}

export function evaluateOutcome(testCase: TestCase, outcome: RequestOutcome): CaseResult {
  const base = {
    row: testCase.row,
    testCase: testCase.name,
    expectedStatus: testCase.expectedStatus,
  };

  switch (outcome.kind) {
    case "response":
      return {
        ...base,
        statusCode: outcome.status,
        responseTimeMs: outcome.latencyMs,
        passed: outcome.status === testCase.expectedStatus,
      };
    case "timeout":
      return { ...base, statusCode: TIMEOUT_STATUS, responseTimeMs: null, passed: false };
    case "error":
      return { ...base, statusCode: REQUEST_ERROR_STATUS, responseTimeMs: null, passed: false };
  }
}

function logOutcome(
  outcomeLog: OutcomeLog,
  testCase: TestCase,
  outcome: RequestOutcome,
  passed: boolean,
  bodyLogLimit: number
): void {
  const name = testCase.name;

  switch (outcome.kind) {
    case "response":
      if (passed) {
        outcomeLog.success(`  PASS: Status code matches for '${name}'`);
      } else {
        outcomeLog.error(`  FAIL: Status code MISMATCH for '${name}'`);
        outcomeLog.error(formatResponseBody(outcome.body, bodyLogLimit));
      }
      break;
    case "timeout":
      outcomeLog.error(`  FAIL: Request timed out for '${name}'`);
      break;
    case "error":
      outcomeLog.error(`  FAIL: Request error for '${name}': ${outcome.message}`);
      break;
  }
}

export async function runSuite(cases: TestCase[], options: RunnerOptions): Promise<SuiteRun> {
  const sleep = options.sleep ?? defaultSleep;
  const clock = options.clock ?? new SystemTimeProvider();
  const results: CaseResult[] = [];
  const total = cases.length;
  const startedAt = clock.now();

  for (const testCase of cases) {
    options.outcomeLog.info(`Running Test: ${testCase.name} (Row ${testCase.row}/${total})`);

    const outcome = await options.send(testCase);
    const result = evaluateOutcome(testCase, outcome);
    logOutcome(options.outcomeLog, testCase, outcome, result.passed, options.bodyLogLimit);
    results.push(result);

    await sleep(options.delayMs);
  }

  const completedAt = clock.now();
  return { results, startedAt, completedAt, durationMs: completedAt - startedAt };
}
