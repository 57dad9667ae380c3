import { log } from "../logger.js";
import type { TestCase } from "../cases/types.js";

// =============================================================================
// KGX3 Submit Client
// =============================================================================
// One POST per call, no retries. Transport failures come back as values so
// the runner can record them next to ordinary status mismatches.
// =============================================================================

/**
 * JSON body sent to the submit endpoint
 */
export interface SubmitPayload {
  title: string;
  pdf_url: string;
  email: string;
}

export type RequestOutcome =
  | {
      kind: "response";
      status: number;
      /** Raw response text */
      body: string;
      latencyMs: number;
    }
  | {
      kind: "timeout";
      timeoutMs: number;
    }
  | {
      kind: "error";
      message: string;
    };

export interface SubmitOptions {
  timeoutMs: number;
  /** Swappable for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

export type SubmitFn = (testCase: TestCase) => Promise<RequestOutcome>;

export function buildPayload(testCase: TestCase): SubmitPayload {
  return {
    title: testCase.title,
    pdf_url: testCase.pdfUrl,
    email: testCase.email,
  };
}

/**
 * An empty key means "send no key at all", which is how the
 * missing-credential cases are expressed in the case file.
 */
export function buildHeaders(apiKey: string): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (apiKey) {
    headers["X-API-Key"] = apiKey;
  }
  return headers;
}

/**
 * Milliseconds since `start`, from the monotonic clock
 */
function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

export async function submitCase(
  endpoint: string,
  testCase: TestCase,
  options: SubmitOptions
): Promise<RequestOutcome> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const start = process.hrtime.bigint();
    const response = await fetchImpl(endpoint, {
      method: "POST",
      headers: buildHeaders(testCase.apiKey),
      body: JSON.stringify(buildPayload(testCase)),
      signal: controller.signal,
    });
    const body = await response.text();
    const latencyMs = elapsedMs(start);

    log.http.debug({ row: testCase.row, status: response.status, latencyMs }, "response");
    return { kind: "response", status: response.status, body, latencyMs };
  } catch (error) {
    if (error instanceof Error && error.name === "AbortError") {
      log.http.debug({ row: testCase.row, timeoutMs: options.timeoutMs }, "timed out");
      return { kind: "timeout", timeoutMs: options.timeoutMs };
    }

    const message = describeFetchError(error);
    log.http.debug({ row: testCase.row, error: message }, "request failed");
    return { kind: "error", message };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * fetch reports network failures as `TypeError: fetch failed` and keeps the
 * useful part (ECONNREFUSED, ENOTFOUND, ...) in `cause`.
 */
export function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

export function createSubmitter(endpoint: string, options: SubmitOptions): SubmitFn {
  return (testCase) => submitCase(endpoint, testCase, options);
}
