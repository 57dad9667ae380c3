import { parseArgs } from "node:util";
import { z } from "zod";
import { MAX_TIMER_MS } from "@kgx3-regression/config";
import type { Config } from "./config.js";
import type { RegressionSettings } from "./regression.js";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliOptions {
  cases?: string;
  url?: string;
  logFile?: string;
  reportDir?: string;
  recordsDir?: string;
  delayMs?: number;
  timeoutMs?: number;
  open: boolean;
  saveBaseline: boolean;
  help: boolean;
}

export const USAGE = `Usage: kgx3-regression [options]

Options:
  --cases <file>         CSV file with test cases        (CASES_FILE)
  --url <endpoint>       Endpoint to POST to             (KGX3_API_URL)
  --log-file <file>      Plaintext outcome log           (OUTPUT_LOG_FILE)
  --report-dir <dir>     Directory for the HTML report   (REPORT_DIR)
  --records-dir <dir>    Root for test-reports/ records  (TEST_REPORTS_DIR)
  --delay <ms>           Pause after each request        (REQUEST_DELAY_MS)
  --timeout <ms>         Per-request timeout             (REQUEST_TIMEOUT_MS)
  --open                 Open the HTML report when done  (OPEN_REPORT)
  --save-baseline        Store this run as the baseline
  -h, --help             Show this message

Exit codes: 0 passed, 1 failed, 2 could not start`;

const millis = (flag: string, min: number) =>
  z.coerce
    .number({ invalid_type_error: `${flag} must be a number` })
    .int(`${flag} must be a whole number of milliseconds`)
    .min(min, `${flag} must be at least ${min}`)
    .max(MAX_TIMER_MS, `${flag} must be at most ${MAX_TIMER_MS}`);

function parseMillis(flag: string, value: string | undefined, min: number): number | undefined {
  if (value === undefined) return undefined;
  const result = millis(flag, min).safeParse(value);
  if (!result.success) {
    throw new CliUsageError(result.error.issues[0]?.message ?? `invalid ${flag}`);
  }
  return result.data;
}

function readFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      cases: { type: "string" },
      url: { type: "string" },
      "log-file": { type: "string" },
      "report-dir": { type: "string" },
      "records-dir": { type: "string" },
      delay: { type: "string" },
      timeout: { type: "string" },
      open: { type: "boolean", default: false },
      "save-baseline": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
    strict: true,
  });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let flags: ReturnType<typeof readFlags>;
  try {
    flags = readFlags(argv);
  } catch (error) {
    // Unknown flags and missing values
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
  const { values } = flags;

  if (values.url !== undefined && !z.string().url().safeParse(values.url).success) {
    throw new CliUsageError(`--url must be an absolute URL, got "${values.url}"`);
  }

  return {
    cases: values.cases,
    url: values.url,
    logFile: values["log-file"],
    reportDir: values["report-dir"],
    recordsDir: values["records-dir"],
    delayMs: parseMillis("--delay", values.delay, 0),
    timeoutMs: parseMillis("--timeout", values.timeout, 1),
    open: values.open ?? false,
    saveBaseline: values["save-baseline"] ?? false,
    help: values.help ?? false,
  };
}

/**
 * Flags win over environment configuration.
 */
export function resolveSettings(cli: CliOptions, config: Config): RegressionSettings {
  return {
    endpoint: cli.url ?? config.KGX3_API_URL,
    casesFile: cli.cases ?? config.CASES_FILE,
    logFile: cli.logFile ?? config.OUTPUT_LOG_FILE,
    reportDir: cli.reportDir ?? config.REPORT_DIR,
    recordsDir: cli.recordsDir ?? config.TEST_REPORTS_DIR,
    timeoutMs: cli.timeoutMs ?? config.REQUEST_TIMEOUT_MS,
    delayMs: cli.delayMs ?? config.REQUEST_DELAY_MS,
    bodyLogLimit: config.RESPONSE_BODY_LOG_LIMIT,
    openReport: cli.open || config.OPEN_REPORT,
    saveBaseline: cli.saveBaseline,
    minSuccessRate: config.MIN_SUCCESS_RATE,
    maxAvgLatencyMs: config.MAX_AVG_LATENCY_MS,
  };
}
