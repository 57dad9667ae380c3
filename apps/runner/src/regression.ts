/**
 * Regression Run
 *
 * load cases -> send each one -> summarize -> HTML report -> JSON run record.
 * Everything the CLI does, minus argument parsing and process exit.
 */

import { loadCases, CaseFileNotFoundError, CaseFileParseError, type TestCase } from "./cases/index.js";
import { createSubmitter, type SubmitFn } from "./http/kgx3-client.js";
import { OutcomeLog } from "./outcome-log.js";
import { runSuite, type SuiteRun } from "./runner.js";
import { summarize, type RunSummary } from "./summary.js";
import { renderHtmlReport, writeHtmlReport, openInBrowser, ReportWriteError } from "./report/index.js";
import { createRunRecord, type RunRecord } from "./testing/index.js";
import { log, logWarning, withRunAsync } from "./logger.js";
import { SystemTimeProvider, type Sleep, type TimeProvider } from "./domain/time.js";

export const EXIT_CODES = {
  passed: 0,
  failed: 1,
  setupError: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const RUN_NAME = "KGX3 Endpoint Regression";

export interface RegressionSettings {
  endpoint: string;
  casesFile: string;
  logFile: string;
  reportDir: string;
  /** Root under which test-reports/ is written */
  recordsDir: string;
  timeoutMs: number;
  delayMs: number;
  bodyLogLimit: number;
  openReport: boolean;
  saveBaseline: boolean;
  /** Percent of cases that must pass */
  minSuccessRate: number;
  maxAvgLatencyMs?: number;
}

export interface RegressionDeps {
  send?: SubmitFn;
  sleep?: Sleep;
  clock?: TimeProvider;
  openReport?: (filePath: string) => Promise<boolean>;
}

export interface RegressionResult {
  exitCode: ExitCode;
  run?: SuiteRun;
  summary?: RunSummary;
  /** Absent when the HTML report could not be written */
  reportPath?: string;
  record?: RunRecord;
  recordPaths?: string[];
  baselinePath?: string;
}

function loadCasesOrReport(settings: RegressionSettings, outcomeLog: OutcomeLog): TestCase[] | null {
  try {
    return loadCases(settings.casesFile);
  } catch (error) {
    if (error instanceof CaseFileNotFoundError) {
      outcomeLog.error(`Error: CSV file not found at ${settings.casesFile}. Please upload it.`);
      return null;
    }
    if (error instanceof CaseFileParseError) {
      outcomeLog.error(`Error: ${error.message}`);
      return null;
    }
    throw error;
  }
}

export async function runRegression(
  settings: RegressionSettings,
  deps: RegressionDeps = {}
): Promise<RegressionResult> {
  const clock = deps.clock ?? new SystemTimeProvider();
  const outcomeLog = new OutcomeLog(settings.logFile, { clock });

  outcomeLog.start();
  outcomeLog.info(`Starting API tests against: ${settings.endpoint}`);

  const cases = loadCasesOrReport(settings, outcomeLog);
  if (cases === null) {
    return { exitCode: EXIT_CODES.setupError };
  }
  if (cases.length === 0) {
    logWarning("cases", "case file has no cases", { casesFile: settings.casesFile });
  }

  const builder = createRunRecord({
    name: RUN_NAME,
    endpoint: settings.endpoint,
    casesFile: settings.casesFile,
    rootDir: settings.recordsDir,
    parameters: {
      cases: cases.length,
      timeoutMs: settings.timeoutMs,
      delayMs: settings.delayMs,
    },
  });

  const send = deps.send ?? createSubmitter(settings.endpoint, { timeoutMs: settings.timeoutMs });

  return withRunAsync(builder.runId, async () => {
    log.runner.info({ cases: cases.length, endpoint: settings.endpoint }, "run started");

    const run = await runSuite(cases, {
      send,
      outcomeLog,
      delayMs: settings.delayMs,
      bodyLogLimit: settings.bodyLogLimit,
      sleep: deps.sleep,
      clock,
    });
    const summary = summarize(run.results, run.durationMs);

    let reportPath: string | undefined;
    try {
      const generatedAt = clock.now();
      reportPath = writeHtmlReport(
        renderHtmlReport({ results: run.results, summary, generatedAt }),
        settings.reportDir,
        generatedAt
      );
      outcomeLog.success(`Successfully generated HTML report: ${reportPath}`);
    } catch (error) {
      if (!(error instanceof ReportWriteError)) throw error;
      outcomeLog.error(`Error generating HTML report: ${error.message}`);
    }

    if (reportPath !== undefined && settings.openReport) {
      await (deps.openReport ?? openInBrowser)(reportPath);
    }

    builder.setRun(run, summary);
    // An empty suite has no pass rate to hold to the minimum
    if (summary.totalRequests > 0) {
      builder.addThreshold("summary.passRate", ">=", settings.minSuccessRate, summary.successRate);
    }
    if (settings.maxAvgLatencyMs !== undefined) {
      builder.addThreshold("latency.avg", "<=", settings.maxAvgLatencyMs, summary.latency.avgMs);
    }

    const record = builder.build();
    const { paths: recordPaths } = builder.write(record);
    const baselinePath = settings.saveBaseline ? builder.saveAsBaseline(record) : undefined;

    log.runner.info(
      {
        status: record.status,
        passed: summary.successfulRequests,
        failed: summary.failedRequests,
        durationS: Number(summary.totalDurationSeconds.toFixed(2)),
      },
      "run finished"
    );

    return {
      exitCode: record.status === "failed" ? EXIT_CODES.failed : EXIT_CODES.passed,
      run,
      summary,
      reportPath,
      record,
      recordPaths,
      baselinePath,
    };
  });
}

export { loadCases, parseCases } from "./cases/index.js";
export type { TestCase } from "./cases/index.js";
export { summarize } from "./summary.js";
export type { RunSummary } from "./summary.js";
export type { CaseResult, SuiteRun } from "./runner.js";
