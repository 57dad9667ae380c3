#!/usr/bin/env tsx

/**
 * KGX3 Endpoint Regression Runner
 *
 * Sends every case from the CSV to the submit endpoint, one at a time, and
 * writes an outcome log, an HTML performance report and a JSON run record.
 *
 * Usage:
 *   npm run regression
 *   npm run regression -- --cases cases.csv --open
 *   KGX3_API_URL=http://localhost:4580/wp-json/pw-kgx3/v1/submit npm run regression
 */

import { config } from "./config.js";
import { logFailure } from "./logger.js";
import { CliUsageError, parseCliArgs, resolveSettings, USAGE } from "./cli.js";
import { EXIT_CODES, runRegression, type RegressionResult } from "./regression.js";

const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  cyan: "\x1b[36m",
};

function showSummary(result: RegressionResult): void {
  const { summary, record } = result;
  if (!summary || !record) return;

  const statusColor =
    record.status === "passed" ? colors.green : record.status === "degraded" ? colors.yellow : colors.red;

  console.log("");
  console.log(`${colors.bold}=== ${record.name} ===${colors.reset}`);
  console.log(`Status:        ${statusColor}${record.status.toUpperCase()}${colors.reset}`);
  console.log(`Passed:        ${summary.successfulRequests}/${summary.totalRequests} (${summary.successRate.toFixed(2)}%)`);
  console.log(`Avg response:  ${(summary.latency.avgMs / 1000).toFixed(4)}s`);
  console.log(`Duration:      ${summary.totalDurationSeconds.toFixed(2)}s`);
  if (result.reportPath) {
    console.log(`HTML report:   ${colors.cyan}${result.reportPath}${colors.reset}`);
  }
  for (const path of result.recordPaths ?? []) {
    console.log(`Run record:    ${path}`);
  }
  if (result.baselinePath) {
    console.log(`Baseline:      ${result.baselinePath}`);
  }
  console.log("");
}

async function main(): Promise<number> {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    return EXIT_CODES.passed;
  }

  const result = await runRegression(resolveSettings(cli, config));
  showSummary(result);
  return result.exitCode;
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error) => {
    if (error instanceof CliUsageError) {
      console.error(`${colors.red}✗ ${error.message}${colors.reset}`);
      console.log(USAGE);
    } else {
      logFailure("system", "regression run aborted", error);
    }
    process.exitCode = EXIT_CODES.setupError;
  });
