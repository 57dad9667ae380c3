/**
 * Static HTML performance report.
 *
 * Self-contained: inline CSS, no scripts beyond the print button, so the file
 * can be mailed around or saved as PDF from the browser.
 */

import type { CaseResult, ObservedStatus } from "../runner.js";
import type { RunSummary } from "../summary.js";
import { formatTimestamp } from "../domain/time.js";

export const REPORT_TITLE = "API Performance Report";
export const REPORT_HEADING = "KGX3 Performance Report - PW Shared Endpoint";

const PASS_ROW_COLOR = "#d4edda";
const FAIL_ROW_COLOR = "#f8d7da";

export interface HtmlReportInput {
  results: CaseResult[];
  summary: RunSummary;
  generatedAt: Date | number;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string | number): string {
  return String(value).replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** Milliseconds rendered as seconds, `0.1234s` */
export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(4)}s`;
}

export function formatStatus(status: ObservedStatus): string {
  return escapeHtml(status);
}

function resultRow(result: CaseResult): string {
  const color = result.passed ? PASS_ROW_COLOR : FAIL_ROW_COLOR;
  const time = result.responseTimeMs === null ? "N/A" : formatSeconds(result.responseTimeMs);
  return [
    `<tr style="background-color: ${color}">`,
    `<td>${escapeHtml(result.testCase)}</td>`,
    `<td>${formatStatus(result.statusCode)}</td>`,
    `<td>${time}</td>`,
    `<td>${result.passed ? "PASS" : "FAIL"}</td>`,
    `</tr>`,
  ].join("");
}

const STYLES = `
    body { font-family: Arial, sans-serif; margin: 20px; color: #333; }
    .container { max-width: 900px; margin: auto; border: 1px solid #ddd; padding: 20px; box-shadow: 0 0 10px rgba(0,0,0,0.05); }
    h1, h2 { color: #0056b3; border-bottom: 2px solid #0056b3; padding-bottom: 10px; }
    table { width: 100%; border-collapse: collapse; margin-top: 20px; }
    th, td { padding: 12px; border: 1px solid #ddd; text-align: left; }
    th { background-color: #f2f2f2; }
    .summary-card { background-color: #f8f9fa; border-left: 5px solid #0056b3; padding: 15px; margin: 20px 0; }
    .print-button {
      display: block; width: 150px; margin: 20px auto; padding: 10px 15px;
      background-color: #007bff; color: white; text-align: center;
      border: none; border-radius: 5px; cursor: pointer; font-size: 16px;
    }
    @media print {
      .print-button { display: none; }
    }`;

export function renderHtmlReport({ results, summary, generatedAt }: HtmlReportInput): string {
  const { latency } = summary;

  const distributionRows = summary.statusCodeDistribution
    .map(({ status, count }) => `<tr><td>${formatStatus(status)}</td><td>${count}</td></tr>`)
    .join("\n        ");

  const resultRows = results.map(resultRow).join("\n        ");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${REPORT_TITLE}</title>
  <style>${STYLES}
  </style>
</head>
<body>
  <div class="container">
    <h1>${REPORT_HEADING}</h1>
    <p><strong>Report Generated On:</strong> ${formatTimestamp(generatedAt)}</p>
    <button class="print-button" onclick="window.print()">Save as PDF</button>

    <h2>Overall Summary</h2>
    <div class="summary-card">
      <p><strong>Total Tests:</strong> ${summary.totalRequests}</p>
      <p><strong>Tests Passed:</strong> ${summary.successfulRequests}</p>
      <p><strong>Tests Failed:</strong> ${summary.failedRequests}</p>
      <p><strong>Success Rate:</strong> ${summary.successRate.toFixed(2)}%</p>
      <p><strong>Total Duration:</strong> ${summary.totalDurationSeconds.toFixed(2)} seconds</p>
      <p><strong>Requests Per Second (RPS):</strong> ${summary.requestsPerSecond.toFixed(2)}</p>
    </div>

    <h2>Response Time Statistics (seconds)</h2>
    <table>
      <tr><th>Metric</th><th>Value</th></tr>
      <tr><td>Minimum</td><td>${formatSeconds(latency.minMs)}</td></tr>
      <tr><td>Maximum</td><td>${formatSeconds(latency.maxMs)}</td></tr>
      <tr><td>Average</td><td>${formatSeconds(latency.avgMs)}</td></tr>
      <tr><td>Median</td><td>${formatSeconds(latency.p50Ms)}</td></tr>
      <tr><td>P95</td><td>${formatSeconds(latency.p95Ms)}</td></tr>
    </table>

    <h2>Status Code Distribution</h2>
    <table>
      <tr><th>Status Code</th><th>Count</th></tr>
        ${distributionRows}
    </table>

    <h2>Detailed Test Results</h2>
    <table>
      <tr><th>Test Case Name</th><th>Status Code</th><th>Response Time</th><th>Result</th></tr>
        ${resultRows}
    </table>
  </div>
</body>
</html>
`;
}
