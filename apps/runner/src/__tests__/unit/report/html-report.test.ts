import { describe, it, expect } from "vitest";
import { escapeHtml, formatSeconds, renderHtmlReport, REPORT_HEADING } from "../../../report/html-report.js";
import { summarize } from "../../../summary.js";
import { TIMEOUT_STATUS, type CaseResult } from "../../../runner.js";

const GENERATED_AT = new Date(2024, 2, 9, 14, 5, 0);

const RESULTS: CaseResult[] = [
  { row: 1, testCase: "Valid <submission>", expectedStatus: 200, statusCode: 200, responseTimeMs: 120, passed: true },
  { row: 2, testCase: "Missing key", expectedStatus: 401, statusCode: 200, responseTimeMs: 80, passed: false },
  { row: 3, testCase: "Slow", expectedStatus: 200, statusCode: TIMEOUT_STATUS, responseTimeMs: null, passed: false },
];

function render(): string {
  return renderHtmlReport({ results: RESULTS, summary: summarize(RESULTS, 4_000), generatedAt: GENERATED_AT });
}

describe("escapeHtml", () => {
  it("should escape markup characters", () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;"
    );
  });

  it("should stringify numbers", () => {
    expect(escapeHtml(404)).toBe("404");
  });
});

describe("formatSeconds", () => {
  it("should render four decimals", () => {
    expect(formatSeconds(1234)).toBe("1.2340s");
    expect(formatSeconds(0)).toBe("0.0000s");
  });
});

describe("renderHtmlReport", () => {
  it("should carry the heading and generation time", () => {
    const html = render();

    expect(html).toContain(`<h1>${REPORT_HEADING}</h1>`);
    expect(html).toContain("<p><strong>Report Generated On:</strong> 2024-03-09 14:05:00</p>");
  });

  it("should render the overall summary", () => {
    const html = render();

    expect(html).toContain("<p><strong>Total Tests:</strong> 3</p>");
    expect(html).toContain("<p><strong>Tests Passed:</strong> 1</p>");
    expect(html).toContain("<p><strong>Tests Failed:</strong> 2</p>");
    expect(html).toContain("<p><strong>Success Rate:</strong> 33.33%</p>");
    expect(html).toContain("<p><strong>Total Duration:</strong> 4.00 seconds</p>");
    expect(html).toContain("<p><strong>Requests Per Second (RPS):</strong> 0.75</p>");
  });

  it("should render latency over responded requests only", () => {
    const html = render();

    expect(html).toContain("<tr><td>Minimum</td><td>0.0800s</td></tr>");
    expect(html).toContain("<tr><td>Maximum</td><td>0.1200s</td></tr>");
    expect(html).toContain("<tr><td>Average</td><td>0.1000s</td></tr>");
    expect(html).toContain("<tr><td>Median</td><td>0.0800s</td></tr>");
    expect(html).toContain("<tr><td>P95</td><td>0.1200s</td></tr>");
  });

  it("should list the status distribution", () => {
    const html = render();

    expect(html).toContain("<tr><td>200</td><td>2</td></tr>");
    expect(html).toContain("<tr><td>Timeout</td><td>1</td></tr>");
  });

  it("should color rows by outcome and escape case names", () => {
    const html = render();

    expect(html).toContain(
      '<tr style="background-color: #d4edda"><td>Valid &lt;submission&gt;</td><td>200</td><td>0.1200s</td><td>PASS</td></tr>'
    );
    expect(html).toContain(
      '<tr style="background-color: #f8d7da"><td>Missing key</td><td>200</td><td>0.0800s</td><td>FAIL</td></tr>'
    );
    expect(html).toContain(
      '<tr style="background-color: #f8d7da"><td>Slow</td><td>Timeout</td><td>N/A</td><td>FAIL</td></tr>'
    );
  });
});
