/**
 * Regression Run Record Schema
 *
 * JSON twin of the HTML report, for CI jobs and scripts that need the result
 * of a run without scraping HTML.
 */

import type { CaseResult } from "../runner.js";

// ============================================================================
// Core Types
// ============================================================================

export type RunStatus = "passed" | "failed" | "degraded";
export type Severity = "critical" | "high" | "medium" | "low";

export interface RunRecord {
  /** Schema version for forward compatibility */
  schemaVersion: "1.0";

  runId: string;
  name: string;
  status: RunStatus;

  /** ISO timestamps */
  startedAt: string;
  completedAt: string;
  durationMs: number;

  environment: EnvironmentContext;
  configuration: RunConfiguration;
  summary: RunRecordSummary;
  metrics: RunMetrics;
  cases: CaseResult[];
  issues: RunIssue[];

  /** Present when a baseline record exists */
  comparison?: BaselineComparison;

  /** Short markdown summary */
  narrative: string;
}

export interface EnvironmentContext {
  gitCommit: string;
  gitBranch: string;
  environment: "local" | "ci";
  nodeVersion: string;
}

export interface RunConfiguration {
  endpoint: string;
  casesFile: string;
  parameters: Record<string, number | string | boolean>;
  thresholds: Threshold[];
}

export interface Threshold {
  metric: string;
  operator: "<" | "<=" | ">" | ">=" | "==" | "!=";
  value: number;
  passed: boolean;
  actual: number;
}

export interface RunRecordSummary {
  total: number;
  passed: number;
  failed: number;
  /** Percent */
  passRate: number;
  /** 1-3 bullet points */
  keyFindings: string[];
}

export interface RunMetrics {
  /** Milliseconds */
  latency: {
    min: number;
    max: number;
    avg: number;
    p50: number;
    p95: number;
  };
  throughput: {
    rps: number;
  };
  /** Keyed by status code or failure label */
  statusCodes: Record<string, number>;
  transportFailures: number;
}

// ============================================================================
// Issues
// ============================================================================

export interface RunIssue {
  severity: Severity;
  category: "performance" | "reliability" | "correctness";
  title: string;
  description: string;
  evidence: string;
  recommendation: string;
}

// ============================================================================
// Baseline Comparison
// ============================================================================

export interface BaselineDelta {
  metric: string;
  baseline: number;
  current: number;
  changePercent: number;
  significance: "improved" | "degraded" | "unchanged";
}

export interface BaselineComparison {
  baselineRunId: string;
  baselineDate: string;
  deltas: BaselineDelta[];
  hasRegression: boolean;
}

// ============================================================================
// Record Storage Location
// ============================================================================

/**
 * Directory structure (relative to the configured root):
 *   test-reports/
 *     latest.json                        <- Most recent run
 *     history/
 *       {date}/
 *         {runId}.json                   <- Individual runs
 *     baselines/
 *       regression-baseline.json         <- Baseline for comparison
 */
export const RUN_RECORD_PATHS = {
  root: "test-reports",
  latest: "test-reports/latest.json",
  history: (date: string, runId: string) => `test-reports/history/${date}/${runId}.json`,
  baseline: "test-reports/baselines/regression-baseline.json",
} as const;
