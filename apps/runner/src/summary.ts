import type { CaseResult, ObservedStatus } from "./runner.js";

export interface LatencyStats {
  minMs: number;
  maxMs: number;
  avgMs: number;
  p50Ms: number;
  p95Ms: number;
  /** Results that contributed (those with a response) */
  samples: number;
}

export interface StatusCount {
  status: ObservedStatus;
  count: number;
}

export interface RunSummary {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  /** Percent, 0..100 */
  successRate: number;
  totalDurationSeconds: number;
  requestsPerSecond: number;
  latency: LatencyStats;
  /** Most frequent first; ties keep first-seen order */
  statusCodeDistribution: StatusCount[];
}

/**
 * Nearest-rank percentile over an ascending array
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(Math.max(rank, 1), sorted.length) - 1];
}

export function latencyStats(results: CaseResult[]): LatencyStats {
  const times = results
    .map((r) => r.responseTimeMs)
    .filter((t): t is number => t !== null)
    .sort((a, b) => a - b);

  if (times.length === 0) {
    return { minMs: 0, maxMs: 0, avgMs: 0, p50Ms: 0, p95Ms: 0, samples: 0 };
  }

  const sum = times.reduce((acc, t) => acc + t, 0);
  return {
    minMs: times[0],
    maxMs: times[times.length - 1],
    avgMs: sum / times.length,
    p50Ms: percentile(times, 50),
    p95Ms: percentile(times, 95),
    samples: times.length,
  };
}

export function statusDistribution(results: CaseResult[]): StatusCount[] {
  const counts = new Map<ObservedStatus, number>();
  for (const result of results) {
    counts.set(result.statusCode, (counts.get(result.statusCode) ?? 0) + 1);
  }
  // Array#sort is stable, so equal counts stay in insertion order
  return [...counts.entries()]
    .map(([status, count]) => ({ status, count }))
    .sort((a, b) => b.count - a.count);
}

export function summarize(results: CaseResult[], durationMs: number): RunSummary {
  const totalRequests = results.length;
  const successfulRequests = results.filter((r) => r.passed).length;
  const totalDurationSeconds = durationMs / 1000;

  return {
    totalRequests,
    successfulRequests,
    failedRequests: totalRequests - successfulRequests,
    successRate: totalRequests > 0 ? (successfulRequests / totalRequests) * 100 : 0,
    totalDurationSeconds,
    requestsPerSecond: totalDurationSeconds > 0 ? totalRequests / totalDurationSeconds : 0,
    latency: latencyStats(results),
    statusCodeDistribution: statusDistribution(results),
  };
}
