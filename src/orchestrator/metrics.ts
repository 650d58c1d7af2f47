/**
 * Metrics Derivation
 * @module orchestrator/metrics
 *
 * Combines a cycle's load report with its resource summary into the
 * canonical TestMetricsRecord.
 */

import type { LoadTestReport, ResourceSummary, TestMetricsRecord } from '../types/index.js';

const NS_PER_MS = 1_000_000;

function clampFraction(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Successfully completed requests per second over the intended window.
 * The generator's own `rate` counts attempted requests and is not used.
 */
export function deriveAchievedRps(report: LoadTestReport, durationSeconds: number): number {
  if (durationSeconds <= 0) {
    return 0;
  }
  const completed = Math.max(0, report.requests) * clampFraction(report.success);
  return completed / durationSeconds;
}

/**
 * Build the record for one (rate, endpoint) cycle
 */
export function buildMetricsRecord(
  targetRps: number,
  report: LoadTestReport,
  durationSeconds: number,
  summary: ResourceSummary
): TestMetricsRecord {
  const successRate = clampFraction(report.success);

  return Object.freeze({
    achievedRps: deriveAchievedRps(report, durationSeconds),
    targetRps,
    p50Ms: report.latencies.p50 / NS_PER_MS,
    p95Ms: report.latencies.p95 / NS_PER_MS,
    p99Ms: report.latencies.p99 / NS_PER_MS,
    avgMs: report.latencies.mean / NS_PER_MS,
    successRate,
    errorRate: 1 - successRate,
    totalRequests: report.requests,
    cpuAvg: summary.avgCpu,
    cpuMax: summary.maxCpu,
    memoryAvgMb: summary.avgMemoryMb,
    memoryMaxMb: summary.maxMemoryMb,
  });
}
