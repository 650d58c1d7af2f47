/**
 * Metrics Derivation Tests
 * @module tests/unit/orchestrator/metrics
 */

import { describe, it, expect } from 'vitest';
import { buildMetricsRecord, deriveAchievedRps } from '../../../src/orchestrator/index.js';
import { summarizeSeries } from '../../../src/sampler/index.js';
import { createReport } from '../../factories/bench.factory.js';

describe('deriveAchievedRps', () => {
  it('should count successful requests over the nominal duration', () => {
    const report = createReport({ requests: 1000, success: 0.9 });

    expect(deriveAchievedRps(report, 10)).toBeCloseTo(90, 10);
  });

  it('should ignore the generator reported rate', () => {
    const report = createReport({ requests: 500, success: 1, rate: 9999 });

    expect(deriveAchievedRps(report, 5)).toBe(100);
  });

  it('should return zero for a non-positive duration', () => {
    expect(deriveAchievedRps(createReport(), 0)).toBe(0);
    expect(deriveAchievedRps(createReport(), -1)).toBe(0);
  });

  it('should clamp the success fraction', () => {
    expect(deriveAchievedRps(createReport({ requests: 100, success: 1.5 }), 1)).toBe(100);
    expect(deriveAchievedRps(createReport({ requests: 100, success: Number.NaN }), 1)).toBe(0);
  });
});

describe('buildMetricsRecord', () => {
  it('should convert latencies from nanoseconds to milliseconds', () => {
    const report = createReport({
      requests: 1000,
      success: 0.9,
      latencies: { p50: 1_500_000, p95: 9_000_000, p99: 20_000_000, mean: 5_000_000 },
    });

    const record = buildMetricsRecord(100, report, 10, summarizeSeries([]));

    expect(record.achievedRps).toBeCloseTo(90, 10);
    expect(record.p50Ms).toBe(1.5);
    expect(record.p95Ms).toBe(9);
    expect(record.p99Ms).toBe(20);
    expect(record.avgMs).toBe(5);
    expect(record.successRate).toBe(0.9);
    expect(record.errorRate).toBeCloseTo(0.1, 10);
    expect(record.totalRequests).toBe(1000);
    expect(record.targetRps).toBe(100);
  });

  it('should carry the resource summary', () => {
    const summary = summarizeSeries([
      { timestamp: 1, cpuPercent: 50, rssMb: 100 },
      { timestamp: 2, cpuPercent: 150, rssMb: 120 },
    ]);

    const record = buildMetricsRecord(100, createReport(), 10, summary);

    expect(record).toMatchObject({ cpuAvg: 100, cpuMax: 150, memoryAvgMb: 110, memoryMaxMb: 120 });
  });

  it('should report zero resource usage when no sample was taken', () => {
    const record = buildMetricsRecord(100, createReport(), 10, summarizeSeries([]));

    expect(record).toMatchObject({ cpuAvg: 0, cpuMax: 0, memoryAvgMb: 0, memoryMaxMb: 0 });
  });

  it('should return a frozen record', () => {
    expect(Object.isFrozen(buildMetricsRecord(100, createReport(), 10, summarizeSeries([])))).toBe(true);
  });
});
