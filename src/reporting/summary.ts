/**
 * Run Summary
 * @module reporting/summary
 *
 * Per-endpoint rollups across all rate points of a run.
 */

import { RESULTS } from '../constants/index.js';
import type { RunResult, TestMetricsRecord } from '../types/index.js';

export interface EndpointRollup {
  readonly endpoint: string;
  /** Highest achieved RPS among rate points with success rate above 95%, else 0 */
  readonly maxSustainableRps: number;
  readonly avgCpu: number;
  /** Highest per-rate-point average CPU */
  readonly maxCpu: number;
  readonly avgP95Ms: number;
  readonly maxP95Ms: number;
  /** Number of rate points recorded for the endpoint */
  readonly ratePoints: number;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Group records by endpoint, keeping first-seen order
 */
function recordsByEndpoint(run: RunResult): Map<string, TestMetricsRecord[]> {
  const grouped = new Map<string, TestMetricsRecord[]>();
  for (const byEndpoint of run.results.values()) {
    for (const [endpoint, record] of byEndpoint) {
      const records = grouped.get(endpoint);
      if (records) {
        records.push(record);
      } else {
        grouped.set(endpoint, [record]);
      }
    }
  }
  return grouped;
}

export function summarizeRun(run: RunResult): EndpointRollup[] {
  const rollups: EndpointRollup[] = [];

  for (const [endpoint, records] of recordsByEndpoint(run)) {
    const sustainable = records.filter((record) => record.successRate > RESULTS.SUSTAINABLE_SUCCESS_RATE);

    rollups.push({
      endpoint,
      maxSustainableRps: Math.max(0, ...sustainable.map((record) => record.achievedRps)),
      avgCpu: mean(records.map((record) => record.cpuAvg)),
      maxCpu: Math.max(0, ...records.map((record) => record.cpuAvg)),
      avgP95Ms: mean(records.map((record) => record.p95Ms)),
      maxP95Ms: Math.max(0, ...records.map((record) => record.p95Ms)),
      ratePoints: records.length,
    });
  }

  return rollups;
}
