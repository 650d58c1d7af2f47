/**
 * Terminal Formatting
 * @module reporting/format
 *
 * Plain-text tables for a finished run. Pure functions returning strings;
 * the CLI decides where they are printed.
 */

import type { RunResult } from '../types/index.js';
import type { EndpointRollup } from './summary.js';

const MIN_ENDPOINT_WIDTH = 25;
const COLUMN_WIDTH = 8;
const TARGET_WIDTH = 6;
const RULE = '='.repeat(80);

function cell(value: string, width: number): string {
  return value.padEnd(width);
}

function fixed(value: number): string {
  return value.toFixed(1);
}

/**
 * One table per rate: Endpoint, Target, Achieved, P50, Avg, P95, Success%, CPU Avg%
 */
export function formatRateTables(run: RunResult): string {
  const lines: string[] = [];

  for (const [rate, byEndpoint] of run.results) {
    const longestName = Math.max(0, ...[...byEndpoint.keys()].map((name) => name.length));
    const endpointWidth = Math.max(MIN_ENDPOINT_WIDTH, longestName + 2);
    const totalWidth = endpointWidth + TARGET_WIDTH + COLUMN_WIDTH * 7;

    lines.push('', `Rate ${rate} RPS:`);
    lines.push(
      [
        cell('Endpoint', endpointWidth),
        cell('Target', TARGET_WIDTH),
        cell('Achieved', COLUMN_WIDTH),
        cell('P50(ms)', COLUMN_WIDTH),
        cell('Avg(ms)', COLUMN_WIDTH),
        cell('P95(ms)', COLUMN_WIDTH),
        cell('Success%', COLUMN_WIDTH),
        cell('CPU Avg%', COLUMN_WIDTH),
      ].join(' ')
    );
    lines.push('-'.repeat(totalWidth));

    for (const [name, record] of byEndpoint) {
      lines.push(
        [
          cell(name, endpointWidth),
          cell(String(record.targetRps), TARGET_WIDTH),
          cell(fixed(record.achievedRps), COLUMN_WIDTH),
          cell(fixed(record.p50Ms), COLUMN_WIDTH),
          cell(fixed(record.avgMs), COLUMN_WIDTH),
          cell(fixed(record.p95Ms), COLUMN_WIDTH),
          cell(fixed(record.successRate * 100), COLUMN_WIDTH),
          cell(fixed(record.cpuAvg), COLUMN_WIDTH),
        ].join(' ')
      );
    }
  }

  return lines.join('\n');
}

/**
 * Sustainable throughput, CPU and P95 latency per endpoint
 */
export function formatAnalysis(rollups: readonly EndpointRollup[]): string {
  const label = (endpoint: string): string => `  ${cell(endpoint, MIN_ENDPOINT_WIDTH)}: `;
  const lines = [RULE, 'PERFORMANCE ANALYSIS', RULE, 'Maximum Sustainable RPS (Success Rate > 95%):'];

  for (const rollup of rollups) {
    lines.push(`${label(rollup.endpoint)}${fixed(rollup.maxSustainableRps)} RPS`);
  }

  if (rollups.some((rollup) => rollup.avgCpu > 0)) {
    lines.push('', 'CPU Usage Analysis:');
    for (const rollup of rollups) {
      lines.push(`${label(rollup.endpoint)}${fixed(rollup.avgCpu)}% avg, ${fixed(rollup.maxCpu)}% max`);
    }
  }

  lines.push('', 'Latency Analysis (P95):');
  for (const rollup of rollups) {
    lines.push(`${label(rollup.endpoint)}${fixed(rollup.avgP95Ms)}ms avg, ${fixed(rollup.maxP95Ms)}ms max`);
  }

  return lines.join('\n');
}
