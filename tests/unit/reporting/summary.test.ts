/**
 * Run Summary Tests
 * @module tests/unit/reporting/summary
 */

import { describe, it, expect } from 'vitest';
import { summarizeRun } from '../../../src/reporting/index.js';
import { createRecord, createRun } from '../../factories/bench.factory.js';

describe('summarizeRun', () => {
  it('should roll up each endpoint across rate points', () => {
    const run = createRun({
      results: [
        [100, [['read', createRecord({ achievedRps: 100, cpuAvg: 20, cpuMax: 40, p95Ms: 8 })]]],
        [
          500,
          [
            ['read', createRecord({ achievedRps: 450, successRate: 0.9, cpuAvg: 60, cpuMax: 90, p95Ms: 20 })],
            ['write', createRecord({ achievedRps: 250, successRate: 0.5, cpuAvg: 10, cpuMax: 15, p95Ms: 40 })],
          ],
        ],
      ],
    });

    expect(summarizeRun(run)).toEqual([
      { endpoint: 'read', maxSustainableRps: 100, avgCpu: 40, maxCpu: 60, avgP95Ms: 14, maxP95Ms: 20, ratePoints: 2 },
      { endpoint: 'write', maxSustainableRps: 0, avgCpu: 10, maxCpu: 10, avgP95Ms: 40, maxP95Ms: 40, ratePoints: 1 },
    ]);
  });

  it('should take maxCpu from the per-rate averages rather than sampled peaks', () => {
    const run = createRun({
      results: [
        [100, [['read', createRecord({ cpuAvg: 35, cpuMax: 99 })]]],
        [200, [['read', createRecord({ cpuAvg: 45, cpuMax: 50 })]]],
      ],
    });

    expect(summarizeRun(run)[0]).toMatchObject({ avgCpu: 40, maxCpu: 45 });
  });

  it('should not count a success rate of exactly 95% as sustainable', () => {
    const run = createRun({
      results: [
        [100, [['read', createRecord({ achievedRps: 100, successRate: 0.96 })]]],
        [500, [['read', createRecord({ achievedRps: 475, successRate: 0.95 })]]],
      ],
    });

    expect(summarizeRun(run)[0]?.maxSustainableRps).toBe(100);
  });

  it('should return nothing for an empty run', () => {
    expect(summarizeRun(createRun())).toEqual([]);
  });
});
