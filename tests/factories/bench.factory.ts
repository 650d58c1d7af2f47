/**
 * Benchmark Test Factories
 * @module tests/factories/bench
 *
 * Factory functions for configurations, endpoints, reports and runs.
 */

import { RunConfigurationSchema, type RunConfiguration, type RunConfigurationInput } from '../../src/config/index.js';
import type { ServiceInstance } from '../../src/process/index.js';
import type {
  CycleFailure,
  EndpointSpec,
  LoadTestReport,
  RunMetadata,
  RunResult,
  TestMetricsRecord,
} from '../../src/types/index.js';

// ============================================================================
// Configuration
// ============================================================================

export function createConfig(overrides: Partial<RunConfigurationInput> = {}): RunConfiguration {
  return Object.freeze(
    RunConfigurationSchema.parse({
      rates: [100],
      duration: '1s',
      serverCommand: ['node', '/opt/bench/server.js'],
      ...overrides,
    })
  );
}

// ============================================================================
// Endpoints and Instances
// ============================================================================

export function createEndpoint(overrides: Partial<EndpointSpec> = {}): EndpointSpec {
  return {
    name: 'read',
    method: 'GET',
    path: '/api/items/{item_id}',
    ...overrides,
  };
}

let instanceCounter = 0;

export function createInstance(overrides: Partial<ServiceInstance> = {}): ServiceInstance {
  instanceCounter++;
  return {
    pid: 40_000 + instanceCounter,
    host: '127.0.0.1',
    port: 8000,
    baseUrl: 'http://127.0.0.1:8000',
    command: 'node /opt/bench/server.js --host 127.0.0.1 --port 8000 --workers 1',
    startedAt: new Date('2026-01-01T00:00:00Z'),
    ...overrides,
  };
}

// ============================================================================
// Load Reports and Records
// ============================================================================

export function createReport(overrides: Partial<LoadTestReport> = {}): LoadTestReport {
  return {
    requests: 1000,
    rate: 100,
    success: 1,
    latencies: { p50: 2_000_000, p95: 8_000_000, p99: 12_000_000, mean: 3_000_000 },
    ...overrides,
  };
}

export function createRecord(overrides: Partial<TestMetricsRecord> = {}): TestMetricsRecord {
  return {
    achievedRps: 100,
    targetRps: 100,
    p50Ms: 2,
    p95Ms: 8,
    p99Ms: 12,
    avgMs: 3,
    successRate: 1,
    errorRate: 0,
    totalRequests: 1000,
    cpuAvg: 20,
    cpuMax: 40,
    memoryAvgMb: 64,
    memoryMaxMb: 80,
    ...overrides,
  };
}

// ============================================================================
// Runs
// ============================================================================

export function createMetadata(overrides: Partial<RunMetadata> = {}): RunMetadata {
  return {
    workers: 1,
    host: '127.0.0.1',
    port: 8000,
    duration: '10s',
    timestamp: '2026-01-01T00:00:00.000Z',
    cleanRestart: true,
    interrupted: false,
    ...overrides,
  };
}

export interface RunOptions {
  metadata?: Partial<RunMetadata>;
  /** rate → endpoint → record, in insertion order */
  results?: Array<[number, Array<[string, TestMetricsRecord]>]>;
  skipped?: CycleFailure[];
}

export function createRun(options: RunOptions = {}): RunResult {
  const results = new Map<number, Map<string, TestMetricsRecord>>();
  for (const [rate, entries] of options.results ?? []) {
    results.set(rate, new Map(entries));
  }
  return {
    metadata: createMetadata(options.metadata),
    results,
    skipped: options.skipped ?? [],
  };
}
