/**
 * Benchmark Domain Types
 * @module types/bench
 *
 * Data model shared by discovery, sampling, the orchestrator and the run
 * store. All records are immutable once created.
 */

import type { CycleStage } from '../errors/index.js';

// ============================================================================
// Endpoints
// ============================================================================

/**
 * HTTP methods a benchmarked route may declare
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export const WRITE_METHODS: readonly HttpMethod[] = ['POST', 'PUT', 'PATCH', 'DELETE'];

export function isHttpMethod(value: string): value is HttpMethod {
  return HTTP_METHODS.some((method) => method === value);
}

/**
 * One benchmarkable endpoint, produced by discovery
 */
export interface EndpointSpec {
  /** Logical test name, unique within a run */
  readonly name: string;
  /** Declared HTTP method */
  readonly method: HttpMethod;
  /** URL path template, e.g. `/api/db/read/{item_id}` */
  readonly path: string;
}

// ============================================================================
// Resource Sampling
// ============================================================================

/**
 * One probe of the service process
 */
export interface ResourceSample {
  /** Epoch milliseconds */
  readonly timestamp: number;
  readonly cpuPercent: number;
  readonly rssMb: number;
}

/**
 * Sealed, ordered series of samples for one cycle
 */
export type ResourceSeries = ReadonlyArray<ResourceSample>;

export interface ResourceSummary {
  readonly avgCpu: number;
  readonly maxCpu: number;
  readonly avgMemoryMb: number;
  readonly maxMemoryMb: number;
  readonly sampleCount: number;
}

// ============================================================================
// Load Generator Report
// ============================================================================

/**
 * Latency distribution in nanoseconds, as reported by the load generator
 */
export interface LatencyDistribution {
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
  readonly mean: number;
}

/**
 * Parsed load-generator report for one cycle
 */
export interface LoadTestReport {
  /** Total requests issued */
  readonly requests: number;
  /** Fraction of requests that succeeded (0..1) */
  readonly success: number;
  /** The generator's own attempted mean rate */
  readonly rate: number;
  readonly latencies: LatencyDistribution;
}

// ============================================================================
// Metrics Records
// ============================================================================

/**
 * Canonical result of one cycle, keyed by (targetRps, endpoint)
 */
export interface TestMetricsRecord {
  /** Successfully completed requests per second over the nominal window */
  readonly achievedRps: number;
  readonly targetRps: number;
  readonly p50Ms: number;
  readonly p95Ms: number;
  readonly p99Ms: number;
  readonly avgMs: number;
  readonly successRate: number;
  readonly errorRate: number;
  readonly totalRequests: number;
  readonly cpuAvg: number;
  readonly cpuMax: number;
  readonly memoryAvgMb: number;
  readonly memoryMaxMb: number;
}

/**
 * Why a cycle produced no record
 */
export interface CycleFailure {
  readonly rate: number;
  readonly endpoint: string;
  readonly stage: CycleStage;
  readonly code: string;
  readonly message: string;
}

// ============================================================================
// Run Result
// ============================================================================

export interface RunMetadata {
  readonly workers: number;
  readonly host: string;
  readonly port: number;
  /** Per-cycle duration as configured, e.g. `10s` */
  readonly duration: string;
  /** ISO-8601 start timestamp */
  readonly timestamp: string;
  readonly cleanRestart: boolean;
  readonly interrupted: boolean;
}

/**
 * rate → endpoint name → record
 */
export type RunResults = ReadonlyMap<number, ReadonlyMap<string, TestMetricsRecord>>;

export interface RunResult {
  readonly metadata: RunMetadata;
  readonly results: RunResults;
  readonly skipped: ReadonlyArray<CycleFailure>;
}

/**
 * Count the records held by a run
 */
export function countRecords(run: RunResult): number {
  let count = 0;
  for (const byEndpoint of run.results.values()) {
    count += byEndpoint.size;
  }
  return count;
}
