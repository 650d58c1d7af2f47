/**
 * Run Store
 * @module reporting/run-store
 *
 * Persists a RunResult as one JSON document per run under
 * `<outputRoot>/clean_bench_<YYYYMMDD_HHMMSS>/clean_results.json` and loads
 * it back. The on-disk document uses snake_case keys; writes go to a temp
 * file first and are renamed into place.
 */

import { mkdir, readdir, readFile, rename, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { RESULTS } from '../constants/index.js';
import { FatalError, ErrorCodes, RunNotFoundError, getErrorMessage } from '../errors/index.js';
import type { CycleFailure, RunResult, TestMetricsRecord } from '../types/index.js';

// ============================================================================
// Wire Schema
// ============================================================================

const WireRecordSchema = z.object({
  achieved_rps: z.number(),
  target_rps: z.number(),
  p50_ms: z.number(),
  p95_ms: z.number(),
  p99_ms: z.number(),
  avg_ms: z.number(),
  success_rate: z.number(),
  error_rate: z.number(),
  total_requests: z.number(),
  cpu_avg: z.number(),
  cpu_max: z.number(),
  memory_avg_mb: z.number(),
  memory_max_mb: z.number(),
});

const WireFailureSchema = z.object({
  rate: z.number(),
  endpoint: z.string(),
  stage: z.enum(['provision', 'health', 'seed', 'smoke', 'measure', 'report', 'cancelled']),
  code: z.string(),
  message: z.string(),
});

export const RunDocumentSchema = z.object({
  metadata: z.object({
    workers: z.number().int(),
    host: z.string(),
    port: z.number().int(),
    duration: z.string(),
    timestamp: z.string(),
    clean_restart: z.boolean().default(true),
    interrupted: z.boolean().default(false),
  }),
  results: z.record(z.string().regex(/^\d+$/, 'Rate keys must be integers'), z.record(z.string(), WireRecordSchema)),
  skipped: z.array(WireFailureSchema).default([]),
});

export type RunDocument = z.infer<typeof RunDocumentSchema>;
type WireRecord = z.infer<typeof WireRecordSchema>;

// ============================================================================
// Conversion
// ============================================================================

function recordToWire(record: TestMetricsRecord): WireRecord {
  return {
    achieved_rps: record.achievedRps,
    target_rps: record.targetRps,
    p50_ms: record.p50Ms,
    p95_ms: record.p95Ms,
    p99_ms: record.p99Ms,
    avg_ms: record.avgMs,
    success_rate: record.successRate,
    error_rate: record.errorRate,
    total_requests: record.totalRequests,
    cpu_avg: record.cpuAvg,
    cpu_max: record.cpuMax,
    memory_avg_mb: record.memoryAvgMb,
    memory_max_mb: record.memoryMaxMb,
  };
}

function recordFromWire(wire: WireRecord): TestMetricsRecord {
  return {
    achievedRps: wire.achieved_rps,
    targetRps: wire.target_rps,
    p50Ms: wire.p50_ms,
    p95Ms: wire.p95_ms,
    p99Ms: wire.p99_ms,
    avgMs: wire.avg_ms,
    successRate: wire.success_rate,
    errorRate: wire.error_rate,
    totalRequests: wire.total_requests,
    cpuAvg: wire.cpu_avg,
    cpuMax: wire.cpu_max,
    memoryAvgMb: wire.memory_avg_mb,
    memoryMaxMb: wire.memory_max_mb,
  };
}

/**
 * Convert a run to its persisted document
 */
export function toRunDocument(run: RunResult): RunDocument {
  const results: RunDocument['results'] = {};
  for (const [rate, byEndpoint] of run.results) {
    const entries: Record<string, WireRecord> = {};
    for (const [endpoint, record] of byEndpoint) {
      entries[endpoint] = recordToWire(record);
    }
    results[String(rate)] = entries;
  }

  return {
    metadata: {
      workers: run.metadata.workers,
      host: run.metadata.host,
      port: run.metadata.port,
      duration: run.metadata.duration,
      timestamp: run.metadata.timestamp,
      clean_restart: run.metadata.cleanRestart,
      interrupted: run.metadata.interrupted,
    },
    results,
    skipped: run.skipped.map((failure) => ({ ...failure })),
  };
}

/**
 * Convert a validated document back to a run
 */
export function fromRunDocument(document: RunDocument): RunResult {
  const results = new Map<number, Map<string, TestMetricsRecord>>();
  for (const [rateKey, byEndpoint] of Object.entries(document.results)) {
    const records = new Map<string, TestMetricsRecord>();
    for (const [endpoint, wire] of Object.entries(byEndpoint)) {
      records.set(endpoint, recordFromWire(wire));
    }
    results.set(Number(rateKey), records);
  }

  const skipped: CycleFailure[] = document.skipped.map((failure) => ({ ...failure }));

  return {
    metadata: {
      workers: document.metadata.workers,
      host: document.metadata.host,
      port: document.metadata.port,
      duration: document.metadata.duration,
      timestamp: document.metadata.timestamp,
      cleanRestart: document.metadata.clean_restart,
      interrupted: document.metadata.interrupted,
    },
    results,
    skipped,
  };
}

// ============================================================================
// Store
// ============================================================================

/**
 * Destination for incremental run snapshots
 */
export interface RunSink {
  /**
   * @returns the path written
   */
  persist(run: RunResult): Promise<string>;
}

export interface StoredRun {
  readonly path: string;
  readonly run: RunResult;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `YYYYMMDD_HHMMSS` in local time
 */
export function formatRunStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class RunStore implements RunSink {
  private currentDir: string | null = null;

  constructor(private readonly outputRoot: string) {}

  /**
   * Directory of the run being written, once created
   */
  get runDir(): string | null {
    return this.currentDir;
  }

  /**
   * Create this run's output directory
   */
  async createRunDir(startedAt: Date = new Date()): Promise<string> {
    const dir = join(this.outputRoot, `${RESULTS.RUN_DIR_PREFIX}${formatRunStamp(startedAt)}`);
    await mkdir(dir, { recursive: true });
    this.currentDir = dir;
    return dir;
  }

  async persist(run: RunResult): Promise<string> {
    const dir = this.currentDir ?? (await this.createRunDir(new Date(run.metadata.timestamp)));
    const target = join(dir, RESULTS.RESULTS_FILE);
    const temporary = `${target}.${process.pid}.tmp`;

    try {
      await writeFile(temporary, `${JSON.stringify(toRunDocument(run), null, 2)}\n`, 'utf8');
      await rename(temporary, target);
    } catch (error) {
      throw new FatalError(`Failed to persist results to ${target}: ${getErrorMessage(error)}`, ErrorCodes.PERSIST_FAILED, {
        cause: error instanceof Error ? error : undefined,
        operation: 'persist',
      });
    }
    return target;
  }

  /**
   * Load a specific results file
   */
  async load(path: string): Promise<RunResult> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      throw new RunNotFoundError(`Cannot read results file ${path}: ${getErrorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new FatalError(`Results file ${path} is not valid JSON`, ErrorCodes.RUN_INVALID, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const parsed = RunDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new FatalError(`Results file ${path} has an unexpected shape`, ErrorCodes.RUN_INVALID, {
        details: {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        },
      });
    }
    return fromRunDocument(parsed.data);
  }

  /**
   * Find the run directory whose results file was modified last
   */
  async findLatest(): Promise<string> {
    let names: string[];
    try {
      names = await readdir(this.outputRoot);
    } catch (error) {
      throw new RunNotFoundError(`No benchmark results under ${this.outputRoot}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    let latest: { path: string; mtimeMs: number } | null = null;
    for (const name of names) {
      if (!name.startsWith(RESULTS.RUN_DIR_PREFIX)) {
        continue;
      }
      const candidate = join(this.outputRoot, name, RESULTS.RESULTS_FILE);
      const info = await stat(candidate).catch(() => null);
      if (info?.isFile() && (latest === null || info.mtimeMs > latest.mtimeMs)) {
        latest = { path: candidate, mtimeMs: info.mtimeMs };
      }
    }

    if (latest === null) {
      throw new RunNotFoundError(`No benchmark results under ${this.outputRoot}`);
    }
    return latest.path;
  }

  /**
   * Load the most recently produced run
   */
  async loadLatest(): Promise<StoredRun> {
    const path = await this.findLatest();
    return { path, run: await this.load(path) };
  }
}
