/**
 * Benchmark Orchestrator
 * @module orchestrator/benchmark-orchestrator
 *
 * Runs the clean-room cycle for every (rate, endpoint) pair, rates outer and
 * endpoints inner, strictly one cycle at a time:
 *
 * provision → health gate → seed → smoke → stabilize → measure (sampler and
 * load generator joined) → report → record → teardown → inter-cycle pause
 *
 * A failing cycle is recorded as skipped and the run moves on. The run is
 * persisted after every cycle so an interrupt loses nothing already measured.
 */

import { CYCLE } from '../constants/index.js';
import {
  CycleError,
  ErrorCodes,
  FatalError,
  getErrorMessage,
  isCycleError,
  toCycleError,
  type CycleStage,
} from '../errors/index.js';
import { materializeUrl, requestMethodFor } from '../discovery/index.js';
import type { ServiceClient } from '../http/index.js';
import type { AttackArtifact, LoadSource } from '../load/index.js';
import { createModuleLogger, type CycleRef, type StructuredLogger } from '../logging/index.js';
import type { ServiceDriver, ServiceInstance } from '../process/index.js';
import type { RunSink } from '../reporting/index.js';
import { summarizeSeries, type ResourceSampler } from '../sampler/index.js';
import type { RunConfiguration } from '../config/index.js';
import {
  countRecords,
  type CycleFailure,
  type EndpointSpec,
  type RunMetadata,
  type RunResult,
  type TestMetricsRecord,
} from '../types/index.js';
import { delay } from '../utils/async.js';
import { err, isErr, ok, type Result } from '../utils/result.js';
import { buildMetricsRecord } from './metrics.js';

// ============================================================================
// Types
// ============================================================================

export type Sampler = Pick<ResourceSampler, 'startSampling' | 'collect'>;

/**
 * Fixed waits between cycle steps
 */
export interface PacingOptions {
  readonly healthTimeoutMs: number;
  readonly postSeedPauseMs: number;
  readonly stabilizationDelayMs: number;
  readonly interCyclePauseMs: number;
  /** Extra sampling time beyond the load duration */
  readonly samplingSkewMs: number;
}

export const DEFAULT_PACING: PacingOptions = {
  healthTimeoutMs: CYCLE.HEALTH_TIMEOUT_MS,
  postSeedPauseMs: CYCLE.POST_SEED_PAUSE_MS,
  stabilizationDelayMs: CYCLE.STABILIZATION_DELAY_MS,
  interCyclePauseMs: CYCLE.INTER_CYCLE_PAUSE_MS,
  samplingSkewMs: CYCLE.SAMPLING_SKEW_MS,
};

export interface OrchestratorDependencies {
  readonly driver: ServiceDriver;
  readonly sampler: Sampler;
  readonly loadSource: LoadSource;
  readonly client: ServiceClient;
  /** Receives a snapshot after every cycle and once at the end */
  readonly sink?: RunSink;
  readonly pacing?: Partial<PacingOptions>;
  readonly logger?: StructuredLogger;
}

/**
 * The outcome of one cycle as reported to progress callbacks
 */
export type CycleOutcome =
  | { readonly cycle: CycleRef; readonly ok: true; readonly record: TestMetricsRecord }
  | { readonly cycle: CycleRef; readonly ok: false; readonly failure: CycleFailure };

export interface RunOptions {
  /** Directory for load-generator artifacts */
  readonly workDir: string;
  readonly signal?: AbortSignal;
  onCycleStart?(cycle: CycleRef): void;
  onCycleComplete?(outcome: CycleOutcome, run: RunResult): void;
}

interface CycleReport {
  readonly result: Result<TestMetricsRecord, CycleError>;
  /** Whether the instance passed the health gate */
  readonly healthy: boolean;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class BenchmarkOrchestrator {
  private readonly driver: ServiceDriver;
  private readonly sampler: Sampler;
  private readonly loadSource: LoadSource;
  private readonly client: ServiceClient;
  private readonly sink: RunSink | undefined;
  private readonly pacing: PacingOptions;
  private readonly logger: StructuredLogger;

  constructor(deps: OrchestratorDependencies) {
    this.driver = deps.driver;
    this.sampler = deps.sampler;
    this.loadSource = deps.loadSource;
    this.client = deps.client;
    this.sink = deps.sink;
    this.pacing = { ...DEFAULT_PACING, ...deps.pacing };
    this.logger = deps.logger ?? createModuleLogger('orchestrator');
  }

  /**
   * Benchmark every endpoint at every rate.
   *
   * @returns the run, with `interrupted` set when the signal aborted it
   * @throws FatalError when cycles were attempted but no server ever became healthy
   */
  async run(config: RunConfiguration, endpoints: readonly EndpointSpec[], options: RunOptions): Promise<RunResult> {
    const startedAt = Date.now();
    const metadata: RunMetadata = {
      workers: config.workers,
      host: config.host,
      port: config.port,
      duration: config.duration,
      timestamp: new Date(startedAt).toISOString(),
      cleanRestart: true,
      interrupted: false,
    };
    const results = new Map<number, Map<string, TestMetricsRecord>>();
    const skipped: CycleFailure[] = [];
    const total = config.rates.length * endpoints.length;
    const { signal } = options;

    let index = 0;
    let interrupted = false;
    let everHealthy = false;

    this.logger.runStarted(total, {
      rates: config.rates,
      endpoints: endpoints.map((endpoint) => endpoint.name),
      duration: config.duration,
      workers: config.workers,
    });

    outer: for (const rate of config.rates) {
      for (const endpoint of endpoints) {
        if (signal?.aborted) {
          interrupted = true;
          break outer;
        }

        index += 1;
        const cycle: CycleRef = { index, total, rate, endpoint: endpoint.name };
        options.onCycleStart?.(cycle);
        this.logger.cycleStarted(cycle);

        const cycleStart = Date.now();
        const { result, healthy } = await this.runCycle(cycle, config, endpoint, options);
        if (healthy) {
          everHealthy = true;
        }

        let outcome: CycleOutcome;
        if (result.ok) {
          const byEndpoint = results.get(rate) ?? new Map<string, TestMetricsRecord>();
          byEndpoint.set(endpoint.name, result.value);
          results.set(rate, byEndpoint);
          outcome = { cycle, ok: true, record: result.value };
          this.logger.cycleCompleted(cycle, Date.now() - cycleStart, {
            achievedRps: result.value.achievedRps,
            p95Ms: result.value.p95Ms,
            successRate: result.value.successRate,
            cpuAvg: result.value.cpuAvg,
          });
        } else {
          const failure: CycleFailure = {
            rate,
            endpoint: endpoint.name,
            stage: result.error.stage,
            code: result.error.code,
            message: result.error.message,
          };
          skipped.push(failure);
          outcome = { cycle, ok: false, failure };
          this.logger.cycleSkipped(cycle, result.error.stage, result.error);
        }

        const snapshot = this.snapshot(metadata, results, skipped, false);
        await this.persistIncrement(snapshot);
        options.onCycleComplete?.(outcome, snapshot);

        if (signal?.aborted) {
          interrupted = true;
          break outer;
        }
        if (index < total) {
          await delay(this.pacing.interCyclePauseMs, signal);
        }
      }
    }

    const run = this.snapshot(metadata, results, skipped, interrupted);
    const recorded = countRecords(run);
    if (this.sink) {
      const path = await this.sink.persist(run);
      this.logger.runPersisted(path, recorded);
    }

    if (interrupted) {
      this.logger.runInterrupted(signal?.reason === undefined ? 'aborted' : String(signal.reason), recorded);
    } else {
      this.logger.runCompleted(Date.now() - startedAt, recorded, skipped.length);
    }

    if (index > 0 && !everHealthy && !interrupted) {
      throw new FatalError(
        `Unable to bind any server on ${config.host}:${config.port}`,
        ErrorCodes.NO_SERVER_BOUND,
        { details: { attempted: index, skipped: skipped.length } }
      );
    }

    return run;
  }

  // --------------------------------------------------------------------------
  // Cycle
  // --------------------------------------------------------------------------

  private async runCycle(
    cycle: CycleRef,
    config: RunConfiguration,
    endpoint: EndpointSpec,
    options: RunOptions
  ): Promise<CycleReport> {
    const { signal } = options;
    let stage: CycleStage = 'provision';
    let instance: ServiceInstance | undefined;
    let healthy = false;

    const fail = (error: CycleError): CycleReport => ({ result: err(error), healthy });

    try {
      instance = await this.driver.spawn({
        host: config.host,
        port: config.port,
        workers: config.workers,
        command: config.serverCommand,
      });
      this.logger.cycleStageCompleted(cycle, stage, { pid: instance.pid });

      stage = 'health';
      if (!(await this.driver.awaitHealthy(instance, this.pacing.healthTimeoutMs, signal))) {
        if (signal?.aborted) {
          return fail(CycleError.cancelled(stage));
        }
        return fail(
          new CycleError(
            `Server not healthy within ${this.pacing.healthTimeoutMs}ms`,
            ErrorCodes.HEALTH_TIMEOUT,
            stage,
            { details: { pid: instance.pid } }
          )
        );
      }
      healthy = true;
      this.logger.cycleStageCompleted(cycle, stage);

      stage = 'seed';
      const seeded = await this.client.seed(instance, config.seedPath, signal);
      if (isErr(seeded)) {
        return fail(seeded.error);
      }
      await delay(this.pacing.postSeedPauseMs, signal);
      this.logger.cycleStageCompleted(cycle, stage, { status: seeded.value.status });

      stage = 'smoke';
      const smoke = await this.client.smoke(instance, endpoint, config.resourceId, signal);
      if (isErr(smoke)) {
        return fail(smoke.error);
      }
      this.logger.cycleStageCompleted(cycle, stage, { status: smoke.value.status, body: smoke.value.body });

      await delay(this.pacing.stabilizationDelayMs, signal);
      if (signal?.aborted) {
        return fail(CycleError.cancelled(stage));
      }

      stage = 'measure';
      const record = await this.measure(cycle, config, endpoint, instance, options, (next) => {
        stage = next;
      });
      return { result: ok(record), healthy };
    } catch (error) {
      if (signal?.aborted && !(isCycleError(error) && error.code === ErrorCodes.CYCLE_CANCELLED)) {
        return fail(CycleError.cancelled(stage));
      }
      return fail(toCycleError(error, stage));
    } finally {
      if (instance) {
        await this.teardown(instance);
      }
    }
  }

  /**
   * Sample and attack concurrently, join both, then convert the report
   */
  private async measure(
    cycle: CycleRef,
    config: RunConfiguration,
    endpoint: EndpointSpec,
    instance: ServiceInstance,
    options: RunOptions,
    enterStage: (stage: CycleStage) => void
  ): Promise<TestMetricsRecord> {
    const { signal } = options;
    const handle = this.sampler.startSampling(instance.pid, config.durationMs + this.pacing.samplingSkewMs, {
      signal,
    });

    let artifact: AttackArtifact;
    try {
      artifact = await this.loadSource.attack({
        targets: [
          {
            method: requestMethodFor(endpoint),
            url: materializeUrl(instance.baseUrl, endpoint.path, config.resourceId),
          },
        ],
        rate: cycle.rate,
        durationMs: config.durationMs,
        workDir: options.workDir,
        name: `${endpoint.name}_${cycle.rate}`,
        signal,
      });
    } catch (error) {
      handle.stop();
      await this.sampler.collect(handle);
      throw error;
    }

    const series = await this.sampler.collect(handle);
    if (signal?.aborted) {
      throw CycleError.cancelled('measure');
    }
    this.logger.cycleStageCompleted(cycle, 'measure', { samples: series.length });

    enterStage('report');
    const report = await this.loadSource.report(artifact, signal);
    this.logger.cycleStageCompleted(cycle, 'report', { requests: report.requests, generatorRate: report.rate });

    return buildMetricsRecord(cycle.rate, report, config.durationMs / 1000, summarizeSeries(series));
  }

  private async teardown(instance: ServiceInstance): Promise<void> {
    try {
      await this.driver.terminate(instance);
    } catch (error) {
      this.logger.error({ pid: instance.pid, error: getErrorMessage(error) }, 'Failed to terminate server');
    }
  }

  // --------------------------------------------------------------------------
  // Results
  // --------------------------------------------------------------------------

  private snapshot(
    metadata: RunMetadata,
    results: ReadonlyMap<number, ReadonlyMap<string, TestMetricsRecord>>,
    skipped: readonly CycleFailure[],
    interrupted: boolean
  ): RunResult {
    const copy = new Map<number, ReadonlyMap<string, TestMetricsRecord>>();
    for (const [rate, byEndpoint] of results) {
      copy.set(rate, new Map(byEndpoint));
    }
    return { metadata: { ...metadata, interrupted }, results: copy, skipped: [...skipped] };
  }

  private async persistIncrement(run: RunResult): Promise<void> {
    if (!this.sink) {
      return;
    }
    try {
      await this.sink.persist(run);
    } catch (error) {
      this.logger.error({ error: getErrorMessage(error) }, 'Failed to persist partial results');
    }
  }
}
