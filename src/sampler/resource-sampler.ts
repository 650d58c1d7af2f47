/**
 * Resource Sampler
 * @module sampler/resource-sampler
 *
 * Polls one process's CPU and memory at a fixed tick for a bounded duration.
 * Runs concurrently with the load generator; the orchestrator joins both.
 */

import { SAMPLING } from '../constants/index.js';
import { getErrorMessage, isProbeError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { PsProcessProbe, type ProcessProbe } from '../process/index.js';
import type { ResourceSample, ResourceSeries, ResourceSummary } from '../types/index.js';
import { delay } from '../utils/async.js';

// ============================================================================
// Types
// ============================================================================

export interface SamplerOptions {
  /** Tick between probes */
  readonly intervalMs?: number;
  /** Bound on a single probe; capped at the tick interval */
  readonly probeTimeoutMs?: number;
  readonly logger?: StructuredLogger;
}

export interface StartSamplingOptions {
  readonly signal?: AbortSignal;
}

/**
 * A running sampling loop
 */
export interface SamplingHandle {
  readonly pid: number;
  /** End the loop after the in-flight probe */
  stop(): void;
  /** Settles with the sealed series when the loop ends */
  readonly done: Promise<ResourceSeries>;
}

// ============================================================================
// Sampler
// ============================================================================

export class ResourceSampler {
  private readonly intervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly probe: ProcessProbe = new PsProcessProbe(),
    options: SamplerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? SAMPLING.INTERVAL_MS;
    this.probeTimeoutMs = Math.min(options.probeTimeoutMs ?? SAMPLING.PROBE_TIMEOUT_MS, this.intervalMs);
    this.logger = options.logger ?? createModuleLogger('sampler');
  }

  /**
   * Begin sampling a process. Ends when `maxDurationMs` elapses, `stop()` is
   * called, or the signal aborts.
   */
  startSampling(
    pid: number,
    maxDurationMs: number,
    options: StartSamplingOptions = {}
  ): SamplingHandle {
    const stopper = new AbortController();
    const signal = options.signal
      ? AbortSignal.any([options.signal, stopper.signal])
      : stopper.signal;

    return {
      pid,
      stop: () => stopper.abort(),
      done: this.sample(pid, maxDurationMs, signal),
    };
  }

  /**
   * Wait for a sampling loop to finish and return its series
   */
  collect(handle: SamplingHandle): Promise<ResourceSeries> {
    return handle.done;
  }

  private async sample(pid: number, maxDurationMs: number, signal: AbortSignal): Promise<ResourceSeries> {
    const samples: ResourceSample[] = [];
    const deadline = Date.now() + maxDurationMs;

    while (Date.now() < deadline && !signal.aborted) {
      const tickStart = Date.now();

      try {
        const reading = await this.probe.read(pid, this.probeTimeoutMs);
        samples.push({ timestamp: Date.now(), cpuPercent: reading.cpuPercent, rssMb: reading.rssMb });
      } catch (error) {
        if (isProbeError(error)) {
          this.logger.probeFailed(pid, error);
        } else {
          this.logger.warn({ pid, error: getErrorMessage(error) }, 'Unexpected probe failure');
        }
      }

      const now = Date.now();
      await delay(Math.min(this.intervalMs - (now - tickStart), deadline - now), signal);
    }

    this.logger.debug({ pid, samples: samples.length }, 'Sampling finished');
    return Object.freeze(samples);
  }
}

// ============================================================================
// Summary
// ============================================================================

/**
 * Reduce a series to summary statistics. An empty series yields all zeros.
 */
export function summarizeSeries(series: ResourceSeries): ResourceSummary {
  if (series.length === 0) {
    return { avgCpu: 0, maxCpu: 0, avgMemoryMb: 0, maxMemoryMb: 0, sampleCount: 0 };
  }

  let cpuTotal = 0;
  let memoryTotal = 0;
  let maxCpu = 0;
  let maxMemoryMb = 0;
  for (const sample of series) {
    cpuTotal += sample.cpuPercent;
    memoryTotal += sample.rssMb;
    maxCpu = Math.max(maxCpu, sample.cpuPercent);
    maxMemoryMb = Math.max(maxMemoryMb, sample.rssMb);
  }

  return {
    avgCpu: cpuTotal / series.length,
    maxCpu,
    avgMemoryMb: memoryTotal / series.length,
    maxMemoryMb,
    sampleCount: series.length,
  };
}
