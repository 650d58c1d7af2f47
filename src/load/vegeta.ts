/**
 * Vegeta Load Source
 * @module load/vegeta
 *
 * Drives the `vegeta` binary: `attack` writes a binary results file, then
 * `report -type=json` converts it. The JSON report is validated with zod
 * before it reaches the metrics layer.
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { LOAD } from '../constants/index.js';
import { CycleError, ErrorCodes, getErrorMessage, isCycleError } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { toGeneratorDuration } from '../config/schema.js';
import type { LoadTestReport } from '../types/index.js';
import { defaultCommandRunner, type CommandRunner } from '../utils/exec.js';
import type { AttackArtifact, AttackRequest, LoadSource, LoadTarget } from './load-source.js';

// ============================================================================
// Report Schema
// ============================================================================

/**
 * Subset of `vegeta report -type=json` the metrics need (latencies in ns)
 */
export const VegetaReportSchema = z.object({
  requests: z.number().int().nonnegative(),
  rate: z.number().nonnegative(),
  success: z.number().min(0).max(1),
  latencies: z.object({
    '50th': z.number().nonnegative(),
    '95th': z.number().nonnegative(),
    '99th': z.number().nonnegative(),
    mean: z.number().nonnegative(),
  }),
});

export type VegetaReport = z.infer<typeof VegetaReportSchema>;

/**
 * Parse the generator's JSON report
 *
 * @throws CycleError (stage `report`) on invalid JSON or a missing field
 */
export function parseVegetaReport(raw: string): LoadTestReport {
  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new CycleError('Load report is not valid JSON', ErrorCodes.REPORT_FAILED, 'report', {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const parsed = VegetaReportSchema.safeParse(document);
  if (!parsed.success) {
    throw new CycleError('Load report is missing required fields', ErrorCodes.REPORT_FAILED, 'report', {
      details: {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      },
    });
  }

  const { requests, rate, success, latencies } = parsed.data;
  return {
    requests,
    rate,
    success,
    latencies: {
      p50: latencies['50th'],
      p95: latencies['95th'],
      p99: latencies['99th'],
      mean: latencies.mean,
    },
  };
}

/**
 * Render targets in vegeta's HTTP format, one `METHOD URL` per line
 */
export function formatTargets(targets: readonly LoadTarget[]): string {
  return targets.map((target) => `${target.method} ${target.url}\n`).join('');
}

// ============================================================================
// Load Source
// ============================================================================

export interface VegetaOptions {
  /** Path of the vegeta executable */
  readonly binary?: string;
  readonly runner?: CommandRunner;
  readonly logger?: StructuredLogger;
}

export class VegetaLoadSource implements LoadSource {
  private readonly binary: string;
  private readonly runner: CommandRunner;
  private readonly logger: StructuredLogger;

  constructor(options: VegetaOptions = {}) {
    this.binary = options.binary ?? 'vegeta';
    this.runner = options.runner ?? defaultCommandRunner;
    this.logger = options.logger ?? createModuleLogger('vegeta');
  }

  async attack(request: AttackRequest): Promise<AttackArtifact> {
    const targetsPath = join(request.workDir, `t_${request.name}.txt`);
    const outputPath = join(request.workDir, `${request.name}.bin`);

    const args = [
      'attack',
      '-duration', toGeneratorDuration(request.durationMs),
      '-rate', String(request.rate),
      '-timeout', LOAD.REQUEST_TIMEOUT,
      '-targets', targetsPath,
      '-output', outputPath,
    ];

    try {
      await writeFile(targetsPath, formatTargets(request.targets), 'utf8');

      this.logger.debug({ args }, 'Starting load generator');
      const result = await this.runner.run(this.binary, args, {
        timeoutMs: request.durationMs + LOAD.ATTACK_OVERHEAD_MS,
        signal: request.signal,
      });

      if (result.killed) {
        throw new CycleError(
          request.signal?.aborted ? 'Load generator aborted' : 'Load generator timed out',
          request.signal?.aborted ? ErrorCodes.CYCLE_CANCELLED : ErrorCodes.LOAD_FAILED,
          'measure'
        );
      }
      if (result.exitCode !== 0) {
        throw new CycleError(
          `Load generator exited with ${result.exitCode ?? 'signal'}: ${result.stderr.trim()}`,
          ErrorCodes.LOAD_FAILED,
          'measure',
          { details: { exitCode: result.exitCode } }
        );
      }
    } catch (error) {
      if (isCycleError(error)) {
        throw error;
      }
      throw new CycleError(`Load generator failed: ${getErrorMessage(error)}`, ErrorCodes.LOAD_FAILED, 'measure', {
        cause: error instanceof Error ? error : undefined,
      });
    }

    return { path: outputPath };
  }

  async report(artifact: AttackArtifact, signal?: AbortSignal): Promise<LoadTestReport> {
    let stdout: string;
    try {
      const result = await this.runner.run(this.binary, ['report', '-type=json', artifact.path], {
        timeoutMs: LOAD.REPORT_TIMEOUT_MS,
        signal,
      });
      if (result.exitCode !== 0) {
        throw new CycleError(
          `Report conversion exited with ${result.exitCode ?? 'signal'}: ${result.stderr.trim()}`,
          ErrorCodes.REPORT_FAILED,
          'report'
        );
      }
      stdout = result.stdout;
    } catch (error) {
      if (isCycleError(error)) {
        throw error;
      }
      throw new CycleError(`Report conversion failed: ${getErrorMessage(error)}`, ErrorCodes.REPORT_FAILED, 'report', {
        cause: error instanceof Error ? error : undefined,
      });
    }

    return parseVegetaReport(stdout);
  }
}
