/**
 * Load Source
 * @module load/load-source
 *
 * Contract with the external load generator. An attack fires requests at a
 * fixed rate for a fixed duration and leaves a raw artifact; report
 * conversion turns that artifact into a LoadTestReport in a separate step.
 */

import type { HttpMethod, LoadTestReport } from '../types/index.js';

export interface LoadTarget {
  readonly method: HttpMethod;
  readonly url: string;
}

export interface AttackRequest {
  readonly targets: readonly LoadTarget[];
  /** Requests per second */
  readonly rate: number;
  readonly durationMs: number;
  /** Directory for the targets file and the raw results */
  readonly workDir: string;
  /** File-name stem for this cycle's artifacts */
  readonly name: string;
  readonly signal?: AbortSignal;
}

/**
 * Raw output of an attack
 */
export interface AttackArtifact {
  readonly path: string;
}

export interface LoadSource {
  /**
   * @throws CycleError (stage `measure`) when the generator fails
   */
  attack(request: AttackRequest): Promise<AttackArtifact>;

  /**
   * @throws CycleError (stage `report`) when conversion or parsing fails
   */
  report(artifact: AttackArtifact, signal?: AbortSignal): Promise<LoadTestReport>;
}
