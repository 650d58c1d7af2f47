/**
 * Orchestrator Module
 * @module orchestrator
 */

export {
  BenchmarkOrchestrator,
  DEFAULT_PACING,
  type Sampler,
  type PacingOptions,
  type OrchestratorDependencies,
  type CycleOutcome,
  type RunOptions,
} from './benchmark-orchestrator.js';
export { deriveAchievedRps, buildMetricsRecord } from './metrics.js';
