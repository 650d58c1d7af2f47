/**
 * Clean-Room HTTP Benchmark
 * @module clean-room-bench
 *
 * Library entry point. The `clean-bench` command wires these pieces
 * together; embedders can swap any collaborator of the orchestrator.
 *
 * @example
 * ```typescript
 * import {
 *   BenchmarkOrchestrator,
 *   ResourceSampler,
 *   RunStore,
 *   SubprocessServiceDriver,
 *   VegetaLoadSource,
 *   FetchServiceClient,
 * } from 'clean-room-bench';
 * ```
 */

// ============================================================================
// Types, Constants and Errors
// ============================================================================

export * from './types/index.js';
export * from './constants/index.js';
export * from './errors/index.js';
export { ok, err, isOk, isErr, type Result, type AsyncResult } from './utils/result.js';

// ============================================================================
// Configuration and Logging
// ============================================================================

export * from './config/index.js';
export * from './logging/index.js';

// ============================================================================
// Benchmark Components
// ============================================================================

export * from './discovery/index.js';
export * from './process/index.js';
export * from './sampler/index.js';
export * from './load/index.js';
export * from './http/index.js';
export * from './orchestrator/index.js';
export * from './reporting/index.js';
