/**
 * Application Constants
 * @module constants
 *
 * Centralized timing, pacing and discovery constants for the benchmark
 * orchestrator. All magic numbers used by the cycle state machine live here.
 */

// ============================================================================
// Cycle Pacing
// ============================================================================

export const CYCLE = {
  /** Maximum time to wait for the service to report healthy */
  HEALTH_TIMEOUT_MS: 30_000,
  /** Interval between health polls */
  HEALTH_POLL_INTERVAL_MS: 1_000,
  /** Timeout for a single health request */
  HEALTH_REQUEST_TIMEOUT_MS: 5_000,
  /** Timeout for the seed request */
  SEED_TIMEOUT_MS: 10_000,
  /** Pause after seeding so the store settles */
  POST_SEED_PAUSE_MS: 1_000,
  /** Timeout for the smoke request */
  SMOKE_TIMEOUT_MS: 5_000,
  /** Connection-pool warm-up before measurement */
  STABILIZATION_DELAY_MS: 2_000,
  /** Pause between cycles so sockets and ports settle */
  INTER_CYCLE_PAUSE_MS: 2_000,
  /** Extra sampling time over the load duration (process start/stop skew) */
  SAMPLING_SKEW_MS: 2_000,
} as const;

// ============================================================================
// Process Lifecycle
// ============================================================================

export const PROCESS = {
  /** Time allowed for the OS to confirm a spawned process */
  SPAWN_TIMEOUT_MS: 30_000,
  /** Grace period after SIGTERM before SIGKILL */
  TERMINATE_GRACE_MS: 5_000,
  /** Wait after SIGKILL before giving up on exit confirmation */
  KILL_WAIT_MS: 2_000,
  /** Grace period for orphan processes */
  ORPHAN_GRACE_MS: 2_000,
  /** Budget for the whole cleanup routine on signal exit */
  SHUTDOWN_BUDGET_MS: 15_000,
  /** Command-line fragments of this tool's own processes, never swept */
  OWN_COMMAND_MARKERS: ['run-benchmark', 'clean-bench'] as const,
} as const;

// ============================================================================
// Sampling
// ============================================================================

export const SAMPLING = {
  /** Tick between resource probes */
  INTERVAL_MS: 1_000,
  /** Upper bound for a single probe */
  PROBE_TIMEOUT_MS: 1_000,
} as const;

// ============================================================================
// Load Generator
// ============================================================================

export const LOAD = {
  /** Fixed overhead added to the attack duration when bounding the invocation */
  ATTACK_OVERHEAD_MS: 30_000,
  /** Per-request timeout passed to the generator */
  REQUEST_TIMEOUT: '10s',
  /** Timeout for report conversion */
  REPORT_TIMEOUT_MS: 30_000,
} as const;

// ============================================================================
// Discovery
// ============================================================================

export const DISCOVERY = {
  /** Infrastructure routes that are never benchmarked */
  EXCLUDED_PATHS: [
    '/',
    '/health',
    '/openapi.json',
    '/docs',
    '/docs/oauth2-redirect',
    '/redoc',
  ] as const,
  /** Methods a route must declare to be benchmarked */
  BENCHMARKED_METHODS: ['GET', 'POST'] as const,
  /** Path segment that marks a write endpoint */
  WRITE_SEGMENT: 'write',
} as const;

// ============================================================================
// Results
// ============================================================================

export const RESULTS = {
  /** Prefix of per-run output directories */
  RUN_DIR_PREFIX: 'clean_bench_',
  /** Name of the consolidated results document */
  RESULTS_FILE: 'clean_results.json',
  /** Success rate above which a rate point counts as sustainable */
  SUSTAINABLE_SUCCESS_RATE: 0.95,
} as const;
