/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the benchmark orchestrator, grouped by the
 * scope a failure aborts: the whole run, a single cycle, or a single probe.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * Run-level failures. These abort the whole run with a non-zero exit.
 */
export const FatalErrorCodes = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  DISCOVERY_UNAVAILABLE: 'DISCOVERY_UNAVAILABLE',
  DISCOVERY_INVALID: 'DISCOVERY_INVALID',
  DUPLICATE_ENDPOINT: 'DUPLICATE_ENDPOINT',
  NO_ENDPOINTS: 'NO_ENDPOINTS',
  NO_SERVER_BOUND: 'NO_SERVER_BOUND',
  RUN_NOT_FOUND: 'RUN_NOT_FOUND',
  RUN_INVALID: 'RUN_INVALID',
  PERSIST_FAILED: 'PERSIST_FAILED',
} as const;

/**
 * Cycle-level failures. The cycle is skipped and the run continues.
 */
export const CycleErrorCodes = {
  SPAWN_FAILED: 'SPAWN_FAILED',
  PORT_IN_USE: 'PORT_IN_USE',
  HEALTH_TIMEOUT: 'HEALTH_TIMEOUT',
  SEED_FAILED: 'SEED_FAILED',
  SMOKE_FAILED: 'SMOKE_FAILED',
  LOAD_FAILED: 'LOAD_FAILED',
  REPORT_FAILED: 'REPORT_FAILED',
  CYCLE_CANCELLED: 'CYCLE_CANCELLED',
  CYCLE_UNEXPECTED: 'CYCLE_UNEXPECTED',
} as const;

/**
 * Probe-level failures. Swallowed by the sampler.
 */
export const ProbeErrorCodes = {
  PROCESS_GONE: 'PROCESS_GONE',
  PROBE_FAILED: 'PROBE_FAILED',
  PROBE_MALFORMED: 'PROBE_MALFORMED',
} as const;

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...FatalErrorCodes,
  ...CycleErrorCodes,
  ...ProbeErrorCodes,
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type FatalErrorCode = typeof FatalErrorCodes[keyof typeof FatalErrorCodes];
export type CycleErrorCode = typeof CycleErrorCodes[keyof typeof CycleErrorCodes];
export type ProbeErrorCode = typeof ProbeErrorCodes[keyof typeof ProbeErrorCodes];
export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Process exit codes used by the command line
 */
export const ExitCodes = {
  SUCCESS: 0,
  FATAL: 1,
  USAGE: 2,
  SIGINT: 130,
  SIGTERM: 143,
} as const;

export type ExitCode = typeof ExitCodes[keyof typeof ExitCodes];

/**
 * Check whether a string is a known error code
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.values<string>(ErrorCodes).includes(value);
}
