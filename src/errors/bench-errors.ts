/**
 * Benchmark Error Classes
 * @module errors/bench-errors
 *
 * The three failure scopes of a benchmark run:
 * - FatalError - aborts the whole run (discovery, configuration, no server)
 * - CycleError - aborts one (rate, endpoint) cycle; the run continues
 * - ProbeError - one failed resource poll; the sampler carries on
 */

import { BaseError, type ErrorContext, type SerializedError } from './base.js';
import {
  ErrorCodes,
  ExitCodes,
  type CycleErrorCode,
  type ExitCode,
  type FatalErrorCode,
  type ProbeErrorCode,
} from './codes.js';

// ============================================================================
// Fatal Errors
// ============================================================================

/**
 * Run-level failure. The command exits with a non-zero code.
 */
export class FatalError extends BaseError {
  declare readonly code: FatalErrorCode;
  public readonly exitCode: ExitCode;

  constructor(
    message: string,
    code: FatalErrorCode = ErrorCodes.CONFIGURATION_ERROR,
    context: ErrorContext = {},
    exitCode: ExitCode = ExitCodes.FATAL
  ) {
    super(message, code, context);
    this.exitCode = exitCode;
  }
}

/**
 * Route table unavailable, invalid, or yielding no usable endpoints
 */
export class DiscoveryError extends FatalError {
  constructor(
    message: string,
    code: FatalErrorCode = ErrorCodes.DISCOVERY_UNAVAILABLE,
    context: ErrorContext = {}
  ) {
    super(message, code, { operation: 'discover', ...context });
  }
}

/**
 * Invalid command-line arguments or environment configuration
 */
export class ConfigurationError extends FatalError {
  constructor(message: string, context: ErrorContext = {}, usage = false) {
    super(
      message,
      usage ? ErrorCodes.INVALID_ARGUMENT : ErrorCodes.CONFIGURATION_ERROR,
      { operation: 'configure', ...context },
      usage ? ExitCodes.USAGE : ExitCodes.FATAL
    );
  }
}

/**
 * No persisted run could be located or parsed
 */
export class RunNotFoundError extends FatalError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCodes.RUN_NOT_FOUND, { operation: 'load', ...context });
  }
}

// ============================================================================
// Cycle Errors
// ============================================================================

/**
 * Stage of the clean-room cycle in which a failure occurred
 */
export type CycleStage =
  | 'provision'
  | 'health'
  | 'seed'
  | 'smoke'
  | 'measure'
  | 'report'
  | 'cancelled';

/**
 * Serialized cycle error including its stage
 */
export interface SerializedCycleError extends SerializedError {
  stage: CycleStage;
}

/**
 * Failure confined to a single (rate, endpoint) cycle
 */
export class CycleError extends BaseError {
  declare readonly code: CycleErrorCode;
  public readonly stage: CycleStage;

  constructor(
    message: string,
    code: CycleErrorCode,
    stage: CycleStage,
    context: ErrorContext = {}
  ) {
    super(message, code, context, code !== ErrorCodes.CYCLE_UNEXPECTED);
    this.stage = stage;
  }

  override toJSON(): SerializedCycleError {
    return { ...super.toJSON(), stage: this.stage };
  }

  /**
   * Build the cancellation error raised when the run is interrupted
   */
  static cancelled(stage: CycleStage): CycleError {
    return new CycleError(
      `Cycle cancelled during ${stage}`,
      ErrorCodes.CYCLE_CANCELLED,
      'cancelled',
      { details: { interruptedStage: stage } }
    );
  }
}

// ============================================================================
// Probe Errors
// ============================================================================

/**
 * A single failed resource poll
 */
export class ProbeError extends BaseError {
  declare readonly code: ProbeErrorCode;
  public readonly pid: number;

  constructor(message: string, code: ProbeErrorCode, pid: number, context: ErrorContext = {}) {
    super(message, code, { operation: 'probe', ...context });
    this.pid = pid;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isFatalError(error: unknown): error is FatalError {
  return error instanceof FatalError;
}

export function isCycleError(error: unknown): error is CycleError {
  return error instanceof CycleError;
}

export function isProbeError(error: unknown): error is ProbeError {
  return error instanceof ProbeError;
}

/**
 * Normalize anything thrown inside a cycle into a CycleError
 */
export function toCycleError(error: unknown, stage: CycleStage): CycleError {
  if (isCycleError(error)) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  return new CycleError(
    cause?.message ?? String(error),
    ErrorCodes.CYCLE_UNEXPECTED,
    stage,
    { cause }
  );
}
