/**
 * Result Type Pattern
 * @module utils/result
 *
 * Type-safe handling of expected failures using the Ok/Err pattern. Cycle
 * stages return a Result so that a failed health gate or seed request is a
 * value the orchestrator branches on, not an exception.
 *
 * @example
 * ```typescript
 * const outcome = await seed(instance);
 * if (isErr(outcome)) {
 *   return outcome;
 * }
 * ```
 */

// ============================================================================
// Result Type Definition
// ============================================================================

/**
 * Ok variant - represents a successful result
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Err variant - represents a failed result
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Result type - either Ok<T> or Err<E>
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Async result type
 */
export type AsyncResult<T, E = Error> = Promise<Result<T, E>>;

// ============================================================================
// Constructors
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}
