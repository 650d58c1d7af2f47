/**
 * Base Error Classes
 * @module errors/base
 *
 * Foundation error class for the benchmark orchestrator. Provides a
 * hierarchical error structure with serialization and cause chaining.
 */

import type { ErrorCode } from './codes.js';

// ============================================================================
// Error Context Types
// ============================================================================

/**
 * Context information for errors
 */
export interface ErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** Additional details about the error */
  details?: Record<string, unknown>;
  /** Timestamp when error occurred */
  timestamp?: Date;
  /** Operation being performed */
  operation?: string;
}

/**
 * Serialized error format for logs and persisted failure lists
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  timestamp: string;
  details?: Record<string, unknown>;
  cause?: string;
  stack?: string;
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base error class for all orchestrator errors.
 */
export abstract class BaseError extends Error {
  /** Error code for programmatic handling */
  public readonly code: ErrorCode;
  /** Timestamp when the error occurred */
  public readonly timestamp: Date;
  /** Error context with additional information */
  public readonly context: ErrorContext;
  /**
   * Whether this is an operational error.
   * Operational errors are expected outcomes (timeouts, refused connections);
   * non-operational errors are bugs.
   */
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: ErrorCode,
    context: ErrorContext = {},
    isOperational = true
  ) {
    super(message);

    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = context.timestamp ?? new Date();
    this.context = context;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);

    if (context.cause) {
      this.cause = context.cause;
    }
  }

  /**
   * Serialize error to JSON-safe object
   */
  toJSON(): SerializedError {
    const rootCause = this.getRootCause();
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      details: this.context.details,
      cause: rootCause === this ? undefined : rootCause.message,
    };
  }

  /**
   * String representation
   */
  override toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }

  /**
   * Get the root cause of the error chain
   */
  getRootCause(): Error {
    let current: Error = this;
    while (current.cause instanceof Error) {
      current = current.cause;
    }
    return current;
  }
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a BaseError
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Check if an error has a specific code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isBaseError(error) && error.code === code;
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Coerce an unknown thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
