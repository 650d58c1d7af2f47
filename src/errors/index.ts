/**
 * Error Handling Module
 * @module errors
 */

export {
  type ErrorContext,
  type SerializedError,
  BaseError,
  isBaseError,
  hasErrorCode,
  getErrorMessage,
  toError,
} from './base.js';

export {
  ErrorCodes,
  FatalErrorCodes,
  CycleErrorCodes,
  ProbeErrorCodes,
  ExitCodes,
  isErrorCode,
  type ErrorCode,
  type FatalErrorCode,
  type CycleErrorCode,
  type ProbeErrorCode,
  type ExitCode,
} from './codes.js';

export {
  FatalError,
  DiscoveryError,
  ConfigurationError,
  RunNotFoundError,
  CycleError,
  ProbeError,
  isFatalError,
  isCycleError,
  isProbeError,
  toCycleError,
  type CycleStage,
  type SerializedCycleError,
} from './bench-errors.js';
