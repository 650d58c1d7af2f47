/**
 * Logging Module
 * @module logging
 */

export {
  // Types
  type LogContext,
  type LoggerConfig,
  type CycleRef,
  type BenchLogMethods,
  type StructuredLogger,
  // Factory functions
  createLogger,
  getLogger,
  resetLogger,
  createModuleLogger,
} from './logger.js';
