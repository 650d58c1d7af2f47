/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino for the benchmark orchestrator. Extends the
 * base logger with domain methods for run, cycle and process lifecycle events
 * so every stage logs with the same event names and fields.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  module?: string;
  runId?: string;
  rate?: number;
  endpoint?: string;
  pid?: number;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Identifies one (rate, endpoint) cycle in log events
 */
export interface CycleRef {
  readonly index: number;
  readonly total: number;
  readonly rate: number;
  readonly endpoint: string;
}

/**
 * Domain-specific logging methods
 */
export interface BenchLogMethods {
  // Run lifecycle
  runStarted(totalCycles: number, metadata?: Record<string, unknown>): void;
  runCompleted(durationMs: number, completed: number, skipped: number): void;
  runInterrupted(reason: string, completed: number): void;
  runPersisted(path: string, recordCount: number): void;

  // Cycle lifecycle
  cycleStarted(cycle: CycleRef): void;
  cycleStageCompleted(cycle: CycleRef, stage: string, metadata?: Record<string, unknown>): void;
  cycleCompleted(cycle: CycleRef, durationMs: number, metrics: Record<string, unknown>): void;
  cycleSkipped(cycle: CycleRef, stage: string, error: Error): void;

  // Process lifecycle
  processSpawned(pid: number, command: string, port: number): void;
  processTerminated(pid: number, forced: boolean): void;
  orphanSwept(pid: number, command: string): void;
  probeFailed(pid: number, error: Error): void;
}

/**
 * Pino logger extended with domain-specific methods
 */
export type StructuredLogger = Logger & BenchLogMethods & {
  withContext(context: LogContext): StructuredLogger;
};

// ============================================================================
// Default Configuration
// ============================================================================

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
  redact: ['password', 'token', 'authorization', 'secret', 'headers.authorization'],
  service: process.env.SERVICE_NAME || 'clean-room-bench',
  version: process.env.SERVICE_VERSION || '0.1.0',
  environment: process.env.NODE_ENV || 'development',
};

// ============================================================================
// Redaction Utilities
// ============================================================================

/**
 * Expands redaction paths to nested variations
 */
function createRedactionPaths(paths: string[]): string[] {
  return paths.flatMap((path) => [path, `*.${path}`]);
}

/**
 * Reads an error code off any error without widening it to a known class
 */
function errorCodeOf(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

function cycleLabel(cycle: CycleRef): string {
  return `[${cycle.index}/${cycle.total}] ${cycle.endpoint} @ ${cycle.rate} RPS`;
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

/**
 * Extends a Pino logger with domain-specific methods
 */
function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: BenchLogMethods = {
    runStarted(totalCycles, metadata) {
      logger.info(
        { event: 'run_started', totalCycles, ...metadata },
        `Running ${totalCycles} cycles with clean server restarts`
      );
    },

    runCompleted(durationMs, completed, skipped) {
      logger.info(
        { event: 'run_completed', durationMs, completed, skipped },
        `Benchmark completed: ${completed} cycles recorded, ${skipped} skipped in ${(durationMs / 1000).toFixed(1)}s`
      );
    },

    runInterrupted(reason, completed) {
      logger.warn(
        { event: 'run_interrupted', reason, completed },
        `Run interrupted (${reason}) after ${completed} recorded cycles`
      );
    },

    runPersisted(path, recordCount) {
      logger.info(
        { event: 'run_persisted', path, recordCount },
        `Results saved: ${path}`
      );
    },

    cycleStarted(cycle) {
      logger.info(
        { event: 'cycle_started', ...cycle },
        `Cycle ${cycleLabel(cycle)}`
      );
    },

    cycleStageCompleted(cycle, stage, metadata) {
      logger.debug(
        { event: 'cycle_stage_completed', ...cycle, stage, ...metadata },
        `Cycle ${cycleLabel(cycle)}: ${stage} ok`
      );
    },

    cycleCompleted(cycle, durationMs, metrics) {
      logger.info(
        { event: 'cycle_completed', ...cycle, durationMs, ...metrics },
        `Cycle ${cycleLabel(cycle)} completed in ${(durationMs / 1000).toFixed(1)}s`
      );
    },

    cycleSkipped(cycle, stage, error) {
      logger.warn(
        { event: 'cycle_skipped', ...cycle, stage, err: error, errorCode: errorCodeOf(error) },
        `Cycle ${cycleLabel(cycle)} skipped at ${stage}: ${error.message}`
      );
    },

    processSpawned(pid, command, port) {
      logger.debug(
        { event: 'process_spawned', pid, command, port },
        `Started server process ${pid} on port ${port}`
      );
    },

    processTerminated(pid, forced) {
      logger.debug(
        { event: 'process_terminated', pid, forced },
        forced ? `Force killed process ${pid}` : `Terminated process ${pid}`
      );
    },

    orphanSwept(pid, command) {
      logger.warn(
        { event: 'orphan_swept', pid, command },
        `Cleaning up orphaned process ${pid}`
      );
    },

    probeFailed(pid, error) {
      logger.debug(
        { event: 'probe_failed', pid, err: error, errorCode: errorCodeOf(error) },
        `Resource probe failed for ${pid}: ${error.message}`
      );
    },
  };

  return Object.assign(logger, methods, {
    withContext(context: LogContext): StructuredLogger {
      return extendWithDomainMethods(logger.child(context));
    },
  });
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const config = { ...defaultConfig };

  if (process.env.LOG_LEVEL) {
    config.level = process.env.LOG_LEVEL;
  }

  const options: LoggerOptions = {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };

  let destination: DestinationStream | undefined;

  if (config.pretty && config.environment !== 'production') {
    try {
      destination = pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service,version,env',
          messageFormat: '{msg}',
        },
      });
    } catch {
      // pino-pretty not resolvable; fall back to JSON lines
      destination = undefined;
    }
  }

  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger('clean-room-bench');
  }
  return rootLogger;
}

/**
 * Resets the root logger (primarily for testing)
 */
export function resetLogger(): void {
  rootLogger = null;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}
