/**
 * Shutdown Coordinator
 * @module process/shutdown
 *
 * Owns the run's interrupt path. SIGINT and SIGTERM abort the running
 * benchmark, give the main flow a bounded window to wind down, then run the
 * one-shot cleanup: terminate every tracked server, sweep orphans and run
 * the registered finalizers. Uncaught errors take the same cleanup before
 * the process exits.
 */

import type { EventEmitter } from 'events';
import { PROCESS } from '../constants/index.js';
import { ExitCodes, getErrorMessage, toError, type ExitCode } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { delay } from '../utils/async.js';
import type { ServiceDriver } from './service-driver.js';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export type Finalizer = () => Promise<void>;

export interface ShutdownCoordinatorOptions {
  readonly driver: Pick<ServiceDriver, 'terminateAll' | 'sweepOrphans'>;
  /** Upper bound on waiting for the main flow after a signal */
  readonly budgetMs?: number;
  readonly exit?: (code: number) => void;
  /** Event source for signals and uncaught errors (default: process) */
  readonly processLike?: EventEmitter;
  readonly logger?: StructuredLogger;
}

const SIGNAL_EXIT_CODES: Record<ShutdownSignal, ExitCode> = {
  SIGINT: ExitCodes.SIGINT,
  SIGTERM: ExitCodes.SIGTERM,
};

export class ShutdownCoordinator {
  private readonly controller = new AbortController();
  private readonly driver: Pick<ServiceDriver, 'terminateAll' | 'sweepOrphans'>;
  private readonly budgetMs: number;
  private readonly exit: (code: number) => void;
  private readonly target: EventEmitter;
  private readonly logger: StructuredLogger;
  private readonly finalizers: Finalizer[] = [];
  private readonly listeners = new Map<string, (...args: unknown[]) => void>();

  private cleanupPromise: Promise<void> | null = null;
  private mainFlow: Promise<unknown> | null = null;
  private shuttingDown = false;

  constructor(options: ShutdownCoordinatorOptions) {
    this.driver = options.driver;
    this.budgetMs = options.budgetMs ?? PROCESS.SHUTDOWN_BUDGET_MS;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.target = options.processLike ?? process;
    this.logger = options.logger ?? createModuleLogger('shutdown');
  }

  /**
   * Aborted when a shutdown signal arrives
   */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Register handlers. Safe to call more than once.
   */
  install(): this {
    if (this.listeners.size > 0) {
      return this;
    }

    this.listen('SIGINT', () => void this.handleSignal('SIGINT'));
    this.listen('SIGTERM', () => void this.handleSignal('SIGTERM'));
    this.listen('uncaughtException', (error) => void this.handleFatal(error));
    this.listen('unhandledRejection', (reason) => void this.handleFatal(reason));
    return this;
  }

  uninstall(): void {
    for (const [event, listener] of this.listeners) {
      this.target.off(event, listener);
    }
    this.listeners.clear();
  }

  /**
   * Run a finalizer during cleanup, after servers are stopped
   */
  addFinalizer(finalizer: Finalizer): void {
    this.finalizers.push(finalizer);
  }

  /**
   * Register the main flow so a signal waits for it before cleaning up
   */
  track<T>(flow: Promise<T>): Promise<T> {
    this.mainFlow = flow;
    return flow;
  }

  /**
   * Stop everything this tool started. Runs at most once; later calls share
   * the first call's promise. Never rejects.
   */
  cleanup(): Promise<void> {
    if (!this.cleanupPromise) {
      this.cleanupPromise = this.runCleanup();
    }
    return this.cleanupPromise;
  }

  private listen(event: string, listener: (...args: unknown[]) => void): void {
    this.listeners.set(event, listener);
    this.target.on(event, listener);
  }

  private async runCleanup(): Promise<void> {
    const steps: Array<[string, () => Promise<unknown>]> = [
      ['terminate servers', () => this.driver.terminateAll()],
      ['sweep orphans', () => this.driver.sweepOrphans()],
      ...this.finalizers.map((finalizer, index): [string, () => Promise<unknown>] => [
        `finalizer ${index + 1}`,
        finalizer,
      ]),
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        this.logger.error({ step: name, error: getErrorMessage(error) }, `Cleanup step failed: ${name}`);
      }
    }
  }

  private async handleSignal(signal: ShutdownSignal): Promise<void> {
    const code = SIGNAL_EXIT_CODES[signal];

    if (this.shuttingDown) {
      this.logger.warn({ signal }, `Received ${signal} again, exiting now`);
      this.exit(code);
      return;
    }
    this.shuttingDown = true;

    this.logger.info({ signal }, `Received ${signal}, shutting down`);
    this.controller.abort(signal);

    if (this.mainFlow) {
      await Promise.race([
        this.mainFlow.then(
          () => undefined,
          () => undefined
        ),
        delay(this.budgetMs),
      ]);
    }

    await this.cleanup();
    this.exit(code);
  }

  private async handleFatal(reason: unknown): Promise<void> {
    const error = toError(reason);
    this.logger.fatal({ err: error }, `Uncaught error: ${error.message}`);

    if (!this.shuttingDown) {
      this.shuttingDown = true;
      this.controller.abort(error);
    }

    await this.cleanup();
    this.exit(ExitCodes.FATAL);
  }
}
