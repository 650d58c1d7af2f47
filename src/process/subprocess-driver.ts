/**
 * Subprocess Service Driver
 * @module process/subprocess-driver
 *
 * Launches the service under test as a child process in its own process
 * group, tracks it in the process registry, polls its health endpoint, and
 * stops it with SIGTERM escalating to SIGKILL. Also sweeps orphaned server
 * processes left over by earlier runs.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import { CYCLE, PROCESS } from '../constants/index.js';
import { CycleError, ErrorCodes, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { delay, timeoutSignal, withTimeout } from '../utils/async.js';
import { isPortFree } from './port-check.js';
import { ProcessRegistry } from './process-registry.js';
import {
  PsProcessLister,
  isServerLaunch,
  lineageOf,
  type ProcessInfo,
  type ProcessLister,
} from './process-table.js';
import {
  baseUrlFor,
  type ServiceDriver,
  type ServiceInstance,
  type ServiceLaunchConfig,
} from './service-driver.js';

// ============================================================================
// Types
// ============================================================================

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

export type KillFunction = (pid: number, signal: NodeJS.Signals | 0) => void;

export interface SubprocessDriverOptions {
  /** Substring identifying this tool's server processes */
  readonly processSignature: string;
  /** Commands containing any of these are never swept. Default: this tool's entry points */
  readonly ownCommandMarkers?: readonly string[];
  readonly registry?: ProcessRegistry;
  readonly spawn?: SpawnFunction;
  readonly kill?: KillFunction;
  readonly lister?: ProcessLister;
  readonly isPortFree?: (host: string, port: number) => Promise<boolean>;
  readonly fetch?: typeof fetch;
  /** Signal the whole process group (covers worker processes). Default: true on POSIX */
  readonly processGroup?: boolean;
  readonly graceMs?: number;
  readonly killWaitMs?: number;
  readonly orphanGraceMs?: number;
  readonly healthPollIntervalMs?: number;
  readonly healthRequestTimeoutMs?: number;
  readonly spawnTimeoutMs?: number;
  readonly logger?: StructuredLogger;
}

/** Bytes of stderr kept for diagnostics */
const STDERR_TAIL_BYTES = 4096;

function hasExited(child: ChildProcess): boolean {
  return child.exitCode !== null || child.signalCode !== null;
}

function isMissingProcess(error: unknown): boolean {
  return error instanceof Error && Reflect.get(error, 'code') === 'ESRCH';
}

// ============================================================================
// Driver
// ============================================================================

export class SubprocessServiceDriver implements ServiceDriver {
  public readonly registry: ProcessRegistry;

  private readonly spawnProcess: SpawnFunction;
  private readonly killProcess: KillFunction;
  private readonly lister: ProcessLister;
  private readonly checkPort: (host: string, port: number) => Promise<boolean>;
  private readonly fetchFn: typeof fetch;
  private readonly processGroup: boolean;
  private readonly signature: string;
  private readonly ownCommandMarkers: readonly string[];
  private readonly graceMs: number;
  private readonly killWaitMs: number;
  private readonly orphanGraceMs: number;
  private readonly healthPollIntervalMs: number;
  private readonly healthRequestTimeoutMs: number;
  private readonly spawnTimeoutMs: number;
  private readonly logger: StructuredLogger;

  /** Child handles by pid, dropped once a termination confirms the exit */
  private readonly children = new Map<number, ChildProcess>();
  /** In-flight terminations, shared between the main flow and cleanup */
  private readonly terminations = new Map<number, Promise<void>>();
  private readonly stderrTails = new Map<number, string>();

  constructor(options: SubprocessDriverOptions) {
    this.signature = options.processSignature;
    this.ownCommandMarkers = options.ownCommandMarkers ?? PROCESS.OWN_COMMAND_MARKERS;
    this.registry = options.registry ?? new ProcessRegistry();
    this.spawnProcess = options.spawn ?? spawn;
    this.killProcess = options.kill ?? ((pid, signal) => void process.kill(pid, signal));
    this.lister = options.lister ?? new PsProcessLister();
    this.checkPort = options.isPortFree ?? isPortFree;
    this.fetchFn = options.fetch ?? fetch;
    this.processGroup = options.processGroup ?? process.platform !== 'win32';
    this.graceMs = options.graceMs ?? PROCESS.TERMINATE_GRACE_MS;
    this.killWaitMs = options.killWaitMs ?? PROCESS.KILL_WAIT_MS;
    this.orphanGraceMs = options.orphanGraceMs ?? PROCESS.ORPHAN_GRACE_MS;
    this.healthPollIntervalMs = options.healthPollIntervalMs ?? CYCLE.HEALTH_POLL_INTERVAL_MS;
    this.healthRequestTimeoutMs = options.healthRequestTimeoutMs ?? CYCLE.HEALTH_REQUEST_TIMEOUT_MS;
    this.spawnTimeoutMs = options.spawnTimeoutMs ?? PROCESS.SPAWN_TIMEOUT_MS;
    this.logger = options.logger ?? createModuleLogger('subprocess-driver');
  }

  // --------------------------------------------------------------------------
  // Spawn
  // --------------------------------------------------------------------------

  async spawn(config: ServiceLaunchConfig): Promise<ServiceInstance> {
    const [file, ...baseArgs] = config.command;
    if (file === undefined) {
      throw new CycleError('Server command is empty', ErrorCodes.SPAWN_FAILED, 'provision');
    }

    if (!(await this.checkPort(config.host, config.port))) {
      throw new CycleError(
        `Port ${config.host}:${config.port} is already bound`,
        ErrorCodes.PORT_IN_USE,
        'provision',
        { details: { host: config.host, port: config.port } }
      );
    }

    const args = [
      ...baseArgs,
      '--host', config.host,
      '--port', String(config.port),
      '--workers', String(config.workers),
    ];
    const commandLine = [file, ...args].join(' ');

    let child: ChildProcess | undefined;
    try {
      child = this.spawnProcess(file, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        detached: this.processGroup,
        env: process.env,
      });
      const starting = child;
      await withTimeout(
        new Promise<void>((resolve, reject) => {
          starting.once('spawn', () => resolve());
          starting.once('error', reject);
        }),
        this.spawnTimeoutMs,
        `Process did not start within ${this.spawnTimeoutMs}ms`
      );
    } catch (error) {
      if (child && !hasExited(child)) {
        this.abandon(child);
      }
      throw new CycleError(
        `Failed to start server: ${getErrorMessage(error)}`,
        ErrorCodes.SPAWN_FAILED,
        'provision',
        { cause: error instanceof Error ? error : undefined, details: { command: commandLine } }
      );
    }

    const pid = child.pid;
    if (pid === undefined) {
      throw new CycleError('Server process has no pid', ErrorCodes.SPAWN_FAILED, 'provision', {
        details: { command: commandLine },
      });
    }

    child.stdout?.resume();
    child.stderr?.on('data', (chunk: Buffer) => {
      const tail = (this.stderrTails.get(pid) ?? '') + chunk.toString();
      this.stderrTails.set(pid, tail.slice(-STDERR_TAIL_BYTES));
    });
    child.once('exit', (code, signal) => {
      this.logger.debug({ pid, code, signal }, `Server process ${pid} exited`);
    });

    const startedAt = new Date();
    this.children.set(pid, child);
    this.registry.add({
      pid,
      host: config.host,
      port: config.port,
      command: commandLine,
      startedAt,
      child,
    });
    this.logger.processSpawned(pid, commandLine, config.port);

    return {
      pid,
      host: config.host,
      port: config.port,
      baseUrl: baseUrlFor(config.host, config.port),
      command: commandLine,
      startedAt,
    };
  }

  // --------------------------------------------------------------------------
  // Health
  // --------------------------------------------------------------------------

  async awaitHealthy(
    instance: ServiceInstance,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    const healthUrl = `${instance.baseUrl}/health`;

    while (Date.now() < deadline) {
      if (signal?.aborted) {
        return false;
      }

      const child = this.children.get(instance.pid);
      if (child && hasExited(child)) {
        this.logger.warn(
          { pid: instance.pid, exitCode: child.exitCode, stderr: this.stderrTail(instance.pid) },
          'Server exited before becoming healthy'
        );
        return false;
      }

      const remaining = Math.max(1, deadline - Date.now());
      try {
        const response = await this.fetchFn(healthUrl, {
          signal: timeoutSignal(Math.min(this.healthRequestTimeoutMs, remaining), signal),
        });
        if (response.ok) {
          return true;
        }
        this.logger.debug({ status: response.status }, 'Health check not ready');
      } catch (error) {
        this.logger.debug({ error: getErrorMessage(error) }, 'Health check failed');
      }

      await delay(Math.min(this.healthPollIntervalMs, Math.max(0, deadline - Date.now())), signal);
    }

    return false;
  }

  /**
   * Child handles still held, including ones awaiting termination
   */
  get childCount(): number {
    return this.children.size;
  }

  /**
   * Last bytes written to stderr by a process
   */
  stderrTail(pid: number): string {
    return this.stderrTails.get(pid) ?? '';
  }

  // --------------------------------------------------------------------------
  // Terminate
  // --------------------------------------------------------------------------

  terminate(instance: ServiceInstance): Promise<void> {
    return this.terminatePid(instance.pid);
  }

  /**
   * Terminate every tracked process
   */
  async terminateAll(): Promise<void> {
    await Promise.all(this.registry.snapshot().map((entry) => this.terminatePid(entry.pid)));
  }

  private terminatePid(pid: number): Promise<void> {
    const pending = this.terminations.get(pid);
    if (pending) {
      return pending;
    }

    const termination = this.stopProcess(pid).finally(() => {
      const child = this.children.get(pid);
      if (child && hasExited(child)) {
        this.children.delete(pid);
      }
      this.registry.remove(pid);
      this.terminations.delete(pid);
      this.stderrTails.delete(pid);
    });
    this.terminations.set(pid, termination);
    return termination;
  }

  private async stopProcess(pid: number): Promise<void> {
    const child = this.children.get(pid) ?? this.registry.get(pid)?.child;
    if (!child || hasExited(child)) {
      // Still signal the group: workers may outlive an exited primary
      if (child && this.processGroup) {
        this.signal(pid, child, 'SIGKILL');
      }
      return;
    }

    this.signal(pid, child, 'SIGTERM');
    if (await this.waitForExit(child, this.graceMs)) {
      this.logger.processTerminated(pid, false);
      return;
    }

    this.signal(pid, child, 'SIGKILL');
    const exited = await this.waitForExit(child, this.killWaitMs);
    if (!exited) {
      this.logger.warn({ pid }, `Process ${pid} did not exit after SIGKILL`);
    }
    this.logger.processTerminated(pid, true);
  }

  /**
   * Kill a child whose start was never confirmed
   */
  private abandon(child: ChildProcess): void {
    if (child.pid === undefined) {
      child.kill('SIGKILL');
    } else {
      this.signal(child.pid, child, 'SIGKILL');
    }
  }

  private signal(pid: number, child: ChildProcess, signal: NodeJS.Signals): void {
    try {
      if (this.processGroup) {
        this.killProcess(-pid, signal);
      } else {
        child.kill(signal);
      }
    } catch (error) {
      if (!isMissingProcess(error)) {
        this.logger.warn({ pid, signal, error: getErrorMessage(error) }, 'Failed to signal process');
      }
    }
  }

  private waitForExit(child: ChildProcess, timeoutMs: number): Promise<boolean> {
    if (hasExited(child)) {
      return Promise.resolve(true);
    }
    return new Promise((resolve) => {
      const onExit = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        child.off('exit', onExit);
        resolve(hasExited(child));
      }, timeoutMs);
      child.once('exit', onExit);
    });
  }

  // --------------------------------------------------------------------------
  // Orphan sweep
  // --------------------------------------------------------------------------

  async sweepOrphans(): Promise<number> {
    if (this.signature.length === 0) {
      return 0;
    }

    let processes: ProcessInfo[];
    try {
      processes = await this.lister.list();
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Error during orphan cleanup');
      return 0;
    }

    const tracked = this.registry.pids();
    // Our own launcher chain (tsx, npm, a shell) may carry the signature too
    const lineage = lineageOf(process.pid, processes).add(process.ppid);
    const orphans = processes.filter(
      (info) =>
        !lineage.has(info.pid) &&
        !tracked.has(info.pid) &&
        !this.ownCommandMarkers.some((marker) => info.command.includes(marker)) &&
        isServerLaunch(info.command, this.signature)
    );

    let swept = 0;
    for (const orphan of orphans) {
      try {
        this.logger.orphanSwept(orphan.pid, orphan.command);
        this.killProcess(orphan.pid, 'SIGTERM');
        swept += 1;
        if (!(await this.waitForPidExit(orphan.pid, this.orphanGraceMs))) {
          this.killProcess(orphan.pid, 'SIGKILL');
        }
      } catch (error) {
        if (!isMissingProcess(error)) {
          this.logger.warn(
            { pid: orphan.pid, error: getErrorMessage(error) },
            'Failed to clean up orphaned process'
          );
        }
      }
    }

    return swept;
  }

  private isAlive(pid: number): boolean {
    try {
      this.killProcess(pid, 0);
      return true;
    } catch (error) {
      return !isMissingProcess(error);
    }
  }

  private async waitForPidExit(pid: number, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!this.isAlive(pid)) {
        return true;
      }
      await delay(Math.min(100, timeoutMs));
    }
    return !this.isAlive(pid);
  }
}
