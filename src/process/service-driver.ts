/**
 * Service Driver
 * @module process/service-driver
 *
 * Capability set the orchestrator needs from the service under test:
 * start it, wait for it to become healthy, stop it, and clean up strays.
 * The subprocess driver is the default; an in-process driver or a fake can
 * be substituted without touching the orchestrator.
 */

import type { ProcessRegistry } from './process-registry.js';

/**
 * How to launch one service instance
 */
export interface ServiceLaunchConfig {
  readonly host: string;
  readonly port: number;
  readonly workers: number;
  /** Base command; `--host`, `--port` and `--workers` are appended */
  readonly command: readonly string[];
}

/**
 * A running service instance. Exists for exactly one cycle.
 */
export interface ServiceInstance {
  readonly pid: number;
  readonly host: string;
  readonly port: number;
  /** Base URL, e.g. `http://127.0.0.1:8000` */
  readonly baseUrl: string;
  readonly command: string;
  readonly startedAt: Date;
}

export interface ServiceDriver {
  /** Live processes started through this driver */
  readonly registry: ProcessRegistry;

  /**
   * Launch an instance; resolves once the OS has started the process
   *
   * @throws CycleError (stage `provision`) when the launch fails
   */
  spawn(config: ServiceLaunchConfig): Promise<ServiceInstance>;

  /**
   * Poll `/health` until it answers 2xx.
   *
   * @returns false on timeout, early exit or abort; never throws for a timeout
   */
  awaitHealthy(instance: ServiceInstance, timeoutMs: number, signal?: AbortSignal): Promise<boolean>;

  /**
   * Graceful stop, escalating to a forced kill. Idempotent.
   */
  terminate(instance: ServiceInstance): Promise<void>;

  /**
   * Terminate every process in the registry
   */
  terminateAll(): Promise<void>;

  /**
   * Terminate processes matching this tool's launch signature that are not
   * tracked in the registry.
   *
   * @returns the number of processes signalled
   */
  sweepOrphans(): Promise<number>;
}

/**
 * Build the base URL for a host and port
 */
export function baseUrlFor(host: string, port: number): string {
  const bracketed = host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
  return `http://${bracketed}:${port}`;
}
