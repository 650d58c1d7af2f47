/**
 * Process Registry
 * @module process/process-registry
 *
 * Tracks every live service-under-test process this tool has started. The
 * registry is an explicit context object owned by the service driver and
 * shared with the shutdown coordinator; both the main flow and a signal
 * handler may mutate it, so removal is idempotent and iteration always runs
 * over a snapshot.
 */

import type { ChildProcess } from 'child_process';

/**
 * A registered process
 */
export interface TrackedProcess {
  readonly pid: number;
  readonly host: string;
  readonly port: number;
  readonly command: string;
  readonly startedAt: Date;
  /** Handle for processes this tool spawned itself */
  readonly child?: ChildProcess;
}

export class ProcessRegistry {
  private readonly entries = new Map<number, TrackedProcess>();

  /**
   * Register a live process (replaces any entry with the same pid)
   */
  add(entry: TrackedProcess): void {
    this.entries.set(entry.pid, entry);
  }

  /**
   * Remove a process; removing an unknown pid is a no-op
   *
   * @returns whether an entry was removed
   */
  remove(pid: number): boolean {
    return this.entries.delete(pid);
  }

  has(pid: number): boolean {
    return this.entries.has(pid);
  }

  get(pid: number): TrackedProcess | undefined {
    return this.entries.get(pid);
  }

  /**
   * Find the live process bound to a host and port
   */
  findByEndpoint(host: string, port: number): TrackedProcess | undefined {
    for (const entry of this.entries.values()) {
      if (entry.host === host && entry.port === port) {
        return entry;
      }
    }
    return undefined;
  }

  /**
   * Copy of the current entries; safe to iterate while entries are removed
   */
  snapshot(): TrackedProcess[] {
    return [...this.entries.values()];
  }

  pids(): Set<number> {
    return new Set(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }
}
