/**
 * Child Process Mocks
 * @module tests/mocks/process.mock
 *
 * A ChildProcess that never starts an OS process, plus a spawn function
 * handing them out.
 */

import { ChildProcess, type SpawnOptions } from 'child_process';
import { PassThrough } from 'stream';
import type { SpawnFunction } from '../../src/process/index.js';

export interface FakeChildOptions {
  /** Signals that make the child exit; others are ignored */
  exitOn?: NodeJS.Signals[];
}

export class FakeChild extends ChildProcess {
  override pid: number | undefined = undefined;
  override exitCode: number | null = null;
  override signalCode: NodeJS.Signals | null = null;
  override stderr = new PassThrough();
  override stdout = new PassThrough();

  readonly signals: Array<NodeJS.Signals | number | undefined> = [];
  private readonly exitOn: Array<NodeJS.Signals | number | undefined>;

  constructor(pid: number, options: FakeChildOptions = {}) {
    super();
    this.pid = pid;
    this.exitOn = options.exitOn ?? ['SIGTERM', 'SIGKILL'];
  }

  override kill(signal?: NodeJS.Signals | number): boolean {
    this.receive(signal);
    return true;
  }

  /**
   * Deliver a signal as if it came from outside (e.g. to the process group)
   */
  receive(signal?: NodeJS.Signals | number): void {
    this.signals.push(signal);
    if (this.exitOn.includes(signal) && typeof signal === 'string') {
      setImmediate(() => this.finish(null, signal));
    }
  }

  finish(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) {
      return;
    }
    this.exitCode = code;
    this.signalCode = signal;
    this.emit('exit', code, signal);
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

export interface FakeSpawner {
  spawn: SpawnFunction;
  calls: SpawnCall[];
  children: FakeChild[];
}

/**
 * Spawn function producing FakeChild instances with increasing pids.
 * `startError` makes the child emit `error` instead of `spawn`; `silent`
 * makes it emit neither.
 */
export function createFakeSpawner(
  options: FakeChildOptions & { startError?: Error; silent?: boolean; firstPid?: number } = {}
): FakeSpawner {
  const calls: SpawnCall[] = [];
  const children: FakeChild[] = [];
  let nextPid = options.firstPid ?? 321;

  const spawn: SpawnFunction = (command, args, spawnOptions) => {
    calls.push({ command, args, options: spawnOptions });
    const child = new FakeChild(nextPid++, options);
    children.push(child);
    queueMicrotask(() => {
      if (options.silent) {
        return;
      }
      if (options.startError) {
        child.emit('error', options.startError);
      } else {
        child.emit('spawn');
      }
    });
    return child;
  };

  return { spawn, calls, children };
}
