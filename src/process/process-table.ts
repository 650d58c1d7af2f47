/**
 * OS Process Table
 * @module process/process-table
 *
 * Lists processes and probes their resource usage through `ps`. Both sit
 * behind interfaces so the sweep and the sampler can run against fakes.
 */

import { ProbeError, ErrorCodes, getErrorMessage } from '../errors/index.js';
import { defaultCommandRunner, type CommandRunner } from '../utils/exec.js';

// ============================================================================
// Process Listing
// ============================================================================

export interface ProcessInfo {
  readonly pid: number;
  readonly ppid: number;
  /** Full command line */
  readonly command: string;
}

/**
 * Enumerates processes visible to the current user
 */
export interface ProcessLister {
  list(): Promise<ProcessInfo[]>;
}

/**
 * Parse `ps -eo pid=,ppid=,args=` output
 */
export function parseProcessList(output: string): ProcessInfo[] {
  const processes: ProcessInfo[] = [];
  for (const line of output.split('\n')) {
    const match = /^\s*(\d+)\s+(\d+)\s+(.*)$/.exec(line);
    if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) {
      continue;
    }
    processes.push({ pid: Number(match[1]), ppid: Number(match[2]), command: match[3].trim() });
  }
  return processes;
}

/**
 * The pid itself plus every ancestor reachable through the listed parents
 */
export function lineageOf(pid: number, processes: readonly ProcessInfo[]): Set<number> {
  const parents = new Map(processes.map((info) => [info.pid, info.ppid]));
  const lineage = new Set<number>([pid]);
  let current = parents.get(pid);
  while (current !== undefined && current > 0 && !lineage.has(current)) {
    lineage.add(current);
    current = parents.get(current);
  }
  return lineage;
}

const LAUNCH_FLAGS = /\s--host\s+\S+\s+--port\s+\d+\s+--workers\s+\d+(\s|$)/;

/**
 * Whether a command line is a server launched the way the driver starts it,
 * with the host, port and worker flags following the signature
 */
export function isServerLaunch(command: string, signature: string): boolean {
  if (signature.length === 0) {
    return false;
  }
  let from = command.indexOf(signature);
  while (from >= 0) {
    if (LAUNCH_FLAGS.test(command.slice(from + signature.length))) {
      return true;
    }
    from = command.indexOf(signature, from + 1);
  }
  return false;
}

export class PsProcessLister implements ProcessLister {
  constructor(private readonly runner: CommandRunner = defaultCommandRunner) {}

  async list(): Promise<ProcessInfo[]> {
    const result = await this.runner.run('ps', ['-eo', 'pid=,ppid=,args='], { timeoutMs: 5_000 });
    if (result.exitCode !== 0) {
      throw new Error(`ps exited with ${result.exitCode ?? 'signal'}: ${result.stderr.trim()}`);
    }
    return parseProcessList(result.stdout);
  }
}

// ============================================================================
// Resource Probe
// ============================================================================

export interface ProbeReading {
  readonly cpuPercent: number;
  readonly rssMb: number;
}

/**
 * Reads one process's CPU percentage and resident memory
 *
 * @throws ProbeError when the reading cannot be taken
 */
export interface ProcessProbe {
  read(pid: number, timeoutMs: number): Promise<ProbeReading>;
}

/**
 * Parse `ps -p <pid> -o pcpu=,rss=` output (RSS in KiB)
 */
export function parseProbeOutput(pid: number, output: string): ProbeReading {
  const line = output.split('\n').map((l) => l.trim()).find((l) => l.length > 0);
  if (line === undefined) {
    throw new ProbeError(`Process ${pid} not found`, ErrorCodes.PROCESS_GONE, pid);
  }

  const [cpuField, rssField] = line.split(/\s+/);
  const cpuPercent = Number(cpuField);
  const rssKb = Number(rssField);
  if (!Number.isFinite(cpuPercent) || !Number.isFinite(rssKb)) {
    throw new ProbeError(`Unparseable probe output: ${line}`, ErrorCodes.PROBE_MALFORMED, pid, {
      details: { line },
    });
  }

  return { cpuPercent, rssMb: rssKb / 1024 };
}

export class PsProcessProbe implements ProcessProbe {
  constructor(private readonly runner: CommandRunner = defaultCommandRunner) {}

  async read(pid: number, timeoutMs: number): Promise<ProbeReading> {
    let output: string;
    try {
      const result = await this.runner.run('ps', ['-p', String(pid), '-o', 'pcpu=,rss='], {
        timeoutMs,
      });
      if (result.killed) {
        throw new ProbeError(`Probe timed out after ${timeoutMs}ms`, ErrorCodes.PROBE_FAILED, pid);
      }
      // ps exits 1 when the pid does not exist
      if (result.exitCode !== 0) {
        throw new ProbeError(`Process ${pid} not found`, ErrorCodes.PROCESS_GONE, pid);
      }
      output = result.stdout;
    } catch (error) {
      if (error instanceof ProbeError) {
        throw error;
      }
      throw new ProbeError(getErrorMessage(error), ErrorCodes.PROBE_FAILED, pid, {
        cause: error instanceof Error ? error : undefined,
      });
    }
    return parseProbeOutput(pid, output);
  }
}
