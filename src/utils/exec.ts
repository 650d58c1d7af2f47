/**
 * Command Execution
 * @module utils/exec
 *
 * Thin wrapper over child_process.execFile that reports exit status instead of
 * throwing on a non-zero exit. Used for the process probe, the process table
 * listing and the load generator, and replaced by fakes in tests.
 */

import { execFile } from 'child_process';

// ============================================================================
// Types
// ============================================================================

export interface CommandOptions {
  /** Kill the command after this many milliseconds */
  readonly timeoutMs?: number;
  /** Abort the command */
  readonly signal?: AbortSignal;
  /** Working directory */
  readonly cwd?: string;
}

export interface CommandResult {
  /** Exit code, or null when the command was killed by a signal */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** True when the command was killed because of the timeout or abort */
  readonly killed: boolean;
}

/**
 * Runs an external command to completion
 */
export interface CommandRunner {
  run(file: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>;
}

// ============================================================================
// Implementation
// ============================================================================

/** Upper bound on captured output (load-generator reports can be large) */
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

/**
 * CommandRunner backed by execFile (no shell)
 */
export class ExecFileRunner implements CommandRunner {
  run(file: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(
        file,
        [...args],
        {
          timeout: options.timeoutMs,
          signal: options.signal,
          cwd: options.cwd,
          maxBuffer: MAX_BUFFER_BYTES,
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, killed: false });
            return;
          }

          // Spawn failures (ENOENT, EACCES) carry a string code
          if (typeof error.code === 'string' && error.code !== 'ABORT_ERR') {
            reject(error);
            return;
          }

          resolve({
            exitCode: typeof error.code === 'number' ? error.code : null,
            stdout,
            stderr,
            killed: error.killed === true || error.code === 'ABORT_ERR',
          });
        }
      );
    });
  }
}

/**
 * Shared default runner
 */
export const defaultCommandRunner: CommandRunner = new ExecFileRunner();
