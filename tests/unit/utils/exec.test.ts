/**
 * Command Execution Tests
 * @module tests/unit/utils/exec
 */

import { describe, it, expect } from 'vitest';
import { ExecFileRunner } from '../../../src/utils/exec.js';

describe('ExecFileRunner', () => {
  const runner = new ExecFileRunner();

  it('should capture output of a successful command', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stdout.write("ready")']);

    expect(result).toEqual({ exitCode: 0, stdout: 'ready', stderr: '', killed: false });
  });

  it('should report a non-zero exit without throwing', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stderr.write("bad"); process.exit(3)']);

    expect(result).toMatchObject({ exitCode: 3, stderr: 'bad', killed: false });
  });

  it('should kill a command that outlives its timeout', async () => {
    const result = await runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 100 });

    expect(result.killed).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it('should reject when the executable does not exist', async () => {
    await expect(runner.run('/nonexistent/clean-bench-binary', [])).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
