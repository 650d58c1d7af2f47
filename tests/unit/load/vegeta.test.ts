/**
 * Vegeta Load Source Tests
 * @module tests/unit/load/vegeta
 */

import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CycleError, ErrorCodes } from '../../../src/errors/index.js';
import {
  VegetaLoadSource,
  formatTargets,
  parseVegetaReport,
  type AttackRequest,
} from '../../../src/load/index.js';
import { commandResult, createMockCommandRunner } from '../../mocks/services.mock.js';

const REPORT_JSON = JSON.stringify({
  latencies: {
    total: 3_000_000_000,
    mean: 3_000_000,
    '50th': 2_000_000,
    '90th': 6_000_000,
    '95th': 8_000_000,
    '99th': 12_000_000,
    max: 30_000_000,
    min: 500_000,
  },
  bytes_in: { total: 52_000, mean: 52 },
  bytes_out: { total: 0, mean: 0 },
  requests: 1000,
  rate: 100.1,
  throughput: 99.9,
  success: 0.98,
  status_codes: { '200': 980, '500': 20 },
  errors: ['500 Internal Server Error'],
});

describe('parseVegetaReport', () => {
  it('should map the report fields', () => {
    expect(parseVegetaReport(REPORT_JSON)).toEqual({
      requests: 1000,
      rate: 100.1,
      success: 0.98,
      latencies: { p50: 2_000_000, p95: 8_000_000, p99: 12_000_000, mean: 3_000_000 },
    });
  });

  it('should reject invalid JSON', () => {
    expect(() => parseVegetaReport('not json')).toThrow(CycleError);
    expect(() => parseVegetaReport('not json')).toThrow('Load report is not valid JSON');
  });

  it('should reject a report missing latencies', () => {
    try {
      parseVegetaReport(JSON.stringify({ requests: 10, rate: 1, success: 1 }));
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCodes.REPORT_FAILED, stage: 'report' });
    }
  });
});

describe('formatTargets', () => {
  it('should write one METHOD URL line per target', () => {
    expect(
      formatTargets([
        { method: 'GET', url: 'http://127.0.0.1:8000/api/items/1000' },
        { method: 'POST', url: 'http://127.0.0.1:8000/api/db/write/1000' },
      ])
    ).toBe('GET http://127.0.0.1:8000/api/items/1000\nPOST http://127.0.0.1:8000/api/db/write/1000\n');
  });
});

describe('VegetaLoadSource', () => {
  let dir: string;
  let request: AttackRequest;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clean-bench-vegeta-'));
    request = {
      targets: [{ method: 'GET', url: 'http://127.0.0.1:8000/api/items/1000' }],
      rate: 100,
      durationMs: 10_000,
      workDir: dir,
      name: 'read_100',
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('attack', () => {
    it('should write the targets file and run a bounded attack', async () => {
      const runner = createMockCommandRunner(commandResult());
      const source = new VegetaLoadSource({ binary: '/usr/local/bin/vegeta', runner });

      const artifact = await source.attack(request);

      expect(artifact).toEqual({ path: join(dir, 'read_100.bin') });
      expect(await readFile(join(dir, 't_read_100.txt'), 'utf8')).toBe('GET http://127.0.0.1:8000/api/items/1000\n');
      expect(runner.run).toHaveBeenCalledWith(
        '/usr/local/bin/vegeta',
        [
          'attack',
          '-duration', '10s',
          '-rate', '100',
          '-timeout', '10s',
          '-targets', join(dir, 't_read_100.txt'),
          '-output', join(dir, 'read_100.bin'),
        ],
        { timeoutMs: 40_000, signal: undefined }
      );
    });

    it('should render sub-second durations in milliseconds', async () => {
      const runner = createMockCommandRunner(commandResult());
      const source = new VegetaLoadSource({ runner });

      await source.attack({ ...request, durationMs: 1500 });

      expect(runner.run.mock.calls[0]?.[1]).toContain('1500ms');
    });

    it('should fail the measurement on a non-zero exit', async () => {
      const runner = createMockCommandRunner(commandResult({ exitCode: 2, stderr: 'invalid rate\n' }));
      const source = new VegetaLoadSource({ runner });

      await expect(source.attack(request)).rejects.toMatchObject({
        code: ErrorCodes.LOAD_FAILED,
        stage: 'measure',
        message: 'Load generator exited with 2: invalid rate',
      });
    });

    it('should report a killed generator as timed out', async () => {
      const runner = createMockCommandRunner(commandResult({ exitCode: null, killed: true }));
      const source = new VegetaLoadSource({ runner });

      await expect(source.attack(request)).rejects.toMatchObject({
        code: ErrorCodes.LOAD_FAILED,
        message: 'Load generator timed out',
      });
    });

    it('should report a generator killed by an abort as cancelled', async () => {
      const runner = createMockCommandRunner(commandResult({ exitCode: null, killed: true }));
      const source = new VegetaLoadSource({ runner });

      await expect(source.attack({ ...request, signal: AbortSignal.abort() })).rejects.toMatchObject({
        code: ErrorCodes.CYCLE_CANCELLED,
      });
    });

    it('should report a missing binary', async () => {
      const runner = createMockCommandRunner();
      runner.run.mockRejectedValueOnce(new Error('spawn vegeta ENOENT'));
      const source = new VegetaLoadSource({ runner });

      await expect(source.attack(request)).rejects.toMatchObject({
        code: ErrorCodes.LOAD_FAILED,
        message: 'Load generator failed: spawn vegeta ENOENT',
      });
    });
  });

  describe('report', () => {
    it('should convert the artifact to a JSON report', async () => {
      const runner = createMockCommandRunner(commandResult({ stdout: REPORT_JSON }));
      const source = new VegetaLoadSource({ runner });

      const report = await source.report({ path: '/tmp/run/read_100.bin' });

      expect(report.requests).toBe(1000);
      expect(report.latencies.p95).toBe(8_000_000);
      expect(runner.run).toHaveBeenCalledWith('vegeta', ['report', '-type=json', '/tmp/run/read_100.bin'], {
        timeoutMs: 30_000,
        signal: undefined,
      });
    });

    it('should fail the report stage on a non-zero exit', async () => {
      const runner = createMockCommandRunner(commandResult({ exitCode: 1, stderr: 'decode error' }));
      const source = new VegetaLoadSource({ runner });

      await expect(source.report({ path: '/tmp/run/read_100.bin' })).rejects.toMatchObject({
        code: ErrorCodes.REPORT_FAILED,
        stage: 'report',
        message: 'Report conversion exited with 1: decode error',
      });
    });

    it('should fail the report stage on unparseable output', async () => {
      const runner = createMockCommandRunner(commandResult({ stdout: '{}' }));
      const source = new VegetaLoadSource({ runner });

      await expect(source.report({ path: '/tmp/run/read_100.bin' })).rejects.toMatchObject({
        code: ErrorCodes.REPORT_FAILED,
        message: 'Load report is missing required fields',
      });
    });
  });
});
