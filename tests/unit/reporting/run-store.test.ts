/**
 * Run Store Tests
 * @module tests/unit/reporting/run-store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { RunNotFoundError } from '../../../src/errors/index.js';
import { RunStore, formatRunStamp } from '../../../src/reporting/index.js';
import { createRecord, createRun } from '../../factories/bench.factory.js';

describe('RunStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'run-store-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  describe('formatRunStamp', () => {
    it('should format local time as YYYYMMDD_HHMMSS', () => {
      expect(formatRunStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102_030405');
    });
  });

  describe('createRunDir', () => {
    it('should create a stamped directory under the output root', async () => {
      const store = new RunStore(root);

      const dir = await store.createRunDir(new Date(2026, 10, 30, 14, 5, 9));

      expect(dir).toBe(join(root, 'clean_bench_20261130_140509'));
      expect(store.runDir).toBe(dir);
    });
  });

  describe('persist', () => {
    it('should write the run with snake_case keys', async () => {
      const store = new RunStore(root);
      const dir = await store.createRunDir(new Date(2026, 0, 1, 0, 0, 0));
      const run = createRun({
        results: [[100, [['read', createRecord()]]]],
        skipped: [{ rate: 100, endpoint: 'write', stage: 'seed', code: 'SEED_FAILED', message: 'seed refused' }],
      });

      const path = await store.persist(run);

      expect(path).toBe(join(dir, 'clean_results.json'));
      const document: unknown = JSON.parse(await readFile(path, 'utf8'));
      expect(document).toEqual({
        metadata: {
          workers: 1,
          host: '127.0.0.1',
          port: 8000,
          duration: '10s',
          timestamp: '2026-01-01T00:00:00.000Z',
          clean_restart: true,
          interrupted: false,
        },
        results: {
          '100': {
            read: {
              achieved_rps: 100,
              target_rps: 100,
              p50_ms: 2,
              p95_ms: 8,
              p99_ms: 12,
              avg_ms: 3,
              success_rate: 1,
              error_rate: 0,
              total_requests: 1000,
              cpu_avg: 20,
              cpu_max: 40,
              memory_avg_mb: 64,
              memory_max_mb: 80,
            },
          },
        },
        skipped: [{ rate: 100, endpoint: 'write', stage: 'seed', code: 'SEED_FAILED', message: 'seed refused' }],
      });
    });

    it('should overwrite the same file on every snapshot', async () => {
      const store = new RunStore(root);
      await store.createRunDir();

      const first = await store.persist(createRun({ results: [[100, [['read', createRecord()]]]] }));
      const second = await store.persist(
        createRun({ results: [[100, [['read', createRecord()], ['write', createRecord()]]]] })
      );

      expect(second).toBe(first);
      const reloaded = await store.load(second);
      expect([...(reloaded.results.get(100)?.keys() ?? [])]).toEqual(['read', 'write']);
    });

    it('should report a write failure as PERSIST_FAILED', async () => {
      const store = new RunStore(root);
      const dir = await store.createRunDir();
      await rm(dir, { recursive: true });

      await expect(store.persist(createRun())).rejects.toMatchObject({ code: 'PERSIST_FAILED' });
    });
  });

  describe('load', () => {
    it('should read back the run that was persisted', async () => {
      const store = new RunStore(root);
      await store.createRunDir();
      const run = createRun({
        metadata: { interrupted: true },
        results: [
          [100, [['read', createRecord()]]],
          [500, [['read', createRecord({ targetRps: 500, achievedRps: 480.5 })]]],
        ],
      });

      const loaded = await store.load(await store.persist(run));

      expect(loaded).toEqual(run);
      expect([...loaded.results.keys()]).toEqual([100, 500]);
    });

    it('should default optional fields of older documents', async () => {
      const path = join(root, 'old.json');
      await writeFile(
        path,
        JSON.stringify({
          metadata: { workers: 2, host: '127.0.0.1', port: 8000, duration: '30s', timestamp: '2025-06-01T12:00:00' },
          results: {},
        })
      );

      const loaded = await new RunStore(root).load(path);

      expect(loaded.metadata).toMatchObject({ cleanRestart: true, interrupted: false, workers: 2 });
      expect(loaded.skipped).toEqual([]);
    });

    it('should fail with RUN_NOT_FOUND for a missing file', async () => {
      const promise = new RunStore(root).load(join(root, 'missing.json'));

      await expect(promise).rejects.toBeInstanceOf(RunNotFoundError);
      await expect(promise).rejects.toMatchObject({ code: 'RUN_NOT_FOUND' });
    });

    it('should fail with RUN_INVALID for malformed JSON', async () => {
      const path = join(root, 'broken.json');
      await writeFile(path, '{"metadata":');

      await expect(new RunStore(root).load(path)).rejects.toMatchObject({
        code: 'RUN_INVALID',
        message: `Results file ${path} is not valid JSON`,
      });
    });

    it('should fail with RUN_INVALID for a document of the wrong shape', async () => {
      const path = join(root, 'shape.json');
      await writeFile(path, JSON.stringify({ metadata: {}, results: { fast: {} } }));

      await expect(new RunStore(root).load(path)).rejects.toMatchObject({
        code: 'RUN_INVALID',
        message: `Results file ${path} has an unexpected shape`,
      });
    });
  });

  describe('findLatest', () => {
    async function writeRun(name: string, mtime: Date): Promise<string> {
      const dir = join(root, name);
      await mkdir(dir);
      const path = join(dir, 'clean_results.json');
      await writeFile(path, '{}');
      await utimes(path, mtime, mtime);
      return path;
    }

    it('should pick the results file modified last', async () => {
      await writeRun('clean_bench_20260101_000000', new Date('2026-01-03T00:00:00Z'));
      const newest = await writeRun('clean_bench_20260102_000000', new Date('2026-01-05T00:00:00Z'));
      await writeRun('other_20260109_000000', new Date('2026-01-09T00:00:00Z'));
      await mkdir(join(root, 'clean_bench_empty'));

      await expect(new RunStore(root).findLatest()).resolves.toBe(newest);
    });

    it('should fail when no run directory holds results', async () => {
      await mkdir(join(root, 'clean_bench_20260101_000000'));

      await expect(new RunStore(root).findLatest()).rejects.toMatchObject({
        code: 'RUN_NOT_FOUND',
        message: `No benchmark results under ${root}`,
      });
    });

    it('should fail when the output root does not exist', async () => {
      await expect(new RunStore(join(root, 'nowhere')).findLatest()).rejects.toBeInstanceOf(RunNotFoundError);
    });

    it('should load the latest run with its path', async () => {
      const store = new RunStore(root);
      await store.createRunDir();
      const path = await store.persist(createRun({ results: [[100, [['read', createRecord()]]]] }));

      const latest = await store.loadLatest();

      expect(latest.path).toBe(path);
      expect(latest.run.results.get(100)?.get('read')).toEqual(createRecord());
    });
  });
});
