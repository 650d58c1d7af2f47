/**
 * Async Utility Tests
 * @module tests/unit/utils/async
 */

import { describe, it, expect } from 'vitest';
import { delay, formatDuration, timeoutSignal, withTimeout } from '../../../src/utils/async.js';

describe('delay', () => {
  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const waiting = delay(10_000, controller.signal);
    controller.abort();
    await waiting;

    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should resolve immediately for a pre-aborted signal', async () => {
    await expect(delay(10_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('should pass through a value that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve('ready'), 1000)).resolves.toBe('ready');
  });

  it('should reject with the given message on timeout', async () => {
    await expect(withTimeout(new Promise<never>(() => undefined), 10, 'spawn timed out')).rejects.toThrow(
      'spawn timed out'
    );
  });
});

describe('timeoutSignal', () => {
  it('should follow the caller signal', () => {
    const controller = new AbortController();
    const signal = timeoutSignal(10_000, controller.signal);

    controller.abort();

    expect(signal.aborted).toBe(true);
  });
});

describe('formatDuration', () => {
  it.each([
    [250, '250ms'],
    [1500, '1.5s'],
    [61_000, '1m 1s'],
    [125_400, '2m 5s'],
  ])('should format %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
