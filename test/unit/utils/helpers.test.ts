import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, retry, sleep, TimeoutError, withTimeout } from '../../../src/utils/retry.js';
import { average, clamp01, hourInWindow, hourOfDay, round } from '../../../src/utils/math.js';
import { readDataFile, resolveDataDir } from '../../../src/utils/fs.js';
import { existsSync } from 'fs';
import { join } from 'path';

// ===========================================================================
//  retry.ts
// ===========================================================================
describe('retry', () => {
  const immediate = { initialDelayMs: 0, maxDelayMs: 0 };

  describe('retry()', () => {
    it('should resolve on successful first attempt without retrying', async () => {
      const fn = vi.fn().mockResolvedValue('ok');

      const result = await retry(fn, immediate);

      expect(result).toBe('ok');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure then succeed', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('fail-1'))
        .mockRejectedValueOnce(new Error('fail-2'))
        .mockResolvedValue('success');

      const result = await retry(fn, { ...immediate, retries: 3 });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should throw the last error after exhausting retries', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('always-fail'));

      await expect(retry(fn, { ...immediate, retries: 2 })).rejects.toThrow('always-fail');
      // Initial attempt + 2 retries = 3 calls
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry when retries is 0', async () => {
      const fn = vi.fn().mockRejectedValue(new Error('once'));

      await expect(retry(fn, { retries: 0 })).rejects.toThrow('once');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should stop when shouldRetry rejects the error', async () => {
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('transient'))
        .mockRejectedValueOnce(new Error('permanent'))
        .mockResolvedValue('late');

      await expect(
        retry(fn, { ...immediate, retries: 5, shouldRetry: (error) => error.message === 'transient' }),
      ).rejects.toThrow('permanent');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('should call onRetry with the attempt, error and delay', async () => {
      const onRetry = vi.fn();
      const fn = vi
        .fn()
        .mockRejectedValueOnce(new Error('err-1'))
        .mockRejectedValueOnce(new Error('err-2'))
        .mockResolvedValue('done');

      await retry(fn, { ...immediate, retries: 3, onRetry });

      expect(onRetry).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.objectContaining({ message: 'err-1' }), 0);
      expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.objectContaining({ message: 'err-2' }), 0);
    });

    it('should wrap non-Error throws', async () => {
      const fn = vi.fn().mockRejectedValue('string-error');

      await expect(retry(fn, { ...immediate, retries: 1 })).rejects.toThrow('string-error');
    });
  });

  describe('backoffDelay()', () => {
    const options = { initialDelayMs: 100, maxDelayMs: 1000, factor: 2, jitter: 0.5, random: () => 0.5 };

    it('should grow exponentially with jitter', () => {
      expect(backoffDelay(1, options)).toBe(125);
      expect(backoffDelay(2, options)).toBe(250);
      expect(backoffDelay(3, { ...options, jitter: 0 })).toBe(400);
    });

    it('should cap at maxDelayMs', () => {
      expect(backoffDelay(5, options)).toBe(1000);
    });
  });

  describe('sleep()', () => {
    it('should resolve after the specified delay', async () => {
      const start = performance.now();
      await sleep(50);
      const elapsed = performance.now() - start;
      expect(elapsed).toBeGreaterThanOrEqual(40); // allow small timing variance
    });
  });

  describe('withTimeout()', () => {
    it('should resolve with the value when promise completes before timeout', async () => {
      const promise = new Promise<string>(resolve => setTimeout(() => resolve('fast'), 10));
      const result = await withTimeout(promise, 5000);
      expect(result).toBe('fast');
    });

    it('should reject with a TimeoutError when the promise is too slow', async () => {
      const promise = new Promise<string>(resolve => setTimeout(() => resolve('slow'), 200));
      const result = withTimeout(promise, 10);

      await expect(result).rejects.toBeInstanceOf(TimeoutError);
      await expect(result).rejects.toThrow('Operation timed out after 10ms');
    });

    it('should use custom timeout message when provided', async () => {
      const promise = new Promise<string>(resolve => setTimeout(() => resolve('slow'), 200));
      await expect(withTimeout(promise, 10, 'Custom timeout!')).rejects.toThrow('Custom timeout!');
    });

    it('should propagate the original error if promise rejects before timeout', async () => {
      const promise = Promise.reject(new Error('original error'));
      await expect(withTimeout(promise, 5000)).rejects.toThrow('original error');
    });
  });
});

// ===========================================================================
//  math.ts
// ===========================================================================
describe('math', () => {
  it('clamps into the unit interval', () => {
    expect(clamp01(-0.5)).toBe(0);
    expect(clamp01(0.25)).toBe(0.25);
    expect(clamp01(3)).toBe(1);
    expect(clamp01(Number.NaN)).toBe(0);
    expect(clamp01(Number.POSITIVE_INFINITY)).toBe(0);
  });

  it('averages, returning 0 for no values', () => {
    expect(average([0.2, 0.4])).toBeCloseTo(0.3, 10);
    expect(average([])).toBe(0);
  });

  it('rounds to a fixed number of decimals', () => {
    expect(round(0.1 + 0.2, 9)).toBe(0.3);
    expect(round(1.23456789)).toBe(1.234568);
  });

  it('reads hours in UTC', () => {
    expect(hourOfDay(Date.UTC(2026, 0, 1, 23, 59))).toBe(23);
  });

  it('handles plain, wrapping and empty hour windows', () => {
    expect(hourInWindow(9, 9, 17)).toBe(true);
    expect(hourInWindow(17, 9, 17)).toBe(false);
    expect(hourInWindow(23, 22, 6)).toBe(true);
    expect(hourInWindow(5, 22, 6)).toBe(true);
    expect(hourInWindow(12, 22, 6)).toBe(false);
    expect(hourInWindow(4, 4, 4)).toBe(false);
  });
});

// ===========================================================================
//  fs.ts
// ===========================================================================
describe('data files', () => {
  it('locates the bundled data directory', () => {
    const dir = resolveDataDir();
    expect(existsSync(join(dir, 'templates.json'))).toBe(true);
  });

  it('throws for a missing data file', () => {
    expect(() => readDataFile('does-not-exist.json')).toThrow(/Missing data file/);
  });
});
