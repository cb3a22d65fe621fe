import { describe, expect, it, vi } from 'vitest';

import { RateLimitError } from '@tracklift/contracts';

import { chunk, runWithBackoff } from '../src/http/backoff';
import { parseRetryAfter, withTimeout } from '../src/http/timeout';

const noWait = () => vi.fn(async (_ms: number) => {});

describe('runWithBackoff', () => {
  it('returns the first successful result', async () => {
    const wait = noWait();
    const fn = vi.fn(async () => 'ok');

    await expect(runWithBackoff(fn, undefined, wait)).resolves.toBe('ok');
    expect(wait).not.toHaveBeenCalled();
  });

  it('waits exponentially between rate-limited attempts', async () => {
    const wait = noWait();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError('slow'))
      .mockRejectedValueOnce(new RateLimitError('slow'))
      .mockResolvedValueOnce('done');

    await expect(runWithBackoff(fn, undefined, wait)).resolves.toBe('done');
    expect(wait.mock.calls).toEqual([[500], [1000]]);
  });

  it('honours Retry-After up to the ceiling', async () => {
    const wait = noWait();
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitError('slow', 3000))
      .mockRejectedValueOnce(new RateLimitError('slow', 60_000))
      .mockResolvedValueOnce('done');

    await runWithBackoff(fn, undefined, wait);

    expect(wait.mock.calls).toEqual([[3000], [8000]]);
  });

  it('gives up after the configured retries', async () => {
    const wait = noWait();
    const error = new RateLimitError('slow');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(runWithBackoff(fn, { retries: 2 }, wait)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
  });

  it('does not retry other errors', async () => {
    const wait = noWait();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('boom'));

    await expect(runWithBackoff(fn, undefined, wait)).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('chunk', () => {
  it('splits into batches of the given size', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunk([], 100)).toEqual([]);
  });
});

describe('parseRetryAfter', () => {
  it('reads seconds and ignores garbage', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('withTimeout', () => {
  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 1000, 'answer')).resolves.toBe(42);
  });

  it('rejects with the label once the time is up', async () => {
    vi.useFakeTimers();
    try {
      const pending = withTimeout(new Promise<number>(() => {}), 100, 'slow call');
      const assertion = expect(pending).rejects.toThrow('slow call timed out after 100ms');
      await vi.advanceTimersByTimeAsync(100);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});
