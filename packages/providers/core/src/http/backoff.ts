import { RateLimitError, type BackoffOptions } from '@tracklift/contracts';

type Milliseconds = number;

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  retries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export const sleep = (ms: Milliseconds) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const normalizeBackoff = (backoff?: BackoffOptions): Required<BackoffOptions> => ({
  retries: backoff?.retries ?? DEFAULT_BACKOFF.retries,
  baseDelayMs: backoff?.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs,
  maxDelayMs: backoff?.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
});

/**
 * Retries `fn` while it throws {@link RateLimitError}, waiting `Retry-After` when the
 * platform sent one and exponential backoff otherwise. Other errors propagate at once.
 */
export async function runWithBackoff<T>(
  fn: () => Promise<T>,
  backoff?: BackoffOptions,
  wait: (ms: Milliseconds) => Promise<void> = sleep,
): Promise<T> {
  const { retries, baseDelayMs, maxDelayMs } = normalizeBackoff(backoff);
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof RateLimitError)) {
        throw error;
      }

      if (attempt >= retries) {
        throw error;
      }

      const delay = Math.min(
        error.retryAfterMs ?? baseDelayMs * Math.pow(2, attempt),
        maxDelayMs,
      );
      attempt += 1;
      await wait(delay);
    }
  }
}

export const chunk = <T,>(input: T[], size: number): T[][] => {
  if (input.length === 0) return [];
  const batches: T[][] = [];
  for (let i = 0; i < input.length; i += size) {
    batches.push(input.slice(i, i + size));
  }
  return batches;
};
