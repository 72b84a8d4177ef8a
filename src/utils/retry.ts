import { getLogger } from '../core/logger.js';

export interface RetryOptions {
  /** Attempts after the first one. */
  retries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** Extra random delay as a fraction of the backoff, 0 for none. */
  jitter: number;
  random: () => number;
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  retries: 2,
  initialDelayMs: 250,
  maxDelayMs: 5000,
  factor: 2,
  jitter: 0.2,
  random: Math.random,
};

export class TimeoutError extends Error {
  constructor(
    public readonly ms: number,
    message = `Operation timed out after ${ms}ms`,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Delay before retry number `attempt` (1-based), capped at `maxDelayMs`.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelayMs' | 'maxDelayMs' | 'factor' | 'jitter' | 'random'>,
): number {
  const base = options.initialDelayMs * Math.pow(options.factor, attempt - 1);
  return Math.min(base * (1 + options.jitter * options.random()), options.maxDelayMs);
}

/**
 * Run `fn` until it resolves, backing off exponentially between failures.
 * The last error is rethrown once retries run out or `shouldRetry` says no.
 */
export async function retry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt > opts.retries || (opts.shouldRetry && !opts.shouldRetry(error, attempt))) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, opts);
      getLogger().debug({ attempt, delayMs, error: error.message }, 'Retrying after error');
      opts.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reject with a `TimeoutError` when `promise` has not settled within `ms`.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms, message)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
