import { getLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffFactor: number;
  /** Add up to one second of random delay per attempt */
  jitter: boolean;
  /** Only errors accepted by this predicate are retried; others propagate immediately */
  isRetryable?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delay: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffFactor: 2,
  jitter: true,
};

/** Substrings that mark a completion or API failure as transient */
export const TRANSIENT_ERROR_MARKERS = [
  'rate_limit',
  'rate limit',
  'overloaded',
  'timeout',
  'timed out',
  '429',
  '500',
  '502',
  '503',
  '529',
];

/**
 * True when the error's name or message mentions one of the transient markers.
 */
export function isTransientError(error: Error): boolean {
  const text = `${error.name} ${error.message}`.toLowerCase();
  return TRANSIENT_ERROR_MARKERS.some(marker => text.includes(marker));
}

/**
 * Retry a function with exponential backoff (optionally jittered)
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logger = getLogger();

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = toError(err);

      if (attempt >= opts.maxRetries) throw error;
      if (opts.isRetryable && !opts.isRetryable(error)) throw error;

      const delay = Math.min(
        opts.baseDelay * Math.pow(opts.backoffFactor, attempt) + (opts.jitter ? Math.random() * 1000 : 0),
        opts.maxDelay,
      );

      logger.debug({ attempt: attempt + 1, delay, error: error.message }, 'Retrying after error');
      opts.onRetry?.(attempt + 1, error, delay);

      await sleep(delay);
    }
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Reject with `onTimeout()` (or a generic error) if the promise does not settle within `ms`
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout?: string | (() => Error),
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      if (typeof onTimeout === 'function') {
        reject(onTimeout());
      } else {
        reject(new Error(onTimeout || `Operation timed out after ${ms}ms`));
      }
    }, ms);

    promise
      .then(value => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(toError(err));
      });
  });
}
