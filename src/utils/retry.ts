import { ChainTimeoutError, isRetryable } from '../types/errors';
import { logger } from './logger';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  label: string;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
}

export function withTimeout<T>(task: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new ChainTimeoutError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    task().then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Run `task` with a per-attempt timeout, retrying retryable failures with exponential backoff.
 * The last error is rethrown once attempts run out; non-retryable errors are rethrown at once.
 */
export async function withRetry<T>(task: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry || isRetryable;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await withTimeout(task, options.timeoutMs, options.label);
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs);
      logger.warn(`${options.label} failed, retrying`, {
        attempt,
        maxAttempts: options.maxAttempts,
        delayMs,
        error: error instanceof Error ? error.message : String(error)
      });
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
