import { TimeoutError } from '../Types/errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timer. The underlying operation is not cancelled;
 * its eventual result is simply ignored once the timer wins.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });
}

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts: number;
  delayMs: number;
  /** Called after each failed attempt that will be retried */
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Run `fn` up to `attempts` times with a fixed delay between attempts.
 * Rethrows the last error once attempts are exhausted.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (attempt < attempts) {
        options.onRetry?.(error, attempt);
        await sleep(options.delayMs);
      }
    }
  }

  throw lastError;
}
