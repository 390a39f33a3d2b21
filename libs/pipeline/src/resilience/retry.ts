import { defer, lastValueFrom, retry, throwError, timeout, timer } from 'rxjs';
import { isTransientError } from '../errors/processing.errors';

export interface RetryPolicy {
  /** Total attempts including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  /** Defaults to retrying TransientProcessingError only */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, retryNumber: number) => void;
}

/** Exponential backoff: base, 2×base, 4×base … capped at maxDelayMs. */
export function backoffDelay(
  policy: RetryPolicy,
  retryNumber: number,
): number {
  const delay = policy.baseDelayMs * 2 ** Math.max(0, retryNumber - 1);
  return policy.maxDelayMs === undefined
    ? delay
    : Math.min(delay, policy.maxDelayMs);
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable error or
 * exhausts `maxAttempts`. The last error is rethrown unchanged.
 */
export function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
): Promise<T> {
  const shouldRetry = policy.shouldRetry ?? isTransientError;

  return lastValueFrom(
    defer(operation).pipe(
      retry({
        count: Math.max(0, policy.maxAttempts - 1),
        delay: (error: unknown, retryNumber: number) => {
          if (!shouldRetry(error)) {
            return throwError(() => error);
          }
          policy.onRetry?.(error, retryNumber);
          return timer(backoffDelay(policy, retryNumber));
        },
      }),
    ),
  );
}

/**
 * Rejects with `onTimeout()` if `operation` has not settled within `ms`.
 * The operation itself is not interrupted; its late result is ignored.
 * A non-positive `ms` disables the limit.
 */
export function withTimeout<T>(
  operation: () => Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  if (ms <= 0) {
    return operation();
  }

  return lastValueFrom(
    defer(operation).pipe(
      timeout({
        first: ms,
        with: () => throwError(onTimeout),
      }),
    ),
  );
}
