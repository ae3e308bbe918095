import { setTimeout as sleep } from 'timers/promises';
import { CancelledError, FetchError, toError } from '../errors';
import { RetryPolicy } from './types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoff: 'exponential'
};

/**
 * Delay before the retry that follows failed attempt number `attempt` (1-based)
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = policy.backoff === 'exponential'
    ? policy.baseDelayMs * 2 ** (attempt - 1)
    : policy.baseDelayMs;
  return Math.min(delay, policy.maxDelayMs);
}

export interface RetryOptions {
  signal?: AbortSignal;
  onRetry?: (attempt: number, delayMs: number, error: Error) => void;
}

/**
 * Run `operation` up to `policy.attempts` times. Only retryable FetchErrors are
 * retried; anything else, including cancellation, propagates immediately.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, onRetry } = options;
  const maxAttempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof FetchError) || !error.retryable || attempt >= maxAttempts) {
        throw error;
      }

      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(attempt, delayMs, toError(error));

      try {
        await sleep(delayMs, undefined, { signal });
      } catch {
        throw new CancelledError();
      }
    }
  }
}
