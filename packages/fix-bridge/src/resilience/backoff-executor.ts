/**
 * Backoff Executor
 *
 * Runs a single remote operation with bounded retries and exponential delay:
 * - delay starts at initialDelayMs, multiplied by backoffFactor after every
 *   wait, capped at maxDelayMs
 * - after maxRetries retries the last error propagates unchanged
 * - non-retryable errors propagate on the first attempt
 * - rate-limited errors follow their own policy and do not consume the retry budget
 * - every wait is cancellable through the caller's AbortSignal
 */

import { CancellationError, abortReason, throwIfAborted } from './resilience.errors';

export interface RateLimitPolicy {
  maxWaits: number;
  maxDelayMs: number;
  isRateLimited: (error: unknown) => boolean;
  retryAfterMs: (error: unknown) => number | undefined;
}

export interface BackoffPolicy {
  maxRetries: number;
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
  rateLimit?: RateLimitPolicy;
}

export type GiveUpReason = 'exhausted' | 'non-retryable' | 'rate-limited' | 'cancelled';

export type BackoffEvent =
  | { type: 'attempt'; attempt: number }
  | { type: 'success'; attempt: number }
  | {
      type: 'wait';
      attempt: number;
      delayMs: number;
      reason: 'backoff' | 'rate-limit';
      error: unknown;
    }
  | { type: 'give-up'; attempt: number; reason: GiveUpReason; error: unknown };

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffOptions {
  signal?: AbortSignal;
  onEvent?: (event: BackoffEvent) => void;
  sleep?: Sleep;
}

/**
 * Timer-based wait that rejects with CancellationError when the signal aborts
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError(abortReason(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError(signal ? abortReason(signal) : undefined));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function executeWithBackoff<T>(
  operation: (attempt: number, signal?: AbortSignal) => Promise<T>,
  policy: BackoffPolicy,
  options: BackoffOptions = {},
): Promise<T> {
  const { signal } = options;
  const sleep = options.sleep ?? abortableSleep;
  const emit = options.onEvent ?? (() => undefined);

  let delay = Math.min(policy.initialDelayMs, policy.maxDelayMs);
  let retries = 0;
  let rateLimitWaits = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      throwIfAborted(signal);
    } catch (error) {
      emit({ type: 'give-up', attempt: attempt - 1, reason: 'cancelled', error });
      throw error;
    }

    emit({ type: 'attempt', attempt });

    let failure: unknown;
    try {
      const result = await operation(attempt, signal);
      emit({ type: 'success', attempt });
      return result;
    } catch (error) {
      failure = error;
    }

    if (failure instanceof CancellationError || signal?.aborted) {
      const cancellation =
        failure instanceof CancellationError
          ? failure
          : new CancellationError(signal ? abortReason(signal) : undefined);
      emit({ type: 'give-up', attempt, reason: 'cancelled', error: cancellation });
      throw cancellation;
    }

    const rateLimit = policy.rateLimit;
    let wait: { delayMs: number; reason: 'backoff' | 'rate-limit' };

    if (rateLimit && rateLimit.isRateLimited(failure)) {
      if (rateLimitWaits >= rateLimit.maxWaits) {
        emit({ type: 'give-up', attempt, reason: 'rate-limited', error: failure });
        throw failure;
      }
      rateLimitWaits++;
      wait = {
        delayMs: Math.min(rateLimit.retryAfterMs(failure) ?? delay, rateLimit.maxDelayMs),
        reason: 'rate-limit',
      };
    } else if (!policy.isRetryable(failure)) {
      emit({ type: 'give-up', attempt, reason: 'non-retryable', error: failure });
      throw failure;
    } else if (retries >= policy.maxRetries) {
      emit({ type: 'give-up', attempt, reason: 'exhausted', error: failure });
      throw failure;
    } else {
      retries++;
      wait = { delayMs: delay, reason: 'backoff' };
      delay = Math.min(delay * policy.backoffFactor, policy.maxDelayMs);
    }

    emit({ type: 'wait', attempt, delayMs: wait.delayMs, reason: wait.reason, error: failure });

    try {
      await sleep(wait.delayMs, signal);
    } catch (error) {
      const cancellation =
        error instanceof CancellationError ? error : new CancellationError(String(error));
      emit({ type: 'give-up', attempt, reason: 'cancelled', error: cancellation });
      throw cancellation;
    }
  }
}
