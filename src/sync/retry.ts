/**
 * Per-call timeout and retry with exponential backoff for remote calls.
 */

import type { CancelToken } from '../cancel.js';
import { RateLimitError, RemoteApplyError, RemoteTimeoutError, TransientRemoteError } from '../errors.js';
import { sleep as defaultSleep } from '../utils/index.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  callTimeoutMs: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { operation: string; attempt: number; delayMs: number; error: TransientRemoteError }) => void;
  /** Checked before each retry; cancelling ends a backoff wait early. */
  cancelToken?: CancelToken;
}

/** Delay before the retry that follows failed attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Race `promise` against a timer. The underlying call is not interrupted;
 * its eventual result is dropped.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RemoteTimeoutError(operation, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wait `ms`, or less when `token` is cancelled first. Without a custom
 * `sleep` the pending timer is cleared on cancellation.
 */
export function backoffWait(ms: number, token?: CancelToken, sleep?: (ms: number) => Promise<void>): Promise<void> {
  if (token === undefined) return (sleep ?? defaultSleep)(ms);
  return new Promise<void>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const unsubscribe = token.onCancel(() => {
      clearTimeout(timer);
      resolve();
    });
    if (token.isCancelled) return;

    const done = (): void => {
      unsubscribe();
      resolve();
    };
    if (sleep === undefined) {
      timer = setTimeout(done, ms);
      return;
    }
    sleep(ms).then(done, (e: unknown) => {
      unsubscribe();
      reject(e);
    });
  });
}

/**
 * Run `fn` until it succeeds, fails with a non-transient error, or uses up
 * `policy.maxAttempts`. A RateLimitError's retry-after hint replaces the
 * computed backoff. Exhaustion is reported as RemoteApplyError with the
 * last transient error as its cause. Once `hooks.cancelToken` is cancelled
 * no further attempt is made: SyncCancelledError is thrown instead.
 */
export async function callWithRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  policy: RetryPolicy,
  hooks?: RetryHooks,
): Promise<T> {
  const token = hooks?.cancelToken;
  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(fn(), policy.callTimeoutMs, operation);
    } catch (e) {
      if (!(e instanceof TransientRemoteError)) throw e;
      if (attempt >= policy.maxAttempts) {
        throw new RemoteApplyError(
          `${operation} failed after ${attempt} attempt(s): ${e.message}`,
          null,
          { cause: e },
        );
      }
      const delayMs = e instanceof RateLimitError && e.retryAfterMs !== null
        ? e.retryAfterMs
        : backoffDelay(attempt, policy);
      token?.check();
      hooks?.onRetry?.({ operation, attempt, delayMs, error: e });
      await backoffWait(delayMs, token, hooks?.sleep);
      token?.check();
    }
  }
}
