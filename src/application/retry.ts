import { AttemptTimeoutError } from '../domain/index.js';

/** Bounded retry budget with exponential backoff and a per-attempt timeout. */
export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly backoffMaxMs?: number | undefined;
  readonly attemptTimeoutMs: number;
}

export type RetryOutcome<T> =
  | { readonly ok: true; readonly value: T; readonly attempts: number }
  | { readonly ok: false; readonly error: unknown; readonly attempts: number };

export interface RetryHooks {
  /** Decides whether a failure is worth another attempt. Defaults to always. */
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_BACKOFF_MAX_MS = 30_000;

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempt budget is spent. Each attempt gets its own AbortSignal that
 * fires when the attempt's timeout elapses; the attempt then fails with
 * an AttemptTimeoutError regardless of whether `fn` honours the signal.
 */
export async function retryWithBackoff<T>(
  fn: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<RetryOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const sleepFn = hooks.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await executeWithTimeout(
        (signal) => fn(signal, attempt),
        policy.attemptTimeoutMs,
      );
      return { ok: true, value, attempts: attempt };
    } catch (err: unknown) {
      lastError = err;

      if (hooks.isRetryable && !hooks.isRetryable(err)) {
        return { ok: false, error: err, attempts: attempt };
      }

      if (attempt < maxAttempts) {
        const delay = computeBackoff(policy, attempt);
        hooks.onRetry?.(err, attempt, delay);
        await sleepFn(delay);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}

/** Exponential delay before attempt `attempt + 1`, capped. */
export function computeBackoff(policy: RetryPolicy, attempt: number): number {
  const cap = policy.backoffMaxMs ?? DEFAULT_BACKOFF_MAX_MS;
  return Math.min(policy.backoffBaseMs * Math.pow(2, attempt - 1), cap);
}

export async function executeWithTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);

    fn(controller.signal)
      .then((result) => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((err: unknown) => {
        clearTimeout(timer);
        reject(err);
      });
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
