import { describe, it, expect, vi } from 'vitest';
import {
  computeBackoff,
  executeWithTimeout,
  retryWithBackoff,
} from '../../src/application/retry.js';
import { AttemptTimeoutError } from '../../src/domain/index.js';

const noSleep = () => Promise.resolve();

describe('computeBackoff', () => {
  it('doubles per attempt up to the cap', () => {
    const policy = { maxAttempts: 10, backoffBaseMs: 100, backoffMaxMs: 1000, attemptTimeoutMs: 50 };
    expect([1, 2, 3, 4, 5].map((a) => computeBackoff(policy, a))).toEqual([100, 200, 400, 800, 1000]);
  });

  it('caps at 30s by default', () => {
    expect(computeBackoff({ maxAttempts: 20, backoffBaseMs: 1000, attemptTimeoutMs: 1 }, 10)).toBe(30_000);
  });
});

describe('retryWithBackoff', () => {
  const policy = { maxAttempts: 3, backoffBaseMs: 10, attemptTimeoutMs: 1000 };

  it('returns the first success with its attempt number', async () => {
    let calls = 0;
    const outcome = await retryWithBackoff(async () => {
      calls++;
      if (calls < 2) throw new Error('flaky');
      return 'done';
    }, policy, { sleep: noSleep });

    expect(outcome).toEqual({ ok: true, value: 'done', attempts: 2 });
  });

  it('gives up after maxAttempts and reports the last error', async () => {
    const onRetry = vi.fn();
    const sleep = vi.fn(noSleep);
    let calls = 0;

    const outcome = await retryWithBackoff(async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    }, policy, { sleep, onRetry });

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.ok) expect(outcome.error).toEqual(new Error('failure 3'));
    expect(sleep.mock.calls).toEqual([[10], [20]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('stops immediately on a non-retryable error', async () => {
    let calls = 0;
    const outcome = await retryWithBackoff(async () => {
      calls++;
      throw new Error('rejected');
    }, policy, { sleep: noSleep, isRetryable: () => false });

    expect(calls).toBe(1);
    expect(outcome).toMatchObject({ ok: false, attempts: 1 });
  });

  it('times out a hung attempt and retries', async () => {
    let calls = 0;
    const outcome = await retryWithBackoff(
      (signal) => {
        calls++;
        if (calls === 1) {
          return new Promise<string>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(new Error('aborted')));
          });
        }
        return Promise.resolve('second');
      },
      { maxAttempts: 2, backoffBaseMs: 1, attemptTimeoutMs: 20 },
      { sleep: noSleep },
    );

    expect(outcome).toEqual({ ok: true, value: 'second', attempts: 2 });
  });
});

describe('executeWithTimeout', () => {
  it('rejects with AttemptTimeoutError and aborts the signal', async () => {
    let seen: AbortSignal | undefined;
    const pending = executeWithTimeout((signal) => {
      seen = signal;
      return new Promise<never>(() => {});
    }, 10);

    await expect(pending).rejects.toBeInstanceOf(AttemptTimeoutError);
    expect(seen?.aborted).toBe(true);
  });
});
