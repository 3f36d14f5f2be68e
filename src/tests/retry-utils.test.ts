import { describe, it, expect } from '@jest/globals';
import { calculateDelay, isSafetyBlockError, isTransientError, sleep, withRetry } from '@/shared/retry-utils';

describe('isTransientError', () => {
  it('recognizes retryable statuses, codes and messages', () => {
    expect(isTransientError({ status: 429 })).toBe(true);
    expect(isTransientError({ statusCode: 503 })).toBe(true);
    expect(isTransientError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientError(new Error('Service Unavailable, try again'))).toBe(true);
  });

  it('rejects permanent failures and aborts', () => {
    expect(isTransientError({ status: 400 })).toBe(false);
    expect(isTransientError(new Error('invalid prompt'))).toBe(false);
    const abort = new Error('The operation was aborted due to timeout');
    abort.name = 'AbortError';
    expect(isTransientError(abort)).toBe(false);
    expect(isTransientError('timeout')).toBe(false);
  });
});

describe('isSafetyBlockError', () => {
  it('detects moderation refusals', () => {
    expect(isSafetyBlockError({ status: 422 })).toBe(true);
    expect(isSafetyBlockError({ code: 'IMAGE_SAFETY' })).toBe(true);
    expect(isSafetyBlockError(new Error('Your request was rejected by the safety system'))).toBe(true);
    expect(isSafetyBlockError(new Error('socket hang up'))).toBe(false);
  });
});

describe('calculateDelay', () => {
  it('backs off exponentially up to the cap when there is no jitter', () => {
    expect(calculateDelay(1, 100, 1000, 0)).toBe(100);
    expect(calculateDelay(3, 100, 1000, 0)).toBe(400);
    expect(calculateDelay(6, 100, 1000, 0)).toBe(1000);
  });
});

describe('withRetry', () => {
  it('retries transient errors until the call succeeds', async () => {
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw Object.assign(new Error('rate limit'), { status: 429 });
        return 'done';
      },
      { baseDelayMs: 0, jitterMs: 0 },
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
  });

  it('does not retry a permanent error', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('bad request');
        },
        { baseDelayMs: 0, jitterMs: 0 },
      ),
    ).rejects.toThrow('bad request');
    expect(calls).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('connection reset by peer');
        },
        { maxAttempts: 2, baseDelayMs: 0, jitterMs: 0 },
      ),
    ).rejects.toThrow('connection reset by peer');
    expect(calls).toBe(2);
  });

  it('stops before the first attempt when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          return 'never';
        },
        { signal: controller.signal },
      ),
    ).rejects.toThrow('cancelled');
    expect(calls).toBe(0);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});
