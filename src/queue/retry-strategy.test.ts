import { describe, expect, it, vi } from 'vitest';
import { AccessDeniedError, EmptyPayloadError, RetryExhaustedError, TransientFetchError } from '../errors/custom-errors.js';
import type { AttemptInfo } from './retry-strategy.js';
import { classifyDownloadFailure, createDownloadRetryPolicy, executeWithRetry } from './retry-strategy.js';

const URL = 'https://youtu.be/abc';

describe('classifyDownloadFailure', () => {
  it('should map access errors by reason', () => {
    expect(classifyDownloadFailure(new AccessDeniedError('403', URL, 'blocked'))).toBe('alternate');
    expect(classifyDownloadFailure(new AccessDeniedError('private', URL, 'unavailable'))).toBe('terminal');
  });

  it('should retry transient, empty and unknown failures', () => {
    expect(classifyDownloadFailure(new TransientFetchError('timeout', URL))).toBe('retry');
    expect(classifyDownloadFailure(new EmptyPayloadError('empty'))).toBe('retry');
    expect(classifyDownloadFailure(new Error('boom'))).toBe('retry');
  });
});

describe('executeWithRetry', () => {
  it('should return the first successful result without sleeping', async () => {
    const sleep = vi.fn(async () => {});
    const fn = vi.fn(async () => 'ok');

    const result = await executeWithRetry(fn, createDownloadRetryPolicy(), { sleep });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should back off between transient failures and recover', async () => {
    const sleep = vi.fn(async () => {});
    const onRetry = vi.fn();
    const seen: AttemptInfo[] = [];
    const fn = async (info: AttemptInfo) => {
      seen.push(info);
      if (info.attempt < 3) throw new TransientFetchError('timed out', URL);
      return 'done';
    };

    const result = await executeWithRetry(fn, createDownloadRetryPolicy(3, 3000), { sleep, onRetry });

    expect(result).toBe('done');
    expect(seen).toEqual([
      { attempt: 1, variant: 0 },
      { attempt: 2, variant: 0 },
      { attempt: 3, variant: 0 },
    ]);
    expect(sleep.mock.calls).toEqual([[3000], [3000]]);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[0]?.[0]).toMatchObject({ attempt: 1, decision: 'retry', delayMs: 3000 });
  });

  it('should switch directive without delay when blocked', async () => {
    const sleep = vi.fn(async () => {});
    const seen: AttemptInfo[] = [];
    const fn = async (info: AttemptInfo) => {
      seen.push(info);
      if (info.attempt === 1) throw new AccessDeniedError('HTTP Error 403', URL, 'blocked');
      return info.variant;
    };

    const variant = await executeWithRetry(fn, createDownloadRetryPolicy(), { sleep });

    expect(variant).toBe(1);
    expect(seen).toEqual([
      { attempt: 1, variant: 0 },
      { attempt: 2, variant: 1 },
    ]);
    expect(sleep.mock.calls).toEqual([[0]]);
  });

  it('should stop at once on terminal failures', async () => {
    const onGiveUp = vi.fn();
    const onRetry = vi.fn();
    const error = new AccessDeniedError('Private video', URL, 'unavailable');
    const fn = vi.fn(async () => {
      throw error;
    });

    await expect(
      executeWithRetry(fn, createDownloadRetryPolicy(), { sleep: async () => {}, onGiveUp, onRetry }),
    ).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
    expect(onGiveUp).toHaveBeenCalledWith(error, 1);
  });

  it('should throw RetryExhaustedError after the last transient failure', async () => {
    const onGiveUp = vi.fn();
    const fn = vi.fn(async () => {
      throw new TransientFetchError('timed out', URL);
    });

    const error = await executeWithRetry(fn, createDownloadRetryPolicy(3, 0), {
      sleep: async () => {},
      onGiveUp,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: 'All 3 attempts failed: timed out' });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onGiveUp).toHaveBeenCalledTimes(1);
  });

  it('should surface the blocked error when alternates run out', async () => {
    const fn = vi.fn(async () => {
      throw new AccessDeniedError('HTTP Error 403', URL, 'blocked');
    });

    const error = await executeWithRetry(fn, createDownloadRetryPolicy(), { sleep: async () => {} }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(AccessDeniedError);
    expect(error).toMatchObject({ reason: 'blocked' });
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should wrap non-Error throws', async () => {
    const fn = vi.fn(async () => {
      throw 'plain string';
    });

    const error = await executeWithRetry(fn, createDownloadRetryPolicy(1, 0)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ message: 'All 1 attempts failed: plain string' });
  });
});
