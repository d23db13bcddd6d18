import { describe, it, expect, vi } from 'vitest';
import { computeBackoffDelay, RetryExecutor, sleep, withRetry } from '../../../src/utils/retry.js';

const noSleep = (_ms: number, _signal?: AbortSignal): Promise<void> => Promise.resolve();

describe('computeBackoffDelay', () => {
  it('should double the base delay per attempt', () => {
    const opts = { baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 1000 };
    expect(computeBackoffDelay(1, opts, () => 0)).toBe(1000);
    expect(computeBackoffDelay(2, opts, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, opts, () => 0)).toBe(4000);
  });

  it('should cap the exponential part at maxDelayMs', () => {
    const opts = { baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 1000 };
    expect(computeBackoffDelay(5, opts, () => 0)).toBe(10_000);
    expect(computeBackoffDelay(12, opts, () => 0)).toBe(10_000);
  });

  it('should add jitter strictly below jitterMs', () => {
    const opts = { baseDelayMs: 1000, maxDelayMs: 10_000, jitterMs: 1000 };
    expect(computeBackoffDelay(1, opts, () => 0.5)).toBe(1500);
    expect(computeBackoffDelay(1, opts, () => 0.9999)).toBe(1999);
    expect(computeBackoffDelay(5, opts, () => 1)).toBe(10_999);
  });

  it('should add no jitter when jitterMs is 0', () => {
    expect(computeBackoffDelay(2, { baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 }, () => 0.7)).toBe(200);
  });
});

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue('done');
    await expect(withRetry(fn, { sleep: noSleep })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith(1);
  });

  it('should retry until success and sleep with growing delays', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ok');
    const sleepFn = vi.fn(noSleep);

    const result = await withRetry(fn, { sleep: sleepFn, random: () => 0 });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('should throw the last attempt error untouched', async () => {
    const errors = [new Error('e1'), new Error('e2'), new Error('e3')];
    let call = 0;
    const fn = vi.fn(() => Promise.reject(errors[call++]));

    const outcome = withRetry(fn, { maxAttempts: 3, sleep: noSleep });

    await expect(outcome).rejects.toBe(errors[2]);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop immediately when retryIf rejects the error', async () => {
    const fatal = new Error('fatal');
    const fn = vi.fn().mockRejectedValue(fatal);
    const sleepFn = vi.fn(noSleep);

    await expect(withRetry(fn, { retryIf: () => false, sleep: sleepFn })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it('should report each retry through onRetry', async () => {
    const failure = new Error('flaky');
    const fn = vi.fn().mockRejectedValueOnce(failure).mockResolvedValue(1);
    const onRetry = vi.fn();

    await withRetry(fn, { onRetry, sleep: noSleep, random: () => 0 });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 1000, error: failure });
  });

  it('should stop when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const fn = vi.fn().mockRejectedValue(new Error('down'));
    const sleepFn = vi.fn((): Promise<void> => {
      controller.abort(reason);
      return Promise.reject(reason);
    });

    await expect(withRetry(fn, { signal: controller.signal, sleep: sleepFn })).rejects.toBe(reason);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should not call fn when the signal is already aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('already');
    controller.abort(reason);
    const fn = vi.fn().mockResolvedValue('never');

    await expect(withRetry(fn, { signal: controller.signal })).rejects.toBe(reason);
    expect(fn).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });
});

describe('RetryExecutor', () => {
  it('should default to three attempts', async () => {
    const executor = new RetryExecutor({ sleep: noSleep });
    const fn = vi.fn().mockRejectedValue(new Error('always'));

    expect(executor.maxAttempts).toBe(3);
    await expect(executor.execute(fn)).rejects.toThrow('always');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should run both the policy and the per-call onRetry hooks', async () => {
    const policyHook = vi.fn();
    const callHook = vi.fn();
    const executor = new RetryExecutor({ sleep: noSleep, onRetry: policyHook });
    const fn = vi.fn().mockRejectedValueOnce(new Error('once')).mockResolvedValue('ok');

    await expect(executor.execute(fn, { onRetry: callHook })).resolves.toBe('ok');
    expect(policyHook).toHaveBeenCalledTimes(1);
    expect(callHook).toHaveBeenCalledTimes(1);
  });

  it('should honour a per-call retryIf', async () => {
    const executor = new RetryExecutor({ sleep: noSleep, maxAttempts: 5 });
    const fn = vi.fn().mockRejectedValue(new Error('no retry'));

    await expect(executor.execute(fn, { retryIf: () => false })).rejects.toThrow('no retry');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
