import { afterEach, describe, it, expect, vi } from 'vitest';
import { GatewayTimeoutError } from '../src/errors.js';
import { retry, withTimeout } from '../src/util/async.js';

describe('withTimeout', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve with the task result in time', async () => {
    await expect(withTimeout('op', 1000, async () => 42)).resolves.toBe(42);
  });

  it('should reject with GatewayTimeoutError when the task hangs', async () => {
    vi.useFakeTimers();
    const pending = expect(withTimeout('fetch USD/JPY', 100, () => new Promise<number>(() => undefined))).rejects.toThrow(
      new GatewayTimeoutError('fetch USD/JPY', 100),
    );
    await vi.advanceTimersByTimeAsync(100);
    await pending;
  });

  it('should pass task errors through', async () => {
    await expect(
      withTimeout('op', 1000, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});

describe('retry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should retry up to the policy limit', async () => {
    const attempts: number[] = [];
    const result = await retry({ retries: 2, backoffMs: 0 }, async (attempt) => {
      attempts.push(attempt);
      if (attempt < 2) throw new Error(`fail ${attempt}`);
      return 'ok';
    });
    expect(result).toBe('ok');
    expect(attempts).toEqual([0, 1, 2]);
  });

  it('should throw the last error when retries run out', async () => {
    const task = vi.fn(async (attempt: number) => {
      throw new Error(`fail ${attempt}`);
    });
    await expect(retry({ retries: 1, backoffMs: 0 }, task)).rejects.toThrow('fail 1');
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should not retry when shouldRetry declines', async () => {
    const task = vi.fn(async () => {
      throw new Error('fatal');
    });
    await expect(retry({ retries: 3, backoffMs: 0 }, task, () => false)).rejects.toThrow('fatal');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should back off exponentially between attempts', async () => {
    vi.useFakeTimers();
    const task = vi.fn(async () => {
      throw new Error('down');
    });
    const result = retry({ retries: 2, backoffMs: 100 }, task).catch((err: unknown) => err);
    expect(task).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(99);
    expect(task).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(199);
    expect(task).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    expect(task).toHaveBeenCalledTimes(3);

    expect(await result).toBeInstanceOf(Error);
  });
});
