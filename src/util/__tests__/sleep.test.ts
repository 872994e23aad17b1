import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { sleep, settles_within } from '../sleep';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the delay', async () => {
    const done = vi.fn();
    void sleep(100).then(done);
    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalled();
  });

  it('resolves early on abort and clears its timer', async () => {
    const controller = new AbortController();
    const done = vi.fn();
    void sleep(10_000, controller.signal).then(done);
    controller.abort();
    await vi.advanceTimersByTimeAsync(0);
    expect(done).toHaveBeenCalled();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves at once for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).resolves.toBeUndefined();
  });
});

describe('settles_within', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('is true when the promise settles in time', async () => {
    await expect(settles_within(Promise.resolve('x'), 100)).resolves.toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('is false on timeout', async () => {
    const result = settles_within(new Promise<void>(() => undefined), 100);
    await vi.advanceTimersByTimeAsync(100);
    await expect(result).resolves.toBe(false);
  });

  it('rethrows a rejection', async () => {
    await expect(settles_within(Promise.reject(new Error('close failed')), 100)).rejects.toThrow('close failed');
  });
});
