/**
 * Promise-based delay that can be cut short by an AbortSignal.
 *
 * Resolves (never rejects) after `ms` or as soon as the signal aborts, so a
 * loop can sleep and then check `signal.aborted` itself.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const on_abort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', on_abort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', on_abort, { once: true });
  });
}

/**
 * Wait for `promise` for at most `ms`.
 *
 * @returns true if it settled in time, false on timeout. A rejection inside
 *   the window is rethrown.
 */
export async function settles_within(promise: Promise<unknown>, ms: number): Promise<boolean> {
  const timer = new AbortController();
  try {
    return await Promise.race([
      promise.then(() => true),
      sleep(ms, timer.signal).then(() => false)
    ]);
  } finally {
    timer.abort();
  }
}
