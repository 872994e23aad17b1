/**
 * Per-channel ordered observer lists.
 *
 * A channel key is an RF protocol name or a pin number. Callbacks are kept
 * in registration order, duplicates included, and there is no removal.
 * A throwing callback is logged and the remaining callbacks still run.
 *
 * @module client/callback_registry
 */

import { create_logger } from '../log';
import type { Logger } from '../log';

export class CallbackRegistry<K, A extends unknown[]> {
  private readonly entries = new Map<K, Array<(...args: A) => void>>();
  private readonly log: Logger;

  /** @param name - Used in log lines, e.g. "digital". */
  constructor(private readonly name: string) {
    this.log = create_logger(`callbacks:${name}`);
  }

  register(key: K, callback: (...args: A) => void): void {
    const list = this.entries.get(key);
    if (list) {
      list.push(callback);
    } else {
      this.entries.set(key, [callback]);
    }
  }

  /**
   * Invoke every callback registered for `key`, in order.
   *
   * @returns The number of callbacks invoked.
   */
  dispatch(key: K, ...args: A): number {
    const list = this.entries.get(key);
    if (!list) return 0;

    // Snapshot: a callback registering another must not extend this round.
    const callbacks = [...list];
    for (const callback of callbacks) {
      try {
        callback(...args);
      } catch (err) {
        this.log.error(
          `${this.name} callback for ${String(key)} threw:`,
          err instanceof Error ? err.message : err
        );
      }
    }
    return callbacks.length;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  count(key: K): number {
    return this.entries.get(key)?.length ?? 0;
  }

  /** Channel keys in first-registration order. */
  keys(): K[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}
