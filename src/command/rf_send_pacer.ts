/**
 * Minimum spacing between RF transmit commands.
 *
 * A burst of `RF send` commands keeps the radio keyed for long stretches
 * and receivers miss frames. RF transmissions are queued through the pacer
 * one at a time; each waits until `min_interval_ms` has passed since the
 * previous one completed. The completion time is recorded whether the send
 * succeeded or failed, so failing retries are paced too.
 *
 * @module command/rf_send_pacer
 */

import { sleep } from '../util/sleep';
import { create_logger } from '../log';

const log = create_logger('pacer');

export class RfSendPacer {
  /** Date.now() when the previous RF transmit completed, 0 if none yet. */
  private last_departure = 0;

  /** Tail of the queue of paced tasks. */
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly min_interval_ms: number) {}

  /** Run `task` once the pacing interval allows it. */
  pace<T>(task: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const wait_ms = this.last_departure + this.min_interval_ms - Date.now();
      if (this.last_departure > 0 && wait_ms > 0) {
        log.debug(`delaying RF send by ${wait_ms} ms`);
        await sleep(wait_ms);
      }
      try {
        return await task();
      } finally {
        this.last_departure = Date.now();
      }
    };

    const result = this.tail.then(run);
    // The queue continues whether or not this task failed.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  /** Milliseconds the next RF send would wait if issued now. */
  remaining_delay_ms(): number {
    if (this.last_departure === 0) return 0;
    return Math.max(0, this.last_departure + this.min_interval_ms - Date.now());
  }
}
