/**
 * Request/response correlator for the Homeduino line protocol.
 *
 * The wire format has no request ids, so at most one command may be in
 * flight. The correlator enforces this with an exclusive send slot:
 *
 *   send() --> acquire slot (FIFO, up to busy_timeout_ms) --> write line
 *          --> await one response line (up to response_timeout_ms)
 *          --> release slot
 *
 * The router hands the next non-event line to `on_response_line()` while
 * `is_awaiting_response()` is true. Once a request resolves or times out no
 * pending request exists, so a late reply is dropped by the router instead
 * of being attributed to the next command.
 *
 * @module command/correlator
 */

import {
  HomeduinoDisconnectedError,
  HomeduinoNotReadyError,
  HomeduinoTooBusyError,
  HomeduinoResponseTimeoutError
} from '../errors';
import { create_logger } from '../log';
import type {
  CorrelatorHost,
  CorrelatorOptions,
  PendingRequest,
  SendOptions
} from './command_types';

const log = create_logger('correlator');

/** A caller queued for the send slot. */
interface SlotWaiter {
  grant: () => void;
  timer: ReturnType<typeof setTimeout>;
}

export class CommandCorrelator {
  private slot_taken = false;
  private waiters: SlotWaiter[] = [];
  private pending: PendingRequest | null = null;

  constructor(
    private readonly host: CorrelatorHost,
    private readonly options: CorrelatorOptions
  ) {}

  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  /** True while a written command waits for its response line. */
  is_awaiting_response(): boolean {
    return this.pending !== null;
  }

  /** True while a caller holds the send slot. */
  is_busy(): boolean {
    return this.slot_taken;
  }

  /** The in-flight command, or null. */
  get_pending(): Readonly<Pick<PendingRequest, 'command' | 'submitted_at'>> | null {
    if (!this.pending) return null;
    return { command: this.pending.command, submitted_at: this.pending.submitted_at };
  }

  // -----------------------------------------------------------------------
  // Sending
  // -----------------------------------------------------------------------

  /**
   * Send one command and wait for its response line.
   *
   * @returns The trimmed response.
   * @throws HomeduinoDisconnectedError if no link is attached.
   * @throws HomeduinoNotReadyError if the device is not ready and
   *   `require_ready` is not false.
   * @throws HomeduinoTooBusyError if the slot stays taken past the busy timeout.
   * @throws HomeduinoResponseTimeoutError if no response line arrives in time.
   */
  async send(command: string, send_options: SendOptions = {}): Promise<string> {
    const require_ready = send_options.require_ready ?? true;

    this.assert_sendable(require_ready);
    await this.acquire_slot(command);

    try {
      // The link may have dropped while this caller was queued.
      this.assert_sendable(require_ready);
      return await this.exchange(command);
    } finally {
      this.release_slot();
    }
  }

  /** Feed the response line the router attributed to the pending request. */
  on_response_line(line: string): void {
    const pending = this.pending;
    if (!pending) {
      log.debug(`no pending request for "${line}"`);
      return;
    }
    this.pending = null;
    clearTimeout(pending.timer);
    log.debug(`"${pending.command}" -> "${line}"`);
    pending.resolve(line.trim());
  }

  /**
   * Reject the in-flight request, if any. The slot is released by the
   * rejected `send()` call itself.
   */
  abort_pending(error: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(error);
  }

  // -----------------------------------------------------------------------
  // Private
  // -----------------------------------------------------------------------

  private assert_sendable(require_ready: boolean): void {
    if (!this.host.is_connected()) {
      throw new HomeduinoDisconnectedError();
    }
    if (require_ready && !this.host.is_ready()) {
      throw new HomeduinoNotReadyError();
    }
  }

  private exchange(command: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const timeout_ms = this.options.response_timeout_ms;
      const timer = setTimeout(() => {
        if (this.pending === request) {
          this.pending = null;
          log.warn(`no response to "${command}" within ${timeout_ms} ms`);
          reject(new HomeduinoResponseTimeoutError(command, timeout_ms));
        }
      }, timeout_ms);

      const request: PendingRequest = {
        command,
        submitted_at: Date.now(),
        resolve,
        reject,
        timer
      };
      // Pending before the write: a reply may arrive synchronously.
      this.pending = request;

      try {
        log.debug(`writing "${command}"`);
        this.host.write_line(command);
      } catch (err) {
        this.abort_pending(
          new HomeduinoDisconnectedError(
            `Failed to write "${command}": ${err instanceof Error ? err.message : String(err)}`
          )
        );
      }
    });
  }

  private acquire_slot(command: string): Promise<void> {
    if (!this.slot_taken) {
      this.slot_taken = true;
      return Promise.resolve();
    }

    const busy_timeout_ms = this.options.busy_timeout_ms;
    log.info(`too busy to transmit "${command}", waiting`);

    return new Promise<void>((resolve, reject) => {
      const waiter: SlotWaiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new HomeduinoTooBusyError(command, busy_timeout_ms));
        }, busy_timeout_ms)
      };
      this.waiters.push(waiter);
    });
  }

  private release_slot(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter; it stays taken.
      next.grant();
    } else {
      this.slot_taken = false;
    }
  }
}
