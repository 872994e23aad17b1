/**
 * Liveness supervisor.
 *
 * Background loop started by `Homeduino.connect()` when a ping interval is
 * set. Each iteration:
 *
 *   1. reconnects when the link is gone, unless a connect is under way
 *   2. polls digital inputs (`DR`) and reports changes
 *   3. polls analog inputs (`AR`) and reports changes
 *   4. reads DHT sensors, at most once per `dht_read_interval_ms`
 *   5. pings when nothing was received for `ping_interval_ms`
 *   6. sleeps `poll_interval_ms` after polling, else `idle_interval_ms`
 *
 * Cancellation goes through an AbortController; the loop notices it within
 * one sleep. Pins with an operation in flight are skipped for the iteration.
 *
 * @module client/supervisor
 */

import { HomeduinoResponseTimeoutError } from '../errors';
import { create_logger } from '../log';
import { sleep, settles_within } from '../util/sleep';
import type { CallbackRegistry } from './callback_registry';
import type { DhtReading, DhtType } from '../protocol/types';

const log = create_logger('supervisor');

/** What the supervisor needs from the client that owns it. */
export interface SupervisorHost {
  is_connected: () => boolean;
  /** True while the client itself is opening a link or awaiting ready. */
  is_connecting: () => boolean;
  /** Close and reopen the link without touching the supervisor. */
  reconnect_link: () => Promise<boolean>;
  ping: () => Promise<boolean>;
  /** Date.now() of the last framed line received. */
  get_last_message_received_at: () => number;
  digital_read: (pin: number) => Promise<number>;
  analog_read: (pin: number) => Promise<number>;
  dht_read: (pin: number, dht_type: DhtType) => Promise<DhtReading | null>;
  is_pin_busy: (pin: number) => boolean;
}

export type PinValueCallbacks = CallbackRegistry<number, [pin: number, value: number]>;
export type DhtCallbacks = CallbackRegistry<number, [pin: number, reading: DhtReading]>;

/** The input channels to poll. Owned by the client, read live. */
export interface SupervisorChannels {
  digital: PinValueCallbacks;
  analog: PinValueCallbacks;
  dht: DhtCallbacks;
  dht_types: ReadonlyMap<number, DhtType>;
}

export interface SupervisorOptions {
  poll_interval_ms: number;
  idle_interval_ms: number;
  dht_read_interval_ms: number;
  max_ping_failures: number;
  /** Upper bound on how long `stop()` waits for the loop to exit. */
  stop_timeout_ms: number;
}

/** Last reported value per pin; the first reading always counts as a change. */
interface PinState {
  digital: Map<number, number>;
  analog: Map<number, number>;
  dht: Map<number, DhtReading>;
}

export class LivenessSupervisor {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private ping_interval_ms = 0;
  private last_dht_read_at = 0;
  private consecutive_ping_failures = 0;
  private failure_reported = false;
  private state: PinState = { digital: new Map(), analog: new Map(), dht: new Map() };

  constructor(
    private readonly host: SupervisorHost,
    private readonly channels: SupervisorChannels,
    private readonly options: SupervisorOptions
  ) {}

  is_running(): boolean {
    return this.controller !== null;
  }

  get_consecutive_ping_failures(): number {
    return this.consecutive_ping_failures;
  }

  /** Start the loop. No-op while already running. */
  start(ping_interval_ms: number): void {
    if (this.controller) return;

    this.ping_interval_ms = ping_interval_ms;
    this.last_dht_read_at = 0;
    this.consecutive_ping_failures = 0;
    this.failure_reported = false;
    this.state = { digital: new Map(), analog: new Map(), dht: new Map() };

    const controller = new AbortController();
    this.controller = controller;
    log.debug(`started, ping interval ${ping_interval_ms} ms`);
    this.loop = this.run(controller.signal);
  }

  /**
   * Abort the loop and wait for it to exit, up to `stop_timeout_ms`.
   * Overrunning is logged as an error; the loop still exits on its own once
   * its current command settles.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    const loop = this.loop;
    if (!controller || !loop) return;

    this.controller = null;
    this.loop = null;
    controller.abort();

    const exited = await settles_within(loop, this.options.stop_timeout_ms);
    if (exited) {
      log.debug('stopped');
    } else {
      log.error(`loop did not exit within ${this.options.stop_timeout_ms} ms`);
    }
  }

  // -----------------------------------------------------------------------
  // Loop
  // -----------------------------------------------------------------------

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let polled = false;
      try {
        polled = await this.iterate(signal);
      } catch (err) {
        if (err instanceof HomeduinoResponseTimeoutError) {
          this.record_ping_result(false);
        }
        log.error('iteration failed:', err instanceof Error ? err.message : err);
      }
      if (signal.aborted) break;
      await sleep(polled ? this.options.poll_interval_ms : this.options.idle_interval_ms, signal);
    }
  }

  /** One pass over steps 1-5. Returns whether any input was polled. */
  private async iterate(signal: AbortSignal): Promise<boolean> {
    if (this.host.is_connecting()) {
      log.debug('connect in progress, skipping iteration');
      return false;
    }
    if (!this.host.is_connected()) {
      log.info('not connected, reconnecting');
      await this.host.reconnect_link();
      if (!this.host.is_connected()) {
        return false;
      }
    }

    let polled = false;

    for (const pin of this.channels.digital.keys()) {
      if (signal.aborted) return polled;
      if (this.host.is_pin_busy(pin)) continue;
      const value = await this.host.digital_read(pin);
      polled = true;
      if (this.state.digital.get(pin) !== value) {
        this.state.digital.set(pin, value);
        this.channels.digital.dispatch(pin, pin, value);
      }
    }

    for (const pin of this.channels.analog.keys()) {
      if (signal.aborted) return polled;
      if (this.host.is_pin_busy(pin)) continue;
      const value = await this.host.analog_read(pin);
      polled = true;
      if (this.state.analog.get(pin) !== value) {
        this.state.analog.set(pin, value);
        this.channels.analog.dispatch(pin, pin, value);
      }
    }

    if (this.channels.dht.size > 0 && Date.now() - this.last_dht_read_at >= this.options.dht_read_interval_ms) {
      let dht_started = false;
      for (const pin of this.channels.dht.keys()) {
        if (signal.aborted) return polled;
        const dht_type = this.channels.dht_types.get(pin);
        if (dht_type === undefined || this.host.is_pin_busy(pin)) continue;
        // The interval runs from the first read actually issued.
        if (!dht_started) {
          dht_started = true;
          this.last_dht_read_at = Date.now();
        }
        const reading = await this.host.dht_read(pin, dht_type);
        polled = true;
        if (reading && !same_reading(this.state.dht.get(pin), reading)) {
          this.state.dht.set(pin, reading);
          this.channels.dht.dispatch(pin, pin, reading);
        }
      }
    }

    if (signal.aborted) return polled;

    const idle_ms = Date.now() - this.host.get_last_message_received_at();
    if (idle_ms > this.ping_interval_ms) {
      let ok = false;
      try {
        ok = await this.host.ping();
      } catch (err) {
        if (!(err instanceof HomeduinoResponseTimeoutError)) throw err;
      }
      this.record_ping_result(ok);
    }

    return polled;
  }

  private record_ping_result(ok: boolean): void {
    if (ok) {
      if (this.consecutive_ping_failures > 0) {
        log.info(`ping recovered after ${this.consecutive_ping_failures} failure(s)`);
      }
      this.consecutive_ping_failures = 0;
      this.failure_reported = false;
      return;
    }

    this.consecutive_ping_failures++;
    log.warn(`ping failed (${this.consecutive_ping_failures} in a row)`);
    if (this.consecutive_ping_failures >= this.options.max_ping_failures && !this.failure_reported) {
      this.failure_reported = true;
      log.error(`Homeduino unresponsive: ${this.consecutive_ping_failures} consecutive ping failures`);
    }
  }
}

function same_reading(previous: DhtReading | undefined, next: DhtReading): boolean {
  return (
    previous !== undefined &&
    previous.temperature === next.temperature &&
    previous.humidity === next.humidity
  );
}
