/**
 * Homeduino client.
 *
 * Owns one link to the Arduino and wires the pipeline together:
 *
 *   link 'data' --> LineFramer --> LineRouter --+--> ready handshake
 *                                               +--> RF receive --> codec --> callbacks
 *                                               +--> key press event
 *                                               +--> CommandCorrelator (responses)
 *
 * Commands go out through the correlator, one at a time. RF transmissions
 * are additionally spaced by the RfSendPacer. Input polling and liveness
 * pings run in the LivenessSupervisor.
 *
 * Events:
 *   'connected'    () -- handshake finished, commands accepted
 *   'ready'        () -- the device announced (or confirmed) ready
 *   'disconnected' () -- the link was closed, on request or not
 *   'key_press'    (code: string)
 *
 * @module client/homeduino
 */

import { EventEmitter } from 'events';
import { parse_options } from '../config';
import type { HomeduinoOptions, ResolvedHomeduinoOptions } from '../config';
import {
  HomeduinoCommandError,
  HomeduinoDisconnectedError,
  HomeduinoResponseTimeoutError
} from '../errors';
import { create_logger } from '../log';
import { CommandCorrelator } from '../command/correlator';
import { RfSendPacer } from '../command/rf_send_pacer';
import { LineFramer } from '../protocol/line_framer';
import { LineRouter } from '../protocol/line_router';
import { COMMAND_TERMINATOR, RECEIVE_PIN_INTERRUPT_OFFSET } from '../protocol/constants';
import {
  build_analog_read,
  build_analog_write,
  build_dht_read,
  build_digital_read,
  build_digital_write,
  build_pin_mode,
  build_ping,
  build_rf_receive,
  build_rf_send
} from '../protocol/command_builder';
import {
  is_ack,
  is_error,
  parse_dht_response,
  parse_int_response
} from '../protocol/response_parser';
import { PinMode } from '../protocol/types';
import type { DhtReading, DhtType, RfPulses } from '../protocol/types';
import { RawPulseCodec } from '../codec/raw_codec';
import type { RfCodec, RfDecoded, RfValues } from '../codec/types';
import { SerialLink } from '../transport/serial_link';
import type { ByteLink, LinkFactory } from '../transport/link_types';
import type { SendOptions } from '../command/command_types';
import { settles_within } from '../util/sleep';
import { CallbackRegistry } from './callback_registry';
import { LivenessSupervisor } from './supervisor';
import type { DhtCallbacks, PinValueCallbacks } from './supervisor';

const log = create_logger('client');

/** Registers an RF callback for every protocol. */
export const ALL_PROTOCOLS = '*';

export type HomeduinoPhase =
  | 'disconnected'
  | 'connecting'
  | 'awaiting_ready'
  | 'ready'
  | 'disconnecting';

/** Collaborators; both default to the real thing. */
export interface HomeduinoDeps {
  codec?: RfCodec;
  link_factory?: LinkFactory;
}

export interface ConnectOptions {
  /** Overrides the configured ping interval for this session; 0 disables the supervisor. */
  ping_interval_ms?: number;
}

export type RfReceiveCallback = (decoded: RfDecoded) => void;
export type PinValueCallback = (pin: number, value: number) => void;
export type DhtReadCallback = (pin: number, reading: DhtReading) => void;

export class Homeduino extends EventEmitter {
  readonly options: ResolvedHomeduinoOptions;

  private readonly codec: RfCodec;
  private readonly link_factory: LinkFactory;
  private link: ByteLink | null = null;
  private phase: HomeduinoPhase = 'disconnected';
  private last_message_received_at = 0;
  private ready_waiters: Array<(ready: boolean) => void> = [];
  /** Receiver and pin-mode restore after the device rebooted behind an open link. */
  private restoring: Promise<void> | null = null;

  private readonly framer = new LineFramer();
  private readonly router: LineRouter;
  private readonly correlator: CommandCorrelator;
  private readonly pacer: RfSendPacer;
  private readonly supervisor: LivenessSupervisor;

  // Channels. Pin modes of registered inputs are replayed on every connect.
  private readonly rf_callbacks = new CallbackRegistry<string, [decoded: RfDecoded]>('rf');
  private readonly digital_callbacks: PinValueCallbacks = new CallbackRegistry<number, [number, number]>('digital');
  private readonly analog_callbacks: PinValueCallbacks = new CallbackRegistry<number, [number, number]>('analog');
  private readonly dht_callbacks: DhtCallbacks = new CallbackRegistry<number, [number, DhtReading]>('dht');
  private readonly dht_types = new Map<number, DhtType>();
  private readonly pin_modes = new Map<number, PinMode>();
  /** In-flight operation count per pin. */
  private readonly busy_pins = new Map<number, number>();

  /** @throws HomeduinoConfigError for invalid options. */
  constructor(options: HomeduinoOptions, deps: HomeduinoDeps = {}) {
    super();
    this.options = parse_options(options);
    this.codec = deps.codec ?? new RawPulseCodec();
    this.link_factory = deps.link_factory ?? (() => new SerialLink());

    this.correlator = new CommandCorrelator(
      {
        is_connected: () => this.is_connected(),
        is_ready: () => this.is_ready(),
        write_line: (command) => this.write_line(command)
      },
      {
        response_timeout_ms: this.options.response_timeout_ms,
        busy_timeout_ms: this.options.busy_timeout_ms
      }
    );

    this.router = new LineRouter({
      on_ready: () => this.handle_ready(),
      on_rf_receive: (pulses) => this.handle_rf_receive(pulses),
      on_rf_receive_invalid: (line, reason) => log.warn(`dropping malformed "${line}": ${reason}`),
      on_key_press: (code) => {
        log.debug(`key press ${code}`);
        this.emit('key_press', code);
      },
      is_awaiting_response: () => this.correlator.is_awaiting_response(),
      on_response: (line) => this.correlator.on_response_line(line),
      on_unhandled: (line) => log.debug(`unhandled line "${line}"`)
    });

    this.pacer = new RfSendPacer(this.options.rf_send_interval_ms);

    this.supervisor = new LivenessSupervisor(
      {
        is_connected: () => this.is_connected(),
        is_connecting: () => this.is_connecting(),
        reconnect_link: () => this.reconnect_link(),
        ping: () => this.ping(),
        get_last_message_received_at: () => this.last_message_received_at,
        digital_read: (pin) => this.digital_read(pin),
        analog_read: (pin) => this.analog_read(pin),
        dht_read: (pin, dht_type) => this.dht_read(pin, dht_type),
        is_pin_busy: (pin) => this.is_pin_busy(pin)
      },
      {
        digital: this.digital_callbacks,
        analog: this.analog_callbacks,
        dht: this.dht_callbacks,
        dht_types: this.dht_types
      },
      {
        poll_interval_ms: this.options.poll_interval_ms,
        idle_interval_ms: this.options.idle_interval_ms,
        dht_read_interval_ms: this.options.dht_read_interval_ms,
        max_ping_failures: this.options.max_ping_failures,
        stop_timeout_ms: this.options.supervisor_stop_timeout_ms
      }
    );
  }

  // -----------------------------------------------------------------------
  // State
  // -----------------------------------------------------------------------

  get_phase(): HomeduinoPhase {
    return this.phase;
  }

  is_connected(): boolean {
    return this.link !== null && this.link.is_connected();
  }

  /** A link is being opened or is waiting for the ready handshake. */
  is_connecting(): boolean {
    const phase = this.get_phase();
    return phase === 'connecting' || phase === 'awaiting_ready';
  }

  is_ready(): boolean {
    return this.is_connected() && this.phase === 'ready';
  }

  is_supervising(): boolean {
    return this.supervisor.is_running();
  }

  is_pin_busy(pin: number): boolean {
    return (this.busy_pins.get(pin) ?? 0) > 0;
  }

  /** Command currently awaiting its response, or null. */
  get_pending_command(): string | null {
    return this.correlator.get_pending()?.command ?? null;
  }

  /** Date.now() of the last line received, 0 before the first. */
  get_last_message_received_at(): number {
    return this.last_message_received_at;
  }

  list_protocols(): string[] {
    return this.codec.list_protocols();
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  /**
   * Open the link, complete the ready handshake and enable the receiver.
   *
   * @returns false if a link is already attached or the port cannot be opened.
   * @throws HomeduinoResponseTimeoutError if the device never becomes ready.
   * @throws HomeduinoCommandError if the receiver cannot be enabled.
   */
  async connect(connect_options: ConnectOptions = {}): Promise<boolean> {
    if (this.link) {
      log.warn('connect() while already connected');
      return false;
    }

    const opened = await this.open_session();
    if (!opened) return false;

    const ping_interval_ms = connect_options.ping_interval_ms ?? this.options.ping_interval_ms;
    if (ping_interval_ms > 0) {
      this.supervisor.start(ping_interval_ms);
    }
    return true;
  }

  /**
   * Stop the supervisor, abort the pending request and close the link.
   * Safe to call when already disconnected.
   *
   * @throws HomeduinoResponseTimeoutError if the port does not close within
   *   `ready_timeout_ms`.
   */
  async disconnect(): Promise<void> {
    await this.supervisor.stop();
    await this.close_session();
  }

  /** Disconnect (errors are logged) and connect again. */
  async reconnect(connect_options: ConnectOptions = {}): Promise<boolean> {
    try {
      await this.disconnect();
    } catch (err) {
      log.warn('disconnect during reconnect failed:', err instanceof Error ? err.message : err);
    }
    return this.connect(connect_options);
  }

  private async open_session(): Promise<boolean> {
    const link = this.link_factory();
    this.link = link;
    this.set_phase('connecting');
    this.framer.reset();

    link.on('data', (chunk) => {
      if (this.link === link) this.handle_data(chunk);
    });
    link.on('error', (err) => {
      log.error('link error:', err.message);
    });
    link.on('close', () => {
      if (this.link === link) this.handle_link_lost(link);
    });

    try {
      await link.connect({
        path: this.options.serial_port,
        baud_rate: this.options.baud_rate,
        data_bits: 8,
        parity: 'none',
        stop_bits: 1
      });
    } catch (err) {
      log.error(`cannot open ${this.options.serial_port}:`, err instanceof Error ? err.message : err);
      link.removeAllListeners();
      if (this.link === link) {
        this.link = null;
        this.set_phase('disconnected');
      }
      return false;
    }

    log.info(`opened ${this.options.serial_port} at ${this.options.baud_rate} baud`);
    this.last_message_received_at = Date.now();
    // 'ready' may already have arrived with the first bytes.
    if (this.get_phase() === 'connecting') {
      this.set_phase('awaiting_ready');
    }

    try {
      await this.await_ready();
      await this.enable_receiver();
      await this.replay_pin_modes();
    } catch (err) {
      await this.close_session().catch((close_err: unknown) => {
        log.warn('closing after failed handshake:', close_err instanceof Error ? close_err.message : close_err);
      });
      throw err;
    }

    log.info('connected');
    this.emit('connected');
    return true;
  }

  private async close_session(): Promise<void> {
    const link = this.link;
    if (!link) {
      this.set_phase('disconnected');
      return;
    }

    this.set_phase('disconnecting');
    this.link = null;
    this.correlator.abort_pending(new HomeduinoDisconnectedError('Disconnected while awaiting a response'));
    this.resolve_ready_waiters(false);

    const timeout_ms = this.options.ready_timeout_ms;
    let closed = false;
    try {
      closed = await settles_within(link.disconnect(), timeout_ms);
    } finally {
      link.removeAllListeners();
      this.framer.reset();
      this.set_phase('disconnected');
      log.info('disconnected');
      this.emit('disconnected');
    }

    if (!closed) {
      throw new HomeduinoResponseTimeoutError('disconnect', timeout_ms);
    }
  }

  /** Reconnect path of the supervisor; never stops the supervisor itself. */
  private async reconnect_link(): Promise<boolean> {
    try {
      await this.close_session();
      return await this.open_session();
    } catch (err) {
      log.error('reconnect failed:', err instanceof Error ? err.message : err);
      return false;
    }
  }

  private handle_link_lost(link: ByteLink): void {
    log.warn('link closed unexpectedly');
    link.removeAllListeners();
    this.link = null;
    this.framer.reset();
    this.correlator.abort_pending(new HomeduinoDisconnectedError('Link closed'));
    this.resolve_ready_waiters(false);
    this.set_phase('disconnected');
    this.emit('disconnected');
  }

  // -----------------------------------------------------------------------
  // Handshake
  // -----------------------------------------------------------------------

  private async await_ready(): Promise<void> {
    if (this.is_ready()) return;

    const timeout_ms = this.options.ready_timeout_ms;
    if (await this.wait_for_ready(timeout_ms)) return;

    // Boards without auto-reset never print "ready" on open; probe instead.
    log.info(`no "ready" within ${timeout_ms} ms, probing with ping`);
    const echoed = await this.ping_device({ require_ready: false });
    if (!echoed) {
      throw new HomeduinoResponseTimeoutError('ready handshake', timeout_ms);
    }
    this.mark_ready();
  }

  private wait_for_ready(timeout_ms: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter = (ready: boolean): void => {
        clearTimeout(timer);
        resolve(ready);
      };
      const timer = setTimeout(() => {
        this.ready_waiters = this.ready_waiters.filter((w) => w !== waiter);
        resolve(false);
      }, timeout_ms);
      this.ready_waiters.push(waiter);
    });
  }

  private resolve_ready_waiters(ready: boolean): void {
    const waiters = this.ready_waiters;
    this.ready_waiters = [];
    for (const waiter of waiters) waiter(ready);
  }

  private handle_ready(): void {
    const phase = this.get_phase();
    if (phase === 'connecting' || phase === 'awaiting_ready') {
      this.mark_ready();
    } else if (phase === 'ready') {
      log.warn('device announced ready again, restoring receiver and pin modes');
      this.emit('ready');
      this.restore_after_reset();
    } else {
      log.debug(`ignoring "ready" in phase ${phase}`);
    }
  }

  /**
   * A rebooted sketch has forgotten its receiver interrupt and pin modes.
   * Send them again; if that fails, drop the link so the supervisor
   * reconnects from scratch.
   */
  private restore_after_reset(): void {
    if (this.restoring) return;
    const link = this.link;

    this.restoring = this.enable_receiver()
      .then(() => this.replay_pin_modes())
      .then(() => log.info('receiver and pin modes restored'))
      .catch(async (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        if (this.link !== link) {
          log.debug('restore interrupted by disconnect:', message);
          return;
        }
        log.error('restore after device reset failed, closing link:', message);
        await this.close_session().catch((close_err: unknown) => {
          log.warn('closing after failed restore:', close_err instanceof Error ? close_err.message : close_err);
        });
      })
      .finally(() => {
        this.restoring = null;
      });
  }

  private mark_ready(): void {
    this.set_phase('ready');
    log.debug('device ready');
    this.emit('ready');
    this.resolve_ready_waiters(true);
  }

  private async enable_receiver(): Promise<void> {
    const pin = this.options.rf_receive_pin;
    if (pin === null) return;

    const command = build_rf_receive(pin - RECEIVE_PIN_INTERRUPT_OFFSET);
    const response = await this.correlator.send(command);
    if (!is_ack(response)) {
      throw new HomeduinoCommandError(command, response);
    }
  }

  private async replay_pin_modes(): Promise<void> {
    for (const [pin, mode] of this.pin_modes) {
      await this.apply_pin_mode(pin, mode);
    }
  }

  private async apply_pin_mode(pin: number, mode: PinMode): Promise<void> {
    if (!(await this.pin_mode(pin, mode))) {
      log.warn(`pin ${pin}: mode ${PinMode[mode]} not acknowledged`);
    }
  }

  // -----------------------------------------------------------------------
  // Receive path
  // -----------------------------------------------------------------------

  private handle_data(chunk: Buffer): void {
    for (const line of this.framer.feed(chunk)) {
      this.last_message_received_at = Date.now();
      log.debug(`<- ${line}`);
      this.router.route(line);
    }
  }

  private handle_rf_receive(pulses: RfPulses): void {
    let matches: RfDecoded[];
    try {
      matches = this.codec.decode(pulses.pulse_lengths, pulses.pulse_sequence);
    } catch (err) {
      log.error('codec failed to decode pulses:', err instanceof Error ? err.message : err);
      return;
    }

    if (matches.length === 0) {
      log.debug(`no protocol matches ${pulses.pulse_sequence}`);
      return;
    }
    for (const decoded of matches) {
      this.rf_callbacks.dispatch(decoded.protocol, decoded);
      this.rf_callbacks.dispatch(ALL_PROTOCOLS, decoded);
    }
  }

  private write_line(command: string): void {
    const link = this.link;
    if (!link) {
      throw new HomeduinoDisconnectedError();
    }
    log.debug(`-> ${command}`);
    link.write(Buffer.from(`${command}${COMMAND_TERMINATOR}`, 'utf-8'));
  }

  // -----------------------------------------------------------------------
  // Callback registration
  // -----------------------------------------------------------------------

  /** Receive decoded RF matches of `protocol`, or of every protocol. */
  add_rf_receive_callback(callback: RfReceiveCallback, protocol: string = ALL_PROTOCOLS): void {
    this.rf_callbacks.register(protocol, callback);
  }

  /**
   * Poll a digital input and receive its value on every change. Configures
   * the pin as an input (with pull-up if asked) now when connected, and on
   * every later connect.
   */
  async add_digital_read_callback(pin: number, callback: PinValueCallback, pull_up = false): Promise<void> {
    const mode = pull_up ? PinMode.InputPullup : PinMode.Input;
    this.pin_modes.set(pin, mode);
    this.digital_callbacks.register(pin, callback);
    if (this.is_ready()) {
      await this.apply_pin_mode(pin, mode);
    }
  }

  /** Poll an analog input and receive its value on every change. */
  add_analog_read_callback(pin: number, callback: PinValueCallback): void {
    this.analog_callbacks.register(pin, callback);
  }

  /** Read a DHT sensor every `dht_read_interval_ms` and receive changed readings. */
  async add_dht_read_callback(pin: number, dht_type: DhtType, callback: DhtReadCallback): Promise<void> {
    this.dht_types.set(pin, dht_type);
    this.pin_modes.set(pin, PinMode.Input);
    this.dht_callbacks.register(pin, callback);
    if (this.is_ready()) {
      await this.apply_pin_mode(pin, PinMode.Input);
    }
  }

  // -----------------------------------------------------------------------
  // Device operations
  // -----------------------------------------------------------------------

  /** Send a raw command and return the trimmed response. */
  send(command: string): Promise<string> {
    return this.correlator.send(command);
  }

  /** True iff the device echoed the ping verbatim. */
  ping(): Promise<boolean> {
    return this.ping_device({});
  }

  private async ping_device(send_options: SendOptions): Promise<boolean> {
    const command = build_ping(String(Date.now()));
    const response = await this.correlator.send(command, send_options);
    if (response !== command) {
      log.warn(`ping mismatch: sent "${command}", got "${response}"`);
      return false;
    }
    return true;
  }

  /**
   * Transmit `values` with the codec's `protocol`.
   *
   * @returns true iff the device acknowledged; false without a send pin.
   */
  async rf_send(protocol: string, values: RfValues, repeats = this.options.rf_send_repeats): Promise<boolean> {
    if (this.options.rf_send_pin === null) {
      log.warn(`cannot send ${protocol}: no RF send pin configured`);
      return false;
    }
    const pulse_lengths = this.codec.pulse_lengths(protocol);
    const pulse_sequence = this.codec.encode(protocol, values);
    return this.rf_send_raw(pulse_lengths, pulse_sequence, repeats);
  }

  /** Transmit pulse timings as-is. */
  async rf_send_raw(
    pulse_lengths: readonly number[],
    pulse_sequence: string,
    repeats = this.options.rf_send_repeats
  ): Promise<boolean> {
    const pin = this.options.rf_send_pin;
    if (pin === null) {
      log.warn('cannot send: no RF send pin configured');
      return false;
    }
    const command = build_rf_send(pin, repeats, pulse_lengths, pulse_sequence);
    return this.pacer.pace(() => this.send_expecting_ack(command));
  }

  pin_mode(pin: number, mode: PinMode): Promise<boolean> {
    const command = build_pin_mode(pin, mode);
    return this.with_busy_pin(pin, () => this.send_expecting_ack(command));
  }

  digital_write(pin: number, value: boolean | 0 | 1): Promise<boolean> {
    const command = build_digital_write(pin, value);
    return this.with_busy_pin(pin, () => this.send_expecting_ack(command));
  }

  analog_write(pin: number, value: number): Promise<boolean> {
    const command = build_analog_write(pin, value);
    return this.with_busy_pin(pin, () => this.send_expecting_ack(command));
  }

  /** @throws HomeduinoCommandError unless the device answers `ACK <value>`. */
  digital_read(pin: number): Promise<number> {
    return this.read_int(pin, build_digital_read(pin));
  }

  /** @throws HomeduinoCommandError unless the device answers `ACK <value>`. */
  analog_read(pin: number): Promise<number> {
    return this.read_int(pin, build_analog_read(pin));
  }

  /** @returns null when the sensor reports an error or the reading is unparsable. */
  dht_read(pin: number, dht_type: DhtType): Promise<DhtReading | null> {
    const command = build_dht_read(dht_type, pin);
    return this.with_busy_pin(pin, async () => {
      const response = await this.correlator.send(command);
      const reading = parse_dht_response(response);
      if (!reading) {
        log.warn(`"${command}" failed: ${response}`);
      }
      return reading;
    });
  }

  private read_int(pin: number, command: string): Promise<number> {
    return this.with_busy_pin(pin, async () => {
      const response = await this.correlator.send(command);
      const value = parse_int_response(response);
      if (value === null) {
        throw new HomeduinoCommandError(command, response);
      }
      return value;
    });
  }

  private async send_expecting_ack(command: string): Promise<boolean> {
    const response = await this.correlator.send(command);
    if (is_ack(response)) return true;
    if (is_error(response)) {
      log.warn(`"${command}" rejected: ${response}`);
    } else {
      log.warn(`"${command}" got unexpected response "${response}"`);
    }
    return false;
  }

  private async with_busy_pin<T>(pin: number, task: () => Promise<T>): Promise<T> {
    this.busy_pins.set(pin, (this.busy_pins.get(pin) ?? 0) + 1);
    try {
      return await task();
    } finally {
      const remaining = (this.busy_pins.get(pin) ?? 1) - 1;
      if (remaining > 0) {
        this.busy_pins.set(pin, remaining);
      } else {
        this.busy_pins.delete(pin);
      }
    }
  }

  private set_phase(phase: HomeduinoPhase): void {
    if (this.phase !== phase) {
      log.debug(`phase ${this.phase} -> ${phase}`);
      this.phase = phase;
    }
  }
}
