/**
 * Builders for host-to-device command lines.
 *
 * Each builder returns the command text without its terminator; the
 * correlator appends it when writing. Arguments are validated here so a bad
 * pin number fails before it takes the send slot.
 *
 * @module protocol/command_builder
 */

import {
  CMD_RF_RECEIVE,
  CMD_RF_SEND,
  CMD_PIN_MODE,
  CMD_DIGITAL_WRITE,
  CMD_ANALOG_WRITE,
  CMD_DIGITAL_READ,
  CMD_ANALOG_READ,
  CMD_DHT_READ,
  CMD_PING,
  PULSE_LENGTH_SLOTS
} from './constants';
import { PinMode, DhtType } from './types';

function assert_uint(name: string, value: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${name} must be an integer between 0 and ${max}, got ${value}`);
  }
}

/** `RF receive <interrupt>`: enable the receiver on an interrupt. */
export function build_rf_receive(interrupt: number): string {
  assert_uint('interrupt', interrupt);
  return `${CMD_RF_RECEIVE} ${interrupt}`;
}

/**
 * Pad pulse lengths with zeros to the eight slots the sketch expects.
 *
 * @throws RangeError if more than eight lengths are given.
 */
export function pad_pulse_lengths(pulse_lengths: readonly number[]): number[] {
  if (pulse_lengths.length > PULSE_LENGTH_SLOTS) {
    throw new RangeError(
      `at most ${PULSE_LENGTH_SLOTS} pulse lengths are supported, got ${pulse_lengths.length}`
    );
  }
  pulse_lengths.forEach((length, i) => assert_uint(`pulse_lengths[${i}]`, length));

  const padded = [...pulse_lengths];
  while (padded.length < PULSE_LENGTH_SLOTS) {
    padded.push(0);
  }
  return padded;
}

/** `RF send <pin> <repeats> <l0..l7> <sequence>`. */
export function build_rf_send(
  pin: number,
  repeats: number,
  pulse_lengths: readonly number[],
  pulse_sequence: string
): string {
  assert_uint('pin', pin);
  assert_uint('repeats', repeats);
  if (!/^\d+$/.test(pulse_sequence)) {
    throw new RangeError(`pulse sequence must be a non-empty string of digits`);
  }
  const lengths = pad_pulse_lengths(pulse_lengths).join(' ');
  return `${CMD_RF_SEND} ${pin} ${repeats} ${lengths} ${pulse_sequence}`;
}

/** `PM <pin> <mode>`. */
export function build_pin_mode(pin: number, mode: PinMode): string {
  assert_uint('pin', pin);
  return `${CMD_PIN_MODE} ${pin} ${mode}`;
}

/** `DW <pin> <0|1>`. */
export function build_digital_write(pin: number, value: boolean | 0 | 1): string {
  assert_uint('pin', pin);
  return `${CMD_DIGITAL_WRITE} ${pin} ${value ? 1 : 0}`;
}

/** `AW <pin> <0..255>` (PWM duty cycle). */
export function build_analog_write(pin: number, value: number): string {
  assert_uint('pin', pin);
  assert_uint('value', value, 255);
  return `${CMD_ANALOG_WRITE} ${pin} ${value}`;
}

/** `DR <pin>`. */
export function build_digital_read(pin: number): string {
  assert_uint('pin', pin);
  return `${CMD_DIGITAL_READ} ${pin}`;
}

/** `AR <pin>`. */
export function build_analog_read(pin: number): string {
  assert_uint('pin', pin);
  return `${CMD_ANALOG_READ} ${pin}`;
}

/** `DHT <type> <pin>`. */
export function build_dht_read(dht_type: DhtType, pin: number): string {
  assert_uint('pin', pin);
  return `${CMD_DHT_READ} ${dht_type} ${pin}`;
}

/** `PING <token>`; the sketch echoes the whole line back. */
export function build_ping(token: string): string {
  return `${CMD_PING} ${token}`;
}
