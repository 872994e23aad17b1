/**
 * Client options and their validation.
 *
 * Options are plain data checked by a zod schema; defaults fill everything
 * except the serial port. Collaborators that are objects (codec, link
 * factory) are passed to the client separately.
 *
 * @module config
 */

import { z } from 'zod';
import {
  BAUD_RATES,
  DEFAULT_BAUD_RATE,
  DEFAULT_RECEIVE_PIN,
  DEFAULT_SEND_PIN,
  DEFAULT_RF_SEND_REPEATS,
  DEFAULT_PING_INTERVAL_MS,
  DEFAULT_RESPONSE_TIMEOUT_MS,
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_READY_TIMEOUT_MS,
  DEFAULT_RF_SEND_INTERVAL_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_IDLE_INTERVAL_MS,
  DEFAULT_DHT_READ_INTERVAL_MS,
  DEFAULT_MAX_PING_FAILURES,
  DEFAULT_SUPERVISOR_STOP_TIMEOUT_MS,
  RECEIVE_PIN_INTERRUPT_OFFSET
} from './protocol/constants';
import { HomeduinoConfigError } from './errors';

const duration_ms = z.number().int().nonnegative();
const positive_ms = z.number().int().positive();
const pin = z.number().int().nonnegative();

export const HomeduinoOptionsSchema = z.object({
  serial_port: z.string().min(1, 'serial_port is required'),
  baud_rate: z
    .number()
    .int()
    .refine((rate) => BAUD_RATES.some((supported) => supported === rate), {
      message: `baud_rate must be one of ${BAUD_RATES.join(', ')}`
    })
    .default(DEFAULT_BAUD_RATE),
  /** Pin of the 433 MHz receiver; null leaves the receiver disabled. */
  rf_receive_pin: pin
    .min(RECEIVE_PIN_INTERRUPT_OFFSET, `rf_receive_pin must be ${RECEIVE_PIN_INTERRUPT_OFFSET} or higher`)
    .nullable()
    .default(DEFAULT_RECEIVE_PIN),
  /** Pin of the 433 MHz transmitter; null disables rf_send(). */
  rf_send_pin: pin.nullable().default(DEFAULT_SEND_PIN),
  rf_send_repeats: z.number().int().min(1).default(DEFAULT_RF_SEND_REPEATS),
  /** 0 disables the liveness supervisor. */
  ping_interval_ms: duration_ms.default(DEFAULT_PING_INTERVAL_MS),
  response_timeout_ms: positive_ms.default(DEFAULT_RESPONSE_TIMEOUT_MS),
  busy_timeout_ms: positive_ms.default(DEFAULT_BUSY_TIMEOUT_MS),
  ready_timeout_ms: positive_ms.default(DEFAULT_READY_TIMEOUT_MS),
  rf_send_interval_ms: duration_ms.default(DEFAULT_RF_SEND_INTERVAL_MS),
  poll_interval_ms: positive_ms.default(DEFAULT_POLL_INTERVAL_MS),
  idle_interval_ms: positive_ms.default(DEFAULT_IDLE_INTERVAL_MS),
  dht_read_interval_ms: positive_ms.default(DEFAULT_DHT_READ_INTERVAL_MS),
  max_ping_failures: z.number().int().nonnegative().default(DEFAULT_MAX_PING_FAILURES),
  supervisor_stop_timeout_ms: positive_ms.default(DEFAULT_SUPERVISOR_STOP_TIMEOUT_MS)
});

/** Options as callers write them; everything but `serial_port` is optional. */
export type HomeduinoOptions = z.input<typeof HomeduinoOptionsSchema>;

/** Options after defaults have been applied. */
export type ResolvedHomeduinoOptions = z.output<typeof HomeduinoOptionsSchema>;

/**
 * Validate options and apply defaults.
 *
 * @throws HomeduinoConfigError listing every invalid field.
 */
export function parse_options(options: HomeduinoOptions): ResolvedHomeduinoOptions {
  const result = HomeduinoOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new HomeduinoConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`)
    );
  }
  return result.data;
}
