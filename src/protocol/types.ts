/**
 * Protocol types shared by the framer, router, command builder and client.
 *
 * @module protocol/types
 */

// ---------------------------------------------------------------------------
// Pins
// ---------------------------------------------------------------------------

/** Arduino pin modes as the `PM` command encodes them. */
export enum PinMode {
  Input = 0,
  Output = 1,
  InputPullup = 2
}

/** DHT sensor families the sketch can read. */
export enum DhtType {
  Dht11 = 11,
  Dht21 = 21,
  Dht22 = 22
}

/** A decoded DHT sensor reading. */
export interface DhtReading {
  /** Degrees Celsius. */
  temperature: number;
  /** Relative humidity in percent. */
  humidity: number;
}

// ---------------------------------------------------------------------------
// Routed lines
// ---------------------------------------------------------------------------

/** Pulse timings carried by an `RF receive` line. */
export interface RfPulses {
  /** Eight pulse lengths in microseconds; unused slots are 0. */
  pulse_lengths: number[];
  /** Indices into `pulse_lengths`, one digit per pulse. */
  pulse_sequence: string;
}

/** Classification of one framed line, see `classify_line()`. */
export type RoutedLine =
  | { kind: 'ready' }
  | { kind: 'rf_receive'; pulses: RfPulses }
  | { kind: 'rf_receive_invalid'; line: string; reason: string }
  | { kind: 'key_press'; code: string }
  | { kind: 'other'; line: string };
