/**
 * RF codec collaborator.
 *
 * A codec maps a named RF protocol and its parameters to the pulse timings
 * the sketch transmits, and back. Protocol knowledge lives entirely in the
 * codec; the client only moves pulse lengths and sequences.
 *
 * @module codec/types
 */

/** Protocol parameters, e.g. `{ id: 98765, unit: 4, all: false, state: true }`. */
export type RfValues = Record<string, string | number | boolean>;

/** One protocol match for a received pulse train. */
export interface RfDecoded {
  protocol: string;
  values: RfValues;
}

export interface RfCodec {
  /** All protocols whose pulse pattern matches, possibly none. */
  decode(pulse_lengths: readonly number[], pulse_sequence: string): RfDecoded[];
  /** Pulse sequence for `values` under `protocol`. */
  encode(protocol: string, values: RfValues): string;
  /** Pulse lengths (at most eight) used by `protocol`. */
  pulse_lengths(protocol: string): number[];
  /** Names of all supported protocols, naturally sorted. */
  list_protocols(): string[];
}
