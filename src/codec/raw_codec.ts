/**
 * Decode-only codec that reports every pulse train as-is.
 *
 * Used when no protocol codec is supplied: each received train becomes one
 * `raw` match carrying the non-zero pulse lengths and the sequence, which is
 * enough to capture signals for later analysis. Encoding is refused; use
 * `Homeduino.rf_send_raw()` to replay captured timings.
 *
 * @module codec/raw_codec
 */

import { HomeduinoError } from '../errors';
import type { RfCodec, RfDecoded, RfValues } from './types';

export const RAW_PROTOCOL = 'raw';

const collator = new Intl.Collator('en', { numeric: true, sensitivity: 'base' });

/** Sort protocol names so that "switch2" precedes "switch10". */
export function sort_protocols_naturally(names: readonly string[]): string[] {
  return [...names].sort((a, b) => collator.compare(a, b));
}

export class RawPulseCodec implements RfCodec {
  decode(pulse_lengths: readonly number[], pulse_sequence: string): RfDecoded[] {
    return [
      {
        protocol: RAW_PROTOCOL,
        values: {
          pulse_lengths: pulse_lengths.filter((l) => l > 0).join(' '),
          pulse_sequence
        }
      }
    ];
  }

  encode(protocol: string, _values: RfValues): string {
    throw new HomeduinoError(`The raw codec cannot encode "${protocol}"; use rf_send_raw()`);
  }

  pulse_lengths(protocol: string): number[] {
    throw new HomeduinoError(`The raw codec has no pulse lengths for "${protocol}"`);
  }

  list_protocols(): string[] {
    return sort_protocols_naturally([RAW_PROTOCOL]);
  }
}
