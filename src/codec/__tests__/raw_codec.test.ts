import { describe, it, expect } from 'vitest';
import { RawPulseCodec, RAW_PROTOCOL, sort_protocols_naturally } from '../raw_codec';
import { HomeduinoError } from '../../errors';

describe('RawPulseCodec', () => {
  const codec = new RawPulseCodec();

  it('decodes any train into one raw match without the empty slots', () => {
    expect(codec.decode([300, 600, 1200, 2400, 0, 0, 0, 0], '0101010101')).toEqual([
      {
        protocol: RAW_PROTOCOL,
        values: { pulse_lengths: '300 600 1200 2400', pulse_sequence: '0101010101' }
      }
    ]);
  });

  it('refuses to encode', () => {
    expect(() => codec.encode('switch1', { id: 1 })).toThrow(HomeduinoError);
    expect(() => codec.pulse_lengths('switch1')).toThrow(/no pulse lengths for "switch1"/);
  });

  it('lists only the raw protocol', () => {
    expect(codec.list_protocols()).toEqual(['raw']);
  });
});

describe('sort_protocols_naturally', () => {
  it('orders embedded numbers numerically', () => {
    expect(sort_protocols_naturally(['switch10', 'switch2', 'dimmer1', 'switch1'])).toEqual([
      'dimmer1',
      'switch1',
      'switch2',
      'switch10'
    ]);
  });

  it('does not modify its input', () => {
    const names = ['b', 'a'];
    sort_protocols_naturally(names);
    expect(names).toEqual(['b', 'a']);
  });
});
