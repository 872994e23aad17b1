import { describe, it, expect } from 'vitest';
import { parse_options } from '../config';
import { HomeduinoConfigError } from '../errors';

describe('parse_options', () => {
  it('fills defaults', () => {
    expect(parse_options({ serial_port: '/dev/ttyUSB0' })).toEqual({
      serial_port: '/dev/ttyUSB0',
      baud_rate: 115200,
      rf_receive_pin: 2,
      rf_send_pin: 4,
      rf_send_repeats: 3,
      ping_interval_ms: 10000,
      response_timeout_ms: 2000,
      busy_timeout_ms: 2000,
      ready_timeout_ms: 5000,
      rf_send_interval_ms: 500,
      poll_interval_ms: 100,
      idle_interval_ms: 1000,
      dht_read_interval_ms: 30000,
      max_ping_failures: 3,
      supervisor_stop_timeout_ms: 5000
    });
  });

  it('accepts null to disable the RF pins', () => {
    const options = parse_options({ serial_port: 'COM3', rf_receive_pin: null, rf_send_pin: null });
    expect(options.rf_receive_pin).toBeNull();
    expect(options.rf_send_pin).toBeNull();
  });

  it('rejects an unsupported baud rate', () => {
    expect(() => parse_options({ serial_port: 'COM3', baud_rate: 12345 })).toThrow(HomeduinoConfigError);
  });

  it('lists every invalid field', () => {
    try {
      parse_options({ serial_port: '', rf_receive_pin: 1, response_timeout_ms: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(HomeduinoConfigError);
      if (err instanceof HomeduinoConfigError) {
        expect(err.issues).toEqual([
          'serial_port: serial_port is required',
          'rf_receive_pin: rf_receive_pin must be 2 or higher',
          'response_timeout_ms: Number must be greater than 0'
        ]);
      }
    }
  });

  it('allows ping_interval_ms 0', () => {
    expect(parse_options({ serial_port: 'COM3', ping_interval_ms: 0 }).ping_interval_ms).toBe(0);
  });
});
