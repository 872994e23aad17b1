/**
 * Tests for the Homeduino client against the in-process device simulator.
 *
 * Real timers with short timeouts; the simulator answers on the next
 * microtask.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Homeduino } from '../homeduino';
import type { HomeduinoOptions } from '../../config';
import type { RfCodec, RfDecoded } from '../../codec/types';
import { PinMode, DhtType } from '../../protocol/types';
import {
  HomeduinoCommandError,
  HomeduinoConfigError,
  HomeduinoDisconnectedError,
  HomeduinoNotReadyError,
  HomeduinoResponseTimeoutError
} from '../../errors';
import { default_responder, fake_link_factory } from '../../../test/fixtures/fake_link';
import type { FakeLink, FakeLinkOptions } from '../../../test/fixtures/fake_link';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FAST: HomeduinoOptions = {
  serial_port: 'COM_TEST',
  ping_interval_ms: 0,
  response_timeout_ms: 50,
  busy_timeout_ms: 200,
  ready_timeout_ms: 50,
  rf_send_interval_ms: 0,
  poll_interval_ms: 10,
  idle_interval_ms: 10,
  supervisor_stop_timeout_ms: 500
};

const clients: Homeduino[] = [];

function make_client(
  fake: FakeLinkOptions = {},
  options: Partial<HomeduinoOptions> = {},
  codec?: RfCodec
): { client: Homeduino; links: FakeLink[] } {
  const { factory, links } = fake_link_factory(fake);
  const client = new Homeduino({ ...FAST, ...options }, { link_factory: factory, codec });
  clients.push(client);
  return { client, links };
}

async function connected_client(
  fake: FakeLinkOptions = {},
  options: Partial<HomeduinoOptions> = {},
  codec?: RfCodec
): Promise<{ client: Homeduino; link: FakeLink; links: FakeLink[] }> {
  const { client, links } = make_client(fake, options, codec);
  expect(await client.connect()).toBe(true);
  return { client, link: links[0], links };
}

function make_codec() {
  const decode = vi.fn(
    (_lengths: readonly number[], _sequence: string): RfDecoded[] => [
      { protocol: 'switch1', values: { id: 98765, unit: 0, state: true } }
    ]
  );
  const encode = vi.fn(() => '0110');
  const pulse_lengths = vi.fn(() => [300, 900]);
  const codec: RfCodec = { decode, encode, pulse_lengths, list_protocols: () => ['switch1'] };
  return { codec, decode, encode, pulse_lengths };
}

afterEach(async () => {
  for (const client of clients.splice(0)) {
    await client.disconnect().catch(() => undefined);
  }
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe('Homeduino lifecycle', () => {
  it('rejects invalid options', () => {
    expect(() => new Homeduino({ serial_port: '' })).toThrow(HomeduinoConfigError);
  });

  it('connects, waits for ready and enables the receiver', async () => {
    const { client, links } = make_client();
    const events: string[] = [];
    client.on('ready', () => events.push('ready'));
    client.on('connected', () => events.push('connected'));

    expect(await client.connect()).toBe(true);

    const link = links[0];
    expect(link.open_options).toEqual({
      path: 'COM_TEST',
      baud_rate: 115200,
      data_bits: 8,
      parity: 'none',
      stop_bits: 1
    });
    expect(link.written).toEqual(['RF receive 0']);
    expect(client.get_phase()).toBe('ready');
    expect(client.is_ready()).toBe(true);
    expect(events).toEqual(['ready', 'connected']);
  });

  it('uses the receive pin minus two as the interrupt', async () => {
    const { link } = await connected_client({}, { rf_receive_pin: 3 });
    expect(link.written).toEqual(['RF receive 1']);
  });

  it('does not enable the receiver without a receive pin', async () => {
    const { link } = await connected_client({}, { rf_receive_pin: null });
    expect(link.written).toEqual([]);
  });

  it('returns false when the port cannot be opened', async () => {
    const { client } = make_client({ open_error: new Error('Access denied') });
    expect(await client.connect()).toBe(false);
    expect(client.get_phase()).toBe('disconnected');
    expect(client.is_connected()).toBe(false);
  });

  it('returns false when already connected', async () => {
    const { client, links } = await connected_client();
    expect(await client.connect()).toBe(false);
    expect(links).toHaveLength(1);
  });

  it('probes with a ping when the device never prints ready', async () => {
    const { client, link } = await connected_client({ send_ready: false });
    expect(link.written).toHaveLength(2);
    expect(link.written[0]).toMatch(/^PING \d+$/);
    expect(link.written[1]).toBe('RF receive 0');
    expect(client.is_ready()).toBe(true);
  });

  it('fails with a response timeout against a silent device and leaves nothing pending', async () => {
    const { client, links } = make_client({ send_ready: false, responder: () => null });

    await expect(client.connect()).rejects.toBeInstanceOf(HomeduinoResponseTimeoutError);

    expect(client.get_pending_command()).toBeNull();
    expect(client.get_phase()).toBe('disconnected');
    expect(links[0].disconnect_calls).toBe(1);
  });

  it('fails with a command error when the receiver is not acknowledged', async () => {
    const { client, links } = make_client({
      responder: (command) => (command.startsWith('RF receive') ? 'ERR no interrupt' : default_responder(command))
    });

    const err = await client.connect().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HomeduinoCommandError);
    if (err instanceof HomeduinoCommandError) {
      expect(err.command).toBe('RF receive 0');
      expect(err.response).toBe('ERR no interrupt');
    }
    expect(client.is_connected()).toBe(false);
    expect(links[0].disconnect_calls).toBe(1);
  });

  it('disconnect() stops the supervisor and closes the link', async () => {
    const { client, link } = await connected_client({}, { ping_interval_ms: 1000 });
    const disconnected = vi.fn();
    client.on('disconnected', disconnected);
    expect(client.is_supervising()).toBe(true);

    await client.disconnect();

    expect(client.is_supervising()).toBe(false);
    expect(client.get_phase()).toBe('disconnected');
    expect(link.disconnect_calls).toBe(1);
    expect(disconnected).toHaveBeenCalledTimes(1);
  });

  it('disconnect() is safe when already disconnected', async () => {
    const { client } = make_client();
    await expect(client.disconnect()).resolves.toBeUndefined();
  });

  it('disconnect() fails when the port does not close in time', async () => {
    const { client } = await connected_client({ close_hangs: true });
    await expect(client.disconnect()).rejects.toBeInstanceOf(HomeduinoResponseTimeoutError);
    expect(client.get_phase()).toBe('disconnected');
  });

  it('reconnect() opens a fresh link', async () => {
    const { client, links } = await connected_client();
    expect(await client.reconnect({ ping_interval_ms: 0 })).toBe(true);
    expect(links).toHaveLength(2);
    expect(links[0].disconnect_calls).toBe(1);
    expect(client.is_ready()).toBe(true);
  });

  it('rejects the pending request when the link drops', async () => {
    const { client, link } = await connected_client();
    link.responder = () => null;
    const disconnected = vi.fn();
    client.on('disconnected', disconnected);

    const read = client.digital_read(3);
    await Promise.resolve();
    link.drop();

    await expect(read).rejects.toBeInstanceOf(HomeduinoDisconnectedError);
    expect(client.get_phase()).toBe('disconnected');
    expect(disconnected).toHaveBeenCalledTimes(1);
    await expect(client.ping()).rejects.toBeInstanceOf(HomeduinoDisconnectedError);
  });

  it('lets the supervisor reconnect after the link drops', async () => {
    const { client, links } = await connected_client({}, { ping_interval_ms: 1000 });
    links[0].drop();

    await vi.waitFor(() => {
      expect(links).toHaveLength(2);
      expect(client.is_ready()).toBe(true);
    });
  });

  it('restores the receiver and pin modes when the device resets', async () => {
    const { client, link } = await connected_client();
    await client.add_digital_read_callback(5, () => undefined);
    link.written.splice(0);

    link.push_line('ready');

    await vi.waitFor(() => expect(link.written).toEqual(['RF receive 0', 'PM 5 0']));
    expect(client.get_phase()).toBe('ready');
    expect(link.disconnect_calls).toBe(0);
  });

  it('drops the link when the receiver cannot be restored after a reset', async () => {
    const { client, link } = await connected_client();
    link.responder = (command) =>
      command.startsWith('RF receive') ? 'ERR no interrupt' : default_responder(command);
    const disconnected = vi.fn();
    client.on('disconnected', disconnected);

    link.push_line('ready');

    await vi.waitFor(() => expect(disconnected).toHaveBeenCalledTimes(1));
    expect(client.get_phase()).toBe('disconnected');
    expect(link.disconnect_calls).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Receive path
// ---------------------------------------------------------------------------

describe('Homeduino receive path', () => {
  it('decodes RF receive lines and dispatches by protocol', async () => {
    const { codec, decode } = make_codec();
    const { client, link } = await connected_client({}, {}, codec);
    const switch1 = vi.fn();
    const switch2 = vi.fn();
    const all = vi.fn();
    client.add_rf_receive_callback(switch1, 'switch1');
    client.add_rf_receive_callback(switch2, 'switch2');
    client.add_rf_receive_callback(all);

    link.push_line('RF receive 300 600 1200 2400 0 0 0 0 0101010101');

    expect(decode).toHaveBeenCalledWith([300, 600, 1200, 2400, 0, 0, 0, 0], '0101010101');
    const decoded = { protocol: 'switch1', values: { id: 98765, unit: 0, state: true } };
    expect(switch1).toHaveBeenCalledWith(decoded);
    expect(all).toHaveBeenCalledWith(decoded);
    expect(switch2).not.toHaveBeenCalled();
  });

  it('reports raw pulses with the default codec', async () => {
    const { client, link } = await connected_client();
    const all = vi.fn();
    client.add_rf_receive_callback(all);

    link.push_line('RF receive 350 1050 0 0 0 0 0 0 01100110');

    expect(all).toHaveBeenCalledWith({
      protocol: 'raw',
      values: { pulse_lengths: '350 1050', pulse_sequence: '01100110' }
    });
  });

  it('emits key presses', async () => {
    const { client, link } = await connected_client();
    const key = vi.fn();
    client.on('key_press', key);
    link.push_line('KP 5');
    expect(key).toHaveBeenCalledWith('5');
  });

  it('records when the last line arrived', async () => {
    const { client, link } = await connected_client();
    const before = client.get_last_message_received_at();
    await new Promise((resolve) => setTimeout(resolve, 5));
    link.push_line('KP 1');
    expect(client.get_last_message_received_at()).toBeGreaterThan(before);
  });

  it('drops a reply that arrives after its request timed out', async () => {
    const { client, link } = await connected_client();
    link.responder = (command) => (command === 'DR 1' ? null : default_responder(command));

    await expect(client.send('DR 1')).rejects.toBeInstanceOf(HomeduinoResponseTimeoutError);
    link.push_line('ACK 1');

    expect(await client.send('DR 2')).toBe('ACK 0');
  });
});

// ---------------------------------------------------------------------------
// Device operations
// ---------------------------------------------------------------------------

describe('Homeduino device operations', () => {
  it('send() returns the trimmed response', async () => {
    const { client, link } = await connected_client();
    link.responder = () => '  ACK 42  ';
    expect(await client.send('AR 0')).toBe('ACK 42');
  });

  it('send() before connect fails with a disconnected error', async () => {
    const { client } = make_client();
    await expect(client.send('AR 0')).rejects.toBeInstanceOf(HomeduinoDisconnectedError);
  });

  it('ping() is true only for a verbatim echo', async () => {
    const { client, link } = await connected_client();
    expect(await client.ping()).toBe(true);
    link.responder = () => 'PING 0';
    expect(await client.ping()).toBe(false);
  });

  it('rf_send() transmits the codec timings', async () => {
    const { codec, encode } = make_codec();
    const { client, link } = await connected_client({}, {}, codec);

    expect(await client.rf_send('switch1', { id: 98765, unit: 0, state: true })).toBe(true);
    expect(encode).toHaveBeenCalledWith('switch1', { id: 98765, unit: 0, state: true });
    expect(link.written[link.written.length - 1]).toBe('RF send 4 3 300 900 0 0 0 0 0 0 0110');
  });

  it('rf_send() honours the repeat count', async () => {
    const { codec } = make_codec();
    const { client, link } = await connected_client({}, { rf_send_pin: 10 }, codec);
    await client.rf_send('switch1', {}, 7);
    expect(link.written[link.written.length - 1]).toBe('RF send 10 7 300 900 0 0 0 0 0 0 0110');
  });

  it('rf_send() is false without a send pin', async () => {
    const { codec } = make_codec();
    const { client, link } = await connected_client({}, { rf_send_pin: null }, codec);
    expect(await client.rf_send('switch1', {})).toBe(false);
    expect(link.written).toEqual(['RF receive 0']);
  });

  it('rf_send_raw() is false when the device answers ERR', async () => {
    const { client, link } = await connected_client();
    link.responder = () => 'ERR busy';
    expect(await client.rf_send_raw([350, 1050], '0110')).toBe(false);
    expect(link.written[link.written.length - 1]).toBe('RF send 4 3 350 1050 0 0 0 0 0 0 0110');
  });

  it('spaces RF transmissions by the send interval', async () => {
    const { client, link } = await connected_client({}, { rf_send_interval_ms: 80 });
    const sent_at: number[] = [];
    link.responder = (command) => {
      if (command.startsWith('RF send')) sent_at.push(Date.now());
      return default_responder(command);
    };

    const results = await Promise.all([
      client.rf_send_raw([350, 1050], '0110'),
      client.rf_send_raw([350, 1050], '1001')
    ]);

    expect(results).toEqual([true, true]);
    expect(link.written.slice(1)).toEqual([
      'RF send 4 3 350 1050 0 0 0 0 0 0 0110',
      'RF send 4 3 350 1050 0 0 0 0 0 0 1001'
    ]);
    // Timers may fire up to 1 ms early against Date.now().
    expect(sent_at[1] - sent_at[0]).toBeGreaterThanOrEqual(79);
  });

  it('pin writes are true on ACK', async () => {
    const { client, link } = await connected_client();
    expect(await client.pin_mode(13, PinMode.Output)).toBe(true);
    expect(await client.digital_write(13, true)).toBe(true);
    expect(await client.analog_write(9, 200)).toBe(true);
    expect(link.written.slice(1)).toEqual(['PM 13 1', 'DW 13 1', 'AW 9 200']);
  });

  it('pin writes are false on ERR', async () => {
    const { client, link } = await connected_client();
    link.responder = () => 'ERR bad pin';
    expect(await client.digital_write(99, false)).toBe(false);
  });

  it('reads digital and analog values', async () => {
    const { client, link } = await connected_client();
    link.responder = (command) => (command === 'DR 3' ? 'ACK 1' : 'ACK 873');
    expect(await client.digital_read(3)).toBe(1);
    expect(await client.analog_read(0)).toBe(873);
  });

  it('a read answered with ERR is a command error', async () => {
    const { client, link } = await connected_client();
    link.responder = () => 'ERR bad pin';
    await expect(client.analog_read(42)).rejects.toBeInstanceOf(HomeduinoCommandError);
  });

  it('reads a DHT sensor, null on error', async () => {
    const { client, link } = await connected_client();
    expect(await client.dht_read(5, DhtType.Dht22)).toEqual({ temperature: 21.5, humidity: 40 });
    expect(link.written[link.written.length - 1]).toBe('DHT 22 5');

    link.responder = () => 'ERR checksum';
    expect(await client.dht_read(5, DhtType.Dht22)).toBeNull();
  });

  it('marks a pin busy while its operation is in flight', async () => {
    const { client } = await connected_client();
    const read = client.digital_read(3);
    expect(client.is_pin_busy(3)).toBe(true);
    await read;
    expect(client.is_pin_busy(3)).toBe(false);
  });

  it('commands need the device to be ready', async () => {
    const { client, links } = make_client({ send_ready: false, responder: () => null });
    const connecting = client.connect().catch(() => false);
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(client.get_phase()).toBe('awaiting_ready');
    await expect(client.send('DR 1')).rejects.toBeInstanceOf(HomeduinoNotReadyError);
    await connecting;
    expect(links[0].written).not.toContain('DR 1');
  });
});

// ---------------------------------------------------------------------------
// Input registration
// ---------------------------------------------------------------------------

describe('Homeduino input callbacks', () => {
  it('configures a digital input when registered while connected', async () => {
    const { client, link } = await connected_client();
    await client.add_digital_read_callback(3, () => undefined, true);
    expect(link.written).toEqual(['RF receive 0', 'PM 3 2']);
  });

  it('replays input pin modes on every connect', async () => {
    const { client, links } = make_client();
    await client.add_digital_read_callback(3, () => undefined);
    await client.add_dht_read_callback(5, DhtType.Dht11, () => undefined);

    await client.connect();
    expect(links[0].written).toEqual(['RF receive 0', 'PM 3 0', 'PM 5 0']);

    await client.reconnect({ ping_interval_ms: 0 });
    expect(links[1].written).toEqual(['RF receive 0', 'PM 3 0', 'PM 5 0']);
  });

  it('polls registered inputs and reports changes', async () => {
    const { client, link } = await connected_client({}, { ping_interval_ms: 60_000 });
    let level = 0;
    link.responder = (command) => (command === 'DR 3' ? `ACK ${level}` : default_responder(command));

    const values: number[] = [];
    await client.add_digital_read_callback(3, (_pin, value) => values.push(value));

    await vi.waitFor(() => expect(values).toEqual([0]));
    level = 1;
    await vi.waitFor(() => expect(values).toEqual([0, 1]));
  });
});
