/**
 * `homeduino` command line.
 *
 * Every device command opens the port, runs, and closes it again. `listen`
 * keeps the connection (with its supervisor) until SIGINT or SIGTERM.
 *
 * @module cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { Homeduino } from './client/homeduino';
import type { ConnectOptions } from './client/homeduino';
import type { HomeduinoOptions } from './config';
import type { RfCodec, RfValues } from './codec/types';
import { create_logger, set_log_level } from './log';
import { DhtType } from './protocol/types';
import { DEFAULT_BAUD_RATE, DEFAULT_RECEIVE_PIN, DEFAULT_SEND_PIN } from './protocol/constants';
import { scan_ports, is_likely_arduino } from './transport/port_scanner';
import type { PortInfo } from './transport/port_scanner';

const log = create_logger('cli');

interface GlobalOptions {
  port?: string;
  baud: number;
  receivePin: number | null;
  sendPin: number | null;
  debug?: boolean;
}

/** Seams for tests; the defaults talk to real hardware and the process. */
export interface CliDeps {
  create_client?: (options: HomeduinoOptions, codec?: RfCodec) => Homeduino;
  /** Protocol codec for `rf-send`; the raw codec cannot encode. */
  codec?: RfCodec;
  scan?: () => Promise<PortInfo[]>;
  out?: (line: string) => void;
  wait_for_shutdown?: () => Promise<void>;
  set_exit_code?: (code: number) => void;
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

export function parse_uint(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`"${value}" is not a non-negative integer.`);
  }
  return Number.parseInt(value, 10);
}

/** A pin number, or "none" to disable the pin. */
export function parse_optional_pin(value: string): number | null {
  return value === 'none' ? null : parse_uint(value);
}

export function parse_dht_type(value: string): DhtType {
  switch (value) {
    case '11':
      return DhtType.Dht11;
    case '21':
      return DhtType.Dht21;
    case '22':
      return DhtType.Dht22;
    default:
      throw new InvalidArgumentError(`"${value}" is not a DHT type (11, 21 or 22).`);
  }
}

/** "300,600,1200" or "300 600 1200". */
export function parse_pulse_lengths(value: string): number[] {
  return value
    .split(/[\s,]+/)
    .filter((f) => f !== '')
    .map(parse_uint);
}

const RfValuesSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

/** '{"id":98765,"unit":0,"state":true}' */
export function parse_rf_values(value: string): RfValues {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new InvalidArgumentError(`"${value}" is not valid JSON.`);
  }
  const result = RfValuesSchema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidArgumentError(`"${value}" is not an object of strings, numbers and booleans.`);
  }
  return result.data;
}

function wait_for_signal(): Promise<void> {
  return new Promise<void>((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

// ---------------------------------------------------------------------------
// Program
// ---------------------------------------------------------------------------

export function build_program(deps: CliDeps = {}): Command {
  const create_client =
    deps.create_client ?? ((options: HomeduinoOptions, codec?: RfCodec) => new Homeduino(options, { codec }));
  const scan = deps.scan ?? scan_ports;
  const out = deps.out ?? ((line: string) => console.log(line));
  const wait_for_shutdown = deps.wait_for_shutdown ?? wait_for_signal;
  const set_exit_code =
    deps.set_exit_code ??
    ((code: number) => {
      process.exitCode = code;
    });

  const program = new Command();

  program
    .name('homeduino')
    .description('Talk to an Arduino running the Homeduino sketch')
    .option('-p, --port <path>', 'Serial port of the Homeduino')
    .option('-b, --baud <rate>', 'Baud rate', parse_uint, DEFAULT_BAUD_RATE)
    .option('--receive-pin <pin>', 'RF receiver pin, or "none"', parse_optional_pin, DEFAULT_RECEIVE_PIN)
    .option('--send-pin <pin>', 'RF transmitter pin, or "none"', parse_optional_pin, DEFAULT_SEND_PIN)
    .option('-d, --debug', 'Log protocol traffic');

  /** Connect, run `task`, disconnect. Failures set exit code 1. */
  const with_client = async (
    task: (client: Homeduino) => Promise<void>,
    connect_options: ConnectOptions = { ping_interval_ms: 0 }
  ): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    if (globals.debug) {
      set_log_level('debug');
    }
    if (!globals.port) {
      log.error('--port is required');
      set_exit_code(1);
      return;
    }

    let client: Homeduino;
    try {
      client = create_client(
        {
          serial_port: globals.port,
          baud_rate: globals.baud,
          rf_receive_pin: globals.receivePin,
          rf_send_pin: globals.sendPin
        },
        deps.codec
      );
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      set_exit_code(1);
      return;
    }

    let connected = false;
    try {
      connected = await client.connect(connect_options);
    } catch (err) {
      log.error('handshake failed:', err instanceof Error ? err.message : err);
    }
    if (!connected) {
      log.error(`could not connect to Homeduino on ${globals.port}`);
      set_exit_code(1);
      return;
    }

    try {
      await task(client);
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      set_exit_code(1);
    } finally {
      await client.disconnect().catch((err: unknown) => {
        log.warn('disconnect failed:', err instanceof Error ? err.message : err);
      });
    }
  };

  /** Print "ACK"/"failed" for a write and fail the process on a NAK. */
  const report_write = (ok: boolean): void => {
    out(ok ? 'ACK' : 'failed');
    if (!ok) set_exit_code(1);
  };

  program
    .command('ports')
    .description('List serial ports')
    .action(async () => {
      const ports = await scan();
      if (ports.length === 0) {
        out('No serial ports found');
        return;
      }
      for (const port of ports) {
        out(is_likely_arduino(port) ? `${port.label} (Arduino)` : port.label);
      }
    });

  program
    .command('listen')
    .description('Print received RF signals until interrupted')
    .action(async () => {
      await with_client(async (client) => {
        client.add_rf_receive_callback((decoded) => {
          out(`${decoded.protocol} ${JSON.stringify(decoded.values)}`);
        });
        client.on('key_press', (code: string) => out(`key ${code}`));
        out('Listening, press Ctrl+C to stop');
        await wait_for_shutdown();
      }, {}); // supervisor at the configured ping interval
    });

  program
    .command('ping')
    .description('Check that the device answers')
    .action(async () => {
      await with_client(async (client) => {
        const ok = await client.ping();
        out(ok ? 'pong' : 'no echo');
        if (!ok) set_exit_code(1);
      });
    });

  program
    .command('send')
    .description('Send a raw command and print the response')
    .argument('<command...>', 'Command words, e.g. DR 3')
    .action(async (words: string[]) => {
      await with_client(async (client) => {
        out(await client.send(words.join(' ')));
      });
    });

  program
    .command('rf-send-raw')
    .description('Transmit pulse timings')
    .argument('<pulse_lengths>', 'Up to eight pulse lengths in microseconds, comma separated', parse_pulse_lengths)
    .argument('<pulse_sequence>', 'Digits indexing the pulse lengths')
    .option('-r, --repeats <count>', 'Transmissions per send', parse_uint)
    .action(async (pulse_lengths: number[], pulse_sequence: string, options: { repeats?: number }) => {
      await with_client(async (client) => {
        report_write(await client.rf_send_raw(pulse_lengths, pulse_sequence, options.repeats));
      });
    });

  program
    .command('rf-send')
    .description('Transmit a protocol message through the codec')
    .argument('<protocol>', 'Protocol name, see list_protocols()')
    .argument('<values>', 'Protocol values as JSON, e.g. {"id":98765,"unit":0,"state":true}', parse_rf_values)
    .option('-r, --repeats <count>', 'Transmissions per send', parse_uint)
    .action(async (protocol: string, values: RfValues, options: { repeats?: number }) => {
      await with_client(async (client) => {
        report_write(await client.rf_send(protocol, values, options.repeats));
      });
    });

  program
    .command('digital-read')
    .argument('<pin>', 'Pin number', parse_uint)
    .action(async (pin: number) => {
      await with_client(async (client) => {
        out(String(await client.digital_read(pin)));
      });
    });

  program
    .command('digital-write')
    .argument('<pin>', 'Pin number', parse_uint)
    .argument('<value>', '0 or 1', parse_uint)
    .action(async (pin: number, value: number) => {
      await with_client(async (client) => {
        report_write(await client.digital_write(pin, value !== 0));
      });
    });

  program
    .command('analog-read')
    .argument('<pin>', 'Pin number', parse_uint)
    .action(async (pin: number) => {
      await with_client(async (client) => {
        out(String(await client.analog_read(pin)));
      });
    });

  program
    .command('dht-read')
    .argument('<type>', 'Sensor type: 11, 21 or 22', parse_dht_type)
    .argument('<pin>', 'Pin number', parse_uint)
    .action(async (dht_type: DhtType, pin: number) => {
      await with_client(async (client) => {
        const reading = await client.dht_read(pin, dht_type);
        if (!reading) {
          out('read failed');
          set_exit_code(1);
          return;
        }
        out(`temperature ${reading.temperature} C, humidity ${reading.humidity} %`);
      });
    });

  return program;
}
