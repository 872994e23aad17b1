/**
 * Wire-level constants of the Homeduino line protocol, plus the default
 * timings used by the client.
 *
 * @module protocol/constants
 */

// ---------------------------------------------------------------------------
// Framing
// ---------------------------------------------------------------------------

/** Line delimiter of every device-to-host line. */
export const LINE_DELIMITER = '\r\n';

/** Terminator appended to every host-to-device command. */
export const COMMAND_TERMINATOR = '\n';

/** Maximum undelimited bytes buffered before the framer resets. */
export const MAX_LINE_BUFFER_SIZE = 4096;

// ---------------------------------------------------------------------------
// Device-to-host tokens
// ---------------------------------------------------------------------------

/** Sent once the sketch has booted and accepts commands. */
export const LINE_READY = 'ready';

/** Prefix of an unsolicited received-pulses line. */
export const LINE_RF_RECEIVE_PREFIX = 'RF receive ';

/** Prefix of an unsolicited key-press line. */
export const LINE_KEY_PRESS_PREFIX = 'KP ';

/** Positive acknowledgement. Read commands append their values. */
export const RESPONSE_ACK = 'ACK';

/** Prefix of an error response. */
export const RESPONSE_ERR_PREFIX = 'ERR';

/** Number of pulse-length slots in RF receive and RF send lines. */
export const PULSE_LENGTH_SLOTS = 8;

// ---------------------------------------------------------------------------
// Host-to-device command mnemonics
// ---------------------------------------------------------------------------

export const CMD_RF_RECEIVE = 'RF receive';
export const CMD_RF_SEND = 'RF send';
export const CMD_PIN_MODE = 'PM';
export const CMD_DIGITAL_WRITE = 'DW';
export const CMD_ANALOG_WRITE = 'AW';
export const CMD_DIGITAL_READ = 'DR';
export const CMD_ANALOG_READ = 'AR';
export const CMD_DHT_READ = 'DHT';
export const CMD_PING = 'PING';

// ---------------------------------------------------------------------------
// Serial settings
// ---------------------------------------------------------------------------

/** Baud rates the sketch can be compiled for. */
export const BAUD_RATES = [
  300, 600, 1200, 2400, 4800, 9600, 14400, 19200, 28800, 38400, 57600, 115200
] as const;

export type BaudRate = (typeof BAUD_RATES)[number];

export const DEFAULT_BAUD_RATE: BaudRate = 115200;

/** Pin the 433 MHz receiver is wired to (Arduino Uno: interrupt 0). */
export const DEFAULT_RECEIVE_PIN = 2;

/** Pin the 433 MHz transmitter is wired to. */
export const DEFAULT_SEND_PIN = 4;

/** Interrupt number = receive pin - this offset (pins 2 and 3 on an Uno). */
export const RECEIVE_PIN_INTERRUPT_OFFSET = 2;

// ---------------------------------------------------------------------------
// Default timings
// ---------------------------------------------------------------------------

export const DEFAULT_RESPONSE_TIMEOUT_MS = 2000;
export const DEFAULT_BUSY_TIMEOUT_MS = 2000;
export const DEFAULT_READY_TIMEOUT_MS = 5000;
export const DEFAULT_PING_INTERVAL_MS = 10_000;
export const DEFAULT_RF_SEND_INTERVAL_MS = 500;
export const DEFAULT_RF_SEND_REPEATS = 3;
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const DEFAULT_IDLE_INTERVAL_MS = 1000;
export const DEFAULT_DHT_READ_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_PING_FAILURES = 3;
export const DEFAULT_SUPERVISOR_STOP_TIMEOUT_MS = 5000;
