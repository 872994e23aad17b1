/**
 * Byte transport contract the Homeduino client runs on.
 *
 * @module transport/link_types
 */

/** Serial line settings. The sketch always uses 8N1. */
export interface LinkOpenOptions {
  /** OS serial port path (e.g., "/dev/ttyUSB0" or "COM3"). */
  path: string;
  baud_rate: number;
  data_bits: 5 | 6 | 7 | 8;
  parity: 'none' | 'even' | 'odd' | 'mark' | 'space';
  stop_bits: 1 | 1.5 | 2;
}

/**
 * A bidirectional byte link.
 *
 * Emits:
 *   'data'  (chunk: Buffer) -- bytes received
 *   'error' (err: Error)    -- transport error
 *   'close' ()              -- link closed by the other side or the OS
 *
 * 'close' is not emitted for a close requested through `disconnect()`.
 */
export interface ByteLink {
  connect(options: LinkOpenOptions): Promise<void>;
  /** Close the link; resolves once the OS has released the port. */
  disconnect(): Promise<void>;
  /** @throws If the link is not open. */
  write(data: Buffer): void;
  is_connected(): boolean;

  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'close', listener: () => void): this;
  removeAllListeners(): this;
}

export type LinkFactory = () => ByteLink;
