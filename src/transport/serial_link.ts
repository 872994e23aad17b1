/**
 * Serial port link to the Homeduino.
 *
 * Thin wrapper around `serialport` that forwards raw received bytes as
 * `'data'` events and writes command bytes. Line framing happens above this
 * layer, in the client's framer.
 *
 * @module transport/serial_link
 */

import { SerialPort } from 'serialport';
import { EventEmitter } from 'events';
import type { ByteLink, LinkOpenOptions } from './link_types';

/**
 * Manages the USB serial connection to the Homeduino.
 *
 * Usage:
 * ```ts
 * const link = new SerialLink();
 * link.on('data', (chunk) => { ... });
 * await link.connect({ path: '/dev/ttyUSB0', baud_rate: 115200, data_bits: 8, parity: 'none', stop_bits: 1 });
 * link.write(Buffer.from('PING 1\n'));
 * await link.disconnect();
 * ```
 */
export class SerialLink extends EventEmitter implements ByteLink {
  private port: SerialPort | null = null;

  /**
   * Open the serial port.
   *
   * @throws If the link is already connected, or if the open fails.
   */
  async connect(options: LinkOpenOptions): Promise<void> {
    if (this.port) {
      throw new Error('SerialLink: already connected, call disconnect() first');
    }

    return new Promise<void>((resolve, reject) => {
      try {
        const port = new SerialPort({
          path: options.path,
          baudRate: options.baud_rate,
          dataBits: options.data_bits,
          parity: options.parity,
          stopBits: options.stop_bits,
          autoOpen: false
        });

        port.on('data', (buf: Buffer) => {
          this.emit('data', buf);
        });
        port.on('error', (err: Error) => {
          this.emit('error', err);
        });
        port.on('close', () => {
          // Guard: only act if this port is still the active one.
          // A late close from a previous port must not drop a new connection.
          if (this.port === port) {
            this.port = null;
            this.emit('close');
          }
        });

        port.open((err) => {
          if (err) {
            port.removeAllListeners();
            this.port = null;
            reject(new Error(`SerialLink: failed to open ${options.path}: ${err.message}`));
            return;
          }
          this.port = port;
          resolve();
        });
      } catch (err) {
        reject(
          new Error(
            `SerialLink: failed to create serial port: ${err instanceof Error ? err.message : String(err)}`
          )
        );
      }
    });
  }

  /**
   * Close the serial port.
   *
   * Safe to call even if already disconnected. Resolves once the port's
   * close callback has run.
   */
  disconnect(): Promise<void> {
    if (!this.port) {
      return Promise.resolve();
    }

    const old_port = this.port;
    this.port = null;

    // Remove our listeners before closing so the async 'close' event
    // from the old port can't interfere with a future connection.
    old_port.removeAllListeners();

    if (!old_port.isOpen) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      old_port.close((err) => {
        if (err) {
          this.emit(
            'error',
            new Error(`SerialLink: error during disconnect: ${err.message}`)
          );
        }
        resolve();
      });
    });
  }

  /** @throws If not connected. */
  write(data: Buffer): void {
    if (!this.port || !this.port.isOpen) {
      throw new Error('SerialLink: not connected');
    }
    this.port.write(data);
  }

  is_connected(): boolean {
    return this.port !== null && this.port.isOpen;
  }
}
