/**
 * CRLF line framer for the Homeduino byte stream.
 *
 * Incoming bytes are accumulated raw. Each time a CRLF delimiter is found,
 * the bytes before it are UTF-8 decoded, trimmed, and returned as a line.
 * Decoding happens per complete line, so a multi-byte character split across
 * two reads is reassembled before it is decoded. A line that is not valid
 * UTF-8 is dropped; the bytes after its delimiter frame normally.
 *
 * A line longer than `max_buffer_size` bytes is dropped whole. When the
 * unterminated tail outgrows the limit the framer discards everything up to
 * and including the next CRLF, so the rest of that line never comes out as a
 * line of its own.
 *
 * Feeding the same bytes in any chunking yields the same lines.
 *
 * @module protocol/line_framer
 */

import { MAX_LINE_BUFFER_SIZE } from './constants';
import { create_logger } from '../log';

const log = create_logger('framer');

const CR = 0x0d;
const LF = 0x0a;

export class LineFramer {
  /** Raw bytes received after the last delimiter. */
  private rx_buffer: Buffer = Buffer.alloc(0);

  /** Dropping the remainder of an overlong line until its delimiter. */
  private discarding = false;

  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly max_buffer_size: number = MAX_LINE_BUFFER_SIZE) {}

  /**
   * Consume a chunk and return every line it completes.
   *
   * Empty lines (after trimming) are not returned.
   */
  feed(chunk: Uint8Array): string[] {
    this.rx_buffer = this.rx_buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.rx_buffer, chunk]);

    const lines: string[] = [];
    let start = 0;
    let search_from = 0;

    for (;;) {
      const cr = this.rx_buffer.indexOf(CR, search_from);
      if (cr === -1 || cr + 1 >= this.rx_buffer.length) {
        break;
      }
      if (this.rx_buffer[cr + 1] !== LF) {
        // Lone CR inside a line, keep scanning.
        search_from = cr + 1;
        continue;
      }

      const raw = this.rx_buffer.subarray(start, cr);
      if (this.discarding) {
        this.discarding = false;
        log.debug(`dropped ${raw.length} trailing bytes of an overlong line`);
      } else if (raw.length > this.max_buffer_size) {
        log.warn(`dropping overlong line (${raw.length} bytes)`);
      } else {
        const line = this.decode_line(raw);
        if (line !== null && line !== '') {
          lines.push(line);
        }
      }
      start = cr + 2;
      search_from = start;
    }

    let tail = this.rx_buffer.subarray(start);
    // A trailing CR may be the first half of the next delimiter.
    const ends_in_cr = tail.length > 0 && tail[tail.length - 1] === CR;
    const content_length = ends_in_cr ? tail.length - 1 : tail.length;

    if (!this.discarding && content_length > this.max_buffer_size) {
      log.warn(`line buffer overflow (${content_length} bytes without delimiter), discarding until next line`);
      this.discarding = true;
    }
    if (this.discarding) {
      tail = ends_in_cr ? tail.subarray(tail.length - 1) : tail.subarray(tail.length);
    }

    this.rx_buffer = Buffer.from(tail);
    return lines;
  }

  /** Discard any partial line. Called whenever a new link is opened. */
  reset(): void {
    this.rx_buffer = Buffer.alloc(0);
    this.discarding = false;
  }

  /** Number of bytes waiting for a delimiter. */
  get pending_bytes(): number {
    return this.rx_buffer.length;
  }

  private decode_line(raw: Buffer): string | null {
    try {
      return this.decoder.decode(raw).trim();
    } catch {
      log.warn(`dropping undecodable line: ${raw.toString('utf8').trim()}`);
      return null;
    }
  }
}
