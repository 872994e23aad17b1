/**
 * Serial port scanner.
 *
 * Enumerates serial ports using the `serialport` package so the CLI can
 * show which device to pass as `--port`.
 */

import { SerialPort } from 'serialport';
import { create_logger } from '../log';

const log = create_logger('ports');

/** Metadata for a single serial port. */
export interface PortInfo {
  /** OS device path (e.g., /dev/ttyUSB0 on Linux, COM3 on Windows). */
  path: string;
  vendor_id?: string;
  product_id?: string;
  manufacturer?: string;
  serial_number?: string;
  /** Manufacturer and path joined for display. */
  label: string;
}

/** Common USB-serial bridges found on Arduino boards. */
const ARDUINO_VENDOR_IDS = new Set(['2341', '2a03', '1a86', '0403', '10c4']);

/** Whether the port looks like an Arduino or its USB-serial bridge. */
export function is_likely_arduino(port: PortInfo): boolean {
  return port.vendor_id !== undefined && ARDUINO_VENDOR_IDS.has(port.vendor_id.toLowerCase());
}

/**
 * List all available serial ports.
 *
 * Enumeration failures (e.g., permission errors) are logged and yield an
 * empty list.
 */
export async function scan_ports(): Promise<PortInfo[]> {
  try {
    const raw_ports = await SerialPort.list();

    return raw_ports.map((p) => {
      const label_parts: string[] = [];
      if (p.manufacturer) {
        label_parts.push(p.manufacturer);
      }
      label_parts.push(p.path);

      return {
        path: p.path,
        vendor_id: p.vendorId ?? undefined,
        product_id: p.productId ?? undefined,
        manufacturer: p.manufacturer ?? undefined,
        serial_number: p.serialNumber ?? undefined,
        label: label_parts.join(' - ')
      };
    });
  } catch (err) {
    log.warn(`port enumeration failed: ${err instanceof Error ? err.message : String(err)}`);
    return [];
  }
}
