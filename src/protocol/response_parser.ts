/**
 * Interpretation of command responses.
 *
 * Writes answer a bare `ACK`; reads answer `ACK` followed by their values;
 * failures answer `ERR <message>`.
 *
 * @module protocol/response_parser
 */

import { RESPONSE_ACK, RESPONSE_ERR_PREFIX } from './constants';
import type { DhtReading } from './types';

/** True for exactly `ACK`. */
export function is_ack(response: string): boolean {
  return response === RESPONSE_ACK;
}

/** True for `ERR` or `ERR <message>`. */
export function is_error(response: string): boolean {
  return response === RESPONSE_ERR_PREFIX || response.startsWith(`${RESPONSE_ERR_PREFIX} `);
}

/**
 * Split `ACK v1 v2 ...` into its values.
 *
 * @returns The value fields, or `null` when the response is not an ACK.
 */
export function parse_ack_values(response: string): string[] | null {
  const fields = response.split(' ').filter((f) => f !== '');
  if (fields.length === 0 || fields[0] !== RESPONSE_ACK) {
    return null;
  }
  return fields.slice(1);
}

/** Parse `ACK <integer>`, as answered by `DR` and `AR`. */
export function parse_int_response(response: string): number | null {
  const values = parse_ack_values(response);
  if (values === null || values.length !== 1 || !/^-?\d+$/.test(values[0])) {
    return null;
  }
  return Number.parseInt(values[0], 10);
}

/** Parse `ACK <temperature> <humidity>`, as answered by `DHT`. */
export function parse_dht_response(response: string): DhtReading | null {
  const values = parse_ack_values(response);
  if (values === null || values.length !== 2) {
    return null;
  }
  const temperature = Number(values[0]);
  const humidity = Number(values[1]);
  if (!Number.isFinite(temperature) || !Number.isFinite(humidity)) {
    return null;
  }
  return { temperature, humidity };
}
