/**
 * Classification and routing of framed Homeduino lines.
 *
 * Rules, first match wins:
 *   1. `ready`                -> ready handler
 *   2. `RF receive <8> <seq>` -> RF receive handler (malformed lines dropped)
 *   3. `KP <code>`            -> key press handler
 *   4. a request is pending   -> response handler
 *   5. anything else          -> unhandled handler
 *
 * Command responses carry no request id. A line is attributed to "the"
 * outstanding request because the correlator never lets more than one be
 * in flight, and the sketch answers strictly in order. Unsolicited RF and
 * key-press lines are matched before step 4 and so are never taken as a
 * response.
 *
 * `classify_line()` never throws.
 *
 * @module protocol/line_router
 */

import {
  LINE_READY,
  LINE_RF_RECEIVE_PREFIX,
  LINE_KEY_PRESS_PREFIX,
  PULSE_LENGTH_SLOTS
} from './constants';
import type { RfPulses, RoutedLine } from './types';

/** Classify a single framed line without side effects. */
export function classify_line(line: string): RoutedLine {
  if (line === LINE_READY) {
    return { kind: 'ready' };
  }

  if (line.startsWith(LINE_RF_RECEIVE_PREFIX)) {
    const result = parse_rf_receive(line);
    return typeof result === 'string'
      ? { kind: 'rf_receive_invalid', line, reason: result }
      : { kind: 'rf_receive', pulses: result };
  }

  if (line.startsWith(LINE_KEY_PRESS_PREFIX)) {
    return { kind: 'key_press', code: line.slice(LINE_KEY_PRESS_PREFIX.length).trim() };
  }

  return { kind: 'other', line };
}

/**
 * Parse `RF receive l0 l1 l2 l3 l4 l5 l6 l7 sequence`.
 *
 * @returns The pulses, or a reason string when the line is malformed.
 */
export function parse_rf_receive(line: string): RfPulses | string {
  const fields = line.split(' ').filter((f) => f !== '');
  // "RF", "receive", 8 pulse lengths, sequence
  const expected = 2 + PULSE_LENGTH_SLOTS + 1;
  if (fields.length < expected) {
    return `expected ${expected} fields, got ${fields.length}`;
  }

  const pulse_lengths: number[] = [];
  for (const field of fields.slice(2, 2 + PULSE_LENGTH_SLOTS)) {
    if (!/^\d+$/.test(field)) {
      return `invalid pulse length "${field}"`;
    }
    pulse_lengths.push(Number.parseInt(field, 10));
  }

  const pulse_sequence = fields[2 + PULSE_LENGTH_SLOTS];
  if (!/^\d+$/.test(pulse_sequence)) {
    return `invalid pulse sequence "${pulse_sequence}"`;
  }

  return { pulse_lengths, pulse_sequence };
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

/** Callbacks the router forwards classified lines to. */
export interface LineRouterHandlers {
  on_ready: () => void;
  on_rf_receive: (pulses: RfPulses) => void;
  on_rf_receive_invalid: (line: string, reason: string) => void;
  on_key_press: (code: string) => void;
  /** Whether the correlator is waiting for a response right now. */
  is_awaiting_response: () => boolean;
  on_response: (line: string) => void;
  on_unhandled: (line: string) => void;
}

export class LineRouter {
  constructor(private readonly handlers: LineRouterHandlers) {}

  route(line: string): void {
    const routed = classify_line(line);

    switch (routed.kind) {
      case 'ready':
        this.handlers.on_ready();
        break;
      case 'rf_receive':
        this.handlers.on_rf_receive(routed.pulses);
        break;
      case 'rf_receive_invalid':
        this.handlers.on_rf_receive_invalid(routed.line, routed.reason);
        break;
      case 'key_press':
        this.handlers.on_key_press(routed.code);
        break;
      case 'other':
        if (this.handlers.is_awaiting_response()) {
          this.handlers.on_response(routed.line);
        } else {
          this.handlers.on_unhandled(routed.line);
        }
        break;
    }
  }
}
