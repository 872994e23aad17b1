/**
 * Types shared by the correlator and the RF send pacer.
 *
 * @module command/command_types
 */

/** Timing limits of the correlator. */
export interface CorrelatorOptions {
  /** Maximum wait for a response line after writing a command. */
  response_timeout_ms: number;
  /** Maximum wait for the send slot while another command is in flight. */
  busy_timeout_ms: number;
}

/** What the correlator needs from the connection that owns it. */
export interface CorrelatorHost {
  /** True while a link is attached. */
  is_connected: () => boolean;
  /** True once the device completed its ready handshake. */
  is_ready: () => boolean;
  /** Write one command line; the terminator is added by the host. */
  write_line: (command: string) => void;
}

/** Per-call options of `CommandCorrelator.send()`. */
export interface SendOptions {
  /**
   * Set to false to send before the ready handshake completed. Only the
   * handshake ping probe does this.
   */
  require_ready?: boolean;
}

/** The single in-flight command. */
export interface PendingRequest {
  command: string;
  /** Date.now() when the command was written. */
  submitted_at: number;
  resolve: (response: string) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}
