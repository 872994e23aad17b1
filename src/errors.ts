/**
 * Error taxonomy for the Homeduino client.
 *
 * The four protocol errors (disconnected, not ready, too busy, response
 * timeout) propagate to the immediate caller of `send()` and every operation
 * built on it. Link-open failures never surface as errors: `connect()`
 * resolves to `false` instead.
 *
 * @module errors
 */

/** Base class of every error thrown by this package. */
export class HomeduinoError extends Error {
  public override readonly name: string = 'HomeduinoError';

  constructor(message: string) {
    super(message);
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message
    };
  }
}

/** No link is attached to the client. */
export class HomeduinoDisconnectedError extends HomeduinoError {
  public override readonly name = 'HomeduinoDisconnectedError';

  constructor(message = 'Not connected to Homeduino') {
    super(message);
  }
}

/** The link is open but the device has not announced `ready` yet. */
export class HomeduinoNotReadyError extends HomeduinoError {
  public override readonly name = 'HomeduinoNotReadyError';

  constructor(message = 'Homeduino is not ready') {
    super(message);
  }
}

/** The send slot stayed taken for longer than the busy timeout. */
export class HomeduinoTooBusyError extends HomeduinoError {
  public override readonly name = 'HomeduinoTooBusyError';

  constructor(
    public readonly command: string,
    public readonly waited_ms: number
  ) {
    super(`Too busy to send "${command}" (waited ${waited_ms} ms)`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), command: this.command, waited_ms: this.waited_ms };
  }
}

/** No response line arrived within the response window. */
export class HomeduinoResponseTimeoutError extends HomeduinoError {
  public override readonly name = 'HomeduinoResponseTimeoutError';

  constructor(
    public readonly command: string,
    public readonly timeout_ms: number
  ) {
    super(`No response to "${command}" within ${timeout_ms} ms`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), command: this.command, timeout_ms: this.timeout_ms };
  }
}

/** The device answered, but not with what the command expects. */
export class HomeduinoCommandError extends HomeduinoError {
  public override readonly name = 'HomeduinoCommandError';

  constructor(
    public readonly command: string,
    public readonly response: string
  ) {
    super(`Unexpected response to "${command}": ${response}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), command: this.command, response: this.response };
  }
}

/** Client options failed validation. */
export class HomeduinoConfigError extends HomeduinoError {
  public override readonly name = 'HomeduinoConfigError';

  constructor(public readonly issues: string[]) {
    super(`Invalid Homeduino options: ${issues.join('; ')}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), issues: this.issues };
  }
}
