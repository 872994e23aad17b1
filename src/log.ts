/**
 * Scoped console logging.
 *
 * Every module logs through a {@link Logger} created with its scope name, so
 * lines read `[homeduino:correlator] ...`. The threshold comes from
 * `HOMEDUINO_LOG_LEVEL` (debug | info | warn | error | silent); setting
 * `DEBUG_HOMEDUINO=1` is a shorthand for `debug`.
 *
 * @module log
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

function is_log_level(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Resolve the initial level from the environment. */
export function level_from_env(env: NodeJS.ProcessEnv): LogLevel {
  const raw = (env.HOMEDUINO_LOG_LEVEL ?? '').trim().toLowerCase();
  if (is_log_level(raw)) {
    return raw;
  }
  if (env.DEBUG_HOMEDUINO === '1' || env.DEBUG_HOMEDUINO === 'true') {
    return 'debug';
  }
  return 'info';
}

let current_level: LogLevel = level_from_env(process.env);

export function set_log_level(level: LogLevel): void {
  current_level = level;
}

export function get_log_level(): LogLevel {
  return current_level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[current_level];
}

/**
 * Create a logger whose lines carry the given scope.
 *
 * The level is checked on every call, so {@link set_log_level} takes effect
 * for loggers created earlier.
 */
export function create_logger(scope: string): Logger {
  const prefix = `[homeduino:${scope}]`;
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    }
  };
}
