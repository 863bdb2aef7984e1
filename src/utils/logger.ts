/**
 * Minimal leveled logger used for diagnostic output.
 *
 * Output goes to the console; the server and session only depend on the
 * {@link Logger} interface so embedders can route messages elsewhere.
 */

/**
 * Severity levels in increasing order.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Sink for diagnostic messages.
 */
export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Options for {@link createConsoleLogger}.
 */
export interface ConsoleLoggerOptions {
  /** Tag printed in brackets before every message, e.g. `Server`. */
  readonly prefix?: string;
  /** Messages below this level are dropped. @default 'info' */
  readonly level?: LogLevel;
}

/**
 * Creates a logger writing to `console`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ prefix: 'Server', level: 'debug' });
 * logger.info('Listening on 0.0.0.0:8080');
 * // [Server] Listening on 0.0.0.0:8080
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const tag = options.prefix ? `[${options.prefix}] ` : '';

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${tag}${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${tag}${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${tag}${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${tag}${message}`, ...details);
    },
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Returns true when `value` is a valid {@link LogLevel} name.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}
