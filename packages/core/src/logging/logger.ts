/**
 * Logging for hop transfers.
 *
 * @packageDocumentation
 */

/**
 * How much gets logged.
 * - `silent`: nothing
 * - `minimal`: step progress, warnings
 * - `verbose`: also every poll and attempt detail
 */
export type LogLevel = 'silent' | 'minimal' | 'verbose';

/**
 * Custom log sink. Receives every line that passes the level filter.
 */
export type LogSink = (
  message: string,
  data?: Record<string, unknown>,
  severity?: 'debug' | 'info' | 'warn'
) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /**
   * Log level. Defaults to 'minimal'.
   */
  level?: LogLevel;
  /**
   * Custom sink. Defaults to the console.
   */
  sink?: LogSink;
}

/**
 * Default sink (console).
 */
function consoleSink(
  message: string,
  data?: Record<string, unknown>,
  severity: 'debug' | 'info' | 'warn' = 'info'
): void {
  const write = severity === 'warn' ? console.warn : console.log;
  if (data) {
    write(`[Hopline] ${message}`, data);
  } else {
    write(`[Hopline] ${message}`);
  }
}

/**
 * Create a logger.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: 'verbose' });
 * logger.debug('Awaiting confirmation', { poll: 3 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'minimal', sink = consoleSink } = options;

  return {
    debug(message, data) {
      if (level === 'verbose') sink(message, data, 'debug');
    },
    info(message, data) {
      if (level !== 'silent') sink(message, data, 'info');
    },
    warn(message, data) {
      if (level !== 'silent') sink(message, data, 'warn');
    },
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createLogger({ level: 'silent' });
