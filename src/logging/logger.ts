import pino from 'pino';

/**
 * Logger used for the library's own diagnostics.
 * Pino instances, console-like objects and test fakes can all be adapted to it.
 */
export interface Logger {
  error(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

/**
 * Factory injected through configuration. Called every time a logger is needed,
 * so a factory may hand out per-tenant or per-test loggers.
 */
export type LoggerFactory = () => Logger;

/**
 * Adapts a pino logger (message last, fields first) to the {@link Logger} shape.
 *
 * @example
 * ```ts
 * import pino from 'pino';
 *
 * configure({ loggerFactory: () => fromPino(pino({ level: 'debug' })) });
 * ```
 */
export function fromPino(instance: pino.Logger): Logger {
  return {
    error: (message, fields) => (fields ? instance.error(fields, message) : instance.error(message)),
    warn: (message, fields) => (fields ? instance.warn(fields, message) : instance.warn(message)),
    info: (message, fields) => (fields ? instance.info(fields, message) : instance.info(message)),
    debug: (message, fields) => (fields ? instance.debug(fields, message) : instance.debug(message)),
  };
}

let defaultLogger: Logger | null = null;

/**
 * Process-wide fallback logger, created on first use.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = fromPino(
      pino({
        name: 'inbound-request-logger',
        level: process.env.INBOUND_LOGGER_LEVEL ?? 'info',
        timestamp: pino.stdTimeFunctions.isoTime,
      })
    );
  }
  return defaultLogger;
}
