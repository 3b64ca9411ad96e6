import { getErrorName, toError } from '../utils/errors.js';
import type { Logger } from './logger.js';

/**
 * What error reporting needs from a configuration.
 */
export interface ReportingSource {
  readonly debugLogging: boolean;
  logger(): Logger;
}

/**
 * Reports a logging-machinery failure at `error` level.
 * The stack is attached only when debug logging is on.
 */
export function reportError(source: ReportingSource, message: string, error: unknown): void {
  const name = getErrorName(error);
  const normalized = toError(error);
  const detail = normalized.message;
  const fields: Record<string, unknown> = { error: name, message: detail };
  if (source.debugLogging && normalized.stack) {
    fields.stack = normalized.stack;
  }
  source.logger().error(`${message}: ${name}: ${detail}`, fields);
}
