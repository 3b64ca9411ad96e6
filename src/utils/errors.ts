/**
 * Normalisation of thrown values, which may be anything.
 */

/** The value itself when it is an Error, else an Error carrying its string form. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Prefixes `context` to the message and keeps the original as `cause`.
 *
 * @example
 * ```ts
 * throw wrapError(e, 'Failed to create inbound_request_logs');
 * // "Failed to create inbound_request_logs: no such module: json1"
 * ```
 */
export function wrapError(error: unknown, context: string): Error {
  const cause = toError(error);
  const wrapped = new Error(`${context}: ${cause.message}`);
  wrapped.cause = cause;
  return wrapped;
}

export function getErrorMessage(error: unknown): string {
  return toError(error).message;
}

/**
 * Class name such as "TypeError" or "ConnectionResolutionError";
 * "Error" for thrown non-Error values.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) {
    return error.name || error.constructor.name;
  }
  return 'Error';
}
