import type { Configuration } from '../config/configuration.js';
import { parseJson } from '../config/filters.js';
import { validateLogRecord } from './schema.js';
import type { LogRequestInput, LogRequestOptions, NewLogRecord } from './types.js';

export interface BuildLogRecordOptions extends LogRequestOptions {
  /**
   * Structured backends keep parsed bodies as values; text backends
   * get JSON strings.
   */
  structured: boolean;
}

/**
 * Path portion of a url (no query string or fragment).
 */
export function pathOf(url: string): string {
  const end = url.search(/[?#]/);
  return end === -1 ? url : url.slice(0, end);
}

function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Redacts a captured body for the target storage format.
 * Absent and empty bodies become `null`.
 */
export function prepareBody(config: Configuration, body: unknown, structured: boolean): unknown {
  if (body === undefined || body === null) return null;

  if (typeof body === 'string') {
    if (body.length === 0) return null;
    if (!structured) return config.filterBody(body);
    if (Buffer.byteLength(body, 'utf8') > config.maxBodySize) return body;

    const parsed = parseJson(body);
    return parsed.kind === 'parsed' ? config.filterSensitiveData(parsed.value) : parsed.raw;
  }

  const redacted = config.filterSensitiveData(body);
  return structured ? redacted : JSON.stringify(redacted);
}

/**
 * Assembles and validates one record from a raw capture.
 *
 * Metadata and loggable carried by the input (the request's own context)
 * take precedence over the ones passed in `options`.
 *
 * @throws RecordValidationError when method, url or status are missing
 */
export function buildLogRecord(
  input: LogRequestInput,
  config: Configuration,
  options: BuildLogRecordOptions
): NewLogRecord {
  const metadata =
    input.metadata && Object.keys(input.metadata).length > 0 ? input.metadata : (options.metadata ?? {});
  const loggable = input.loggable ?? options.loggable ?? null;
  const durationMs = input.durationMs === undefined || input.durationMs === null ? null : roundTo(input.durationMs, 2);

  return validateLogRecord({
    requestId: input.requestId ?? null,
    httpMethod: input.httpMethod,
    url: input.url,
    ipAddress: input.ipAddress ?? null,
    userAgent: input.userAgent ?? null,
    referrer: input.referrer ?? null,
    requestHeaders: config.filterHeaders(input.requestHeaders ?? {}),
    requestBody: prepareBody(config, input.requestBody, options.structured),
    statusCode: input.statusCode,
    responseHeaders: config.filterHeaders(input.responseHeaders ?? {}),
    responseBody: prepareBody(config, input.responseBody, options.structured),
    durationMs,
    loggableType: loggable ? loggable.type : null,
    loggableId: loggable ? String(loggable.id) : null,
    metadata: { ...metadata },
    createdAt: options.createdAt ?? new Date(),
  });
}
