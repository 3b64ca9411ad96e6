import { baseContentType, parseJson } from '../config/filters.js';
import type { ParseResult } from '../config/types.js';
import { parseNestedQuery } from './form.js';

/** Response types whose body is an open-ended stream and is never buffered. */
const STREAMING_CONTENT_TYPES = new Set(['text/event-stream']);

export type BodyReadResult =
  | { kind: 'absent' }
  | { kind: 'oversized' }
  | { kind: 'read'; text: string };

/**
 * Reads a body stream up to `limit` bytes. Exceeding the limit cancels the
 * stream and reports `oversized`; nothing past the limit is buffered.
 */
export async function readLimited(
  stream: ReadableStream<Uint8Array> | null,
  limit: number
): Promise<BodyReadResult> {
  if (!stream) return { kind: 'absent' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    size += value.byteLength;
    if (size > limit) {
      await reader.cancel();
      return { kind: 'oversized' };
    }
    chunks.push(value);
  }

  if (size === 0) return { kind: 'absent' };
  return { kind: 'read', text: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parses a captured body according to its declared content type.
 * JSON and urlencoded bodies become values; anything else, and anything that
 * fails to parse, stays raw text.
 */
export function parseBody(text: string, contentType: string | null | undefined): ParseResult<unknown> {
  switch (baseContentType(contentType)) {
    case 'application/json':
      return parseJson(text);
    case 'application/x-www-form-urlencoded':
      return { kind: 'parsed', value: parseNestedQuery(text) };
    default:
      return { kind: 'unparsed', raw: text };
  }
}

/**
 * Captures the request body from a clone, so the handler can still read the original.
 * @returns The parsed value, raw text, or null when absent or over the size cap
 */
export async function captureRequestBody(request: Request, maxBodySize: number): Promise<unknown> {
  if (request.body === null || request.method === 'GET' || request.method === 'HEAD') return null;

  const declared = Number(request.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBodySize) return null;

  const read = await readLimited(request.clone().body, maxBodySize);
  if (read.kind !== 'read') return null;

  const parsed = parseBody(read.text, request.headers.get('content-type'));
  return parsed.kind === 'parsed' ? parsed.value : parsed.raw;
}

/**
 * True when a response body may be captured: not 204, not a redirect,
 * not an event stream.
 */
export function responseBodyCapturable(status: number, contentType: string | null | undefined): boolean {
  if (status === 204) return false;
  if (status >= 300 && status < 400) return false;
  const main = baseContentType(contentType);
  return !(main && STREAMING_CONTENT_TYPES.has(main));
}

/**
 * Captures the response body as text from a clone; the original stays
 * untouched for the client.
 * @returns The text, or null when absent or over the size cap
 */
export async function captureResponseBody(response: Response, maxBodySize: number): Promise<string | null> {
  if (response.body === null) return null;

  const declared = Number(response.headers.get('content-length'));
  if (Number.isFinite(declared) && declared > maxBodySize) return null;

  const read = await readLimited(response.clone().body, maxBodySize);
  return read.kind === 'read' ? read.text : null;
}
