import { z } from 'zod';
import { parseJson } from '../config/filters.js';

const headersSchema = z.record(z.string());
const metadataSchema = z.record(z.unknown());

export function decodeHeaders(value: unknown): Record<string, string> {
  const result = headersSchema.safeParse(typeof value === 'string' ? decodeJsonText(value) : value);
  return result.success ? result.data : {};
}

export function decodeMetadata(value: unknown): Record<string, unknown> {
  const result = metadataSchema.safeParse(typeof value === 'string' ? decodeJsonText(value) : value);
  return result.success ? result.data : {};
}

function decodeJsonText(text: string): unknown {
  const parsed = parseJson(text);
  return parsed.kind === 'parsed' ? parsed.value : null;
}

/** Value for a TEXT column: strings as-is, everything else as JSON. */
export function toText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return value;
  return JSON.stringify(value) ?? null;
}
