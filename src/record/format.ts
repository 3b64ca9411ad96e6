import { STATUS_CODES } from 'node:http';
import type { LogRecord } from './types.js';

type RecordView = Pick<
  LogRecord,
  'httpMethod' | 'url' | 'statusCode' | 'durationMs' | 'requestHeaders' | 'requestBody' | 'responseHeaders' | 'responseBody'
>;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function formatHeaders(headers: Record<string, string>): string {
  return Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}`)
    .join('\n');
}

function formatBody(body: unknown): string {
  if (body === null || body === undefined) return '';
  if (typeof body === 'string') return body;
  if (typeof body === 'object') return JSON.stringify(body, null, 2);
  return String(body);
}

/** `"GET /users?page=2"` */
export function formattedCall(record: Pick<LogRecord, 'httpMethod' | 'url'>): string {
  return `${record.httpMethod} ${record.url}`;
}

export function formattedRequest(record: RecordView): string {
  return `${formattedCall(record)}\n${formatHeaders(record.requestHeaders)}\n\n${formatBody(record.requestBody)}`;
}

export function formattedResponse(record: RecordView): string {
  return `HTTP ${record.statusCode} ${statusText(record.statusCode)}\n${formatHeaders(record.responseHeaders)}\n\n${formatBody(record.responseBody)}`;
}

/** Reason phrase for a status code, or the code itself when unknown. */
export function statusText(statusCode: number): string {
  return STATUS_CODES[statusCode] ?? String(statusCode);
}

/** 2xx and 3xx count as success. */
export function isSuccess(record: Pick<LogRecord, 'statusCode'>): boolean {
  return record.statusCode >= 200 && record.statusCode <= 399;
}

export function isFailure(record: Pick<LogRecord, 'statusCode'>): boolean {
  return !isSuccess(record);
}

export function isSlow(record: Pick<LogRecord, 'durationMs'>, thresholdMs = 1000): boolean {
  return record.durationMs !== null && record.durationMs > thresholdMs;
}

export function durationSeconds(record: Pick<LogRecord, 'durationMs'>): number | null {
  return record.durationMs === null ? null : record.durationMs / 1000;
}

/** `"250.5ms"`, `"1.5s"` or `"N/A"`. */
export function formattedDuration(record: Pick<LogRecord, 'durationMs'>): string {
  if (record.durationMs === null) return 'N/A';
  if (record.durationMs < 1000) return `${round2(record.durationMs)}ms`;
  return `${round2(record.durationMs / 1000)}s`;
}
