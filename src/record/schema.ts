import { z } from 'zod';
import { RecordValidationError } from '../core/exceptions.js';
import type { NewLogRecord } from './types.js';

const BLANK = "can't be blank";

/**
 * Invariants every record must satisfy before it reaches a backend.
 */
export const logRecordSchema = z.object({
  requestId: z.string().nullable(),
  httpMethod: z.string({ required_error: BLANK }).min(1, BLANK),
  url: z.string({ required_error: BLANK }).min(1, BLANK),
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  referrer: z.string().nullable(),
  requestHeaders: z.record(z.string()),
  requestBody: z.unknown(),
  statusCode: z
    .number({ required_error: BLANK, invalid_type_error: 'must be a number' })
    .int('must be an integer'),
  responseHeaders: z.record(z.string()),
  responseBody: z.unknown(),
  durationMs: z.number().nonnegative('must be greater than or equal to 0').nullable(),
  loggableType: z.string().nullable(),
  loggableId: z.string().nullable(),
  metadata: z.record(z.unknown()),
  createdAt: z.date(),
});

/**
 * Checks a draft record, returning it unchanged when valid.
 *
 * @throws RecordValidationError listing every failed field
 */
export function validateLogRecord(draft: NewLogRecord): NewLogRecord {
  const result = logRecordSchema.safeParse(draft);
  if (!result.success) {
    throw new RecordValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return draft;
}
