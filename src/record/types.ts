/**
 * Polymorphic reference from a log record to a domain object.
 */
export interface LoggableRef {
  type: string;
  id: string | number;
}

/**
 * One logged request, as persisted and returned by every storage backend.
 * Records are append-only: there is no update timestamp and no mutation API.
 */
export interface LogRecord {
  /** Assigned by the storage backend. */
  id: number;
  /** Correlation id from `X-Request-ID`, or generated. */
  requestId: string | null;
  httpMethod: string;
  /** Path plus query string. */
  url: string;
  ipAddress: string | null;
  userAgent: string | null;
  referrer: string | null;
  requestHeaders: Record<string, string>;
  /**
   * Redacted body. Structured backends keep parsed JSON values;
   * text backends keep a string. `null` when absent or over the size cap.
   */
  requestBody: unknown;
  statusCode: number;
  responseHeaders: Record<string, string>;
  responseBody: unknown;
  durationMs: number | null;
  loggableType: string | null;
  loggableId: string | null;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

/** A record before the backend has assigned its id. */
export type NewLogRecord = Omit<LogRecord, 'id'>;

/**
 * Raw capture handed to `StorageAdapter.logRequest`. Headers and bodies are
 * unfiltered here; the backend redacts them for its own storage format.
 */
export interface LogRequestInput {
  requestId?: string | null;
  httpMethod: string;
  url: string;
  /** Request path used for exclusion; derived from `url` when omitted. */
  path?: string;
  ipAddress?: string | null;
  userAgent?: string | null;
  referrer?: string | null;
  requestHeaders?: Record<string, unknown>;
  requestBody?: unknown;
  statusCode: number;
  responseHeaders?: Record<string, unknown>;
  responseBody?: unknown;
  durationMs?: number | null;
  loggable?: LoggableRef | null;
  metadata?: Record<string, unknown>;
}

export interface LogRequestOptions {
  /** Used when the request carries no metadata of its own. */
  metadata?: Record<string, unknown>;
  /** Used when the request carries no loggable of its own. */
  loggable?: LoggableRef | null;
  /** Overrides the creation timestamp (imports, backfills). */
  createdAt?: Date;
}

/**
 * Filters accepted by `search` and `count`. Every filter is optional and
 * they combine with AND.
 */
export interface SearchCriteria {
  /** Case-insensitive substring over url, request body and response body. */
  q?: string;
  status?: number | number[];
  /** Matched case-insensitively. */
  method?: string | string[];
  ipAddress?: string;
  loggable?: LoggableRef;
  /** Inclusive from the start of this day (UTC). */
  startDate?: Date | string;
  /** Inclusive to the end of this day (UTC). */
  endDate?: Date | string;
  limit?: number;
  offset?: number;
}

/**
 * Aggregate counts and rates over stored records. Rates are percentages
 * rounded to two decimals.
 */
export interface RequestAnalysis {
  total: number;
  successful: number;
  clientErrors: number;
  serverErrors: number;
  successRate: number;
  errorRate: number;
}
