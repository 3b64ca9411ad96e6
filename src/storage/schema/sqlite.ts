import { sql } from 'drizzle-orm';
import { index, integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

/**
 * `inbound_request_logs` for the embedded SQLite backend.
 * Headers, bodies and metadata are JSON text.
 */
export const sqliteRequestLogs = sqliteTable(
  'inbound_request_logs',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    requestId: text('request_id'),
    httpMethod: text('http_method').notNull(),
    url: text('url').notNull(),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    referrer: text('referrer'),
    requestHeaders: text('request_headers').notNull().default('{}'),
    requestBody: text('request_body'),
    statusCode: integer('status_code').notNull(),
    responseHeaders: text('response_headers').notNull().default('{}'),
    responseBody: text('response_body'),
    durationMs: real('duration_ms'),
    loggableType: text('loggable_type'),
    loggableId: text('loggable_id'),
    metadata: text('metadata').notNull().default('{}'),
    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    requestIdIdx: index('idx_inbound_request_logs_request_id').on(table.requestId),
    httpMethodIdx: index('idx_inbound_request_logs_http_method').on(table.httpMethod),
    statusCodeIdx: index('idx_inbound_request_logs_status_code').on(table.statusCode),
    createdAtIdx: index('idx_inbound_request_logs_created_at').on(table.createdAt),
    ipAddressIdx: index('idx_inbound_request_logs_ip_address').on(table.ipAddress),
    durationIdx: index('idx_inbound_request_logs_duration_ms').on(table.durationMs),
    loggableIdx: index('idx_inbound_request_logs_loggable').on(table.loggableType, table.loggableId),
    failedIdx: index('idx_inbound_request_logs_failed_requests')
      .on(table.statusCode)
      .where(sql`status_code >= 400`),
  })
);

export type SqliteRequestLogRow = typeof sqliteRequestLogs.$inferSelect;
export type SqliteRequestLogInsert = typeof sqliteRequestLogs.$inferInsert;

/** DDL run by `SqliteStorageAdapter.ensureSchema()`. */
export const SQLITE_SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS inbound_request_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_id TEXT,
    http_method TEXT NOT NULL,
    url TEXT NOT NULL,
    ip_address TEXT,
    user_agent TEXT,
    referrer TEXT,
    request_headers TEXT NOT NULL DEFAULT '{}',
    request_body TEXT,
    status_code INTEGER NOT NULL,
    response_headers TEXT NOT NULL DEFAULT '{}',
    response_body TEXT,
    duration_ms REAL,
    loggable_type TEXT,
    loggable_id TEXT,
    metadata TEXT NOT NULL DEFAULT '{}',
    created_at INTEGER NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_request_id ON inbound_request_logs(request_id)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_http_method ON inbound_request_logs(http_method)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_status_code ON inbound_request_logs(status_code)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_created_at ON inbound_request_logs(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_ip_address ON inbound_request_logs(ip_address)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_duration_ms ON inbound_request_logs(duration_ms)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_loggable ON inbound_request_logs(loggable_type, loggable_id)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_failed_requests ON inbound_request_logs(status_code) WHERE status_code >= 400',
];
