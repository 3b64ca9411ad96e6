import { sql } from 'drizzle-orm';
import {
  bigserial,
  index,
  inet,
  integer,
  jsonb,
  numeric,
  pgTable,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';

/**
 * `inbound_request_logs` for the PostgreSQL backend.
 * Headers, bodies and metadata are JSONB, so parsed bodies are stored as values.
 */
export const pgRequestLogs = pgTable(
  'inbound_request_logs',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    requestId: varchar('request_id', { length: 255 }),
    httpMethod: varchar('http_method', { length: 10 }).notNull(),
    url: text('url').notNull(),
    ipAddress: inet('ip_address'),
    userAgent: text('user_agent'),
    referrer: text('referrer'),
    requestHeaders: jsonb('request_headers').notNull().default({}),
    requestBody: jsonb('request_body'),
    statusCode: integer('status_code').notNull(),
    responseHeaders: jsonb('response_headers').notNull().default({}),
    responseBody: jsonb('response_body'),
    durationMs: numeric('duration_ms', { precision: 10, scale: 2 }),
    loggableType: varchar('loggable_type', { length: 255 }),
    loggableId: varchar('loggable_id', { length: 255 }),
    metadata: jsonb('metadata').notNull().default({}),
    createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull(),
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
    requestHeadersGin: index('idx_inbound_request_logs_request_headers_gin').using('gin', table.requestHeaders),
    requestBodyGin: index('idx_inbound_request_logs_request_body_gin').using('gin', table.requestBody),
    responseHeadersGin: index('idx_inbound_request_logs_response_headers_gin').using('gin', table.responseHeaders),
    responseBodyGin: index('idx_inbound_request_logs_response_body_gin').using('gin', table.responseBody),
    metadataGin: index('idx_inbound_request_logs_metadata_gin').using('gin', table.metadata),
  })
);

export type PgRequestLogRow = typeof pgRequestLogs.$inferSelect;
export type PgRequestLogInsert = typeof pgRequestLogs.$inferInsert;

/** DDL run by `PostgresStorageAdapter.ensureSchema()`. */
export const PG_SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS inbound_request_logs (
    id BIGSERIAL PRIMARY KEY,
    request_id VARCHAR(255),
    http_method VARCHAR(10) NOT NULL,
    url TEXT NOT NULL,
    ip_address INET,
    user_agent TEXT,
    referrer TEXT,
    request_headers JSONB NOT NULL DEFAULT '{}',
    request_body JSONB,
    status_code INTEGER NOT NULL,
    response_headers JSONB NOT NULL DEFAULT '{}',
    response_body JSONB,
    duration_ms DECIMAL(10,2),
    loggable_type VARCHAR(255),
    loggable_id VARCHAR(255),
    metadata JSONB NOT NULL DEFAULT '{}',
    created_at TIMESTAMP WITH TIME ZONE NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_request_id ON inbound_request_logs(request_id)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_http_method ON inbound_request_logs(http_method)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_status_code ON inbound_request_logs(status_code)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_created_at ON inbound_request_logs(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_ip_address ON inbound_request_logs(ip_address)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_duration_ms ON inbound_request_logs(duration_ms)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_loggable ON inbound_request_logs(loggable_type, loggable_id)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_failed_requests ON inbound_request_logs(status_code) WHERE status_code >= 400',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_request_headers_gin ON inbound_request_logs USING GIN (request_headers)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_request_body_gin ON inbound_request_logs USING GIN (request_body)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_response_headers_gin ON inbound_request_logs USING GIN (response_headers)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_response_body_gin ON inbound_request_logs USING GIN (response_body)',
  'CREATE INDEX IF NOT EXISTS idx_inbound_request_logs_metadata_gin ON inbound_request_logs USING GIN (metadata)',
];
