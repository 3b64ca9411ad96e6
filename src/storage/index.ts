// Types
export type { ConfigurationSource, StorageAdapter } from './types.js';
export type { BaseStorageAdapterOptions, StatusCounts } from './base.js';

// Adapters
export { BaseStorageAdapter, buildAnalysis, containsPattern, ANALYSIS_TTL } from './base.js';
export { MemoryStorageAdapter, jsonContains } from './memory.js';
export type { MemoryStorageAdapterOptions } from './memory.js';
export { SqliteStorageAdapter, sqliteConnections } from './sqlite.js';
export type { SqliteConnection, SqliteDatabase, SqliteStorageAdapterOptions } from './sqlite.js';
export { PostgresStorageAdapter, postgresConnections } from './postgres.js';
export type { PgConnection, PgDatabase, PostgresStorageAdapterOptions } from './postgres.js';
export { createStorageAdapter } from './factory.js';
export type { CreateStorageAdapterOptions } from './factory.js';

// Connections and locations
export { ConnectionRegistry } from './connections.js';
export { assertStorageKind, parseLocation, parsePostgresLocation, parseSqliteLocation } from './location.js';
export type { MemoryLocation, PostgresLocation, SqliteLocation, StorageLocation } from './location.js';

// Schema
export { sqliteRequestLogs, SQLITE_SCHEMA_STATEMENTS } from './schema/sqlite.js';
export { pgRequestLogs, PG_SCHEMA_STATEMENTS } from './schema/pg.js';

// Middleware
export { createStorageMiddleware } from './middleware.js';
export { resolvePrimaryStorage } from './helpers.js';
