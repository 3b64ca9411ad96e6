import { assertStorageKind } from './location.js';
import { MemoryStorageAdapter } from './memory.js';
import { PostgresStorageAdapter } from './postgres.js';
import { SqliteStorageAdapter } from './sqlite.js';
import type { ConfigurationSource, StorageAdapter } from './types.js';

export interface CreateStorageAdapterOptions {
  configuration?: ConfigurationSource;
  connectionName?: string;
}

/**
 * Builds an adapter for a backend kind and location string.
 * The connection is not opened; call `establishConnection()` for that.
 *
 * @throws ConfigurationError for an unknown kind or a malformed location
 *
 * @example
 * ```ts
 * createStorageAdapter('sqlite', 'sqlite3://log/requests.db');
 * createStorageAdapter('postgres', 'postgres://localhost/request_logs');
 * createStorageAdapter('memory');
 * ```
 */
export function createStorageAdapter(
  kind: string,
  location?: string | null,
  options: CreateStorageAdapterOptions = {}
): StorageAdapter {
  switch (assertStorageKind(kind)) {
    case 'memory':
      return new MemoryStorageAdapter({ configuration: options.configuration });
    case 'sqlite':
      return new SqliteStorageAdapter({ ...options, location });
    case 'postgresql':
      return new PostgresStorageAdapter({ ...options, location });
  }
}
