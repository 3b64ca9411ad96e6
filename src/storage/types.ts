import type { Configuration } from '../config/configuration.js';
import type { StorageKind } from '../config/types.js';
import type {
  LogRecord,
  LogRequestInput,
  LogRequestOptions,
  RequestAnalysis,
  SearchCriteria,
} from '../record/types.js';

/**
 * Source of the configuration a backend filters and reports with.
 * Resolved on every call so scoped overrides are honoured.
 */
export type ConfigurationSource = () => Configuration;

/**
 * Persistence contract shared by every backend (memory, SQLite, PostgreSQL).
 *
 * Implement this interface to plug in your own store.
 *
 * @example
 * ```ts
 * const storage = createStorageAdapter('sqlite', 'sqlite3://log/requests.db');
 * await storage.establishConnection();
 * setPrimaryStorage(storage);
 * ```
 */
export interface StorageAdapter {
  readonly kind: StorageKind;

  /**
   * True when parsed JSON bodies are stored as native structured values
   * rather than re-serialised strings.
   */
  readonly structuredStorage: boolean;

  /**
   * True when the backend's driver can be loaded. Never throws; warns once
   * when a location was configured but the driver is missing.
   */
  available(): boolean;

  /**
   * Opens (or registers) the backend's connection and makes sure the table exists.
   * A no-op when the adapter reuses a connection handed to it by the host.
   */
  establishConnection(): Promise<void>;

  /**
   * Builds, validates and persists one record.
   * @returns The stored record, or null when the request is excluded or persisting failed
   */
  logRequest(input: LogRequestInput, options?: LogRequestOptions): Promise<LogRecord | null>;

  /** Records matching every criterion, newest first. */
  search(criteria?: SearchCriteria): Promise<LogRecord[]>;

  count(criteria?: SearchCriteria): Promise<number>;

  /**
   * Deletes records created before the cutoff.
   * @returns Number of deleted records
   */
  cleanup(olderThanDays?: number): Promise<number>;

  /** Deletes every record. */
  clear(): Promise<number>;

  analyze(): Promise<RequestAnalysis>;

  /** Records whose request body (as JSON) contains `{ [key]: value }`. */
  withRequestContaining(key: string, value: unknown): Promise<LogRecord[]>;

  /** Records whose response body (as JSON) contains `{ [key]: value }`. */
  withResponseContaining(key: string, value: unknown): Promise<LogRecord[]>;

  /** Releases connections the adapter opened itself. */
  close(): Promise<void>;
}
