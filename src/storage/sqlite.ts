import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Client } from '@libsql/client';
import { and, count, desc, eq, gte, inArray, lt, lte, sql, type SQL } from 'drizzle-orm';
import type { LibSQLDatabase } from 'drizzle-orm/libsql';
import type { StorageKind } from '../config/types.js';
import { ConfigurationError } from '../core/exceptions.js';
import { wrapError } from '../utils/errors.js';
import type { LogRecord, NewLogRecord, SearchCriteria } from '../record/types.js';
import {
  BaseStorageAdapter,
  cleanupCutoff,
  containsPattern,
  endOfDay,
  startOfDay,
  toArray,
  type BaseStorageAdapterOptions,
  type StatusCounts,
} from './base.js';
import { ConnectionRegistry } from './connections.js';
import { parseSqliteLocation, type SqliteLocation } from './location.js';
import { decodeHeaders, decodeMetadata, toText } from './rows.js';
import {
  SQLITE_SCHEMA_STATEMENTS,
  sqliteRequestLogs,
  type SqliteRequestLogInsert,
  type SqliteRequestLogRow,
} from './schema/sqlite.js';

export type SqliteDatabase = LibSQLDatabase<Record<string, never>>;

export interface SqliteConnection {
  client: Client;
  db: SqliteDatabase;
}

/** Connections registered by SQLite adapters that were given a location. */
export const sqliteConnections = new ConnectionRegistry<SqliteConnection>();

export interface SqliteStorageAdapterOptions extends BaseStorageAdapterOptions {
  /**
   * `sqlite3://path`, `sqlite://path`, `file:path`, a plain path or `:memory:`.
   * Opens an independent connection registered under `connectionName`.
   */
  location?: string | null;

  /**
   * The host application's own libsql client. Used as-is; the adapter never
   * closes it. Mutually exclusive with `location`.
   */
  client?: Client;

  /** @default derived from the location */
  connectionName?: string;

  /** @default the shared {@link sqliteConnections} registry */
  registry?: ConnectionRegistry<SqliteConnection>;
}

const t = sqliteRequestLogs;

function toRow(draft: NewLogRecord): SqliteRequestLogInsert {
  return {
    requestId: draft.requestId,
    httpMethod: draft.httpMethod,
    url: draft.url,
    ipAddress: draft.ipAddress,
    userAgent: draft.userAgent,
    referrer: draft.referrer,
    requestHeaders: JSON.stringify(draft.requestHeaders),
    requestBody: toText(draft.requestBody),
    statusCode: draft.statusCode,
    responseHeaders: JSON.stringify(draft.responseHeaders),
    responseBody: toText(draft.responseBody),
    durationMs: draft.durationMs,
    loggableType: draft.loggableType,
    loggableId: draft.loggableId,
    metadata: JSON.stringify(draft.metadata),
    createdAt: draft.createdAt,
  };
}

export function fromSqliteRow(row: SqliteRequestLogRow): LogRecord {
  return {
    id: row.id,
    requestId: row.requestId,
    httpMethod: row.httpMethod,
    url: row.url,
    ipAddress: row.ipAddress,
    userAgent: row.userAgent,
    referrer: row.referrer,
    requestHeaders: decodeHeaders(row.requestHeaders),
    requestBody: row.requestBody,
    statusCode: row.statusCode,
    responseHeaders: decodeHeaders(row.responseHeaders),
    responseBody: row.responseBody,
    durationMs: row.durationMs,
    loggableType: row.loggableType,
    loggableId: row.loggableId,
    metadata: decodeMetadata(row.metadata),
    createdAt: row.createdAt,
  };
}

/**
 * WHERE clause for search criteria. Free text is a case-insensitive literal
 * substring match over url and the stored body text.
 */
export function sqliteSearchCondition(criteria: SearchCriteria): SQL | undefined {
  const conditions: SQL[] = [];

  if (criteria.q) {
    const pattern = containsPattern(criteria.q);
    conditions.push(
      sql`(lower(${t.url}) like ${pattern} escape '\\' or lower(${t.requestBody}) like ${pattern} escape '\\' or lower(${t.responseBody}) like ${pattern} escape '\\')`
    );
  }

  const statuses = toArray(criteria.status);
  if (statuses.length > 0) conditions.push(inArray(t.statusCode, statuses));

  const methods = toArray(criteria.method).map((method) => method.toUpperCase());
  if (methods.length > 0) conditions.push(inArray(t.httpMethod, methods));

  if (criteria.ipAddress) conditions.push(eq(t.ipAddress, criteria.ipAddress));

  if (criteria.loggable) {
    conditions.push(eq(t.loggableType, criteria.loggable.type));
    conditions.push(eq(t.loggableId, String(criteria.loggable.id)));
  }

  const start = startOfDay(criteria.startDate);
  if (start) conditions.push(gte(t.createdAt, start));

  const end = endOfDay(criteria.endDate);
  if (end) conditions.push(lte(t.createdAt, end));

  return and(...conditions);
}

function jsonPath(key: string): string {
  return `$."${key.replace(/"/g, '\\"')}"`;
}

function containmentValue(value: unknown): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return JSON.stringify(value) ?? null;
}

/**
 * Embedded SQLite backend on libsql. Bodies, headers and metadata are stored
 * as redacted JSON text.
 *
 * @example
 * ```ts
 * // Independent connection
 * const storage = new SqliteStorageAdapter({ location: 'sqlite3://log/requests.db' });
 * await storage.establishConnection();
 *
 * // Reuse the host's client
 * const shared = new SqliteStorageAdapter({ client: createClient({ url: 'file:app.db' }) });
 * await shared.ensureSchema();
 * ```
 */
export class SqliteStorageAdapter extends BaseStorageAdapter {
  readonly kind: StorageKind = 'sqlite';
  readonly structuredStorage = false;
  readonly location: SqliteLocation | null;
  readonly connectionName: string | null;

  private registry: ConnectionRegistry<SqliteConnection>;
  private hostClient: Client | null;
  private hostDb: SqliteDatabase | null = null;

  constructor(options: SqliteStorageAdapterOptions = {}) {
    super(options);
    if (options.client && options.location) {
      throw new ConfigurationError('Pass either a client or a location to SqliteStorageAdapter, not both');
    }
    this.location = options.location ? parseSqliteLocation(options.location) : null;
    this.connectionName = this.location
      ? (options.connectionName ?? `inbound_request_logger_sqlite:${this.location.url}`)
      : null;
    this.hostClient = options.client ?? null;
    this.registry = options.registry ?? sqliteConnections;
  }

  available(): boolean {
    return this.driverAvailable('@libsql/client', this.location !== null);
  }

  /**
   * Opens and registers the independent connection, then creates the table.
   * A no-op when reusing the host's client.
   */
  async establishConnection(): Promise<void> {
    if (!this.available() || !this.location || !this.connectionName) return;
    if (this.registry.has(this.connectionName)) return;

    if (this.location.path) {
      await mkdir(dirname(this.location.path), { recursive: true });
    }

    const [{ createClient }, { drizzle }] = await Promise.all([
      import('@libsql/client'),
      import('drizzle-orm/libsql'),
    ]);
    const client = createClient({ url: this.location.url });
    const connection = this.registry.register(
      this.connectionName,
      { client, db: drizzle(client) },
      async () => client.close()
    );
    if (connection.client !== client) {
      client.close();
    }
    await this.ensureSchema();
  }

  /** Creates `inbound_request_logs` and its indexes when missing. */
  async ensureSchema(): Promise<void> {
    const db = await this.database();
    try {
      for (const statement of SQLITE_SCHEMA_STATEMENTS) {
        await db.run(sql.raw(statement));
      }
    } catch (error) {
      throw wrapError(error, 'Failed to create inbound_request_logs');
    }
  }

  /**
   * The drizzle database for this adapter, resolved at the point of I/O.
   * @throws ConnectionResolutionError when the named connection is not registered
   */
  async database(): Promise<SqliteDatabase> {
    if (this.connectionName) {
      return this.registry.resolve(this.connectionName).db;
    }
    if (this.hostDb) return this.hostDb;
    if (!this.hostClient) {
      throw new ConfigurationError('SqliteStorageAdapter needs either a client or a location');
    }
    const { drizzle } = await import('drizzle-orm/libsql');
    this.hostDb = drizzle(this.hostClient);
    return this.hostDb;
  }

  protected async persist(draft: NewLogRecord): Promise<LogRecord> {
    const db = await this.database();
    const [row] = await db.insert(t).values(toRow(draft)).returning();
    if (!row) {
      throw new Error('Insert into inbound_request_logs returned no row');
    }
    return fromSqliteRow(row);
  }

  async search(criteria: SearchCriteria = {}): Promise<LogRecord[]> {
    const db = await this.database();
    let query = db
      .select()
      .from(t)
      .where(sqliteSearchCondition(criteria))
      .orderBy(desc(t.createdAt), desc(t.id))
      .$dynamic();

    if (criteria.limit !== undefined) {
      query = query.limit(criteria.limit);
    } else if (criteria.offset !== undefined) {
      // SQLite only accepts OFFSET after a LIMIT; -1 means no limit
      query = query.limit(-1);
    }
    if (criteria.offset !== undefined) {
      query = query.offset(criteria.offset);
    }

    const rows = await query;
    return rows.map(fromSqliteRow);
  }

  async count(criteria: SearchCriteria = {}): Promise<number> {
    const db = await this.database();
    const [row] = await db.select({ value: count() }).from(t).where(sqliteSearchCondition(criteria));
    return row?.value ?? 0;
  }

  async cleanup(olderThanDays = 90): Promise<number> {
    const db = await this.database();
    const deleted = await db
      .delete(t)
      .where(lt(t.createdAt, cleanupCutoff(olderThanDays)))
      .returning({ id: t.id });
    return deleted.length;
  }

  async clear(): Promise<number> {
    const db = await this.database();
    const deleted = await db.delete(t).returning({ id: t.id });
    return deleted.length;
  }

  async withRequestContaining(key: string, value: unknown): Promise<LogRecord[]> {
    return this.containing(t.requestBody, key, value);
  }

  async withResponseContaining(key: string, value: unknown): Promise<LogRecord[]> {
    return this.containing(t.responseBody, key, value);
  }

  protected async statusCounts(): Promise<StatusCounts> {
    const db = await this.database();
    const [row] = await db
      .select({
        total: count(),
        successful: sql`coalesce(sum(case when ${t.statusCode} between 200 and 299 then 1 else 0 end), 0)`.mapWith(Number),
        clientErrors: sql`coalesce(sum(case when ${t.statusCode} between 400 and 499 then 1 else 0 end), 0)`.mapWith(Number),
        serverErrors: sql`coalesce(sum(case when ${t.statusCode} between 500 and 599 then 1 else 0 end), 0)`.mapWith(Number),
      })
      .from(t);
    return row ?? { total: 0, successful: 0, clientErrors: 0, serverErrors: 0 };
  }

  /** Closes the independent connection. A host client is left open. */
  async close(): Promise<void> {
    if (this.connectionName) {
      await this.registry.remove(this.connectionName);
    }
  }

  protected cacheNamespace(): string {
    return `${this.kind}:${this.connectionName ?? 'host'}`;
  }

  private async containing(
    column: typeof t.requestBody | typeof t.responseBody,
    key: string,
    value: unknown
  ): Promise<LogRecord[]> {
    const db = await this.database();
    const rows = await db
      .select()
      .from(t)
      .where(
        sql`(case when json_valid(${column}) then json_extract(${column}, ${jsonPath(key)}) end) = ${containmentValue(value)}`
      )
      .orderBy(desc(t.createdAt), desc(t.id));
    return rows.map(fromSqliteRow);
  }
}
