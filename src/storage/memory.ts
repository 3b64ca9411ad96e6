import type { StorageKind } from '../config/types.js';
import { parseJson } from '../config/filters.js';
import type { LogRecord, NewLogRecord, SearchCriteria } from '../record/types.js';
import {
  BaseStorageAdapter,
  cleanupCutoff,
  endOfDay,
  startOfDay,
  toArray,
  type BaseStorageAdapterOptions,
  type StatusCounts,
} from './base.js';

/**
 * Options for MemoryStorageAdapter.
 */
export interface MemoryStorageAdapterOptions extends BaseStorageAdapterOptions {
  /**
   * Maximum number of records to keep.
   * When exceeded, the oldest records are removed.
   * @default 10000
   */
  maxEntries?: number;

  /**
   * Records older than this (ms) are removed by the periodic sweep.
   * Set to 0 to disable age-based cleanup.
   * @default 0
   */
  maxAge?: number;

  /**
   * Interval for the periodic sweep (ms). Only runs when `maxAge` is set.
   * @default 300000 (5 minutes)
   */
  cleanupInterval?: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * JSON containment with the semantics of PostgreSQL's `@>` operator.
 */
export function jsonContains(container: unknown, contained: unknown): boolean {
  if (Array.isArray(contained)) {
    if (!Array.isArray(container)) return false;
    return contained.every((item) => container.some((candidate) => jsonContains(candidate, item)));
  }
  if (isPlainObject(contained)) {
    if (!isPlainObject(container)) return false;
    return Object.entries(contained).every(
      ([key, value]) => Object.prototype.hasOwnProperty.call(container, key) && jsonContains(container[key], value)
    );
  }
  return container === contained;
}

function structuredBody(body: unknown): unknown {
  if (typeof body !== 'string') return body;
  const parsed = parseJson(body);
  return parsed.kind === 'parsed' ? parsed.value : body;
}

function bodyText(body: unknown): string {
  if (body === null || body === undefined) return '';
  if (typeof body === 'string') return body;
  return JSON.stringify(body) ?? '';
}

function newestFirst(a: LogRecord, b: LogRecord): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

/**
 * In-process storage. Stores parsed bodies as values, so it is the default
 * backend for the test sink and for development.
 *
 * Note: This storage is not shared across processes/instances.
 * Use the SQLite or PostgreSQL adapter for anything that must survive a restart.
 *
 * @example
 * ```ts
 * import { MemoryStorageAdapter, setPrimaryStorage } from 'hono-inbound-logger';
 *
 * const storage = new MemoryStorageAdapter({ maxEntries: 5000 });
 * setPrimaryStorage(storage);
 *
 * process.on('SIGTERM', () => storage.destroy());
 * ```
 */
export class MemoryStorageAdapter extends BaseStorageAdapter {
  readonly kind: StorageKind = 'memory';
  readonly structuredStorage = true;

  /** Records stored by id */
  private recordsById = new Map<number, LogRecord>();

  private nextId = 1;
  private maxEntries: number;
  private maxAge: number;
  private cleanupIntervalId: ReturnType<typeof setInterval> | null = null;

  constructor(options: MemoryStorageAdapterOptions = {}) {
    super(options);
    this.maxEntries = options.maxEntries ?? 10000;
    this.maxAge = options.maxAge ?? 0;
    const cleanupInterval = options.cleanupInterval ?? 300000;

    if (this.maxAge > 0 && cleanupInterval > 0) {
      this.cleanupIntervalId = setInterval(() => {
        this.sweep(Date.now() - this.maxAge);
      }, cleanupInterval);

      // Ensure interval doesn't prevent process from exiting
      this.cleanupIntervalId.unref();
    }
  }

  protected async persist(draft: NewLogRecord): Promise<LogRecord> {
    // Map iteration order is insertion order, so the first key is the oldest
    while (this.recordsById.size >= this.maxEntries) {
      const oldest = this.recordsById.keys().next();
      if (oldest.done) break;
      this.recordsById.delete(oldest.value);
    }

    const record: LogRecord = { id: this.nextId++, ...draft };
    this.recordsById.set(record.id, record);
    return record;
  }

  async search(criteria: SearchCriteria = {}): Promise<LogRecord[]> {
    const matches = this.filtered(criteria).sort(newestFirst);
    const offset = criteria.offset ?? 0;
    const limit = criteria.limit ?? matches.length;
    return matches.slice(offset, offset + limit);
  }

  async count(criteria: SearchCriteria = {}): Promise<number> {
    return this.filtered(criteria).length;
  }

  async cleanup(olderThanDays = 90): Promise<number> {
    return this.sweep(cleanupCutoff(olderThanDays).getTime());
  }

  async clear(): Promise<number> {
    const count = this.recordsById.size;
    this.recordsById.clear();
    return count;
  }

  async withRequestContaining(key: string, value: unknown): Promise<LogRecord[]> {
    return this.all().filter((record) => jsonContains(structuredBody(record.requestBody), { [key]: value }));
  }

  async withResponseContaining(key: string, value: unknown): Promise<LogRecord[]> {
    return this.all().filter((record) => jsonContains(structuredBody(record.responseBody), { [key]: value }));
  }

  protected async statusCounts(): Promise<StatusCounts> {
    const counts: StatusCounts = { total: 0, successful: 0, clientErrors: 0, serverErrors: 0 };
    for (const { statusCode } of this.recordsById.values()) {
      counts.total++;
      if (statusCode >= 200 && statusCode <= 299) counts.successful++;
      else if (statusCode >= 400 && statusCode <= 499) counts.clientErrors++;
      else if (statusCode >= 500 && statusCode <= 599) counts.serverErrors++;
    }
    return counts;
  }

  async close(): Promise<void> {
    this.destroy();
  }

  /**
   * Stop the sweep and drop every record.
   */
  destroy(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
    this.recordsById.clear();
  }

  /**
   * Get the number of records (for debugging/monitoring).
   */
  getSize(): number {
    return this.recordsById.size;
  }

  /** Every record, newest first. */
  all(): LogRecord[] {
    return Array.from(this.recordsById.values()).sort(newestFirst);
  }

  private sweep(cutoffMs: number): number {
    let deleted = 0;
    for (const [id, record] of this.recordsById) {
      if (record.createdAt.getTime() < cutoffMs) {
        this.recordsById.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  private filtered(criteria: SearchCriteria): LogRecord[] {
    const q = criteria.q?.toLowerCase();
    const statuses = toArray(criteria.status);
    const methods = toArray(criteria.method).map((method) => method.toUpperCase());
    const start = startOfDay(criteria.startDate);
    const end = endOfDay(criteria.endDate);

    const records: LogRecord[] = [];
    for (const record of this.recordsById.values()) {
      if (q) {
        const haystacks = [record.url, bodyText(record.requestBody), bodyText(record.responseBody)];
        if (!haystacks.some((text) => text.toLowerCase().includes(q))) continue;
      }

      if (statuses.length > 0 && !statuses.includes(record.statusCode)) continue;

      if (methods.length > 0 && !methods.includes(record.httpMethod.toUpperCase())) continue;

      if (criteria.ipAddress && record.ipAddress !== criteria.ipAddress) continue;

      if (criteria.loggable) {
        if (record.loggableType !== criteria.loggable.type) continue;
        if (record.loggableId !== String(criteria.loggable.id)) continue;
      }

      if (start && record.createdAt < start) continue;
      if (end && record.createdAt > end) continue;

      records.push(record);
    }
    return records;
  }
}
