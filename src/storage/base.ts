import { createRequire } from 'node:module';
import { Configuration } from '../config/configuration.js';
import type { StorageKind } from '../config/types.js';
import { reportError } from '../logging/report.js';
import { buildLogRecord, pathOf } from '../record/build.js';
import type {
  LogRecord,
  LogRequestInput,
  LogRequestOptions,
  NewLogRecord,
  RequestAnalysis,
  SearchCriteria,
} from '../record/types.js';
import type { ConfigurationSource, StorageAdapter } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Cached analysis lifetime, in seconds. */
export const ANALYSIS_TTL = 60;

export interface BaseStorageAdapterOptions {
  /** Defaults to a private, default-valued configuration. */
  configuration?: ConfigurationSource;
}

/** Raw counts an adapter reports for {@link BaseStorageAdapter.analyze}. */
export interface StatusCounts {
  total: number;
  successful: number;
  clientErrors: number;
  serverErrors: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Lower-cased `LIKE` pattern matching `q` as a literal substring, for use with
 * a backslash `escape` character. Backslash, `%` and `_` in `q` are escaped.
 */
export function containsPattern(q: string): string {
  return `%${q.toLowerCase().replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

function parseDate(value: Date | string | undefined): Date | null {
  if (value === undefined) return null;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Midnight UTC of the given day, or null for an unparseable date. */
export function startOfDay(value: Date | string | undefined): Date | null {
  const date = parseDate(value);
  if (!date) return null;
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/** Last millisecond of the given day (UTC), or null for an unparseable date. */
export function endOfDay(value: Date | string | undefined): Date | null {
  const start = startOfDay(value);
  return start ? new Date(start.getTime() + DAY_MS - 1) : null;
}

export function cleanupCutoff(olderThanDays: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - olderThanDays * DAY_MS);
}

export function buildAnalysis(counts: StatusCounts): RequestAnalysis {
  const { total, successful, clientErrors, serverErrors } = counts;
  return {
    total,
    successful,
    clientErrors,
    serverErrors,
    successRate: total === 0 ? 0 : round2((successful / total) * 100),
    errorRate: total === 0 ? 0 : round2(((clientErrors + serverErrors) / total) * 100),
  };
}

/**
 * Shared behaviour of the bundled backends: exclusion check, record
 * assembly and validation, failure reporting and cached analysis.
 * Subclasses supply persistence and queries.
 */
export abstract class BaseStorageAdapter implements StorageAdapter {
  abstract readonly kind: StorageKind;
  abstract readonly structuredStorage: boolean;

  protected readonly configurationSource: ConfigurationSource;
  private driverChecks = new Map<string, boolean>();

  protected constructor(options: BaseStorageAdapterOptions = {}) {
    if (options.configuration) {
      this.configurationSource = options.configuration;
    } else {
      const own = new Configuration();
      this.configurationSource = () => own;
    }
  }

  protected config(): Configuration {
    return this.configurationSource();
  }

  available(): boolean {
    return true;
  }

  async establishConnection(): Promise<void> {}

  async close(): Promise<void> {}

  async logRequest(input: LogRequestInput, options: LogRequestOptions = {}): Promise<LogRecord | null> {
    const config = this.config();
    if (!this.available()) return null;
    if (!config.shouldLogPath(input.path ?? pathOf(input.url))) return null;

    try {
      const draft = buildLogRecord(input, config, { ...options, structured: this.structuredStorage });
      return await this.persist(draft);
    } catch (error) {
      reportError(config, `Failed to log request to ${this.kind} storage`, error);
      return null;
    }
  }

  /**
   * Aggregate status counts, memoised through the configured cache when one is set.
   */
  async analyze(): Promise<RequestAnalysis> {
    const cache = this.config().cache;
    if (!cache) {
      return buildAnalysis(await this.statusCounts());
    }

    const key = `inbound-request-logger:analysis:${this.cacheNamespace()}`;
    const cached = await cache.get<RequestAnalysis>(key);
    if (cached) return cached.data;

    const analysis = buildAnalysis(await this.statusCounts());
    await cache.set(key, analysis, { ttl: ANALYSIS_TTL });
    return analysis;
  }

  /** Distinguishes cached analyses of different stores. */
  protected cacheNamespace(): string {
    return this.kind;
  }

  /**
   * Checks that a driver package can be resolved, once per package.
   * Warns once when it is missing and `warn` is set.
   */
  protected driverAvailable(packageName: string, warn: boolean): boolean {
    const known = this.driverChecks.get(packageName);
    if (known !== undefined) return known;

    let found: boolean;
    try {
      createRequire(import.meta.url).resolve(packageName);
      found = true;
    } catch {
      found = false;
      if (warn) {
        this.config().logger().warn(`${packageName} is not installed; ${this.kind} request logging is disabled`, {
          adapter: this.kind,
        });
      }
    }
    this.driverChecks.set(packageName, found);
    return found;
  }

  protected abstract persist(draft: NewLogRecord): Promise<LogRecord>;
  protected abstract statusCounts(): Promise<StatusCounts>;

  abstract search(criteria?: SearchCriteria): Promise<LogRecord[]>;
  abstract count(criteria?: SearchCriteria): Promise<number>;
  abstract cleanup(olderThanDays?: number): Promise<number>;
  abstract clear(): Promise<number>;
  abstract withRequestContaining(key: string, value: unknown): Promise<LogRecord[]>;
  abstract withResponseContaining(key: string, value: unknown): Promise<LogRecord[]>;
}
