import type { CacheStore } from '../cache/types.js';
import { getDefaultLogger, type Logger, type LoggerFactory } from '../logging/logger.js';
import { assertStorageKind, parseLocation } from '../storage/location.js';
import {
  DEFAULT_EXCLUDED_CONTENT_TYPES,
  DEFAULT_EXCLUDED_CONTROLLERS,
  DEFAULT_EXCLUDED_PATHS,
  DEFAULT_MAX_BODY_SIZE,
  DEFAULT_SENSITIVE_BODY_KEYS,
  DEFAULT_SENSITIVE_HEADERS,
} from './defaults.js';
import * as filters from './filters.js';
import { parseConfigurationOptions, type ConfigurationOptions } from './schema.js';
import type { FilterSnapshot, PathPattern, StorageKind } from './types.js';

/**
 * Point-in-time copy of a {@link Configuration}.
 * Every collection is an independent copy, so restoring is a true rollback.
 */
export interface ConfigurationBackup {
  readonly enabled: boolean;
  readonly debugLogging: boolean;
  readonly maxBodySize: number;
  readonly secondaryDatabaseUrl: string | null;
  readonly secondaryDatabaseAdapter: StorageKind;
  readonly loggerFactory: LoggerFactory | null;
  readonly cache: CacheStore | null;
  readonly excludedPaths: Set<PathPattern>;
  readonly excludedContentTypes: Set<string>;
  readonly sensitiveHeaders: Set<string>;
  readonly sensitiveBodyKeys: Set<string>;
  readonly excludedControllers: Set<string>;
  readonly excludedActions: Map<string, Set<string>>;
}

function lowerSet(values: Iterable<string>): Set<string> {
  return new Set(Array.from(values, (value) => value.toLowerCase()));
}

function copyActions(actions: ReadonlyMap<string, ReadonlySet<string>>): Map<string, Set<string>> {
  const copy = new Map<string, Set<string>>();
  for (const [controller, names] of actions) {
    copy.set(controller, new Set(names));
  }
  return copy;
}

/**
 * All filtering rules, size limits and sink settings for one scope.
 *
 * The process-wide default lives on the logger state; scoped overrides are
 * independent copies made with {@link Configuration.copy}. Filter predicates
 * delegate to the pure functions in `filters.ts` with `this` as the snapshot.
 *
 * @example
 * ```ts
 * const config = new Configuration();
 * config.configure({ enabled: true, maxBodySize: 50_000 });
 * config.excludeController('admin/metrics');
 * config.shouldLogPath('/health'); // false
 * ```
 */
export class Configuration implements FilterSnapshot {
  enabled = false;
  debugLogging = false;
  maxBodySize = DEFAULT_MAX_BODY_SIZE;
  secondaryDatabaseUrl: string | null = null;
  secondaryDatabaseAdapter: StorageKind = 'sqlite';
  loggerFactory: LoggerFactory | null = null;
  cache: CacheStore | null = null;

  excludedPaths = new Set<PathPattern>(DEFAULT_EXCLUDED_PATHS);
  excludedContentTypes = new Set<string>(DEFAULT_EXCLUDED_CONTENT_TYPES);
  sensitiveHeaders = new Set<string>(DEFAULT_SENSITIVE_HEADERS);
  sensitiveBodyKeys = new Set<string>(DEFAULT_SENSITIVE_BODY_KEYS);
  excludedControllers = new Set<string>(DEFAULT_EXCLUDED_CONTROLLERS);
  excludedActions = new Map<string, Set<string>>();

  constructor(options?: ConfigurationOptions) {
    if (options) {
      this.configure(options);
    }
  }

  /**
   * Applies options after validating them. Only the keys present are changed;
   * collections given here replace the current collection entirely.
   *
   * @throws ConfigurationError for unknown keys, wrong types or a malformed secondary location
   */
  configure(input: ConfigurationOptions): this {
    const options = parseConfigurationOptions(input);

    if (options.enabled !== undefined) this.enabled = options.enabled;
    if (options.debugLogging !== undefined) this.debugLogging = options.debugLogging;
    if (options.maxBodySize !== undefined) this.maxBodySize = options.maxBodySize;
    if (options.loggerFactory !== undefined) this.loggerFactory = options.loggerFactory;
    if (options.cache !== undefined) this.cache = options.cache;

    if (options.excludedPaths) this.excludedPaths = new Set(options.excludedPaths);
    if (options.excludedContentTypes) this.excludedContentTypes = lowerSet(options.excludedContentTypes);
    if (options.sensitiveHeaders) this.sensitiveHeaders = lowerSet(options.sensitiveHeaders);
    if (options.sensitiveBodyKeys) this.sensitiveBodyKeys = lowerSet(options.sensitiveBodyKeys);
    if (options.excludedControllers) this.excludedControllers = new Set(options.excludedControllers);
    if (options.excludedActions) {
      this.excludedActions = new Map(
        Object.entries(options.excludedActions).map(([controller, actions]) => [controller, new Set(actions)])
      );
    }

    if (options.secondaryDatabaseUrl !== undefined || options.secondaryDatabaseAdapter !== undefined) {
      this.configureSecondaryDatabase(
        options.secondaryDatabaseUrl !== undefined ? options.secondaryDatabaseUrl : this.secondaryDatabaseUrl,
        options.secondaryDatabaseAdapter ?? this.secondaryDatabaseAdapter
      );
    }

    return this;
  }

  // --------------------------------------------------------------------------
  // Filter predicates
  // --------------------------------------------------------------------------

  shouldLogPath(path: string | null | undefined): boolean {
    return filters.shouldLogPath(this, path);
  }

  shouldLogContentType(contentType: string | null | undefined): boolean {
    return filters.shouldLogContentType(this, contentType);
  }

  enabledForController(controllerName: string, actionName?: string | null): boolean {
    return filters.enabledForController(this, controllerName, actionName);
  }

  filterHeaders(headers: unknown): Record<string, string> {
    return filters.filterHeaders(this, headers);
  }

  filterBody(body: unknown): unknown {
    return filters.filterBody(this, body);
  }

  filterSensitiveData(data: unknown): unknown {
    return filters.filterSensitiveData(this, data);
  }

  // --------------------------------------------------------------------------
  // Mutators owned by this scope
  // --------------------------------------------------------------------------

  excludeController(controllerName: string): void {
    this.excludedControllers.add(controllerName);
  }

  excludeAction(controllerName: string, actionName: string): void {
    const actions = this.excludedActions.get(controllerName) ?? new Set<string>();
    actions.add(actionName);
    this.excludedActions.set(controllerName, actions);
  }

  /**
   * Points the secondary sink at a location, or disables it with `null`.
   *
   * @throws ConfigurationError for an unknown adapter kind or malformed location
   */
  configureSecondaryDatabase(url: string | null, adapter: string = 'sqlite'): void {
    const kind = assertStorageKind(adapter);
    if (url !== null) {
      parseLocation(kind, url);
    }
    this.secondaryDatabaseUrl = url;
    this.secondaryDatabaseAdapter = kind;
  }

  secondaryDatabaseEnabled(): boolean {
    return this.secondaryDatabaseUrl !== null && this.secondaryDatabaseUrl.length > 0;
  }

  /**
   * Logger from the injected factory, or the shared pino logger.
   */
  logger(): Logger {
    return this.loggerFactory ? this.loggerFactory() : getDefaultLogger();
  }

  // --------------------------------------------------------------------------
  // Snapshots
  // --------------------------------------------------------------------------

  backup(): ConfigurationBackup {
    return {
      enabled: this.enabled,
      debugLogging: this.debugLogging,
      maxBodySize: this.maxBodySize,
      secondaryDatabaseUrl: this.secondaryDatabaseUrl,
      secondaryDatabaseAdapter: this.secondaryDatabaseAdapter,
      loggerFactory: this.loggerFactory,
      cache: this.cache,
      excludedPaths: new Set(this.excludedPaths),
      excludedContentTypes: new Set(this.excludedContentTypes),
      sensitiveHeaders: new Set(this.sensitiveHeaders),
      sensitiveBodyKeys: new Set(this.sensitiveBodyKeys),
      excludedControllers: new Set(this.excludedControllers),
      excludedActions: copyActions(this.excludedActions),
    };
  }

  /**
   * Replaces every field with the backup's values. Never merges.
   * The backup itself stays reusable: collections are copied again on the way in.
   */
  restore(backup: ConfigurationBackup): void {
    this.enabled = backup.enabled;
    this.debugLogging = backup.debugLogging;
    this.maxBodySize = backup.maxBodySize;
    this.secondaryDatabaseUrl = backup.secondaryDatabaseUrl;
    this.secondaryDatabaseAdapter = backup.secondaryDatabaseAdapter;
    this.loggerFactory = backup.loggerFactory;
    this.cache = backup.cache;
    this.excludedPaths = new Set(backup.excludedPaths);
    this.excludedContentTypes = new Set(backup.excludedContentTypes);
    this.sensitiveHeaders = new Set(backup.sensitiveHeaders);
    this.sensitiveBodyKeys = new Set(backup.sensitiveBodyKeys);
    this.excludedControllers = new Set(backup.excludedControllers);
    this.excludedActions = copyActions(backup.excludedActions);
  }

  /**
   * Independent copy; mutating either side never affects the other.
   */
  copy(): Configuration {
    const copy = new Configuration();
    copy.restore(this.backup());
    return copy;
  }
}
