import { Configuration } from './config/configuration.js';
import type { ConfigurationOptions } from './config/schema.js';
import { ConfigurationScope } from './context/configuration-scope.js';
import { ContextStore } from './context/context-store.js';
import { ConfigurationError } from './core/exceptions.js';
import type { Logger } from './logging/logger.js';
import type { LoggableRef, LogRecord, RequestAnalysis, SearchCriteria } from './record/types.js';
import { createStorageAdapter } from './storage/factory.js';
import type { StorageAdapter } from './storage/types.js';
import { TestLogging } from './testing/test-logging.js';

/** Either a plain options object (validated) or a mutator over the configuration. */
export type ConfigureInput = ConfigurationOptions | ((config: Configuration) => void);

/**
 * Process-wide logger state: the default configuration, the scope and
 * context stores, and the sinks.
 *
 * Every read of "the configuration" goes through {@link LoggerState.configuration},
 * which returns the innermost scoped override before the global default.
 * Administrative mutators (`enable`, `configure`, ...) act on that effective
 * configuration, so inside `withConfiguration` they only touch the scoped copy.
 *
 * @example
 * ```ts
 * const state = new LoggerState();
 * state.configure({ enabled: true });
 * state.setPrimaryStorage(new MemoryStorageAdapter({ configuration: () => state.configuration() }));
 *
 * app.use('*', createCaptureMiddleware({ state }));
 * ```
 */
export class LoggerState {
  readonly context = new ContextStore({
    onDetachedWrite: (operation) =>
      this.logger().warn(`${operation} called outside a logged request; ignored`, { operation }),
  });
  readonly scope = new ConfigurationScope();
  readonly testing: TestLogging;

  private readonly global: Configuration;
  private primary: StorageAdapter | null = null;
  private secondaryAdapters = new Map<string, StorageAdapter>();

  constructor(configuration: Configuration = new Configuration()) {
    this.global = configuration;
    this.testing = new TestLogging({ configuration: () => this.configuration() });
  }

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  /** Innermost scoped override, else the global default. */
  configuration(): Configuration {
    return this.scope.current() ?? this.global;
  }

  /** The global default, bypassing any override. */
  globalConfiguration(): Configuration {
    return this.global;
  }

  configure(input: ConfigureInput): Configuration {
    const config = this.configuration();
    if (typeof input === 'function') {
      input(config);
    } else {
      config.configure(input);
    }
    return config;
  }

  /**
   * Runs `block` against an independent copy of the effective configuration
   * with `overrides` applied. The previous override is back in effect once the
   * block returns, throws or (for async blocks) settles.
   *
   * @example
   * ```ts
   * await withConfiguration({ enabled: false }, async () => {
   *   await app.request('/users'); // not logged
   * });
   * ```
   */
  withConfiguration<T>(overrides: ConfigureInput, block: () => T): T {
    const scoped = this.configuration().copy();
    if (typeof overrides === 'function') {
      overrides(scoped);
    } else {
      scoped.configure(overrides);
    }
    return this.scope.run(scoped, block);
  }

  enable(): void {
    this.configuration().enabled = true;
  }

  disable(): void {
    this.configuration().enabled = false;
  }

  isEnabled(): boolean {
    return this.configuration().enabled;
  }

  /** Enabled, and the controller/action is not excluded. */
  enabledFor(controllerName: string, actionName?: string | null): boolean {
    const config = this.configuration();
    return config.enabled && config.enabledForController(controllerName, actionName);
  }

  logger(): Logger {
    return this.configuration().logger();
  }

  // --------------------------------------------------------------------------
  // Per-request context
  // --------------------------------------------------------------------------

  setMetadata(metadata: Record<string, unknown>): void {
    this.context.setMetadata(metadata);
  }

  getMetadata(): Record<string, unknown> {
    return this.context.getMetadata();
  }

  addMetadata(metadata: Record<string, unknown>): void {
    this.context.addMetadata(metadata);
  }

  setLoggable(loggable: LoggableRef | null): void {
    this.context.setLoggable(loggable);
  }

  getLoggable(): LoggableRef | null {
    return this.context.getLoggable();
  }

  clearContext(): void {
    this.context.clear();
  }

  // --------------------------------------------------------------------------
  // Sinks
  // --------------------------------------------------------------------------

  setPrimaryStorage(storage: StorageAdapter | null): void {
    this.primary = storage;
  }

  getPrimaryStorage(): StorageAdapter | null {
    return this.primary;
  }

  /**
   * @throws ConfigurationError for an unknown kind or malformed location
   */
  enableSecondaryDatabase(location: string, kind: string = 'sqlite'): void {
    this.configuration().configureSecondaryDatabase(location, kind);
  }

  disableSecondaryDatabase(): void {
    const config = this.configuration();
    config.configureSecondaryDatabase(null, config.secondaryDatabaseAdapter);
  }

  /**
   * Secondary sink for the effective configuration, built and connected on
   * first use and cached per kind and location.
   */
  async secondaryStorage(): Promise<StorageAdapter | null> {
    const config = this.configuration();
    const location = config.secondaryDatabaseUrl;
    if (!config.secondaryDatabaseEnabled() || location === null) return null;

    const key = `${config.secondaryDatabaseAdapter}|${location}`;
    const cached = this.secondaryAdapters.get(key);
    if (cached) return cached;

    const adapter = createStorageAdapter(config.secondaryDatabaseAdapter, location, {
      configuration: () => this.configuration(),
    });
    await adapter.establishConnection();
    this.secondaryAdapters.set(key, adapter);
    return adapter;
  }

  // --------------------------------------------------------------------------
  // Queries over the current sink
  // --------------------------------------------------------------------------

  /**
   * The primary storage, else the secondary one.
   * @throws ConfigurationError when neither is configured
   */
  async currentStorage(): Promise<StorageAdapter> {
    const storage = this.primary ?? (await this.secondaryStorage());
    if (!storage) {
      throw new ConfigurationError('No request log storage configured: set a primary storage or a secondary database');
    }
    return storage;
  }

  async cleanup(olderThanDays = 90): Promise<number> {
    return (await this.currentStorage()).cleanup(olderThanDays);
  }

  async search(criteria: SearchCriteria = {}): Promise<LogRecord[]> {
    return (await this.currentStorage()).search(criteria);
  }

  async analyze(): Promise<RequestAnalysis> {
    return (await this.currentStorage()).analyze();
  }

  /**
   * Back to defaults: configuration restored, context cleared, sinks dropped.
   * Secondary connections opened by this state are closed.
   */
  async reset(): Promise<void> {
    this.global.restore(new Configuration().backup());
    this.context.clear();
    this.primary = null;
    const adapters = Array.from(this.secondaryAdapters.values());
    this.secondaryAdapters.clear();
    for (const adapter of adapters) {
      await adapter.close();
    }
    await this.testing.reset();
  }
}

// ============================================================================
// Process-wide instance
// ============================================================================

let state: LoggerState | null = null;

export function getLoggerState(): LoggerState {
  if (!state) {
    state = new LoggerState();
  }
  return state;
}

/**
 * Replaces the process-wide state (for example with one built from a
 * prepared configuration at startup).
 */
export function setLoggerState(next: LoggerState): void {
  state = next;
}

export const enable = (): void => getLoggerState().enable();
export const disable = (): void => getLoggerState().disable();
export const isEnabled = (): boolean => getLoggerState().isEnabled();
export const enabledFor = (controllerName: string, actionName?: string | null): boolean =>
  getLoggerState().enabledFor(controllerName, actionName);
export const configure = (input: ConfigureInput): Configuration => getLoggerState().configure(input);
export const configuration = (): Configuration => getLoggerState().configuration();
export const globalConfiguration = (): Configuration => getLoggerState().globalConfiguration();
export const withConfiguration = <T>(overrides: ConfigureInput, block: () => T): T =>
  getLoggerState().withConfiguration(overrides, block);

export const setMetadata = (metadata: Record<string, unknown>): void => getLoggerState().setMetadata(metadata);
export const getMetadata = (): Record<string, unknown> => getLoggerState().getMetadata();
export const addMetadata = (metadata: Record<string, unknown>): void => getLoggerState().addMetadata(metadata);
export const setLoggable = (loggable: LoggableRef | null): void => getLoggerState().setLoggable(loggable);
export const getLoggable = (): LoggableRef | null => getLoggerState().getLoggable();
export const clearContext = (): void => getLoggerState().clearContext();

export const setPrimaryStorage = (storage: StorageAdapter | null): void => getLoggerState().setPrimaryStorage(storage);
export const getPrimaryStorage = (): StorageAdapter | null => getLoggerState().getPrimaryStorage();
export const enableSecondaryDatabase = (location: string, kind?: string): void =>
  getLoggerState().enableSecondaryDatabase(location, kind);
export const disableSecondaryDatabase = (): void => getLoggerState().disableSecondaryDatabase();

export const cleanup = (olderThanDays?: number): Promise<number> => getLoggerState().cleanup(olderThanDays);
export const search = (criteria?: SearchCriteria): Promise<LogRecord[]> => getLoggerState().search(criteria);
export const analyze = (): Promise<RequestAnalysis> => getLoggerState().analyze();
export const testLogging = (): TestLogging => getLoggerState().testing;
