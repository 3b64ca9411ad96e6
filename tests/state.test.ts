import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigurationError,
  getLoggerState,
  LoggerState,
  MemoryStorageAdapter,
  setLoggerState,
  SqliteStorageAdapter,
} from '../src/index.js';
import * as logger from '../src/index.js';

// ============================================================================
// LoggerState Tests
// ============================================================================

describe('LoggerState', () => {
  let state: LoggerState;

  beforeEach(() => {
    state = new LoggerState();
  });

  afterEach(async () => {
    await state.reset();
  });

  describe('administration', () => {
    it('should toggle the effective configuration', () => {
      expect(state.isEnabled()).toBe(false);

      state.enable();
      expect(state.isEnabled()).toBe(true);
      expect(state.globalConfiguration().enabled).toBe(true);

      state.disable();
      expect(state.isEnabled()).toBe(false);
    });

    it('should check controller exclusions only while enabled', () => {
      state.configure((config) => config.excludeController('admin'));

      expect(state.enabledFor('users')).toBe(false);
      state.enable();
      expect(state.enabledFor('users', 'index')).toBe(true);
      expect(state.enabledFor('admin', 'index')).toBe(false);
    });

    it('should restore defaults on reset', async () => {
      state.configure({ enabled: true, maxBodySize: 10 });
      state.setPrimaryStorage(new MemoryStorageAdapter());
      state.testing.enable();

      await state.reset();

      expect(state.isEnabled()).toBe(false);
      expect(state.configuration().maxBodySize).toBe(10_000);
      expect(state.getPrimaryStorage()).toBeNull();
      expect(state.testing.isEnabled()).toBe(false);
    });
  });

  describe('currentStorage', () => {
    it('should throw when no storage is configured', async () => {
      await expect(state.currentStorage()).rejects.toThrow(
        new ConfigurationError('No request log storage configured: set a primary storage or a secondary database')
      );
      await expect(state.search()).rejects.toThrow(ConfigurationError);
    });

    it('should delegate queries to the primary storage', async () => {
      const storage = new MemoryStorageAdapter({ configuration: () => state.configuration() });
      state.setPrimaryStorage(storage);
      await storage.logRequest({ httpMethod: 'GET', url: '/users', statusCode: 200 });
      await storage.logRequest({ httpMethod: 'GET', url: '/users/9', statusCode: 404 });

      expect((await state.search({ status: 404 })).map((record) => record.url)).toEqual(['/users/9']);
      expect(await state.analyze()).toMatchObject({ total: 2, successful: 1, clientErrors: 1, successRate: 50 });
      expect(await state.cleanup(30)).toBe(0);

      storage.destroy();
    });
  });

  describe('secondary database', () => {
    it('should build the secondary adapter once per location', async () => {
      state.enableSecondaryDatabase(':memory:');

      const first = await state.secondaryStorage();
      const second = await state.secondaryStorage();

      expect(first).toBeInstanceOf(SqliteStorageAdapter);
      expect(second).toBe(first);
      expect(await state.currentStorage()).toBe(first);
    });

    it('should stop using the secondary database once disabled', async () => {
      state.enableSecondaryDatabase(':memory:', 'sqlite');
      state.disableSecondaryDatabase();

      expect(state.configuration().secondaryDatabaseUrl).toBeNull();
      expect(await state.secondaryStorage()).toBeNull();
    });

    it('should reject unknown adapters', () => {
      expect(() => state.enableSecondaryDatabase(':memory:', 'mongodb')).toThrow(
        'Unsupported storage adapter: mongodb'
      );
    });
  });
});

// ============================================================================
// Process-wide State Tests
// ============================================================================

describe('process-wide state', () => {
  let previous: LoggerState;

  beforeEach(() => {
    previous = getLoggerState();
    setLoggerState(new LoggerState());
  });

  afterEach(async () => {
    await getLoggerState().reset();
    setLoggerState(previous);
  });

  it('should route admin functions to the installed state', () => {
    logger.enable();
    logger.configure({ maxBodySize: 512 });

    expect(getLoggerState().isEnabled()).toBe(true);
    expect(logger.configuration().maxBodySize).toBe(512);
    expect(logger.isEnabled()).toBe(true);
    expect(logger.testLogging()).toBe(getLoggerState().testing);
  });

  it('should scope overrides with withConfiguration', async () => {
    logger.enable();

    const inside = await logger.withConfiguration({ enabled: false }, async () => logger.isEnabled());

    expect(inside).toBe(false);
    expect(logger.isEnabled()).toBe(true);
  });

  it('should expose the primary storage accessors', () => {
    const storage = new MemoryStorageAdapter();
    logger.setPrimaryStorage(storage);

    expect(logger.getPrimaryStorage()).toBe(storage);
    storage.destroy();
  });
});
