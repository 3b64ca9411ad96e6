import { describe, it, expect } from 'vitest';
import {
  Configuration,
  ConfigurationError,
  LoggerState,
  MemoryCacheStore,
  parseConfigurationOptions,
} from '../src/index.js';
import { createRecordingLogger, delay } from './support/recording-logger.js';

// ============================================================================
// Configuration Tests
// ============================================================================

describe('Configuration', () => {
  describe('defaults', () => {
    it('should start disabled with the default limits', () => {
      const config = new Configuration();

      expect(config.enabled).toBe(false);
      expect(config.debugLogging).toBe(false);
      expect(config.maxBodySize).toBe(10000);
      expect(config.secondaryDatabaseEnabled()).toBe(false);
      expect(config.secondaryDatabaseAdapter).toBe('sqlite');
      expect(config.sensitiveHeaders.has('authorization')).toBe(true);
      expect(config.sensitiveBodyKeys.has('password')).toBe(true);
      expect(config.excludedControllers.has('health')).toBe(true);
    });
  });

  describe('configure', () => {
    it('should change only the keys given', () => {
      const config = new Configuration();
      config.configure({ enabled: true, maxBodySize: 500 });

      expect(config.enabled).toBe(true);
      expect(config.maxBodySize).toBe(500);
      expect(config.sensitiveHeaders.has('cookie')).toBe(true);
    });

    it('should replace collections and lowercase names', () => {
      const config = new Configuration();
      config.configure({ sensitiveHeaders: ['X-Secret'], excludedContentTypes: new Set(['Text/CSV']) });

      expect(Array.from(config.sensitiveHeaders)).toEqual(['x-secret']);
      expect(config.shouldLogContentType('text/csv')).toBe(false);
      expect(config.shouldLogContentType('text/html')).toBe(true);
    });

    it('should build per-controller action exclusions', () => {
      const config = new Configuration({ excludedActions: { reports: ['export'] } });

      expect(config.enabledForController('reports', 'export')).toBe(false);
      expect(config.enabledForController('reports', 'index')).toBe(true);
    });

    it('should accept an injected cache', () => {
      const cache = new MemoryCacheStore();
      const config = new Configuration({ cache });

      expect(config.cache).toBe(cache);
    });
  });

  describe('validation', () => {
    it('should reject unknown keys', () => {
      const options: Record<string, unknown> = { enabeld: true };

      expect(() => parseConfigurationOptions(options)).toThrow(ConfigurationError);
      expect(() => parseConfigurationOptions(options)).toThrow(/Unrecognized key/);
    });

    it('should reject values of the wrong shape', () => {
      expect(() => parseConfigurationOptions({ maxBodySize: -1 })).toThrow(/^Invalid configuration: maxBodySize: /);
      expect(() => parseConfigurationOptions({ cache: {} })).toThrow(
        'Invalid configuration: cache: cache must implement get/set/delete/clear'
      );
    });
  });

  describe('secondary database', () => {
    it('should enable the secondary sink for a valid location', () => {
      const config = new Configuration();
      config.configure({ secondaryDatabaseUrl: 'sqlite3://tmp/requests.db' });

      expect(config.secondaryDatabaseEnabled()).toBe(true);
      expect(config.secondaryDatabaseUrl).toBe('sqlite3://tmp/requests.db');
      expect(config.secondaryDatabaseAdapter).toBe('sqlite');
    });

    it('should normalise the postgres alias', () => {
      const config = new Configuration();
      config.configureSecondaryDatabase('postgres://localhost/request_logs', 'postgres');

      expect(config.secondaryDatabaseAdapter).toBe('postgresql');
    });

    it('should fail at configuration time for unknown kinds and bad locations', () => {
      const config = new Configuration();

      expect(() => config.configureSecondaryDatabase('x.db', 'mongodb')).toThrow('Unsupported storage adapter: mongodb');
      expect(() => config.configureSecondaryDatabase('mysql://host/db', 'postgresql')).toThrow(ConfigurationError);
      expect(config.secondaryDatabaseEnabled()).toBe(false);
    });

    it('should disable the secondary sink with null', () => {
      const config = new Configuration({ secondaryDatabaseUrl: 'sqlite3://tmp/requests.db' });
      config.configureSecondaryDatabase(null);

      expect(config.secondaryDatabaseEnabled()).toBe(false);
    });
  });

  describe('backup and restore', () => {
    it('should roll back every field', () => {
      const config = new Configuration();
      const backup = config.backup();

      config.enabled = true;
      config.excludeController('admin');
      config.sensitiveHeaders.add('x-extra');
      config.restore(backup);

      expect(config.enabled).toBe(false);
      expect(config.excludedControllers.has('admin')).toBe(false);
      expect(config.sensitiveHeaders.has('x-extra')).toBe(false);
    });

    it('should keep the backup reusable', () => {
      const config = new Configuration();
      const backup = config.backup();

      config.restore(backup);
      config.excludeAction('users', 'index');
      config.restore(backup);

      expect(config.enabledForController('users', 'index')).toBe(true);
      expect(backup.excludedActions.size).toBe(0);
    });

    it('should copy independently', () => {
      const config = new Configuration({ enabled: true });
      const copy = config.copy();

      copy.excludeController('billing');
      copy.enabled = false;

      expect(config.enabled).toBe(true);
      expect(config.excludedControllers.has('billing')).toBe(false);
      expect(copy.excludedControllers.has('billing')).toBe(true);
    });
  });

  describe('logger', () => {
    it('should use the injected factory', () => {
      const logger = createRecordingLogger();
      const config = new Configuration({ loggerFactory: () => logger });

      config.logger().warn('hello');

      expect(logger.calls).toEqual([{ level: 'warn', message: 'hello', fields: undefined }]);
    });
  });
});

// ============================================================================
// Scoped Configuration Tests
// ============================================================================

describe('withConfiguration', () => {
  it('should apply overrides inside the block only', () => {
    const state = new LoggerState();

    const inside = state.withConfiguration({ enabled: true }, () => state.isEnabled());

    expect(inside).toBe(true);
    expect(state.isEnabled()).toBe(false);
  });

  it('should nest, innermost first', () => {
    const state = new LoggerState();
    const seen: number[] = [];

    state.withConfiguration({ maxBodySize: 100 }, () => {
      state.withConfiguration({ maxBodySize: 50 }, () => {
        seen.push(state.configuration().maxBodySize);
        seen.push(state.scope.depth());
      });
      seen.push(state.configuration().maxBodySize);
    });
    seen.push(state.configuration().maxBodySize);

    expect(seen).toEqual([50, 2, 100, 10000]);
  });

  it('should restore the previous configuration when the block throws', () => {
    const state = new LoggerState();

    expect(() =>
      state.withConfiguration({ enabled: true }, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(state.isEnabled()).toBe(false);
    expect(state.scope.depth()).toBe(0);
  });

  it('should restore the previous configuration when an async block rejects', async () => {
    const state = new LoggerState();

    await expect(
      state.withConfiguration({ enabled: true }, async () => {
        await delay(1);
        throw new Error('async boom');
      })
    ).rejects.toThrow('async boom');
    expect(state.isEnabled()).toBe(false);
  });

  it('should isolate concurrent flows', async () => {
    const state = new LoggerState();

    const slow = state.withConfiguration({ maxBodySize: 1 }, async () => {
      await delay(20);
      return state.configuration().maxBodySize;
    });
    const fast = state.withConfiguration({ maxBodySize: 2 }, async () => {
      await delay(5);
      return state.configuration().maxBodySize;
    });

    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
  });

  it('should direct administrative mutators at the scoped copy', () => {
    const state = new LoggerState();

    state.withConfiguration({}, () => {
      state.enable();
      state.configuration().excludeController('reports');
      expect(state.isEnabled()).toBe(true);
    });

    expect(state.isEnabled()).toBe(false);
    expect(state.globalConfiguration().excludedControllers.has('reports')).toBe(false);
  });

  it('should accept a mutator instead of options', () => {
    const state = new LoggerState();
    state.enable();

    const inside = state.withConfiguration(
      (config) => config.excludeAction('users', 'index'),
      () => state.enabledFor('users', 'index')
    );

    expect(inside).toBe(false);
    expect(state.enabledFor('users', 'index')).toBe(true);
  });

  it('should reject invalid overrides before running the block', () => {
    const state = new LoggerState();
    let ran = false;

    expect(() =>
      state.withConfiguration({ maxBodySize: -5 }, () => {
        ran = true;
      })
    ).toThrow(ConfigurationError);
    expect(ran).toBe(false);
  });
});
