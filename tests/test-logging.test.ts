import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  assertRequestCount,
  assertRequestLogged,
  assertSuccessRate,
  MemoryStorageAdapter,
  TestLogging,
  type LogRequestInput,
} from '../src/index.js';

function input(overrides: Partial<LogRequestInput> = {}): LogRequestInput {
  return { httpMethod: 'GET', url: '/users', statusCode: 200, ...overrides };
}

// ============================================================================
// TestLogging Tests
// ============================================================================

describe('TestLogging', () => {
  let testLogging: TestLogging;

  beforeEach(() => {
    testLogging = new TestLogging();
  });

  afterEach(async () => {
    await testLogging.storage().close();
  });

  it('should ignore writes and return empty results while disabled', async () => {
    expect(await testLogging.logRequest(input())).toBeNull();
    expect(await testLogging.logsCount()).toBe(0);
    expect(await testLogging.allLogs()).toEqual([]);
    expect(await testLogging.clearLogs()).toBe(0);
    expect(await testLogging.analyze()).toEqual({
      total: 0,
      successful: 0,
      clientErrors: 0,
      serverErrors: 0,
      successRate: 0,
      errorRate: 0,
    });
  });

  describe('when enabled', () => {
    beforeEach(async () => {
      testLogging.enable();
      await testLogging.logRequest(input());
      await testLogging.logRequest(input({ httpMethod: 'POST', url: '/orders', statusCode: 201 }));
    });

    it('should count and filter logs', async () => {
      expect(testLogging.isEnabled()).toBe(true);
      expect(await testLogging.logsCount()).toBe(2);
      expect(await testLogging.logsWithStatus(201)).toBe(1);
      expect(await testLogging.logsForPath('/orders')).toBe(1);
      expect(await testLogging.logsMatching({ method: 'GET', status: 201 })).toEqual([]);
    });

    it('should list calls newest first', async () => {
      expect(await testLogging.allCalls()).toEqual(['POST /orders', 'GET /users']);
    });

    it('should clear logs and disable on reset', async () => {
      await testLogging.reset();

      expect(testLogging.isEnabled()).toBe(false);
      testLogging.enable();
      expect(await testLogging.logsCount()).toBe(0);
    });
  });

  describe('configure', () => {
    it('should use a given adapter', async () => {
      const adapter = new MemoryStorageAdapter();
      const previous = testLogging.storage();

      expect(await testLogging.configure({ adapter })).toBe(adapter);
      expect(testLogging.storage()).toBe(adapter);
      expect(testLogging.storage()).not.toBe(previous);
    });

    it('should build an SQLite sink from a kind and location', async () => {
      const storage = await testLogging.configure({ kind: 'sqlite', location: ':memory:' });
      testLogging.enable();

      await testLogging.logRequest(input({ url: '/users?page=2' }));

      expect(storage.kind).toBe('sqlite');
      expect(await testLogging.allCalls()).toEqual(['GET /users?page=2']);
    });
  });
});

// ============================================================================
// Assertion Helper Tests
// ============================================================================

describe('assertion helpers', () => {
  let testLogging: TestLogging;

  beforeEach(async () => {
    testLogging = new TestLogging();
    testLogging.enable();
    await testLogging.logRequest(input());
    await testLogging.logRequest(input({ httpMethod: 'POST', url: '/orders', statusCode: 500 }));
  });

  afterEach(async () => {
    await testLogging.storage().close();
  });

  it('should return the matching log', async () => {
    const record = await assertRequestLogged(testLogging, 'POST', '/orders', { status: 500 });

    expect(record.url).toBe('/orders');
  });

  it('should list logged calls when no log matches', async () => {
    await expect(assertRequestLogged(testLogging, 'DELETE', '/users', { status: 204 })).rejects.toThrow(
      'Expected request DELETE /users (204) to be logged. Logged: POST /orders, GET /users'
    );
  });

  it('should say none when nothing is logged', async () => {
    await testLogging.clearLogs();

    await expect(assertRequestLogged(testLogging, 'GET', '/users')).rejects.toThrow(
      'Expected request GET /users to be logged. Logged: none'
    );
  });

  it('should compare request counts', async () => {
    await expect(assertRequestCount(testLogging, 2)).resolves.toBeUndefined();
    await expect(assertRequestCount(testLogging, 1, { method: 'GET' })).resolves.toBeUndefined();
    await expect(assertRequestCount(testLogging, 3)).rejects.toThrow('Expected 3 logged requests, got 2');
  });

  it('should compare the success rate', async () => {
    await expect(assertSuccessRate(testLogging, 50)).resolves.toBeUndefined();
    await expect(assertSuccessRate(testLogging, 75)).rejects.toThrow(
      'Expected success rate of at least 75%, got 50%'
    );
  });
});
