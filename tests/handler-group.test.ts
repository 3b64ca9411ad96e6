import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Hono } from 'hono';
import {
  addLogMetadata,
  ConfigurationError,
  createCaptureMiddleware,
  defineHandlerGroup,
  logEvent,
  LoggerState,
  MemoryStorageAdapter,
  setLogLoggable,
  type InboundLoggerEnv,
} from '../src/index.js';
import { createRecordingLogger } from './support/recording-logger.js';

// ============================================================================
// Handler Group Definition Tests
// ============================================================================

describe('defineHandlerGroup', () => {
  it('should reject only and except together', () => {
    expect(() => defineHandlerGroup({ name: 'users', only: ['show'], except: ['index'] })).toThrow(
      new ConfigurationError("Handler group 'users' cannot declare both only and except")
    );
  });

  it('should reject references to unknown named callbacks', () => {
    expect(() => defineHandlerGroup({ name: 'orders', context: 'missing' })).toThrow(
      "Handler group 'orders' references unknown context callback 'missing'"
    );
  });

  it('should apply only and except lists', () => {
    const onlyShow = defineHandlerGroup({ name: 'users', only: ['show'] });
    const exceptIndex = defineHandlerGroup({ name: 'users', except: ['index'] });

    expect(onlyShow.logsAction('show')).toBe(true);
    expect(onlyShow.logsAction('index')).toBe(false);
    expect(exceptIndex.logsAction('index')).toBe(false);
    expect(exceptIndex.logsAction('create')).toBe(true);
  });

  it('should inherit rules through the parent chain', () => {
    const callback = () => undefined;
    const root = defineHandlerGroup({ name: 'api', only: ['show'], context: callback });
    const middle = defineHandlerGroup({ name: 'api/v1', parent: root });
    const leaf = defineHandlerGroup({ name: 'api/v1/users', parent: middle });

    expect(leaf.logsAction('show')).toBe(true);
    expect(leaf.logsAction('index')).toBe(false);
    expect(leaf.contextCallback()).toBe(callback);
    expect(defineHandlerGroup({ name: 'other' }).contextCallback()).toBeNull();
  });
});

// ============================================================================
// Handler Group Integration Tests
// ============================================================================

describe('HandlerGroup handlers', () => {
  let state: LoggerState;
  let storage: MemoryStorageAdapter;
  let app: Hono<InboundLoggerEnv>;

  beforeEach(() => {
    state = new LoggerState();
    state.configure({ enabled: true });
    storage = new MemoryStorageAdapter({ configuration: () => state.configuration() });
    state.setPrimaryStorage(storage);
    app = new Hono<InboundLoggerEnv>();
    app.use('*', createCaptureMiddleware({ state }));
  });

  afterEach(async () => {
    await state.reset();
    storage.destroy();
  });

  it('should record basic metadata for a logged action', async () => {
    const users = defineHandlerGroup({ name: 'users', state });
    app.get('/users/:id', users.handler('show', (c) => c.json({ id: c.req.param('id') })));

    await app.request('/users/7', { headers: { 'x-request-id': 'req-1' } });

    expect(storage.all()[0]?.metadata).toEqual({
      controller: 'users',
      action: 'show',
      format: 'json',
      requestId: 'req-1',
    });
  });

  it('should add the current user', async () => {
    const users = defineHandlerGroup({
      name: 'users',
      state,
      currentUser: (c) => (c.req.header('x-user-id') ? { id: 42, type: 'Admin' } : null),
    });
    app.get('/me', users.handler('me', (c) => c.text('me')));

    await app.request('/me', { headers: { 'x-user-id': '42', 'x-request-id': 'req-2' } });

    expect(storage.all()[0]?.metadata).toEqual({
      controller: 'users',
      action: 'me',
      format: 'plain',
      requestId: 'req-2',
      userId: 42,
      userType: 'Admin',
    });
  });

  it('should apply the loggable and metadata from the context callback', async () => {
    const orders = defineHandlerGroup({
      name: 'orders',
      state,
      context: (c, log) => {
        log.loggable = { type: 'Order', id: c.req.param('id') ?? 'unknown' };
        log.metadata.channel = 'web';
      },
    });
    app.get('/orders/:id', orders.handler('show', (c) => c.json({ ok: true })));

    await app.request('/orders/ord_9', { headers: { 'x-request-id': 'req-3' } });

    expect(storage.all()[0]).toMatchObject({
      loggableType: 'Order',
      loggableId: 'ord_9',
      metadata: { controller: 'orders', action: 'show', channel: 'web' },
    });
  });

  it('should resolve named callbacks declared on a parent', async () => {
    const api = defineHandlerGroup({
      name: 'api',
      state,
      namedCallbacks: {
        tenant: (c, log) => {
          log.metadata.tenant = c.req.header('x-tenant') ?? null;
        },
      },
    });
    const orders = defineHandlerGroup({ name: 'orders', parent: api, context: 'tenant' });
    app.get('/orders', orders.handler('index', (c) => c.json([])));

    await app.request('/orders', { headers: { 'x-tenant': 'acme' } });

    expect(storage.all()[0]?.metadata.tenant).toBe('acme');
  });

  it('should skip group metadata for actions the group does not log', async () => {
    const users = defineHandlerGroup({
      name: 'users',
      state,
      except: ['index'],
      context: (_c, log) => {
        log.metadata.fromCallback = true;
      },
    });
    app.get('/users', users.handler('index', (c) => c.json([])));

    await app.request('/users');

    expect(storage.all()[0]?.metadata).toEqual({ controller: 'users', action: 'index' });
  });

  it('should not log actions excluded in the configuration', async () => {
    state.configuration().excludeAction('users', 'destroy');
    const users = defineHandlerGroup({ name: 'users', state });
    app.delete('/users/:id', users.handler('destroy', (c) => c.body(null, 204)));

    const res = await app.request('/users/1', { method: 'DELETE' });

    expect(res.status).toBe(204);
    expect(await storage.count()).toBe(0);
  });

  it('should report a failing callback and keep the response', async () => {
    const logger = createRecordingLogger();
    state.configure({ loggerFactory: () => logger });
    const users = defineHandlerGroup({
      name: 'users',
      state,
      context: () => {
        throw new Error('callback failed');
      },
    });
    app.get('/users/:id', users.handler('show', (c) => c.json({ ok: true })));

    const res = await app.request('/users/1');

    expect(await res.json()).toEqual({ ok: true });
    expect(await storage.count()).toBe(1);
    expect(logger.calls.map((call) => call.message)).toEqual([
      'Error building log context for users#show: Error: callback failed',
    ]);
  });

  describe('helpers', () => {
    it('should add metadata, set the loggable and append events', async () => {
      app.post('/checkout', (c) => {
        addLogMetadata({ cart: 'c_1' }, state);
        setLogLoggable({ type: 'Cart', id: 'c_1' }, state);
        logEvent('payment_started', { amount: 10 }, state);
        logEvent('payment_captured', {}, state);
        return c.json({ ok: true });
      });

      await app.request('/checkout', { method: 'POST' });

      const [record] = storage.all();
      expect(record).toMatchObject({ loggableType: 'Cart', loggableId: 'c_1' });
      expect(record?.metadata).toEqual({
        cart: 'c_1',
        events: [
          { event: 'payment_started', data: { amount: 10 }, timestamp: expect.any(String) },
          { event: 'payment_captured', data: {}, timestamp: expect.any(String) },
        ],
      });
    });
  });
});
