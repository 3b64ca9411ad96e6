import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { getConnInfo } from '@hono/node-server/conninfo';
import {
  analyze,
  configure,
  createCaptureMiddleware,
  defineHandlerGroup,
  getRequestId,
  logEvent,
  MemoryCacheStore,
  setPrimaryStorage,
  SqliteStorageAdapter,
  type InboundLoggerEnv,
} from '../src/index.js';

configure({
  enabled: true,
  maxBodySize: 20_000,
  excludedPaths: ['/health', /^\/assets\//],
  cache: new MemoryCacheStore({ defaultTtl: 60 }),
});

// Primary sink: a local SQLite file
const storage = new SqliteStorageAdapter({ location: process.env.REQUEST_LOG_DB ?? 'sqlite3://log/inbound_requests.db' });
await storage.establishConnection();
setPrimaryStorage(storage);

// In-memory users
const users = new Map<string, { id: string; name: string; email: string; password?: string }>();

const app = new Hono<InboundLoggerEnv>();

app.use(
  '*',
  createCaptureMiddleware({
    resolveClientAddress: (c) => getConnInfo(c).remote.address ?? null,
  })
);

const usersGroup = defineHandlerGroup({
  name: 'users',
  except: ['index'],
  currentUser: (c) => {
    const id = c.req.header('x-user-id');
    return id ? { id, type: 'User' } : null;
  },
  context: (c, log) => {
    const id = c.req.param('id');
    if (id) {
      log.loggable = { type: 'User', id };
    }
    log.metadata.client = c.req.header('x-client') ?? 'unknown';
  },
});

app.get(
  '/users',
  usersGroup.handler('index', (c) => c.json({ data: Array.from(users.values()) }))
);

app.post(
  '/users',
  usersGroup.handler('create', async (c) => {
    const body = await c.req.json<{ name: string; email: string; password?: string }>();
    const user = { id: randomUUID(), ...body };
    users.set(user.id, user);
    logEvent('user_created', { email: user.email });
    return c.json({ data: { id: user.id, name: user.name, email: user.email } }, 201);
  })
);

app.get(
  '/users/:id',
  usersGroup.handler('show', (c) => {
    const user = users.get(c.req.param('id'));
    if (!user) {
      return c.json({ error: 'Not found', requestId: getRequestId(c) }, 404);
    }
    return c.json({ data: { id: user.id, name: user.name, email: user.email } });
  })
);

app.get('/stats', async (c) => c.json(await analyze()));

app.get('/health', (c) => c.json({ status: 'ok' }));

// Start server
const port = Number(process.env.PORT) || 3456;
console.log(`Server running at http://localhost:${port}`);
console.log(`Request stats at http://localhost:${port}/stats`);

serve({
  fetch: app.fetch,
  port,
});
