import type { Env, MiddlewareHandler } from 'hono';
import type { InboundLoggerEnv } from '../middleware/types.js';
import type { StorageAdapter } from './types.js';

/**
 * Creates middleware that injects a primary sink into the Hono context.
 * The capture middleware prefers it over the process-wide primary storage,
 * which suits serverless deployments and apps with several storages.
 *
 * @example
 * ```ts
 * import { Hono } from 'hono';
 * import { createCaptureMiddleware, createStorageMiddleware, MemoryStorageAdapter } from 'hono-inbound-logger';
 *
 * const app = new Hono();
 *
 * app.use('*', createStorageMiddleware(new MemoryStorageAdapter()));
 * app.use('*', createCaptureMiddleware());
 * ```
 *
 * @example
 * ```ts
 * // Per-tenant storage
 * app.use('/:tenantId/*', async (ctx, next) => {
 *   const storage = getTenantStorage(ctx.req.param('tenantId'));
 *   return createStorageMiddleware(storage)(ctx, next);
 * });
 * ```
 */
export function createStorageMiddleware<E extends Env = Env>(
  storage: StorageAdapter
): MiddlewareHandler<E & InboundLoggerEnv> {
  return async (ctx, next) => {
    ctx.set('inboundLogStorage', storage);
    await next();
  };
}
