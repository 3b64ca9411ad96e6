import type { Context } from 'hono';
import type { InboundLoggerEnv } from '../middleware/types.js';
import type { StorageAdapter } from './types.js';

/**
 * Resolves the primary sink with priority: explicit param > context > global.
 *
 * @param ctx - Hono context of the request being logged
 * @param explicitStorage - Storage passed to the capture middleware
 * @param globalStorage - Process-wide primary storage
 * @returns The resolved storage or null if none is configured
 *
 * @example
 * ```ts
 * const storage = resolvePrimaryStorage(c, options.storage, state.getPrimaryStorage());
 * if (storage) {
 *   await storage.logRequest(input);
 * }
 * ```
 */
export function resolvePrimaryStorage(
  ctx: Context<InboundLoggerEnv>,
  explicitStorage?: StorageAdapter | null,
  globalStorage?: StorageAdapter | null
): StorageAdapter | null {
  // Priority 1: Explicit parameter
  if (explicitStorage) return explicitStorage;

  // Priority 2: Context variable
  const ctxStorage = ctx.get('inboundLogStorage');
  if (ctxStorage) return ctxStorage;

  // Priority 3: Global storage
  return globalStorage ?? null;
}
