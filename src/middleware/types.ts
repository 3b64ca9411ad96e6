import type { Context, Env } from 'hono';
import type { StorageAdapter } from '../storage/types.js';

/**
 * Names the handler that served a request, for controller/action exclusion.
 */
export interface HandlerDescriptor {
  controller: string;
  action?: string | null;
}

/**
 * Hono environment with the logger's context variables.
 *
 * @example
 * ```ts
 * const app = new Hono<InboundLoggerEnv>();
 *
 * app.use('*', createCaptureMiddleware());
 * app.get('/orders', (c) => c.json({ requestId: c.var.inboundLogRequestId }));
 * ```
 */
export interface InboundLoggerEnv extends Env {
  Variables: {
    /** Primary sink for this app; takes precedence over the process-wide one. */
    inboundLogStorage?: StorageAdapter;
    /** Set by handler-group handlers while routing. */
    inboundLogHandler?: HandlerDescriptor;
    /** Correlation id of the request being logged. */
    inboundLogRequestId?: string;
  };
}

/** Resolves the handler descriptor before `next()` runs. */
export type HandlerResolver = (c: Context) => HandlerDescriptor | null | undefined;

/** Resolves the client address; return null when unknown. */
export type ClientAddressResolver = (c: Context) => string | null | undefined;
