import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { Context, MiddlewareHandler } from 'hono';
import type { Configuration } from '../config/configuration.js';
import { reportError } from '../logging/report.js';
import type { LogRequestInput } from '../record/types.js';
import { getLoggerState, type LoggerState } from '../state.js';
import { resolvePrimaryStorage } from '../storage/helpers.js';
import type { StorageAdapter } from '../storage/types.js';
import { captureRequestBody, captureResponseBody, responseBodyCapturable } from './body.js';
import type { ClientAddressResolver, HandlerDescriptor, HandlerResolver, InboundLoggerEnv } from './types.js';

/**
 * Options for the capture middleware.
 */
export interface CaptureMiddlewareOptions {
  /** @default the process-wide state */
  state?: LoggerState;

  /** Primary sink for this app. Takes precedence over `c.var.inboundLogStorage` and the state's. */
  storage?: StorageAdapter;

  /**
   * Monotonic clock in milliseconds.
   * @default performance.now
   */
  clock?: () => number;

  /** Identifies the handler before it runs, for early controller exclusion. */
  resolveHandler?: HandlerResolver;

  /**
   * Client address when no forwarding header is present,
   * e.g. `(c) => getConnInfo(c).remote.address` on Node.
   */
  resolveClientAddress?: ClientAddressResolver;

  /** Used when the request carries no `X-Request-ID`. @default randomUUID */
  generateRequestId?: () => string;
}

const REQUEST_ID_HEADER = 'x-request-id';

function responseHeaders(response: Response): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  return headers;
}

function clientAddress(c: Context, resolve?: ClientAddressResolver): string | null {
  const forwarded = c.req.header('x-forwarded-for')?.split(',')[0]?.trim();
  if (forwarded) return forwarded;
  const real = c.req.header('x-real-ip')?.trim();
  if (real) return real;
  return resolve?.(c) ?? null;
}

function admitted(config: Configuration, path: string, handler: HandlerDescriptor | null): boolean {
  if (!config.enabled) return false;
  if (!config.shouldLogPath(path)) return false;
  if (handler && !config.enabledForController(handler.controller, handler.action)) return false;
  return true;
}

/**
 * Writes one capture to every configured sink in turn: primary, secondary, test.
 * Each write is isolated; a failing sink is reported and the next one still runs.
 */
async function writeToSinks(
  state: LoggerState,
  config: Configuration,
  primary: StorageAdapter | null,
  input: LogRequestInput
): Promise<void> {
  if (primary) {
    try {
      await primary.logRequest(input);
    } catch (error) {
      reportError(config, 'Error logging inbound request to primary storage', error);
    }
  }

  try {
    const secondary = await state.secondaryStorage();
    if (secondary) {
      await secondary.logRequest(input);
    }
  } catch (error) {
    reportError(config, 'Error logging inbound request to secondary storage', error);
  }

  try {
    await state.testing.logRequest(input);
  } catch (error) {
    reportError(config, 'Error logging inbound request to test storage', error);
  }
}

/**
 * Creates middleware that logs inbound requests and their responses.
 *
 * The handler always runs exactly as it would without this middleware; only
 * the logging side effects depend on configuration. Errors from the handler
 * are never intercepted, and errors from the logging path are reported
 * through the configured logger and swallowed.
 *
 * @param options - Middleware options
 * @returns Middleware handler
 *
 * @example
 * ```ts
 * import { Hono } from 'hono';
 * import { configure, createCaptureMiddleware, setPrimaryStorage, SqliteStorageAdapter } from 'hono-inbound-logger';
 *
 * configure({ enabled: true, sensitiveHeaders: ['authorization', 'cookie'] });
 *
 * const storage = new SqliteStorageAdapter({ location: 'sqlite3://log/requests.db' });
 * await storage.establishConnection();
 * setPrimaryStorage(storage);
 *
 * const app = new Hono();
 * app.use('*', createCaptureMiddleware());
 * ```
 */
export function createCaptureMiddleware(options: CaptureMiddlewareOptions = {}): MiddlewareHandler<InboundLoggerEnv> {
  const clock = options.clock ?? (() => performance.now());
  const generateRequestId = options.generateRequestId ?? randomUUID;

  return async (c, next) => {
    const state = options.state ?? getLoggerState();

    await state.context.run(async () => {
      try {
        const config = state.configuration();
        const earlyHandler = options.resolveHandler?.(c) ?? null;

        if (!admitted(config, c.req.path, earlyHandler)) {
          await next();
          return;
        }

        const requestId = c.req.header(REQUEST_ID_HEADER) || generateRequestId();
        c.set('inboundLogRequestId', requestId);

        let requestBody: unknown = null;
        try {
          requestBody = await captureRequestBody(c.req.raw, config.maxBodySize);
        } catch (error) {
          reportError(config, 'Error reading request body', error);
        }

        const startedAt = clock();
        await next();
        const durationMs = Math.max(0, clock() - startedAt);

        try {
          await logResponse(c, state, config, options, { requestId, requestBody, durationMs });
        } catch (error) {
          reportError(config, 'Error logging inbound request', error);
        }
      } finally {
        state.context.clear();
      }
    });
  };
}

interface Capture {
  requestId: string;
  requestBody: unknown;
  durationMs: number;
}

async function logResponse(
  c: Context<InboundLoggerEnv>,
  state: LoggerState,
  config: Configuration,
  options: CaptureMiddlewareOptions,
  capture: Capture
): Promise<void> {
  const response = c.res;
  const contentType = response.headers.get('content-type');
  if (!config.shouldLogContentType(contentType)) return;

  const handler = c.get('inboundLogHandler') ?? options.resolveHandler?.(c) ?? null;
  if (handler && !config.enabledForController(handler.controller, handler.action)) return;

  const responseBody = responseBodyCapturable(response.status, contentType)
    ? await captureResponseBody(response, config.maxBodySize)
    : null;

  const url = new URL(c.req.url);
  const metadata: Record<string, unknown> = { ...state.context.getMetadata() };
  if (handler) {
    metadata.controller = handler.controller;
    if (handler.action) metadata.action = handler.action;
  }

  const input: LogRequestInput = {
    requestId: capture.requestId,
    httpMethod: c.req.method,
    url: `${url.pathname}${url.search}`,
    path: c.req.path,
    ipAddress: clientAddress(c, options.resolveClientAddress),
    userAgent: c.req.header('user-agent') ?? null,
    referrer: c.req.header('referer') ?? null,
    requestHeaders: c.req.header(),
    requestBody: capture.requestBody,
    statusCode: response.status,
    responseHeaders: responseHeaders(response),
    responseBody,
    durationMs: capture.durationMs,
    loggable: state.context.getLoggable(),
    metadata,
  };

  const primary = resolvePrimaryStorage(c, options.storage, state.getPrimaryStorage());
  await writeToSinks(state, config, primary, input);
}

/**
 * Correlation id of the request being logged, if it was admitted.
 */
export function getRequestId(c: Context<InboundLoggerEnv>): string | undefined {
  return c.get('inboundLogRequestId');
}
