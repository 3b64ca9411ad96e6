import type { Context } from 'hono';
import { ConfigurationError } from '../core/exceptions.js';
import { reportError } from '../logging/report.js';
import type { InboundLoggerEnv } from '../middleware/types.js';
import type { LoggableRef } from '../record/types.js';
import { getLoggerState, type LoggerState } from '../state.js';

/**
 * Mutable view handed to context callbacks. Whatever the callback leaves in
 * `loggable` and `metadata` is applied to the request's log context.
 */
export interface LogContext {
  loggable: LoggableRef | null;
  metadata: Record<string, unknown>;
}

export type LogContextCallback = (c: Context<InboundLoggerEnv>, log: LogContext) => void | Promise<void>;

/** User attached to a request, as returned by a `currentUser` resolver. */
export interface CurrentUser {
  id: string | number;
  type?: string;
}

export type CurrentUserResolver = (c: Context<InboundLoggerEnv>) => CurrentUser | null | undefined;

export type GroupHandler = (c: Context<InboundLoggerEnv>) => Response | Promise<Response>;

export interface HandlerGroupOptions {
  /** Controller name recorded in metadata and matched against exclusions. */
  name: string;
  parent?: HandlerGroup;
  /** Log only these actions. */
  only?: string[];
  /** Log every action except these. */
  except?: string[];
  /** Context callback, or the name of one in `namedCallbacks` (own or inherited). */
  context?: LogContextCallback | string;
  namedCallbacks?: Record<string, LogContextCallback>;
  currentUser?: CurrentUserResolver;
  /** @default the process-wide state */
  state?: LoggerState;
}

/**
 * A named set of handlers sharing logging rules, comparable to a controller.
 * Rules not declared on a group are looked up along its parent chain.
 */
export class HandlerGroup {
  readonly name: string;
  readonly parent: HandlerGroup | null;

  private readonly only: ReadonlySet<string> | null;
  private readonly except: ReadonlySet<string> | null;
  private readonly context: LogContextCallback | string | null;
  private readonly namedCallbacks: Readonly<Record<string, LogContextCallback>>;
  private readonly currentUserResolver: CurrentUserResolver | null;
  private readonly explicitState: LoggerState | null;

  constructor(options: HandlerGroupOptions) {
    if (options.only && options.except) {
      throw new ConfigurationError(`Handler group '${options.name}' cannot declare both only and except`, {
        only: options.only,
        except: options.except,
      });
    }

    this.name = options.name;
    this.parent = options.parent ?? null;
    this.only = options.only ? new Set(options.only) : null;
    this.except = options.except ? new Set(options.except) : null;
    this.context = options.context ?? null;
    this.namedCallbacks = { ...options.namedCallbacks };
    this.currentUserResolver = options.currentUser ?? null;
    this.explicitState = options.state ?? null;

    if (typeof this.context === 'string' && !this.namedCallback(this.context)) {
      throw new ConfigurationError(`Handler group '${options.name}' references unknown context callback '${this.context}'`);
    }
  }

  state(): LoggerState {
    return this.explicitState ?? this.parent?.state() ?? getLoggerState();
  }

  /** Whether this group's only/except rules (own, else inherited) allow `action`. */
  logsAction(action: string): boolean {
    if (this.only) return this.only.has(action);
    if (this.except) return !this.except.has(action);
    return this.parent?.logsAction(action) ?? true;
  }

  /** Own context callback, else the nearest ancestor's. */
  contextCallback(): LogContextCallback | null {
    if (typeof this.context === 'function') return this.context;
    if (typeof this.context === 'string') return this.namedCallback(this.context);
    return this.parent?.contextCallback() ?? null;
  }

  currentUser(c: Context<InboundLoggerEnv>): CurrentUser | null {
    const resolver = this.currentUserResolver ?? this.inheritedCurrentUser();
    return resolver?.(c) ?? null;
  }

  /**
   * Wraps a Hono handler as `action` of this group.
   *
   * @example
   * ```ts
   * const orders = defineHandlerGroup({
   *   name: 'orders',
   *   except: ['health'],
   *   context: (c, log) => {
   *     log.metadata.tenant = c.req.header('x-tenant');
   *   },
   * });
   *
   * app.post('/orders', orders.handler('create', async (c) => c.json(await createOrder(c), 201)));
   * ```
   */
  handler(action: string, fn: GroupHandler): GroupHandler {
    return async (c) => {
      c.set('inboundLogHandler', { controller: this.name, action });
      const response = await fn(c);

      const state = this.state();
      if (this.logsAction(action) && state.enabledFor(this.name, action)) {
        try {
          await this.applyLogContext(c, state, action, response);
        } catch (error) {
          reportError(state.configuration(), `Error building log context for ${this.name}#${action}`, error);
        }
      }
      return response;
    };
  }

  private async applyLogContext(
    c: Context<InboundLoggerEnv>,
    state: LoggerState,
    action: string,
    response: Response
  ): Promise<void> {
    const basic: Record<string, unknown> = {
      controller: this.name,
      action,
      format: formatOf(response.headers.get('content-type')),
      requestId: c.get('inboundLogRequestId') ?? c.req.header('x-request-id') ?? null,
    };
    const user = this.currentUser(c);
    if (user) {
      basic.userId = user.id;
      basic.userType = user.type ?? null;
    }
    state.addMetadata(basic);

    const callback = this.contextCallback();
    if (!callback) return;

    const log: LogContext = { loggable: null, metadata: {} };
    await callback(c, log);
    if (log.loggable) {
      state.setLoggable(log.loggable);
    }
    if (Object.keys(log.metadata).length > 0) {
      state.addMetadata(log.metadata);
    }
  }

  private namedCallback(name: string): LogContextCallback | null {
    return this.namedCallbacks[name] ?? this.parent?.namedCallback(name) ?? null;
  }

  private inheritedCurrentUser(): CurrentUserResolver | null {
    return this.parent ? (this.parent.currentUserResolver ?? this.parent.inheritedCurrentUser()) : null;
  }
}

/**
 * Subtype of a content type, e.g. `json` for `application/json; charset=UTF-8`
 * and `vnd.api+json` for `application/vnd.api+json`.
 */
function formatOf(contentType: string | null): string | null {
  if (!contentType) return null;
  const subtype = contentType.split(';')[0]?.split('/')[1]?.trim().toLowerCase();
  return subtype || null;
}

/**
 * @throws ConfigurationError when both `only` and `except` are given, or
 * `context` names a callback no group in the chain declares
 */
export function defineHandlerGroup(options: HandlerGroupOptions): HandlerGroup {
  return new HandlerGroup(options);
}

// ============================================================================
// Helpers for handlers
// ============================================================================

/** Merges into the current request's log metadata. */
export function addLogMetadata(metadata: Record<string, unknown>, state: LoggerState = getLoggerState()): void {
  state.addMetadata(metadata);
}

/** Associates the current request's log with a domain object. */
export function setLogLoggable(loggable: LoggableRef | null, state: LoggerState = getLoggerState()): void {
  state.setLoggable(loggable);
}

/**
 * Appends `{ event, data, timestamp }` to the `events` list of the current
 * request's log metadata.
 */
export function logEvent(
  name: string,
  data: Record<string, unknown> = {},
  state: LoggerState = getLoggerState()
): void {
  const current = state.getMetadata().events;
  const events = Array.isArray(current) ? current : [];
  state.addMetadata({ events: [...events, { event: name, data, timestamp: new Date().toISOString() }] });
}
