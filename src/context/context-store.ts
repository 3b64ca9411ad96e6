import { AsyncLocalStorage } from 'node:async_hooks';
import type { LoggableRef } from '../record/types.js';

/**
 * Per-request log context: metadata and an optional loggable reference.
 */
export interface ContextFrame {
  metadata: Record<string, unknown>;
  loggable: LoggableRef | null;
}

function emptyFrame(): ContextFrame {
  return { metadata: {}, loggable: null };
}

export interface ContextStoreOptions {
  /** Called with the operation name when a write happens outside any frame. */
  onDetachedWrite?: (operation: string) => void;
}

/**
 * Request-scoped storage for log metadata and the loggable reference.
 *
 * The capture middleware opens one frame per request with {@link ContextStore.run};
 * everything called from that request (handlers, services, callbacks) reads and
 * writes the same frame, and concurrent requests never see each other's frame.
 * Outside any request there is no frame: reads see empty values and writes
 * are dropped, each reported through `onDetachedWrite`.
 *
 * @example
 * ```ts
 * app.post('/orders', async (c) => {
 *   const order = await createOrder(await c.req.json());
 *   setLoggable({ type: 'Order', id: order.id });
 *   addMetadata({ channel: 'web' });
 *   return c.json(order, 201);
 * });
 * ```
 */
export class ContextStore {
  private storage = new AsyncLocalStorage<ContextFrame>();
  private readonly onDetachedWrite: (operation: string) => void;

  constructor(options: ContextStoreOptions = {}) {
    this.onDetachedWrite = options.onDetachedWrite ?? (() => undefined);
  }

  /**
   * Runs `fn` inside a fresh, empty frame.
   */
  run<T>(fn: () => T): T {
    return this.storage.run(emptyFrame(), fn);
  }

  /** True when called inside a frame opened by {@link ContextStore.run}. */
  isActive(): boolean {
    return this.storage.getStore() !== undefined;
  }

  private writableFrame(operation: string): ContextFrame | null {
    const frame = this.storage.getStore();
    if (!frame) {
      this.onDetachedWrite(operation);
      return null;
    }
    return frame;
  }

  /** Replaces the metadata map; does not merge. */
  setMetadata(metadata: Record<string, unknown>): void {
    const frame = this.writableFrame('setMetadata');
    if (frame) frame.metadata = { ...metadata };
  }

  getMetadata(): Record<string, unknown> {
    return this.storage.getStore()?.metadata ?? {};
  }

  /** Read-merge-write over the current metadata. */
  addMetadata(metadata: Record<string, unknown>): void {
    const frame = this.writableFrame('addMetadata');
    if (frame) frame.metadata = { ...frame.metadata, ...metadata };
  }

  setLoggable(loggable: LoggableRef | null): void {
    const frame = this.writableFrame('setLoggable');
    if (frame) frame.loggable = loggable;
  }

  getLoggable(): LoggableRef | null {
    return this.storage.getStore()?.loggable ?? null;
  }

  /** Resets both fields of the current frame. A no-op outside any frame. */
  clear(): void {
    const frame = this.storage.getStore();
    if (!frame) return;
    frame.metadata = {};
    frame.loggable = null;
  }
}
