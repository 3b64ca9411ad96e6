import { AsyncLocalStorage } from 'node:async_hooks';
import type { Configuration } from '../config/configuration.js';

interface ScopeFrame {
  readonly configuration: Configuration;
  readonly parent: ScopeFrame | null;
}

/**
 * Async-local stack of configuration overrides.
 *
 * Frames are immutable and linked to their parent, so leaving a block (by
 * return, throw or rejection) reveals exactly the override that was active
 * before it. Concurrent async flows each carry their own chain.
 */
export class ConfigurationScope {
  private storage = new AsyncLocalStorage<ScopeFrame>();

  /** Innermost override, or `undefined` outside any scope. */
  current(): Configuration | undefined {
    return this.storage.getStore()?.configuration;
  }

  /** Number of nested overrides active in the current flow. */
  depth(): number {
    let depth = 0;
    for (let frame: ScopeFrame | null | undefined = this.storage.getStore(); frame; frame = frame.parent) {
      depth++;
    }
    return depth;
  }

  run<T>(configuration: Configuration, block: () => T): T {
    const frame: ScopeFrame = { configuration, parent: this.storage.getStore() ?? null };
    return this.storage.run(frame, block);
  }
}
