import { ConnectionResolutionError } from '../core/exceptions.js';

interface RegistryEntry<T> {
  handle: T;
  close: () => Promise<void>;
}

/**
 * Named, independently pooled connections owned by this library.
 *
 * Adapters register a connection once (in `establishConnection`) and resolve it
 * by name at every I/O call. A missing name is an error, never a fallback to
 * the host application's own connection.
 *
 * @example
 * ```ts
 * const registry = new ConnectionRegistry<Pool>();
 * registry.register('audit', pool, () => pool.end());
 * registry.resolve('audit'); // pool
 * registry.resolve('other'); // throws ConnectionResolutionError
 * ```
 */
export class ConnectionRegistry<T> {
  private entries = new Map<string, RegistryEntry<T>>();

  /**
   * Registers a connection under `name`. An existing registration is kept
   * and returned; the new handle is then the caller's to dispose of.
   */
  register(name: string, handle: T, close: () => Promise<void>): T {
    const existing = this.entries.get(name);
    if (existing) return existing.handle;

    this.entries.set(name, { handle, close });
    return handle;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * @throws ConnectionResolutionError when nothing is registered under `name`
   */
  resolve(name: string): T {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new ConnectionResolutionError(name);
    }
    return entry.handle;
  }

  /** Closes and forgets one connection. */
  async remove(name: string): Promise<boolean> {
    const entry = this.entries.get(name);
    if (!entry) return false;

    this.entries.delete(name);
    await entry.close();
    return true;
  }

  /** Closes and forgets every connection. */
  async closeAll(): Promise<void> {
    const entries = Array.from(this.entries.values());
    this.entries.clear();
    for (const entry of entries) {
      await entry.close();
    }
  }

  names(): string[] {
    return Array.from(this.entries.keys());
  }
}
