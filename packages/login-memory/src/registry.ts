import { MemoryLoginStore, type MemoryLoginStoreOptions } from "./memory-login-store.js";

/**
 * Named memory stores, so that every component configured with the same
 * process name shares one index.
 */
export class MemoryLoginStoreRegistry {
  private readonly stores = new Map<string, MemoryLoginStore>();

  /** Returns the store registered under `name`, creating it on first use. */
  resolve(name: string, options?: MemoryLoginStoreOptions): MemoryLoginStore {
    const existing = this.stores.get(name);
    if (existing) {
      return existing;
    }
    const store = new MemoryLoginStore(options);
    this.stores.set(name, store);
    return store;
  }

  has(name: string): boolean {
    return this.stores.has(name);
  }

  release(name: string): boolean {
    return this.stores.delete(name);
  }
}

export const defaultMemoryLoginStoreRegistry = new MemoryLoginStoreRegistry();
