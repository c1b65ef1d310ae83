/**
 * Cache
 *
 * Public entry point. Forwards every call to the adapter it was built with;
 * all behavior (validation, TTL, error mode) lives in the adapter.
 */

import type { ICacheAdapter } from './caching/cache-adapter.js';
import type { Ttl } from './caching/ttl-resolver.js';
import type { CacheValues } from './validation/key-validator.js';

export class Cache<A extends ICacheAdapter = ICacheAdapter> {
  constructor(readonly adapter: A) {}

  get(key: string, defaultValue: unknown = null): Promise<unknown> {
    return this.adapter.get(key, defaultValue);
  }

  set(key: string, value: unknown, ttl?: Ttl): Promise<boolean> {
    return this.adapter.set(key, value, ttl);
  }

  delete(key: string): Promise<boolean> {
    return this.adapter.delete(key);
  }

  clear(): Promise<boolean> {
    return this.adapter.clear();
  }

  has(key: string): Promise<boolean> {
    return this.adapter.has(key);
  }

  getMultiple(keys: Iterable<string>, defaultValue: unknown = null): Promise<Record<string, unknown>> {
    return this.adapter.getMultiple(keys, defaultValue);
  }

  setMultiple(values: CacheValues, ttl?: Ttl): Promise<boolean> {
    return this.adapter.setMultiple(values, ttl);
  }

  deleteMultiple(keys: Iterable<string>): Promise<boolean> {
    return this.adapter.deleteMultiple(keys);
  }
}
