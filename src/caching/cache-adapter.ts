/**
 * Cache Adapter Interface
 *
 * The uniform operation set every storage backend implements. Callers (and
 * the Cache façade) never know which backend sits behind it.
 *
 * Design Pattern: Strategy Pattern for cache backend flexibility
 */

import type { CacheValues } from '../validation/key-validator.js';
import type { ErrorMode } from './error-policy.js';
import type { Ttl } from './ttl-resolver.js';

export interface ICacheAdapter {
  /**
   * Get a value, or `defaultValue` (null) when the key is missing or expired
   */
  get(key: string, defaultValue?: unknown): Promise<unknown>;

  /**
   * Store a value; a TTL of zero or less deletes the key instead
   */
  set(key: string, value: unknown, ttl?: Ttl): Promise<boolean>;

  /**
   * Delete a key (true when the key is absent)
   */
  delete(key: string): Promise<boolean>;

  /**
   * Delete every entry owned by this adapter
   */
  clear(): Promise<boolean>;

  /**
   * Check if a live (unexpired) entry exists
   */
  has(key: string): Promise<boolean>;

  /**
   * Get many values at once; every requested key appears in the result
   */
  getMultiple(keys: Iterable<string>, defaultValue?: unknown): Promise<Record<string, unknown>>;

  /**
   * Store many values with one shared TTL
   */
  setMultiple(values: CacheValues, ttl?: Ttl): Promise<boolean>;

  /**
   * Delete many keys at once
   */
  deleteMultiple(keys: Iterable<string>): Promise<boolean>;

  /**
   * Switch the error handling mode for subsequent faults
   */
  setMode(mode: ErrorMode): void;

  getMode(): ErrorMode;
}
