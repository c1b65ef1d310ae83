/**
 * Remote Store Adapter
 *
 * Implements ICacheAdapter on top of a remote key-value store (Redis) through
 * the RemoteStoreClient capability.
 *
 * Key Features:
 * - Every key is namespaced with a prefix (default `cache:`), never exposed to callers
 * - TTL uses the store's native set-with-expiry; the store expires keys itself
 * - getMultiple / deleteMultiple / no-TTL setMultiple are one round trip each
 * - Value encoding is delegated to the client's serializer
 * - Every native call is guarded by the ErrorPolicy (THROW or FAIL)
 */

import { CacheOperationError } from '../errors.js';
import { RemoteStoreOptionsSchema } from '../config/schemas.js';
import {
  REMOTE_KEY_RULES,
  collectEntries,
  collectKeys,
  validateKey,
  type CacheValues,
} from '../validation/key-validator.js';
import type { ICacheAdapter } from './cache-adapter.js';
import { ErrorMode, ErrorPolicy } from './error-policy.js';
import type { RemoteStoreClient } from './remote-store-client.js';
import { resolveTtlSeconds, systemClock, type Clock, type Ttl } from './ttl-resolver.js';

export interface RemoteStoreAdapterOptions {
  /** Error handling mode (default: THROW) */
  mode?: ErrorMode;
  /** Namespace prefix prepended to every key (default: 'cache:') */
  keyPrefix?: string;
  /** Wall clock in epoch ms, used to resolve Duration TTLs (default: Date.now) */
  now?: Clock;
}

export class RemoteStoreAdapter implements ICacheAdapter {
  private readonly policy: ErrorPolicy;
  private readonly keyPrefix: string;
  private readonly now: Clock;

  /**
   * @param client - An already connected client. Under THROW an unconnected
   *   client is rejected here; under FAIL the failure is deferred to first use.
   * @throws {CacheOperationError} if the client is not connected (THROW mode)
   */
  constructor(
    private readonly client: RemoteStoreClient,
    options: RemoteStoreAdapterOptions = {}
  ) {
    const config = RemoteStoreOptionsSchema.parse({
      mode: options.mode,
      keyPrefix: options.keyPrefix,
    });

    this.policy = new ErrorPolicy(config.mode, 'RemoteStoreAdapter');
    this.keyPrefix = config.keyPrefix;
    this.now = options.now ?? systemClock;

    if (!this.client.isConnected() && this.policy.shouldThrow()) {
      throw new CacheOperationError('Remote store connection is not established');
    }

    if (this.client.getSerializer() === 'none') {
      this.client.setSerializer('json');
    }
  }

  /**
   * Set error handling mode at runtime
   */
  setMode(mode: ErrorMode): void {
    this.policy.setMode(mode);
  }

  getMode(): ErrorMode {
    return this.policy.getMode();
  }

  async get(key: string, defaultValue: unknown = null): Promise<unknown> {
    validateKey(key, REMOTE_KEY_RULES);

    return this.policy.guard('get', async () => {
      const value = await this.client.get(this.prefixed(key));
      return value === undefined ? defaultValue : value;
    }, defaultValue);
  }

  async set(key: string, value: unknown, ttl?: Ttl): Promise<boolean> {
    validateKey(key, REMOTE_KEY_RULES);

    const ttlSeconds = resolveTtlSeconds(ttl, this.now());

    if (ttlSeconds !== null && ttlSeconds <= 0) {
      return this.delete(key);
    }

    const prefixedKey = this.prefixed(key);
    return this.policy.guard('set', () => {
      if (ttlSeconds === null) {
        return this.client.set(prefixedKey, value);
      }
      return this.client.setWithExpiry(prefixedKey, ttlSeconds, value);
    }, false);
  }

  async delete(key: string): Promise<boolean> {
    validateKey(key, REMOTE_KEY_RULES);

    return this.policy.guard('delete', async () => {
      const removed = await this.client.delete([this.prefixed(key)]);
      return removed >= 0;
    }, false);
  }

  /**
   * Remove every key under this adapter's prefix
   *
   * Other prefixes sharing the store are untouched.
   */
  async clear(): Promise<boolean> {
    return this.policy.guard('clear', async () => {
      const keys = await this.client.listByPattern(this.prefixed('*'));
      if (keys.length === 0) {
        return true;
      }

      const removed = await this.client.delete(keys);
      return removed >= 0;
    }, false);
  }

  async has(key: string): Promise<boolean> {
    validateKey(key, REMOTE_KEY_RULES);

    return this.policy.guard('exists', async () => {
      const count = await this.client.exists(this.prefixed(key));
      return count > 0;
    }, false);
  }

  /**
   * Fetch every key with a single multi-get round trip
   */
  async getMultiple(keys: Iterable<string>, defaultValue: unknown = null): Promise<Record<string, unknown>> {
    const keyList = collectKeys(keys, REMOTE_KEY_RULES);

    if (keyList.length === 0) {
      return {};
    }

    const allDefaults = (): Record<string, unknown> =>
      Object.fromEntries(keyList.map(key => [key, defaultValue]));

    return this.policy.guard('mGet', async () => {
      const rawValues = await this.client.multiGet(keyList.map(key => this.prefixed(key)));

      return Object.fromEntries(
        keyList.map((key, index) => {
          const value = rawValues[index];
          return [key, value === undefined ? defaultValue : value];
        })
      );
    }, allDefaults());
  }

  /**
   * Without a TTL: one atomic multi-set. With a TTL: the multi-set command
   * cannot carry expiry, so each pair is written with set-with-expiry.
   *
   * Keys are validated up front on both paths, before any write.
   */
  async setMultiple(values: CacheValues, ttl?: Ttl): Promise<boolean> {
    const entries = collectEntries(values, REMOTE_KEY_RULES);

    if (entries.length === 0) {
      return true;
    }

    const ttlSeconds = resolveTtlSeconds(ttl, this.now());

    if (ttlSeconds === null) {
      const prefixedEntries = entries.map(([key, value]): [string, unknown] => [this.prefixed(key), value]);
      return this.policy.guard('mSet', () => this.client.multiSet(prefixedEntries), false);
    }

    if (ttlSeconds <= 0) {
      return this.deleteMultiple(entries.map(([key]) => key));
    }

    let success = true;
    for (const [key, value] of entries) {
      success = (await this.set(key, value, ttlSeconds)) && success;
    }

    return success;
  }

  /**
   * Remove every key with a single bulk delete round trip
   */
  async deleteMultiple(keys: Iterable<string>): Promise<boolean> {
    const keyList = collectKeys(keys, REMOTE_KEY_RULES);

    if (keyList.length === 0) {
      return true;
    }

    return this.policy.guard('del', async () => {
      const removed = await this.client.delete(keyList.map(key => this.prefixed(key)));
      return removed >= 0;
    }, false);
  }

  private prefixed(key: string): string {
    return `${this.keyPrefix}${key}`;
  }
}
