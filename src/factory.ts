/**
 * Cache factory
 *
 * Wires a Cache to the backend selected by a CacheConfig.
 */

import { createClient } from 'redis';
import { Cache } from './cache.js';
import { FileStoreAdapter } from './caching/file-store-adapter.js';
import { RedisStoreClient } from './caching/redis-store-client.js';
import { RemoteStoreAdapter } from './caching/remote-store-adapter.js';
import type { CacheConfig } from './config/schemas.js';
import { normalizeError } from './utils/utils.js';

export interface CacheHandle {
  cache: Cache;

  /** Release the backend connection, if any. Call on app shutdown. */
  close: () => Promise<void>;
}

/**
 * Create a Cache for the configured driver
 *
 * The redis driver opens (and waits for) its own connection; the file driver
 * needs none.
 *
 * @example
 * ```ts
 * const { cache, close } = await createCache(loadCacheConfig());
 *
 * await cache.set('user.42', { name: 'Ada' }, 3600);
 *
 * // On shutdown:
 * await close();
 * ```
 */
export async function createCache(config: CacheConfig): Promise<CacheHandle> {
  if (config.driver === 'file') {
    return {
      cache: new Cache(new FileStoreAdapter(config.file)),
      close: async () => {},
    };
  }

  const redis = createClient({ url: config.redisUrl });
  redis.on('error', (err: unknown) => {
    console.warn(`[createCache] Redis client error: ${normalizeError(err).message}`);
  });
  await redis.connect();

  return {
    cache: new Cache(new RemoteStoreAdapter(new RedisStoreClient(redis), config.remote)),
    close: async () => {
      if (redis.isOpen) {
        await redis.quit();
      }
    },
  };
}
