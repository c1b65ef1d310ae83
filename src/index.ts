export { Cache } from './cache.js';
export { createCache, type CacheHandle } from './factory.js';

export type { ICacheAdapter } from './caching/cache-adapter.js';
export { FileStoreAdapter, type FileStoreAdapterOptions } from './caching/file-store-adapter.js';
export { RemoteStoreAdapter, type RemoteStoreAdapterOptions } from './caching/remote-store-adapter.js';
export type { RemoteSerializer, RemoteStoreClient } from './caching/remote-store-client.js';
export { RedisStoreClient, type RedisCommandClient } from './caching/redis-store-client.js';
export { ErrorMode, ErrorPolicy } from './caching/error-policy.js';
export {
  resolveExpiresAt,
  resolveTtlSeconds,
  type Clock,
  type Ttl,
} from './caching/ttl-resolver.js';

export { CacheError, CacheOperationError, InvalidKeyError, isCacheError, type CacheErrorKind } from './errors.js';

export {
  FILE_KEY_RULES,
  REMOTE_KEY_RULES,
  collectEntries,
  collectKeys,
  validateKey,
  type CacheValues,
  type KeyRules,
} from './validation/key-validator.js';

export { loadCacheConfig } from './config/loader.js';
export {
  CacheConfigSchema,
  CacheEnvSchema,
  DEFAULT_KEY_PREFIX,
  FileStoreOptionsSchema,
  RemoteStoreOptionsSchema,
  type CacheConfig,
} from './config/schemas.js';
