/**
 * Configuration loader
 *
 * Builds a validated CacheConfig from environment variables:
 * - CACHE_DRIVER: 'file' (default) or 'redis'
 * - CACHE_DIR: file backend root directory (default: <tmpdir>/kv-cache)
 * - CACHE_ERROR_MODE: 'throw' (default) or 'fail'
 * - CACHE_REDIS_URL: redis connection URL (default: redis://localhost:6379)
 * - CACHE_KEY_PREFIX: remote key namespace (default: 'cache:')
 * - CACHE_LOCK_WAIT_MS / CACHE_LOCK_STALE_MS: file write lock tuning
 */

import { CacheConfigSchema, CacheEnvSchema, type CacheConfig } from './schemas.js';

/**
 * Parse and validate cache configuration
 *
 * Empty strings count as "not set" so `CACHE_DIR=` falls back to the default.
 *
 * @throws {z.ZodError} naming the offending variable when a value is invalid
 */
export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const pick = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };

  const parsed = CacheEnvSchema.parse({
    CACHE_DRIVER: pick('CACHE_DRIVER'),
    CACHE_DIR: pick('CACHE_DIR'),
    CACHE_ERROR_MODE: pick('CACHE_ERROR_MODE'),
    CACHE_REDIS_URL: pick('CACHE_REDIS_URL'),
    CACHE_KEY_PREFIX: pick('CACHE_KEY_PREFIX'),
    CACHE_LOCK_WAIT_MS: pick('CACHE_LOCK_WAIT_MS'),
    CACHE_LOCK_STALE_MS: pick('CACHE_LOCK_STALE_MS'),
  });

  if (parsed.CACHE_DRIVER === 'redis') {
    return CacheConfigSchema.parse({
      driver: 'redis',
      redisUrl: parsed.CACHE_REDIS_URL,
      remote: {
        mode: parsed.CACHE_ERROR_MODE,
        keyPrefix: parsed.CACHE_KEY_PREFIX,
      },
    });
  }

  return CacheConfigSchema.parse({
    driver: 'file',
    file: {
      directory: parsed.CACHE_DIR,
      mode: parsed.CACHE_ERROR_MODE,
      lockWaitMs: parsed.CACHE_LOCK_WAIT_MS,
      lockStaleMs: parsed.CACHE_LOCK_STALE_MS,
    },
  });
}
