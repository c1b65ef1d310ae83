/**
 * Zod validation schemas for cache configuration
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ErrorMode, ErrorModeSchema } from '../caching/error-policy.js';

/** Default key prefix for the remote backend */
export const DEFAULT_KEY_PREFIX = 'cache:';

/**
 * File backend options
 *
 * - lockWaitMs: 100ms-60s; how long a writer waits for another process's lock
 * - lockStaleMs: 1s-1h; a lock older than this is considered abandoned
 */
export const FileStoreOptionsSchema = z.object({
  directory: z.string()
    .min(1, 'Cache directory cannot be empty')
    .describe('Root directory holding one file per cached key'),
  mode: ErrorModeSchema.default(ErrorMode.THROW),
  lockWaitMs: z.number().int().min(100).max(60_000).default(5_000),
  lockStaleMs: z.number().int().min(1_000).max(3_600_000).default(30_000),
});

/**
 * Remote backend options
 */
export const RemoteStoreOptionsSchema = z.object({
  mode: ErrorModeSchema.default(ErrorMode.THROW),
  keyPrefix: z.string()
    .regex(/^[a-zA-Z0-9_.:-]+$/, 'Key prefix may only contain alphanumerics, underscores, dots, colons, and hyphens')
    .default(DEFAULT_KEY_PREFIX),
});

/**
 * Environment variable schema
 *
 * CACHE_DRIVER selects the backend; the other variables configure it.
 */
export const CacheEnvSchema = z.object({
  CACHE_DRIVER: z.enum(['file', 'redis']).default('file'),
  CACHE_DIR: z.string().min(1).default(path.join(os.tmpdir(), 'kv-cache')),
  CACHE_ERROR_MODE: ErrorModeSchema.default(ErrorMode.THROW),
  CACHE_REDIS_URL: z.string()
    .regex(/^rediss?:\/\//, 'CACHE_REDIS_URL must start with redis:// or rediss://')
    .default('redis://localhost:6379'),
  CACHE_KEY_PREFIX: RemoteStoreOptionsSchema.shape.keyPrefix,
  CACHE_LOCK_WAIT_MS: z.coerce.number().int().min(100).max(60_000).default(5_000),
  CACHE_LOCK_STALE_MS: z.coerce.number().int().min(1_000).max(3_600_000).default(30_000),
});

export const CacheConfigSchema = z.discriminatedUnion('driver', [
  z.object({
    driver: z.literal('file'),
    file: FileStoreOptionsSchema,
  }),
  z.object({
    driver: z.literal('redis'),
    redisUrl: z.string().min(1),
    remote: RemoteStoreOptionsSchema,
  }),
]);

export type CacheConfig = z.infer<typeof CacheConfigSchema>;
