/**
 * Cache configuration loading tests
 *
 * The loader takes the environment as an argument, so no test mutates
 * process.env.
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { ZodError } from 'zod';
import { loadCacheConfig } from '../src/config/loader.js';
import { FileStoreOptionsSchema, RemoteStoreOptionsSchema } from '../src/config/schemas.js';

describe('loadCacheConfig', () => {
  describe('defaults', () => {
    it('should_selectFileDriver_when_envEmpty', () => {
      expect(loadCacheConfig({})).toEqual({
        driver: 'file',
        file: {
          directory: path.join(os.tmpdir(), 'kv-cache'),
          mode: 'throw',
          lockWaitMs: 5_000,
          lockStaleMs: 30_000,
        },
      });
    });

    it('should_treatEmptyStringAsUnset_when_variableBlank', () => {
      const config = loadCacheConfig({ CACHE_DIR: '', CACHE_ERROR_MODE: '' });

      expect(config).toMatchObject({
        driver: 'file',
        file: { directory: path.join(os.tmpdir(), 'kv-cache'), mode: 'throw' },
      });
    });
  });

  describe('file driver', () => {
    it('should_readDirectoryModeAndLockTuning_when_set', () => {
      const config = loadCacheConfig({
        CACHE_DRIVER: 'file',
        CACHE_DIR: '/var/cache/app',
        CACHE_ERROR_MODE: 'fail',
        CACHE_LOCK_WAIT_MS: '250',
        CACHE_LOCK_STALE_MS: '60000',
      });

      expect(config).toEqual({
        driver: 'file',
        file: { directory: '/var/cache/app', mode: 'fail', lockWaitMs: 250, lockStaleMs: 60_000 },
      });
    });

    it('should_reject_when_lockWaitOutOfRange', () => {
      expect(() => loadCacheConfig({ CACHE_LOCK_WAIT_MS: '5' })).toThrow(ZodError);
    });

    it('should_reject_when_lockStaleNotNumeric', () => {
      expect(() => loadCacheConfig({ CACHE_LOCK_STALE_MS: 'soon' })).toThrow(ZodError);
    });
  });

  describe('redis driver', () => {
    it('should_buildRemoteConfig_when_driverIsRedis', () => {
      const config = loadCacheConfig({
        CACHE_DRIVER: 'redis',
        CACHE_REDIS_URL: 'rediss://cache.internal:6380',
        CACHE_KEY_PREFIX: 'app:v2:',
        CACHE_ERROR_MODE: 'fail',
      });

      expect(config).toEqual({
        driver: 'redis',
        redisUrl: 'rediss://cache.internal:6380',
        remote: { mode: 'fail', keyPrefix: 'app:v2:' },
      });
    });

    it('should_defaultUrlAndPrefix_when_onlyDriverSet', () => {
      expect(loadCacheConfig({ CACHE_DRIVER: 'redis' })).toEqual({
        driver: 'redis',
        redisUrl: 'redis://localhost:6379',
        remote: { mode: 'throw', keyPrefix: 'cache:' },
      });
    });

    it('should_reject_when_urlSchemeIsNotRedis', () => {
      expect(() => loadCacheConfig({ CACHE_DRIVER: 'redis', CACHE_REDIS_URL: 'http://localhost' })).toThrow(
        'CACHE_REDIS_URL must start with redis:// or rediss://'
      );
    });

    it('should_reject_when_prefixHasSpaces', () => {
      expect(() => loadCacheConfig({ CACHE_DRIVER: 'redis', CACHE_KEY_PREFIX: 'my cache' })).toThrow(ZodError);
    });
  });

  describe('invalid values', () => {
    it('should_reject_when_driverUnknown', () => {
      expect(() => loadCacheConfig({ CACHE_DRIVER: 'memcached' })).toThrow(ZodError);
    });

    it('should_reject_when_errorModeUnknown', () => {
      expect(() => loadCacheConfig({ CACHE_ERROR_MODE: 'ignore' })).toThrow(ZodError);
    });
  });
});

describe('option schemas', () => {
  it('should_applyDefaults_when_fileOptionsMinimal', () => {
    expect(FileStoreOptionsSchema.parse({ directory: '/tmp/c' })).toEqual({
      directory: '/tmp/c',
      mode: 'throw',
      lockWaitMs: 5_000,
      lockStaleMs: 30_000,
    });
  });

  it('should_rejectEmptyDirectory_when_fileOptionsParsed', () => {
    expect(() => FileStoreOptionsSchema.parse({ directory: '' })).toThrow('Cache directory cannot be empty');
  });

  it('should_applyDefaultPrefix_when_remoteOptionsEmpty', () => {
    expect(RemoteStoreOptionsSchema.parse({})).toEqual({ mode: 'throw', keyPrefix: 'cache:' });
  });
});
