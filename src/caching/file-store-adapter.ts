/**
 * File Store Adapter
 *
 * Implements ICacheAdapter with one file per key under a root directory.
 *
 * Storage layout:
 * - file name: md5(key) + '.cache'
 * - content: JSON `{ "value": ..., "expires_at": <epoch seconds> | null }`
 *
 * Write discipline (same key never interleaves, different keys never contend):
 * 1. AsyncLock keyed by file path serializes writers inside this process
 * 2. FileLock (`<file>.lock`, exclusive create) serializes writers across processes
 * 3. Content goes to a temp file that is renamed over the target, so a reader
 *    sees either the old or the new complete file
 *
 * Reads take no lock. Corrupt content is never an error: the file is deleted
 * and the read is a miss. Expired entries are deleted lazily on the next
 * get()/has(), or in bulk by gc().
 */

import { promises as fs, accessSync, constants, mkdirSync, statSync } from 'fs';
import * as path from 'path';
import { randomUUID } from 'crypto';
import AsyncLock from 'async-lock';
import { z } from 'zod';
import { CacheOperationError } from '../errors.js';
import { CLAIMED_LOCK_SUFFIX, FileLock } from '../services/file-lock.js';
import { FileStoreOptionsSchema } from '../config/schemas.js';
import { hashKey, isMissingFileError, normalizeError } from '../utils/utils.js';
import {
  FILE_KEY_RULES,
  collectEntries,
  collectKeys,
  validateKey,
  type CacheValues,
} from '../validation/key-validator.js';
import type { ICacheAdapter } from './cache-adapter.js';
import { ErrorPolicy, type ErrorMode } from './error-policy.js';
import { resolveExpiresAt, systemClock, toEpochSeconds, type Clock, type Ttl } from './ttl-resolver.js';

const CACHE_FILE_SUFFIX = '.cache';
const TEMP_FILE_SUFFIX = '.tmp';
const LOCK_FILE_SUFFIX = '.lock';

/** Files a crashed writer can leave next to the cache files */
const LEFTOVER_SUFFIXES = [TEMP_FILE_SUFFIX, LOCK_FILE_SUFFIX, CLAIMED_LOCK_SUFFIX];

export interface FileStoreAdapterOptions {
  /** Root directory; created (with parents) if missing */
  directory: string;
  /** Error handling mode (default: THROW) */
  mode?: ErrorMode;
  /** Max wait for another process's write lock in ms (default: 5000) */
  lockWaitMs?: number;
  /** Age in ms after which an abandoned write lock is broken (default: 30000) */
  lockStaleMs?: number;
  /** Wall clock in epoch ms (default: Date.now) */
  now?: Clock;
}

/**
 * Persisted entry. `value` must be present (it may be null); `expires_at` is
 * null for "never expires".
 */
const CacheEntrySchema = z.object({
  value: z.unknown(),
  expires_at: z.number().int().nullable(),
}).refine(entry => 'value' in entry, { message: 'value is missing' });

type CacheEntry = z.infer<typeof CacheEntrySchema>;

export class FileStoreAdapter implements ICacheAdapter {
  private readonly directory: string;
  private readonly policy: ErrorPolicy;
  private readonly writeLock = new AsyncLock();
  private readonly lockWaitMs: number;
  private readonly lockStaleMs: number;
  private readonly now: Clock;

  /**
   * @throws {CacheOperationError} if the directory cannot be created or is not writable
   */
  constructor(options: FileStoreAdapterOptions) {
    const config = FileStoreOptionsSchema.parse({
      directory: options.directory,
      mode: options.mode,
      lockWaitMs: options.lockWaitMs,
      lockStaleMs: options.lockStaleMs,
    });

    this.directory = path.resolve(config.directory);
    this.policy = new ErrorPolicy(config.mode, 'FileStoreAdapter');
    this.lockWaitMs = config.lockWaitMs;
    this.lockStaleMs = config.lockStaleMs;
    this.now = options.now ?? systemClock;

    this.initializeDirectory();
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
    validateKey(key, FILE_KEY_RULES);

    const entry = await this.readLiveEntry(key);
    if (entry === undefined) {
      return defaultValue;
    }
    return entry.value;
  }

  async set(key: string, value: unknown, ttl?: Ttl): Promise<boolean> {
    validateKey(key, FILE_KEY_RULES);

    const nowMs = this.now();
    const expiresAt = resolveExpiresAt(ttl, nowMs);

    if (expiresAt !== null && expiresAt <= toEpochSeconds(nowMs)) {
      return this.delete(key);
    }

    const filePath = this.getFilePath(key);
    const entry: CacheEntry = { value, expires_at: expiresAt };

    try {
      const serialized = JSON.stringify(entry);
      await this.writeLock.acquire(filePath, () =>
        new FileLock(filePath + LOCK_FILE_SUFFIX, {
          waitMs: this.lockWaitMs,
          staleMs: this.lockStaleMs,
        }).withLock(() => this.writeAtomically(filePath, serialized))
      );
      return true;
    } catch (error: unknown) {
      return this.policy.fail(
        `Failed to write cache file: ${filePath} (${normalizeError(error).message})`,
        error,
        false
      );
    }
  }

  async delete(key: string): Promise<boolean> {
    validateKey(key, FILE_KEY_RULES);
    return this.removeFile(this.getFilePath(key));
  }

  /**
   * Remove every file directly under the root directory (best effort)
   *
   * @returns false only when the directory cannot be listed
   */
  async clear(): Promise<boolean> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error: unknown) {
      console.warn(
        `[FileStoreAdapter] Failed to list cache directory ${this.directory}: ${normalizeError(error).message}`
      );
      return false;
    }

    await Promise.all(
      names.map(async name => {
        const filePath = path.join(this.directory, name);
        try {
          const stats = await fs.stat(filePath);
          if (stats.isFile()) {
            await fs.unlink(filePath);
          }
        } catch (error: unknown) {
          if (!isMissingFileError(error)) {
            console.warn(`[FileStoreAdapter] Failed to remove ${filePath}: ${normalizeError(error).message}`);
          }
        }
      })
    );

    return true;
  }

  async has(key: string): Promise<boolean> {
    validateKey(key, FILE_KEY_RULES);
    return (await this.readLiveEntry(key)) !== undefined;
  }

  async getMultiple(keys: Iterable<string>, defaultValue: unknown = null): Promise<Record<string, unknown>> {
    const keyList = collectKeys(keys, FILE_KEY_RULES);

    const values: Array<[string, unknown]> = [];
    for (const key of keyList) {
      values.push([key, await this.get(key, defaultValue)]);
    }

    return Object.fromEntries(values);
  }

  /**
   * Write every pair with the same TTL
   *
   * Under THROW the first failure propagates and earlier writes stay in
   * place; under FAIL the result is false if any write failed.
   */
  async setMultiple(values: CacheValues, ttl?: Ttl): Promise<boolean> {
    const entries = collectEntries(values, FILE_KEY_RULES);

    let success = true;
    for (const [key, value] of entries) {
      success = (await this.set(key, value, ttl)) && success;
    }

    return success;
  }

  async deleteMultiple(keys: Iterable<string>): Promise<boolean> {
    const keyList = collectKeys(keys, FILE_KEY_RULES);

    let success = true;
    for (const key of keyList) {
      success = (await this.delete(key)) && success;
    }

    return success;
  }

  /**
   * Garbage collection: remove expired and corrupt cache files
   *
   * Lock and temp files left behind by a crashed writer are swept too once
   * they are older than `lockStaleMs`; they are not counted.
   *
   * Never runs on its own; call it periodically (cron, interval timer).
   *
   * @returns number of cache entries deleted
   */
  async gc(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error: unknown) {
      return this.policy.fail(
        `Failed to list cache directory: ${this.directory} (${normalizeError(error).message})`,
        error,
        0
      );
    }

    let deleted = 0;
    for (const name of names) {
      const filePath = path.join(this.directory, name);

      try {
        if (name.endsWith(CACHE_FILE_SUFFIX)) {
          if (await this.collectEntry(filePath)) {
            deleted++;
          }
        } else if (LEFTOVER_SUFFIXES.some(suffix => name.endsWith(suffix))) {
          await this.collectLeftover(filePath);
        }
      } catch (error: unknown) {
        console.warn(`[FileStoreAdapter] gc skipped ${filePath}: ${normalizeError(error).message}`);
      }
    }

    return deleted;
  }

  private async collectEntry(filePath: string): Promise<boolean> {
    const entry = await this.loadEntry(filePath);
    if (entry === 'missing') {
      return false;
    }

    if (entry !== 'corrupt' && !this.isExpired(entry)) {
      return false;
    }

    return this.unlinkIfPresent(filePath);
  }

  private async collectLeftover(filePath: string): Promise<void> {
    let modifiedAt: number;
    try {
      modifiedAt = (await fs.stat(filePath)).mtimeMs;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return;
      }
      throw error;
    }

    if (Date.now() - modifiedAt > this.lockStaleMs) {
      await this.unlinkIfPresent(filePath);
    }
  }

  /**
   * Read an entry, evicting it when it is corrupt or expired
   */
  private async readLiveEntry(key: string): Promise<CacheEntry | undefined> {
    const filePath = this.getFilePath(key);

    let entry: CacheEntry | 'missing' | 'corrupt';
    try {
      entry = await this.loadEntry(filePath);
    } catch (error: unknown) {
      return this.policy.fail(
        `Failed to read cache file: ${filePath} (${normalizeError(error).message})`,
        error,
        undefined
      );
    }

    if (entry === 'missing') {
      return undefined;
    }

    if (entry === 'corrupt') {
      console.warn(`[FileStoreAdapter] Removing corrupt cache file for key "${key}"`);
      await this.evict(filePath);
      return undefined;
    }

    if (this.isExpired(entry)) {
      await this.evict(filePath);
      return undefined;
    }

    return entry;
  }

  /**
   * Best-effort removal on the read path; the read is a miss either way
   */
  private async evict(filePath: string): Promise<void> {
    try {
      await this.unlinkIfPresent(filePath);
    } catch (error: unknown) {
      console.warn(`[FileStoreAdapter] Failed to evict ${filePath}: ${normalizeError(error).message}`);
    }
  }

  /**
   * Load and validate cache data from file
   *
   * @throws on read faults other than "file does not exist"
   */
  private async loadEntry(filePath: string): Promise<CacheEntry | 'missing' | 'corrupt'> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return 'missing';
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      return 'corrupt';
    }

    const parsed = CacheEntrySchema.safeParse(data);
    return parsed.success ? parsed.data : 'corrupt';
  }

  private isExpired(entry: CacheEntry): boolean {
    return entry.expires_at !== null && entry.expires_at < toEpochSeconds(this.now());
  }

  private async writeAtomically(filePath: string, content: string): Promise<void> {
    const tempPath = `${filePath}.${process.pid}.${randomUUID()}${TEMP_FILE_SUFFIX}`;

    try {
      await fs.writeFile(tempPath, content, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error: unknown) {
      await this.unlinkIfPresent(tempPath).catch((cleanupError: unknown) => {
        console.warn(
          `[FileStoreAdapter] Failed to remove temp file ${tempPath}: ${normalizeError(cleanupError).message}`
        );
      });
      throw error;
    }
  }

  private async removeFile(filePath: string): Promise<boolean> {
    try {
      await this.unlinkIfPresent(filePath);
      return true;
    } catch (error: unknown) {
      return this.policy.fail(
        `Failed to delete cache file: ${filePath} (${normalizeError(error).message})`,
        error,
        false
      );
    }
  }

  /**
   * @returns true if this call removed the file, false if it was already gone
   */
  private async unlinkIfPresent(filePath: string): Promise<boolean> {
    try {
      await fs.unlink(filePath);
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
  }

  private getFilePath(key: string): string {
    return path.join(this.directory, hashKey(key) + CACHE_FILE_SUFFIX);
  }

  private initializeDirectory(): void {
    try {
      mkdirSync(this.directory, { recursive: true });
    } catch (error: unknown) {
      throw new CacheOperationError(`Failed to create cache directory: ${this.directory}`, { cause: error });
    }

    try {
      if (!statSync(this.directory).isDirectory()) {
        throw new Error('not a directory');
      }
      accessSync(this.directory, constants.W_OK);
    } catch (error: unknown) {
      throw new CacheOperationError(`Cache directory is not writable: ${this.directory}`, { cause: error });
    }
  }
}
