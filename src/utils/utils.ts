/**
 * Utility functions shared by the cache adapters
 */

import * as crypto from 'crypto';

/**
 * Create the MD5 hex digest used to name a key's cache file
 */
export function hashKey(key: string): string {
  return crypto.createHash('md5').update(key).digest('hex');
}

/**
 * Type guard to check if value is an Error instance
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   if (isError(error)) {
 *     console.log(error.message);
 *   }
 * }
 * ```
 */
export function isError(e: unknown): e is Error {
  return e instanceof Error;
}

/**
 * Type guard to check if value is a Node.js ErrnoException
 *
 * File system errors carry a string `code` (e.g. 'ENOENT') that callers
 * branch on.
 *
 * @example
 * ```typescript
 * catch (error: unknown) {
 *   if (isErrnoException(error) && error.code === 'ENOENT') {
 *     return defaultValue;
 *   }
 * }
 * ```
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return (
    typeof e === 'object' &&
    e !== null &&
    'code' in e &&
    typeof e.code === 'string'
  );
}

/**
 * True when the error is a file system "no such file" fault
 */
export function isMissingFileError(e: unknown): boolean {
  return isErrnoException(e) && e.code === 'ENOENT';
}

/**
 * Normalize unknown thrown value to Error, so its message can go into a log
 * line or a CacheOperationError
 *
 * @returns the original Error, or a new Error describing the value
 */
export function normalizeError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }

  if (typeof error === 'object' && error !== null) {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      // Circular reference or BigInt
      return new Error(String(error));
    }
  }

  return new Error(String(error));
}
