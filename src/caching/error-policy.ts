/**
 * Error Policy
 *
 * Per-adapter switch deciding what happens when the storage backend fails:
 * - THROW (default): the fault surfaces as CacheOperationError
 * - FAIL: the fault is logged and the operation returns its degraded result
 *   (the default value for reads, false for writes and deletes)
 *
 * The mode is read when the fault happens, not when the call starts, so a
 * setMode() racing an in-flight call applies to that call's fault handling.
 */

import { z } from 'zod';
import { CacheOperationError, InvalidKeyError } from '../errors.js';
import { normalizeError } from '../utils/utils.js';

export const ErrorMode = {
  THROW: 'throw',
  FAIL: 'fail',
} as const;

export type ErrorMode = (typeof ErrorMode)[keyof typeof ErrorMode];

export const ErrorModeSchema = z.enum([ErrorMode.THROW, ErrorMode.FAIL]);

export class ErrorPolicy {
  constructor(
    private mode: ErrorMode = ErrorMode.THROW,
    private readonly component: string = 'Cache'
  ) {}

  getMode(): ErrorMode {
    return this.mode;
  }

  setMode(mode: ErrorMode): void {
    this.mode = ErrorModeSchema.parse(mode);
  }

  shouldThrow(): boolean {
    return this.mode === ErrorMode.THROW;
  }

  /**
   * Report a storage fault
   *
   * Throws CacheOperationError under THROW, otherwise logs and returns `fallback`.
   */
  fail<T>(message: string, cause: unknown, fallback: T): T {
    if (this.shouldThrow()) {
      throw cause instanceof CacheOperationError
        ? cause
        : new CacheOperationError(message, { cause });
    }

    console.warn(`[${this.component}] ${message}`);
    return fallback;
  }

  /**
   * Run one storage call under this policy
   *
   * Key validation errors are caller bugs and pass through untouched.
   */
  async guard<T>(operation: string, run: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await run();
    } catch (error: unknown) {
      if (error instanceof InvalidKeyError) {
        throw error;
      }
      return this.fail(
        `${operation} operation failed: ${normalizeError(error).message}`,
        error,
        fallback
      );
    }
  }
}
