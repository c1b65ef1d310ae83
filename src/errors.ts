/**
 * Cache error types
 *
 * Two kinds only:
 * - InvalidKeyError: caller supplied a bad key. Always thrown, whatever the ErrorMode.
 * - CacheOperationError: the storage backend failed. Thrown under THROW mode,
 *   swallowed under FAIL mode (see ErrorPolicy).
 */

export type CacheErrorKind = 'invalid_key' | 'operation_failed';

export abstract class CacheError extends Error {
  abstract readonly kind: CacheErrorKind;
}

export class InvalidKeyError extends CacheError {
  readonly kind = 'invalid_key';

  constructor(readonly reason: string) {
    super(reason);
    this.name = 'InvalidKeyError';
  }
}

export class CacheOperationError extends CacheError {
  readonly kind = 'operation_failed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheOperationError';
  }
}

export function isCacheError(e: unknown): e is CacheError {
  return e instanceof CacheError;
}
