/**
 * Key validation shared by every cache adapter
 *
 * Each backend passes its own KeyRules; validation happens before any
 * storage access and is never gated by ErrorMode.
 */

import { InvalidKeyError } from '../errors.js';

export interface KeyRules {
  /** Full-string pattern a key must match */
  pattern: RegExp;
  /** Human readable list of allowed characters, used in error messages */
  allowed: string;
}

/** File backend: letters, digits, underscores and dots */
export const FILE_KEY_RULES: KeyRules = {
  pattern: /^[a-zA-Z0-9_.]+$/,
  allowed: 'alphanumeric characters, underscores, and dots',
};

/** Remote backend: additionally colons and hyphens, the usual namespace separators */
export const REMOTE_KEY_RULES: KeyRules = {
  pattern: /^[a-zA-Z0-9_.:-]+$/,
  allowed: 'alphanumeric characters, underscores, dots, colons, and hyphens',
};

/**
 * Assert that `key` is a non-empty string made of allowed characters
 *
 * @throws {InvalidKeyError}
 */
export function validateKey(key: unknown, rules: KeyRules): asserts key is string {
  if (typeof key !== 'string') {
    throw new InvalidKeyError('Cache key must be a string');
  }

  if (key === '') {
    throw new InvalidKeyError('Cache key cannot be empty');
  }

  if (!rules.pattern.test(key)) {
    throw new InvalidKeyError(
      `Cache key contains invalid characters. Only ${rules.allowed} are allowed.`
    );
  }
}

/**
 * Materialize a batch of keys, validate every element, and drop duplicates
 *
 * The iterable is traversed exactly once. Order of first appearance is kept.
 *
 * @throws {InvalidKeyError} before the caller has done any storage work
 */
export function collectKeys(keys: Iterable<string>, rules: KeyRules): string[] {
  const unique = new Set<string>();

  for (const key of keys) {
    validateKey(key, rules);
    unique.add(key);
  }

  return [...unique];
}

/** Key/value input accepted by setMultiple */
export type CacheValues =
  | ReadonlyMap<string, unknown>
  | Iterable<readonly [string, unknown]>
  | Readonly<Record<string, unknown>>;

function isEntryIterable(values: CacheValues): values is Iterable<readonly [string, unknown]> {
  return Symbol.iterator in values;
}

/**
 * Materialize key/value input into validated, deduplicated pairs
 *
 * Accepts a Map, an iterable of [key, value] pairs, or a plain object.
 * A key that appears twice keeps its last value.
 *
 * @throws {InvalidKeyError} before the caller has done any storage work
 */
export function collectEntries(values: CacheValues, rules: KeyRules): Array<[string, unknown]> {
  const pairs = isEntryIterable(values) ? values : Object.entries(values);
  const entries = new Map<string, unknown>();

  for (const [key, value] of pairs) {
    validateKey(key, rules);
    entries.set(key, value);
  }

  return [...entries];
}
