/**
 * TTL Resolver
 *
 * Converts a caller-supplied TTL into the form each backend persists:
 * - file backend: absolute expiry instant (epoch seconds) stored next to the value
 * - remote backend: seconds from now, for the native set-with-expiry command
 *
 * Both use the same wall clock (`nowMs`) so a Duration resolves to the same
 * relative seconds count whenever it is resolved, and to a later absolute
 * instant when resolved later.
 */

import { DateTime, Duration } from 'luxon';

/**
 * Time-to-live accepted by every cache operation
 *
 * - null / undefined: never expires
 * - number: seconds from now (fractions are truncated, <= 0 means delete now)
 * - Duration: symbolic duration (e.g. `Duration.fromObject({ hours: 2 })`)
 */
export type Ttl = number | Duration | null | undefined;

/** Clock returning epoch milliseconds, injectable for tests */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function toEpochSeconds(nowMs: number): number {
  return Math.floor(nowMs / 1000);
}

function toWholeSeconds(ttl: number): number {
  if (!Number.isFinite(ttl)) {
    throw new RangeError(`TTL must be a finite number of seconds, got ${ttl}`);
  }
  return Math.trunc(ttl);
}

function addDuration(duration: Duration, nowMs: number): number {
  if (!duration.isValid) {
    throw new RangeError(`TTL duration is invalid: ${duration.invalidReason ?? 'unknown reason'}`);
  }
  return toEpochSeconds(DateTime.fromMillis(nowMs).plus(duration).toMillis());
}

/**
 * Resolve a TTL to an absolute expiry instant in epoch seconds
 *
 * A TTL of zero or less resolves to the current second, which callers treat
 * as "delete immediately".
 *
 * @returns epoch seconds, or null for "no expiry"
 */
export function resolveExpiresAt(ttl: Ttl, nowMs: number): number | null {
  if (ttl === null || ttl === undefined) {
    return null;
  }

  const now = toEpochSeconds(nowMs);

  if (Duration.isDuration(ttl)) {
    return addDuration(ttl, nowMs);
  }

  const seconds = toWholeSeconds(ttl);
  return seconds <= 0 ? now : now + seconds;
}

/**
 * Resolve a TTL to a relative number of seconds from now
 *
 * @returns seconds (<= 0 means "delete immediately"), or null for "no expiry"
 */
export function resolveTtlSeconds(ttl: Ttl, nowMs: number): number | null {
  if (ttl === null || ttl === undefined) {
    return null;
  }

  if (Duration.isDuration(ttl)) {
    return addDuration(ttl, nowMs) - toEpochSeconds(nowMs);
  }

  return toWholeSeconds(ttl);
}
