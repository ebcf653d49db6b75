import type { Milliseconds } from "../ports/time"

/**
 * Largest instant a {@link Clock} reading may be advanced to.
 *
 * Past this point float arithmetic stops being exact, so two distinct
 * expiries could compare equal.
 */
export const MAX_INSTANT_MS: Milliseconds = Number.MAX_SAFE_INTEGER

/**
 * Add `deltaMs` to `instantMs`, returning `undefined` instead of an inexact
 * or non-finite result.
 *
 * @example
 * ```ts
 * const expiry = checkedAddMs(clock.nowMs(), ttlMs)
 * if (expiry === undefined) throw new TimeBoundsError(...)
 * ```
 */
export function checkedAddMs(
  instantMs: Milliseconds,
  deltaMs: Milliseconds,
): Milliseconds | undefined {
  const sum = instantMs + deltaMs

  if (!Number.isFinite(sum)) return undefined
  if (sum > MAX_INSTANT_MS || sum < -MAX_INSTANT_MS) return undefined

  return sum
}
