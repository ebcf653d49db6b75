import type { Milliseconds } from "./time"

/**
 * Monotonic time source used for expiry math.
 *
 * @remarks
 * Readings never go backwards and are unaffected by wall-clock adjustments,
 * so they can only be compared with other readings from the same clock.
 */
export interface Clock {
  /** Current reading in milliseconds. */
  nowMs(): Milliseconds
}
