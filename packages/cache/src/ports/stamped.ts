import type { Milliseconds } from "@cachet/clock"

/** A value with the monotonic instant it was written at. */
export type Stamped<V> = {
  stampedAt: Milliseconds
  value: V
}

/** Result of reading a key whose value may already be past its lifespan. */
export type ExpiredLookup<V> = {
  value: V
  expired: boolean
}
