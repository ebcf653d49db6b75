import type { Milliseconds } from "@cachet/clock"

/**
 * The capability every store offers.
 *
 * Absent and expired keys read as `undefined`. Stores are synchronous and
 * single-owner; wrap one in {@link ReadThroughCache} for async loading.
 */
export interface Cached<K, V> {
  /**
   * Live value for `key`. Counts a hit when one is returned and a miss
   * otherwise. Some policies drop an expired entry as a side effect.
   */
  get(key: K): V | undefined

  /**
   * Same lookup, recency and accounting as `get`. When a live value exists,
   * `updater(current)` replaces it in place (its timestamp is kept) and the
   * new value is returned.
   */
  update(key: K, updater: (current: V) => V): V | undefined

  /**
   * Returns the live value, or calls `factory` exactly once and stores its
   * result. A hit is counted only when an existing live value was reused.
   */
  getOrSetWith(key: K, factory: () => V): V

  /**
   * Inserts or replaces `key` and returns the previous value.
   */
  set(key: K, value: V): V | undefined

  remove(key: K): V | undefined

  clear(): void

  /** Clears entries and restores the initial allocation. Counters are kept. */
  reset(): void

  size(): number

  /** `undefined` for stores that keep no counters. */
  hits(): number | undefined
  misses(): number | undefined

  resetMetrics(): void

  capacity(): number | undefined

  lifespan(): Milliseconds | undefined

  /**
   * Replaces the lifespan and returns the previous one. Stores without a
   * lifespan ignore the call and return `undefined`.
   */
  setLifespan(lifespanMs: Milliseconds): Milliseconds | undefined
}
