import type { Clock, Milliseconds } from "@cachet/clock"
import type { Logger } from "@cachet/logger"
import { resolveDeps } from "../../core/deps"
import { assertLifespan } from "../../core/validate"
import type { CacheDeps } from "../../ports/cache-deps"
import type { Cached } from "../../ports/cached"
import type { ExpiredLookup, Stamped } from "../../ports/stamped"

export type TimedCacheOptions = {
  lifespanMs: Milliseconds

  /**
   * Restamp an entry with the current time on every successful read.
   *
   * @default false
   */
  refresh?: boolean

  /** Expected entry count; recorded only. */
  capacityHint?: number
}

/**
 * Store whose entries expire `lifespanMs` after they were written.
 *
 * An entry stamped at `t` is live while `now < t + lifespanMs`. Reading an
 * expired entry removes it.
 */
export class TimedCache<K, V> implements Cached<K, V> {
  readonly capacityHint: number | undefined

  private store = new Map<K, Stamped<V>>()
  private lifespanMs: Milliseconds
  private refreshOnRead: boolean
  private readonly clock: Clock
  private readonly logger: Logger
  private hitCount = 0
  private missCount = 0

  constructor(opts: TimedCacheOptions, deps: Partial<CacheDeps> = {}) {
    const resolved = resolveDeps(deps, "TimedCache")

    this.lifespanMs = assertLifespan(opts.lifespanMs)
    this.refreshOnRead = opts.refresh ?? false
    this.capacityHint = opts.capacityHint
    this.clock = resolved.clock
    this.logger = resolved.logger
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    const entry = this.lookup(key)

    if (!entry) return undefined

    entry.value = updater(entry.value)

    return entry.value
  }

  getOrSetWith(key: K, factory: () => V): V {
    const entry = this.lookup(key)

    if (entry) return entry.value

    const value = factory()

    this.store.set(key, { stampedAt: this.clock.nowMs(), value })

    return value
  }

  /** Stamps `value` with the current time. Returns the previous value even if expired. */
  set(key: K, value: V): V | undefined {
    const previous = this.store.get(key)

    this.store.set(key, { stampedAt: this.clock.nowMs(), value })

    return previous?.value
  }

  remove(key: K): V | undefined {
    const previous = this.store.get(key)

    this.store.delete(key)

    return previous?.value
  }

  /**
   * Like `get`, but hands back an expired value (removing it) instead of
   * discarding it.
   */
  getExpired(key: K): ExpiredLookup<V> | undefined {
    return this.read(key)
  }

  /** Removes every expired entry and returns how many were removed. */
  flush(): number {
    const now = this.clock.nowMs()
    let removed = 0

    for (const [key, entry] of this.store) {
      if (this.isExpired(entry, now)) {
        this.store.delete(key)
        removed++
      }
    }

    if (removed > 0) {
      this.logger.debug("flushed expired entries", { removed, remaining: this.store.size })
    }

    return removed
  }

  refresh(): boolean {
    return this.refreshOnRead
  }

  /** Returns the previous setting. */
  setRefresh(refresh: boolean): boolean {
    const previous = this.refreshOnRead

    this.refreshOnRead = refresh

    return previous
  }

  clear(): void {
    this.store.clear()
  }

  reset(): void {
    this.store = new Map()
  }

  size(): number {
    return this.store.size
  }

  hits(): number {
    return this.hitCount
  }

  misses(): number {
    return this.missCount
  }

  resetMetrics(): void {
    this.hitCount = 0
    this.missCount = 0
  }

  capacity(): undefined {
    return undefined
  }

  lifespan(): Milliseconds {
    return this.lifespanMs
  }

  /** Stored stamps are measured against the new lifespan from now on. */
  setLifespan(lifespanMs: Milliseconds): Milliseconds {
    const previous = this.lifespanMs

    this.lifespanMs = assertLifespan(lifespanMs)

    return previous
  }

  private lookup(key: K): Stamped<V> | undefined {
    const entry = this.store.get(key)

    return this.read(key)?.expired === false ? entry : undefined
  }

  /** Counts the read and removes the entry when it has expired. */
  private read(key: K): ExpiredLookup<V> | undefined {
    const entry = this.store.get(key)

    if (!entry) {
      this.missCount++
      return undefined
    }

    const now = this.clock.nowMs()

    if (this.isExpired(entry, now)) {
      this.store.delete(key)
      this.missCount++

      return { value: entry.value, expired: true }
    }

    this.hitCount++
    if (this.refreshOnRead) entry.stampedAt = now

    return { value: entry.value, expired: false }
  }

  private isExpired(entry: Stamped<V>, now: Milliseconds): boolean {
    return now - entry.stampedAt >= this.lifespanMs
  }
}
