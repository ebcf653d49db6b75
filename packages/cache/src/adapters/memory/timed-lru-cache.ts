import type { Clock, Milliseconds } from "@cachet/clock"
import { resolveDeps } from "../../core/deps"
import { assertLifespan } from "../../core/validate"
import type { CacheDeps } from "../../ports/cache-deps"
import type { Cached } from "../../ports/cached"
import type { Stamped } from "../../ports/stamped"
import { LruCache } from "./lru-cache"

export type TimedLruCacheOptions = {
  capacity: number
  lifespanMs: Milliseconds
  writeRefreshesRecency?: boolean
}

/**
 * LRU store whose entries also expire `lifespanMs` after they were written.
 *
 * Expired entries read as misses but stay in place until capacity pressure,
 * `remove` or `clear` drops them.
 */
export class TimedLruCache<K, V> implements Cached<K, V> {
  private readonly inner: LruCache<K, Stamped<V>>
  private readonly clock: Clock
  private lifespanMs: Milliseconds

  constructor(opts: TimedLruCacheOptions, deps: Partial<CacheDeps> = {}) {
    const resolved = resolveDeps(deps, "TimedLruCache")

    this.lifespanMs = assertLifespan(opts.lifespanMs)
    this.clock = resolved.clock
    this.inner = new LruCache(
      { capacity: opts.capacity, writeRefreshesRecency: opts.writeRefreshesRecency },
      resolved,
    )
  }

  get(key: K): V | undefined {
    return this.inner.getIf(key, this.isLive)?.value
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    return this.inner.updateIf(key, this.isLive, (entry) => ({
      stampedAt: entry.stampedAt,
      value: updater(entry.value),
    }))?.value
  }

  getOrSetWith(key: K, factory: () => V): V {
    const { value } = this.inner.getOrSetWithIf(key, () => this.stamp(factory()), this.isLive)

    return value.value
  }

  /** Restamps `key`. Returns the previous value even if it had expired. */
  set(key: K, value: V): V | undefined {
    return this.inner.set(key, this.stamp(value))?.value
  }

  remove(key: K): V | undefined {
    return this.inner.remove(key)?.value
  }

  /** Live keys from most to least recently used. */
  *keyOrder(): IterableIterator<K> {
    for (const [key, entry] of this.inner.entries()) {
      if (this.isLive(entry)) yield key
    }
  }

  /** Live values from most to least recently used. */
  *valueOrder(): IterableIterator<V> {
    for (const [, entry] of this.inner.entries()) {
      if (this.isLive(entry)) yield entry.value
    }
  }

  clear(): void {
    this.inner.clear()
  }

  reset(): void {
    this.inner.reset()
  }

  /** Counts expired entries that have not been dropped yet. */
  size(): number {
    return this.inner.size()
  }

  hits(): number {
    return this.inner.hits()
  }

  misses(): number {
    return this.inner.misses()
  }

  resetMetrics(): void {
    this.inner.resetMetrics()
  }

  capacity(): number {
    return this.inner.capacity()
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

  private stamp(value: V): Stamped<V> {
    return { stampedAt: this.clock.nowMs(), value }
  }

  private readonly isLive = (entry: Stamped<V>): boolean =>
    this.clock.nowMs() - entry.stampedAt < this.lifespanMs
}
