import type { Milliseconds } from "@cachet/clock"
import type { Logger } from "@cachet/logger"
import { resolveDeps } from "../../core/deps"
import type { CacheDeps } from "../../ports/cache-deps"
import type { Cached } from "../../ports/cached"
import type { CanExpire } from "../../ports/can-expire"
import { LruCache } from "./lru-cache"

export type ExpiringValueCacheOptions<V> = {
  capacity: number

  /** Decides whether a stored value has expired. */
  isExpired: (value: V) => boolean
}

/**
 * LRU store whose values decide their own expiry. Reading an expired value
 * removes it and counts a miss.
 */
export class ExpiringValueCache<K, V> implements Cached<K, V> {
  private readonly inner: LruCache<K, V>
  private readonly isExpired: (value: V) => boolean
  private readonly logger: Logger

  constructor(opts: ExpiringValueCacheOptions<V>, deps: Partial<CacheDeps> = {}) {
    const resolved = resolveDeps(deps, "ExpiringValueCache")

    this.isExpired = opts.isExpired
    this.logger = resolved.logger
    this.inner = new LruCache({ capacity: opts.capacity }, resolved)
  }

  /** For values implementing {@link CanExpire}. */
  static of<K, V extends CanExpire>(
    opts: { capacity: number },
    deps: Partial<CacheDeps> = {},
  ): ExpiringValueCache<K, V> {
    return new ExpiringValueCache<K, V>(
      { capacity: opts.capacity, isExpired: (value) => value.isExpired() },
      deps,
    )
  }

  get(key: K): V | undefined {
    this.dropIfExpired(key)

    return this.inner.get(key)
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    this.dropIfExpired(key)

    return this.inner.update(key, updater)
  }

  getOrSetWith(key: K, factory: () => V): V {
    this.dropIfExpired(key)

    return this.inner.getOrSetWith(key, factory)
  }

  set(key: K, value: V): V | undefined {
    return this.inner.set(key, value)
  }

  remove(key: K): V | undefined {
    return this.inner.remove(key)
  }

  /** Removes every expired value and returns how many were removed. */
  flush(): number {
    const expired: K[] = []

    for (const [key, value] of this.inner.entries()) {
      if (this.isExpired(value)) expired.push(key)
    }

    for (const key of expired) this.inner.remove(key)

    if (expired.length > 0) {
      this.logger.debug("flushed expired entries", {
        removed: expired.length,
        remaining: this.inner.size(),
      })
    }

    return expired.length
  }

  clear(): void {
    this.inner.clear()
  }

  reset(): void {
    this.inner.reset()
  }

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

  lifespan(): undefined {
    return undefined
  }

  setLifespan(_lifespanMs: Milliseconds): undefined {
    return undefined
  }

  private dropIfExpired(key: K): void {
    const value = this.inner.peek(key)

    if (value !== undefined && this.isExpired(value)) this.inner.remove(key)
  }
}
