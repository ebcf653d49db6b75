import { toAppError } from "@cachet/errors"
import { createNullLogger, type Logger } from "@cachet/logger"
import type { Cached } from "../../ports/cached"
import type { ReadThrough } from "./read-through"

export type ReadThroughCacheDeps = {
  logger: Logger
}

export type ReadThroughCacheOptions<K> = {
  /**
   * Maps a key to the value in-flight loads are shared by, compared with
   * SameValueZero. Pass the wrapped store's own `keyIdentity` so keys the
   * store treats as equal share one load.
   *
   * @default the key itself
   */
  keyIdentity?: (key: K) => unknown
}

/**
 * Async loading in front of a synchronous store.
 *
 * Concurrent misses for one key share a single in-flight load and its
 * outcome. A failed load stores nothing and rejects with the loader's own
 * error; the next call starts afresh.
 */
export class ReadThroughCache<K, V> implements ReadThrough<K, V> {
  private readonly inflight = new Map<unknown, Promise<V>>()
  private readonly logger: Logger
  private readonly keyIdentity: (key: K) => unknown

  constructor(
    private readonly cache: Cached<K, V>,
    deps: Partial<ReadThroughCacheDeps> = {},
    options: ReadThroughCacheOptions<K> = {},
  ) {
    this.keyIdentity = options.keyIdentity ?? ((key) => key)
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache",
      store: "ReadThroughCache",
    })
  }

  async getThrough(key: K, loader: () => Promise<V>): Promise<V> {
    const cached = this.cache.get(key)

    if (cached !== undefined) return cached

    const id = this.keyIdentity(key)
    const pending = this.inflight.get(id)

    if (pending) return pending

    const load = this.load(key, loader)

    this.inflight.set(id, load)

    try {
      return await load
    } finally {
      if (this.inflight.get(id) === load) this.inflight.delete(id)
    }
  }

  /** Number of loads currently in flight. */
  get pending(): number {
    return this.inflight.size
  }

  get store(): Cached<K, V> {
    return this.cache
  }

  private async load(key: K, loader: () => Promise<V>): Promise<V> {
    try {
      const value = await loader()

      this.cache.set(key, value)

      return value
    } catch (err) {
      this.logger.debug("read-through load failed", {
        err: toAppError(err, { fallbackCode: "cache_load_failed", context: { key } }),
      })
      throw err
    }
  }
}
