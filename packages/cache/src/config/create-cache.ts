import { ExpiringSizedCache } from "../adapters/memory/expiring-sized-cache"
import { ExpiringValueCache } from "../adapters/memory/expiring-value-cache"
import { LruCache } from "../adapters/memory/lru-cache"
import { TimedCache } from "../adapters/memory/timed-cache"
import { TimedLruCache } from "../adapters/memory/timed-lru-cache"
import { UnboundCache } from "../adapters/memory/unbound-cache"
import { CacheUsageError } from "../core/errors"
import type { CacheDeps } from "../ports/cache-deps"
import type { Cached } from "../ports/cached"
import type { CacheConfig } from "./cache-config"

export type CreateCacheOptions<K, V> = {
  /** Required by the "expiring-value" policy. */
  isExpired?: (value: V) => boolean

  /** Used by the "expiring" policy. */
  keyIdentity?: (key: K) => unknown
}

/**
 * Builds the store named by `config.CACHE_POLICY`.
 *
 * @throws CacheUsageError for the "expiring-value" policy without `isExpired`.
 */
export function createCache<K, V>(
  config: CacheConfig,
  deps: Partial<CacheDeps> = {},
  options: CreateCacheOptions<K, V> = {},
): Cached<K, V> {
  const scoped: Partial<CacheDeps> = {
    ...deps,
    ...(deps.logger && { logger: deps.logger.child({ policy: config.CACHE_POLICY }) }),
  }

  switch (config.CACHE_POLICY) {
    case "unbounded":
      return new UnboundCache<K, V>(config.CACHE_CAPACITY)

    case "lru":
      return new LruCache<K, V>(
        {
          capacity: config.CACHE_CAPACITY,
          writeRefreshesRecency: config.CACHE_WRITE_REFRESHES_RECENCY,
        },
        scoped,
      )

    case "timed":
      return new TimedCache<K, V>(
        { lifespanMs: config.CACHE_LIFESPAN_MS, refresh: config.CACHE_REFRESH },
        scoped,
      )

    case "timed-lru":
      return new TimedLruCache<K, V>(
        {
          capacity: config.CACHE_CAPACITY,
          lifespanMs: config.CACHE_LIFESPAN_MS,
          writeRefreshesRecency: config.CACHE_WRITE_REFRESHES_RECENCY,
        },
        scoped,
      )

    case "expiring":
      return new ExpiringSizedCache<K, V>(
        {
          lifespanMs: config.CACHE_LIFESPAN_MS,
          sizeLimit: config.CACHE_SIZE_LIMIT,
          maxTombstones: config.CACHE_MAX_TOMBSTONES,
          keyIdentity: options.keyIdentity,
        },
        scoped,
      )

    case "expiring-value": {
      const { isExpired } = options

      if (!isExpired) {
        throw new CacheUsageError('The "expiring-value" policy needs an isExpired option', {
          policy: config.CACHE_POLICY,
        })
      }

      return new ExpiringValueCache<K, V>({ capacity: config.CACHE_CAPACITY, isExpired }, scoped)
    }
  }
}
