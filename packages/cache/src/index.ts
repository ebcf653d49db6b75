export {
  DEFAULT_MAX_TOMBSTONES,
  ExpiringSizedCache,
  type ExpiringSizedCacheOptions,
  type InsertOptions,
  type SharedKey,
} from "./adapters/memory/expiring-sized-cache"
export {
  ExpiringValueCache,
  type ExpiringValueCacheOptions,
} from "./adapters/memory/expiring-value-cache"
export {
  type ConditionalLookup,
  LruCache,
  type LruCacheOptions,
} from "./adapters/memory/lru-cache"
export { TimedCache, type TimedCacheOptions } from "./adapters/memory/timed-cache"
export { TimedLruCache, type TimedLruCacheOptions } from "./adapters/memory/timed-lru-cache"
export { UnboundCache } from "./adapters/memory/unbound-cache"
export {
  type CacheConfig,
  type CachePolicy,
  cacheConfigSchema,
  loadCacheConfig,
} from "./config/cache-config"
export { type CreateCacheOptions, createCache } from "./config/create-cache"
export { ArenaList } from "./core/arena/arena-list"
export { CacheUsageError, TimeBoundsError } from "./core/errors"
export type { ReadThrough } from "./core/through/read-through"
export {
  ReadThroughCache,
  type ReadThroughCacheDeps,
  type ReadThroughCacheOptions,
} from "./core/through/read-through-cache"
export type { CacheDeps } from "./ports/cache-deps"
export type { Cached } from "./ports/cached"
export type { CanExpire } from "./ports/can-expire"
export type { ExpiredLookup, Stamped } from "./ports/stamped"
