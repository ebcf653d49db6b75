import { type ConfigSource, type IConfig, loadConfig } from "@cachet/config"
import { z } from "zod"
import { DEFAULT_MAX_TOMBSTONES } from "../adapters/memory/expiring-sized-cache"

const capacity = z.coerce.number().int().positive()
const lifespanMs = z.coerce.number().nonnegative()
const flag = z.union([z.boolean(), z.stringbool()]).default(false)

export const cacheConfigSchema = z.discriminatedUnion("CACHE_POLICY", [
  z.object({
    CACHE_POLICY: z.literal("unbounded"),
    CACHE_CAPACITY: capacity.optional(),
  }),
  z.object({
    CACHE_POLICY: z.literal("lru"),
    CACHE_CAPACITY: capacity,
    CACHE_WRITE_REFRESHES_RECENCY: flag,
  }),
  z.object({
    CACHE_POLICY: z.literal("timed"),
    CACHE_LIFESPAN_MS: lifespanMs,
    CACHE_REFRESH: flag,
  }),
  z.object({
    CACHE_POLICY: z.literal("timed-lru"),
    CACHE_CAPACITY: capacity,
    CACHE_LIFESPAN_MS: lifespanMs,
    CACHE_WRITE_REFRESHES_RECENCY: flag,
  }),
  z.object({
    CACHE_POLICY: z.literal("expiring"),
    CACHE_LIFESPAN_MS: lifespanMs,
    CACHE_SIZE_LIMIT: capacity.optional(),
    CACHE_MAX_TOMBSTONES: capacity.default(DEFAULT_MAX_TOMBSTONES),
  }),
  z.object({
    CACHE_POLICY: z.literal("expiring-value"),
    CACHE_CAPACITY: capacity,
  }),
])

export type CacheConfig = z.infer<typeof cacheConfigSchema>

export type CachePolicy = CacheConfig["CACHE_POLICY"]

/**
 * Loads and validates cache settings. Reads the environment when no
 * sources are given.
 *
 * @throws ConfigValidationError
 */
export async function loadCacheConfig(sources?: ConfigSource[]): Promise<IConfig<CacheConfig>> {
  return loadConfig({ schema: cacheConfigSchema, sources })
}
