import type { Milliseconds } from "@cachet/clock"
import type { Logger } from "@cachet/logger"
import { resolveDeps } from "../../core/deps"
import type { EvictionMap, MapEntry } from "../../core/eviction/eviction-map"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import { assertPositiveInteger } from "../../core/validate"
import type { CacheDeps } from "../../ports/cache-deps"
import type { Cached } from "../../ports/cached"

export type LruCacheOptions = {
  /** Maximum number of entries. Must be a positive integer. */
  capacity: number

  /**
   * When true, `set` on an existing key also marks it most recently used.
   *
   * @default false
   */
  writeRefreshesRecency?: boolean
}

/**
 * Outcome of {@link LruCache.getOrSetWithIf}.
 *
 * `wasPresent` without `wasValid` means an entry existed but failed the
 * predicate and was overwritten.
 */
export type ConditionalLookup<V> = {
  wasPresent: boolean
  wasValid: boolean
  value: V
}

const MAX_PREALLOCATED = 1024

/**
 * Capacity-bounded store that evicts the least recently used entry.
 */
export class LruCache<K, V> implements Cached<K, V> {
  private readonly store: EvictionMap<K, V>
  private readonly logger: Logger
  private readonly maxEntries: number
  private readonly writeRefreshesRecency: boolean
  private hitCount = 0
  private missCount = 0

  constructor(opts: LruCacheOptions, deps: Partial<CacheDeps> = {}) {
    this.maxEntries = assertPositiveInteger("capacity", opts.capacity)
    this.writeRefreshesRecency = opts.writeRefreshesRecency ?? false
    this.logger = resolveDeps(deps, "LruCache").logger
    this.store = new LruMemoryMap(Math.min(this.maxEntries, MAX_PREALLOCATED))
  }

  get(key: K): V | undefined {
    return this.getIf(key, () => true)
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    return this.updateIf(key, () => true, updater)
  }

  getOrSetWith(key: K, factory: () => V): V {
    return this.getOrSetWithIf(key, factory, () => true).value
  }

  set(key: K, value: V): V | undefined {
    const existing = this.store.peek(key)

    if (existing) {
      const previous = existing.value

      existing.value = value
      if (this.writeRefreshesRecency) this.store.touch(key)

      return previous
    }

    this.insert(key, value)

    return undefined
  }

  remove(key: K): V | undefined {
    const existing = this.store.peek(key)

    if (!existing) return undefined

    this.store.delete(key)

    return existing.value
  }

  /**
   * Returns the value only when `isValid` accepts it, marking it most
   * recently used. A rejected entry counts as a miss and stays in place.
   */
  getIf(key: K, isValid: (value: V) => boolean): V | undefined {
    return this.lookup(key, isValid)?.value
  }

  /**
   * Like {@link getIf}, but replaces an accepted value with
   * `updater(current)`.
   */
  updateIf(
    key: K,
    isValid: (value: V) => boolean,
    updater: (current: V) => V,
  ): V | undefined {
    const entry = this.lookup(key, isValid)

    if (!entry) return undefined

    entry.value = updater(entry.value)

    return entry.value
  }

  /**
   * Reuses a value accepted by `isValid`; otherwise stores `factory()`,
   * replacing a rejected entry in place and marking the key most recently
   * used.
   */
  getOrSetWithIf(
    key: K,
    factory: () => V,
    isValid: (value: V) => boolean,
  ): ConditionalLookup<V> {
    const existing = this.store.peek(key)

    if (existing && isValid(existing.value)) {
      this.store.touch(key)
      this.hitCount++

      return { wasPresent: true, wasValid: true, value: existing.value }
    }

    this.missCount++

    const value = factory()

    if (existing) {
      existing.value = value
      this.store.touch(key)

      return { wasPresent: true, wasValid: false, value }
    }

    this.insert(key, value)

    return { wasPresent: false, wasValid: false, value }
  }

  /** Reads without touching order or counters. */
  peek(key: K): V | undefined {
    return this.store.peek(key)?.value
  }

  /** Keys from most to least recently used. */
  *keyOrder(): IterableIterator<K> {
    for (const entry of this.store.entries()) yield entry.key
  }

  /** Values from most to least recently used. */
  *valueOrder(): IterableIterator<V> {
    for (const entry of this.store.entries()) yield entry.value
  }

  /** `[key, value]` pairs from most to least recently used. */
  *entries(): IterableIterator<[K, V]> {
    for (const entry of this.store.entries()) yield [entry.key, entry.value]
  }

  clear(): void {
    this.store.clear()
  }

  reset(): void {
    this.store.clear()
  }

  size(): number {
    return this.store.size()
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

  capacity(): number {
    return this.maxEntries
  }

  lifespan(): undefined {
    return undefined
  }

  setLifespan(_lifespanMs: Milliseconds): undefined {
    return undefined
  }

  private lookup(key: K, isValid: (value: V) => boolean): MapEntry<K, V> | undefined {
    const entry = this.store.peek(key)

    if (!entry || !isValid(entry.value)) {
      this.missCount++
      return undefined
    }

    this.store.touch(key)
    this.hitCount++

    return entry
  }

  private insert(key: K, value: V): void {
    if (this.store.size() >= this.maxEntries) {
      const victim = this.store.victim()

      if (victim !== undefined) {
        this.store.delete(victim)
        this.logger.debug("evicted least recently used entry", {
          capacity: this.maxEntries,
        })
      }
    }

    this.store.set(key, value)
  }
}
