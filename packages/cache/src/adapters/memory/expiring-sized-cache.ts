import { checkedAddMs, type Clock, type Milliseconds } from "@cachet/clock"
import type { Logger } from "@cachet/logger"
import { resolveDeps } from "../../core/deps"
import { TimeBoundsError } from "../../core/errors"
import { assertLifespan, assertPositiveInteger } from "../../core/validate"
import type { CacheDeps } from "../../ports/cache-deps"
import type { Cached } from "../../ports/cached"

/**
 * Key handle shared by a map entry and its expiry stamp. `id` is what the
 * map is keyed by.
 */
export type SharedKey<K> = Readonly<{
  key: K
  id: unknown
}>

export type ExpiringSizedCacheOptions<K> = {
  lifespanMs: Milliseconds

  /** Maximum number of entries. Unbounded when omitted. */
  sizeLimit?: number

  /**
   * Tombstoned stamps tolerated before the stamp queue is compacted.
   *
   * @default 50
   */
  maxTombstones?: number

  /**
   * Maps a key to the value the store is indexed by, compared with
   * SameValueZero. Lets structured keys be looked up by content, e.g.
   * `(key) => key.join("\u0000")`.
   *
   * @default the key itself
   */
  keyIdentity?: (key: K) => unknown
}

export type InsertOptions = {
  /** Drop every expired entry before inserting. */
  evict?: boolean

  /**
   * Lifespan of this entry alone.
   *
   * @default the store's lifespan
   */
  ttlMs?: Milliseconds
}

type Entry<K, V> = {
  stampIndex: number
  expiry: Milliseconds
  value: V
  shared: SharedKey<K>
}

type Stamp<K> = {
  tombstone: boolean
  expiry: Milliseconds
  shared: SharedKey<K>
}

export const DEFAULT_MAX_TOMBSTONES = 50

/**
 * Size- and time-bounded store tuned for reads.
 *
 * Reads never mutate. Writes append an expiry stamp to a queue kept in
 * ascending expiry order; overwritten and removed entries leave their stamp
 * behind as a tombstone, and the queue is compacted in one pass once more
 * than `maxTombstones` accumulate. Expired entries occupy space until
 * `evict`, `retainLatest` or an insert under size pressure drops them.
 *
 * The read path keeps no hit or miss counters.
 */
export class ExpiringSizedCache<K, V> implements Cached<K, V> {
  private readonly entries = new Map<unknown, Entry<K, V>>()
  private stamps: Stamp<K>[] = []
  private tombstones = 0
  private ttlMs: Milliseconds
  private sizeLimit: number | undefined
  private readonly maxTombstones: number
  private readonly keyIdentity: (key: K) => unknown
  private readonly clock: Clock
  private readonly logger: Logger

  constructor(opts: ExpiringSizedCacheOptions<K>, deps: Partial<CacheDeps> = {}) {
    const resolved = resolveDeps(deps, "ExpiringSizedCache")

    this.ttlMs = assertLifespan(opts.lifespanMs)
    this.sizeLimit =
      opts.sizeLimit === undefined
        ? undefined
        : assertPositiveInteger("sizeLimit", opts.sizeLimit)
    this.maxTombstones = assertPositiveInteger(
      "maxTombstones",
      opts.maxTombstones ?? DEFAULT_MAX_TOMBSTONES,
    )
    this.keyIdentity = opts.keyIdentity ?? ((key) => key)
    this.clock = resolved.clock
    this.logger = resolved.logger
  }

  /**
   * Inserts or replaces `key`, expiring `ttlMs` (or `lifespan()`) from now.
   *
   * With a size limit, inserting a new key into a full store first drops the
   * oldest entries (and, with `evict`, every expired one). Returns the
   * previous value only if it had not expired.
   *
   * @throws CacheUsageError when `ttlMs` is negative or not finite.
   * @throws TimeBoundsError when the expiry cannot be represented. The store
   *   is left untouched in both cases.
   */
  insert(key: K, value: V, opts: InsertOptions = {}): V | undefined {
    const now = this.clock.nowMs()
    const ttlMs = opts.ttlMs === undefined ? this.ttlMs : assertLifespan(opts.ttlMs)
    const expiry = this.expiryFrom(now, ttlMs)
    const id = this.keyIdentity(key)
    const evict = opts.evict ?? false

    if (
      this.sizeLimit !== undefined &&
      !this.entries.has(id) &&
      this.entries.size >= this.sizeLimit
    ) {
      this.retainLatest(this.sizeLimit - 1, evict)
    } else if (evict) {
      this.evict()
    }

    const previous = this.entries.get(id)
    const shared: SharedKey<K> = Object.freeze({ key, id })
    const stampIndex = this.placeStamp({ tombstone: false, expiry, shared })

    if (previous) this.bury(previous)

    this.entries.set(id, { stampIndex, expiry, value, shared })
    this.compactIfNeeded()

    return previous && previous.expiry > now ? previous.value : undefined
  }

  get(key: K): V | undefined {
    return this.getBorrowed(this.keyIdentity(key))
  }

  /** Looks up by identity directly, without building a key. */
  getBorrowed(id: unknown): V | undefined {
    return this.live(id, this.clock.nowMs())?.value
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    const entry = this.live(this.keyIdentity(key), this.clock.nowMs())

    if (!entry) return undefined

    entry.value = updater(entry.value)

    return entry.value
  }

  /** Inserts `factory()` when `key` is absent or expired. */
  getOrSetWith(key: K, factory: () => V): V {
    const now = this.clock.nowMs()
    const entry = this.live(this.keyIdentity(key), now)

    if (entry) return entry.value

    // fail before the factory runs
    this.expiryFrom(now)

    const value = factory()

    this.insert(key, value)

    return value
  }

  set(key: K, value: V): V | undefined {
    return this.insert(key, value)
  }

  /** Removes `key` and returns its value, expired or not. */
  remove(key: K): V | undefined {
    const id = this.keyIdentity(key)
    const entry = this.entries.get(id)

    if (!entry) return undefined

    this.entries.delete(id)
    this.bury(entry)
    this.compactIfNeeded()

    return entry.value
  }

  /**
   * Drops every expired entry. Returns the number of entries removed.
   */
  evict(): number {
    const boundary = this.firstUnexpired(this.clock.nowMs())
    let removed = 0

    for (let i = 0; i < boundary; i++) {
      const stamp = this.stamps[i]

      if (stamp === undefined || stamp.tombstone) continue

      this.entries.delete(stamp.shared.id)
      stamp.tombstone = true
      this.tombstones++
      removed++
    }

    if (removed > 0) {
      this.logger.debug("evicted expired entries", { removed, remaining: this.entries.size })
    }

    this.compactIfNeeded()

    return removed
  }

  /**
   * Drops the oldest entries until at most `count` remain. With `evict`,
   * keeps going through every expired entry. Returns the number removed.
   */
  retainLatest(count: number, evict: boolean): number {
    const now = this.clock.nowMs()
    let excess = Math.max(0, this.entries.size - count)
    let removed = 0

    for (const stamp of this.stamps) {
      if (stamp.tombstone) continue

      const expired = stamp.expiry <= now

      if (excess === 0 && !(evict && expired)) break

      this.entries.delete(stamp.shared.id)
      stamp.tombstone = true
      this.tombstones++
      removed++
      if (excess > 0) excess--
    }

    if (removed > 0) {
      this.logger.debug("dropped oldest entries", { removed, retain: count, evict })
    }

    this.compactIfNeeded()

    return removed
  }

  clear(): void {
    this.entries.clear()
    this.stamps = []
    this.tombstones = 0
  }

  reset(): void {
    this.clear()
  }

  /** Includes expired entries not yet dropped. */
  size(): number {
    return this.entries.size
  }

  tombstoneCount(): number {
    return this.tombstones
  }

  stampCount(): number {
    return this.stamps.length
  }

  hits(): undefined {
    return undefined
  }

  misses(): undefined {
    return undefined
  }

  resetMetrics(): void {}

  capacity(): number | undefined {
    return this.sizeLimit
  }

  /** Returns the previous limit. Takes effect on the next insert. */
  setSizeLimit(sizeLimit: number): number | undefined {
    const previous = this.sizeLimit

    this.sizeLimit = assertPositiveInteger("sizeLimit", sizeLimit)

    return previous
  }

  lifespan(): Milliseconds {
    return this.ttlMs
  }

  /** Applies to entries inserted from now on. */
  setLifespan(lifespanMs: Milliseconds): Milliseconds {
    const previous = this.ttlMs

    this.ttlMs = assertLifespan(lifespanMs)

    return previous
  }

  private live(id: unknown, now: Milliseconds): Entry<K, V> | undefined {
    const entry = this.entries.get(id)

    return entry && entry.expiry > now ? entry : undefined
  }

  private expiryFrom(now: Milliseconds, ttlMs: Milliseconds = this.ttlMs): Milliseconds {
    const expiry = checkedAddMs(now, ttlMs)

    if (expiry === undefined) {
      this.logger.warn("rejected insert: expiry out of range", { nowMs: now, ttlMs })
      throw new TimeBoundsError(now, ttlMs)
    }

    return expiry
  }

  /**
   * Appends the stamp, or inserts it at its sorted position when a shorter
   * lifespan puts it before the tail. Returns its index.
   */
  private placeStamp(stamp: Stamp<K>): number {
    const last = this.stamps.at(-1)

    if (last === undefined || last.expiry <= stamp.expiry) {
      return this.stamps.push(stamp) - 1
    }

    const index = this.firstUnexpired(stamp.expiry)

    this.stamps.splice(index, 0, stamp)

    for (let i = index + 1; i < this.stamps.length; i++) {
      const shifted = this.stamps[i]

      if (shifted === undefined || shifted.tombstone) continue

      const entry = this.entries.get(shifted.shared.id)

      if (entry) entry.stampIndex = i
    }

    return index
  }

  private bury(entry: Entry<K, V>): void {
    const stamp = this.stamps[entry.stampIndex]

    if (stamp === undefined || stamp.tombstone) return

    stamp.tombstone = true
    this.tombstones++
  }

  /** Index of the first stamp whose expiry is after `instant`. */
  private firstUnexpired(instant: Milliseconds): number {
    let lo = 0
    let hi = this.stamps.length

    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const stamp = this.stamps[mid]

      if (stamp !== undefined && stamp.expiry <= instant) lo = mid + 1
      else hi = mid
    }

    return lo
  }

  private compactIfNeeded(): void {
    if (this.tombstones <= this.maxTombstones) return

    const before = this.stamps.length

    this.stamps = this.stamps.filter((stamp) => !stamp.tombstone)

    this.stamps.forEach((stamp, index) => {
      const entry = this.entries.get(stamp.shared.id)

      if (entry) entry.stampIndex = index
    })

    this.logger.debug("compacted expiry stamps", {
      dropped: this.tombstones,
      before,
      after: this.stamps.length,
    })

    this.tombstones = 0
  }
}
