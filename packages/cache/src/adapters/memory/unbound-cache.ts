import type { Milliseconds } from "@cachet/clock"
import type { Cached } from "../../ports/cached"

type Slot<V> = { value: V }

/**
 * Store with no eviction and no expiry.
 */
export class UnboundCache<K, V> implements Cached<K, V> {
  private store = new Map<K, Slot<V>>()
  private hitCount = 0
  private missCount = 0

  /** `capacityHint` is recorded only; JS maps do not preallocate. */
  constructor(readonly capacityHint?: number) {}

  static withCapacity<K, V>(capacityHint: number): UnboundCache<K, V> {
    return new UnboundCache<K, V>(capacityHint)
  }

  get(key: K): V | undefined {
    return this.lookup(key)?.value
  }

  update(key: K, updater: (current: V) => V): V | undefined {
    const slot = this.lookup(key)

    if (!slot) return undefined

    slot.value = updater(slot.value)

    return slot.value
  }

  getOrSetWith(key: K, factory: () => V): V {
    const slot = this.lookup(key)

    if (slot) return slot.value

    const value = factory()

    this.store.set(key, { value })

    return value
  }

  set(key: K, value: V): V | undefined {
    const previous = this.store.get(key)

    this.store.set(key, { value })

    return previous?.value
  }

  remove(key: K): V | undefined {
    const previous = this.store.get(key)

    this.store.delete(key)

    return previous?.value
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

  lifespan(): undefined {
    return undefined
  }

  setLifespan(_lifespanMs: Milliseconds): undefined {
    return undefined
  }

  private lookup(key: K): Slot<V> | undefined {
    const slot = this.store.get(key)

    if (slot) this.hitCount++
    else this.missCount++

    return slot
  }
}
