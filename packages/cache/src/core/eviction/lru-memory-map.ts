import { ArenaList } from "../arena/arena-list"
import type { EvictionMap, MapEntry } from "./eviction-map"

export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly index = new Map<K, number>()
  private readonly list: ArenaList<MapEntry<K, V>>

  constructor(capacityHint = 0) {
    this.list = new ArenaList(capacityHint)
  }

  get(key: K): MapEntry<K, V> | undefined {
    const at = this.index.get(key)

    if (at === undefined) return undefined

    this.list.moveToFront(at)

    return this.list.get(at)
  }

  peek(key: K): MapEntry<K, V> | undefined {
    const at = this.index.get(key)

    return at === undefined ? undefined : this.list.get(at)
  }

  set(key: K, value: V): void {
    const existing = this.peek(key)

    if (existing) {
      existing.value = value
      return
    }

    this.index.set(key, this.list.pushFront({ key, value }))
  }

  touch(key: K): boolean {
    const at = this.index.get(key)

    if (at === undefined) return false

    this.list.moveToFront(at)

    return true
  }

  delete(key: K): boolean {
    const at = this.index.get(key)

    if (at === undefined) return false

    this.index.delete(key)
    this.list.remove(at)

    return true
  }

  has(key: K): boolean {
    return this.index.has(key)
  }

  size(): number {
    return this.index.size
  }

  victim(): K | undefined {
    const at = this.list.back()

    return at === undefined ? undefined : this.list.get(at).key
  }

  clear(): void {
    this.index.clear()
    this.list.clear()
  }

  entries(): IterableIterator<MapEntry<K, V>> {
    return this.list.values()
  }
}
