/**
 * A key/value entry owned by an {@link EvictionMap}. Stores mutate `value`
 * in place to replace without touching order.
 */
export type MapEntry<K, V> = {
  readonly key: K
  value: V
}

/**
 * Recency-ordered key/value storage used by the bounded stores.
 *
 * Ordering lives here; capacity and accounting live in the store.
 */
export interface EvictionMap<K, V> {
  /** Looks up `key` and marks it most recently used. */
  get(key: K): MapEntry<K, V> | undefined

  /** Looks up `key` without touching its order. */
  peek(key: K): MapEntry<K, V> | undefined

  /**
   * Inserts a new key at the front, or replaces an existing key's value
   * where it stands.
   */
  set(key: K, value: V): void

  /** Marks `key` most recently used. Returns false when absent. */
  touch(key: K): boolean

  delete(key: K): boolean

  has(key: K): boolean

  size(): number

  /** The key the policy would drop next, or `undefined` when empty. */
  victim(): K | undefined

  clear(): void

  /** Entries from most to least recently used. */
  entries(): IterableIterator<MapEntry<K, V>>
}
