/**
 * Read-through capability: serve from cache, otherwise load and store.
 */
export interface ReadThrough<K, V> {
  getThrough(key: K, loader: () => Promise<V>): Promise<V>
}
