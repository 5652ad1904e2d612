/**
 * Per-forge read cache.
 *
 * Each cached query owns a table; `clear()` on the registry drops them all.
 * Values must not be `undefined`. A failed load is not cached.
 */
export class CachedTable<K, V> {
  private readonly entries = new Map<K, V>();

  async get(key: K, load: () => Promise<V>): Promise<V> {
    const hit = this.entries.get(key);
    if (hit !== undefined) {
      return hit;
    }
    const value = await load();
    this.entries.set(key, value);
    return value;
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  delete(key: K): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

export class ForgeCache {
  private readonly tables: Array<{ clear(): void }> = [];

  table<K, V>(): CachedTable<K, V> {
    const table = new CachedTable<K, V>();
    this.tables.push(table);
    return table;
  }

  clear(): void {
    for (const table of this.tables) {
      table.clear();
    }
  }
}
