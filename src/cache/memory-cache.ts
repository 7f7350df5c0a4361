import type { CacheEntry, PruneCache, PrunedValue } from '../types.js';

interface StoredEntry {
  value: PrunedValue;
  tags: string[];
}

/**
 * In-process PruneCache. Entries are stored as one JSON string each, so a
 * read never returns an object shared with a caller and concurrent writers
 * of the same key leave exactly one writer's entry behind.
 */
export class MemoryPruneCache implements PruneCache {
  private readonly entries: Map<string, string> = new Map();
  private readonly keysByTag: Map<string, Set<string>> = new Map();

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const raw = this.entries.get(key);
    if (raw === undefined) return undefined;
    const stored: StoredEntry = JSON.parse(raw);
    return { value: stored.value, tags: stored.tags };
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.unindex(key);
    const tags = [...new Set(entry.tags)];
    const stored: StoredEntry = { value: entry.value, tags };
    this.entries.set(key, JSON.stringify(stored));
    for (const tag of tags) {
      let keys = this.keysByTag.get(tag);
      if (keys === undefined) {
        keys = new Set();
        this.keysByTag.set(tag, keys);
      }
      keys.add(key);
    }
  }

  /** Evicts every entry carrying at least one of the tags. */
  async invalidate(tags: readonly string[]): Promise<void> {
    for (const tag of tags) {
      const keys = this.keysByTag.get(tag);
      if (keys === undefined) continue;
      for (const key of [...keys]) this.delete(key);
    }
  }

  clear(): void {
    this.entries.clear();
    this.keysByTag.clear();
  }

  private delete(key: string): void {
    this.unindex(key);
    this.entries.delete(key);
  }

  private unindex(key: string): void {
    const raw = this.entries.get(key);
    if (raw === undefined) return;
    const stored: StoredEntry = JSON.parse(raw);
    for (const tag of stored.tags) {
      const keys = this.keysByTag.get(tag);
      if (keys === undefined) continue;
      keys.delete(key);
      if (keys.size === 0) this.keysByTag.delete(tag);
    }
  }
}
