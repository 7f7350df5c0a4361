import type { CacheEntry, PruneCache } from '../types.js';
import type { ErrorReporter } from './resolver.js';

/**
 * Best-effort wrapper around a PruneCache: read failures count as misses,
 * write failures are reported and otherwise ignored. Without a cache every
 * read misses and writes do nothing.
 */
export class Memoizer {
  constructor(
    private readonly cache: PruneCache | null,
    private readonly onError: ErrorReporter,
  ) {}

  get enabled(): boolean {
    return this.cache !== null;
  }

  async read(key: string): Promise<CacheEntry | undefined> {
    if (this.cache === null) return undefined;
    try {
      return await this.cache.get(key);
    } catch (err) {
      this.onError('cache-read', err);
      return undefined;
    }
  }

  async write(key: string, entry: CacheEntry): Promise<void> {
    if (this.cache === null) return;
    try {
      await this.cache.set(key, entry);
    } catch (err) {
      this.onError('cache-write', err);
    }
  }
}
