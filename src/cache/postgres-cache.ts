import pg from 'pg';
import type { CacheEntry, PruneCache } from '../types.js';
import { CacheError } from '../errors.js';
import { applyCacheSchema } from './schema.js';
import { mapCacheRow, type CacheRow } from './row-mapper.js';

export interface PostgresCacheConfig {
  pool: pg.Pool;
}

const SELECT_ENTRY_SQL = `
SELECT c.value, array_agg(t.tag) FILTER (WHERE t.tag IS NOT NULL) AS tags
FROM prune_cache c
LEFT JOIN prune_cache_tags t ON t.cache_key = c.cache_key
WHERE c.cache_key = $1
GROUP BY c.cache_key
`.trim();

const UPSERT_ENTRY_SQL = `
INSERT INTO prune_cache (cache_key, value)
VALUES ($1, $2::jsonb)
ON CONFLICT (cache_key) DO UPDATE SET value = EXCLUDED.value, created_at = NOW()
`.trim();

const DELETE_TAGS_SQL = 'DELETE FROM prune_cache_tags WHERE cache_key = $1';

const INSERT_TAGS_SQL = `
INSERT INTO prune_cache_tags (cache_key, tag)
SELECT $1, unnest($2::text[])
ON CONFLICT DO NOTHING
`.trim();

const INVALIDATE_SQL = `
DELETE FROM prune_cache
WHERE cache_key IN (SELECT cache_key FROM prune_cache_tags WHERE tag = ANY($1::text[]))
`.trim();

/**
 * PruneCache backed by two Postgres tables. An entry and its tags are
 * written in one transaction, so concurrent writers of a key leave one
 * writer's value and tags behind (last writer wins).
 */
export class PostgresPruneCache implements PruneCache {
  private readonly pool: pg.Pool;

  constructor(config: PostgresCacheConfig) {
    this.pool = config.pool;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applyCacheSchema(client);
    } finally {
      client.release();
    }
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    let result: pg.QueryResult<CacheRow>;
    try {
      result = await this.pool.query<CacheRow>(SELECT_ENTRY_SQL, [key]);
    } catch (err) {
      throw new CacheError(`Failed to read cache entry: ${String(err)}`, err);
    }
    const row = result.rows[0];
    return row === undefined ? undefined : mapCacheRow(row);
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    const tags = [...new Set(entry.tags)];
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw new CacheError(`Failed to write cache entry: ${String(err)}`, err);
    }
    try {
      await client.query('BEGIN');
      // Serialized explicitly: pg would send a top-level string value as non-JSON text
      await client.query(UPSERT_ENTRY_SQL, [key, JSON.stringify(entry.value)]);
      await client.query(DELETE_TAGS_SQL, [key]);
      if (tags.length > 0) {
        await client.query(INSERT_TAGS_SQL, [key, tags]);
      }
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw new CacheError(`Failed to write cache entry: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async invalidate(tags: readonly string[]): Promise<void> {
    if (tags.length === 0) return;
    try {
      await this.pool.query(INVALIDATE_SQL, [[...tags]]);
    } catch (err) {
      throw new CacheError(`Failed to invalidate cache tags: ${String(err)}`, err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
