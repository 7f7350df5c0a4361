import type pg from 'pg';

export const DDL_CREATE_CACHE_TABLE = `
CREATE TABLE IF NOT EXISTS prune_cache (
  cache_key   TEXT         PRIMARY KEY,
  value       JSONB        NOT NULL,
  created_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_TAGS_TABLE = `
CREATE TABLE IF NOT EXISTS prune_cache_tags (
  cache_key  TEXT          NOT NULL REFERENCES prune_cache (cache_key) ON DELETE CASCADE,
  tag        VARCHAR(255)  NOT NULL,
  PRIMARY KEY (cache_key, tag)
)
`.trim();

export const DDL_CREATE_TAG_INDEX = `
CREATE INDEX IF NOT EXISTS idx_prune_cache_tags_tag
  ON prune_cache_tags (tag)
`.trim();

export async function applyCacheSchema(client: pg.ClientBase): Promise<void> {
  await client.query(DDL_CREATE_CACHE_TABLE);
  await client.query(DDL_CREATE_TAGS_TABLE);
  await client.query(DDL_CREATE_TAG_INDEX);
}
