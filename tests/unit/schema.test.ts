import { describe, it, expect, vi } from 'vitest';
import pg from 'pg';
import {
  DDL_CREATE_CACHE_TABLE,
  DDL_CREATE_TAGS_TABLE,
  DDL_CREATE_TAG_INDEX,
  applyCacheSchema,
} from '../../src/cache/schema.js';

describe('DDL_CREATE_CACHE_TABLE', () => {
  it('contains CREATE TABLE IF NOT EXISTS prune_cache', () => {
    expect(DDL_CREATE_CACHE_TABLE).toContain('CREATE TABLE IF NOT EXISTS prune_cache (');
  });

  it('defines cache_key as TEXT PRIMARY KEY', () => {
    expect(DDL_CREATE_CACHE_TABLE).toMatch(/cache_key\s+TEXT\s+PRIMARY KEY/i);
  });

  it('defines value as JSONB NOT NULL', () => {
    expect(DDL_CREATE_CACHE_TABLE).toMatch(/value\s+JSONB\s+NOT NULL/i);
  });
});

describe('DDL_CREATE_TAGS_TABLE', () => {
  it('references prune_cache with cascading delete', () => {
    expect(DDL_CREATE_TAGS_TABLE).toMatch(/REFERENCES prune_cache \(cache_key\) ON DELETE CASCADE/i);
  });

  it('keys rows by (cache_key, tag)', () => {
    expect(DDL_CREATE_TAGS_TABLE).toMatch(/PRIMARY KEY \(\s*cache_key\s*,\s*tag\s*\)/i);
  });
});

describe('DDL_CREATE_TAG_INDEX', () => {
  it('indexes tags with IF NOT EXISTS', () => {
    expect(DDL_CREATE_TAG_INDEX).toContain('CREATE INDEX IF NOT EXISTS idx_prune_cache_tags_tag');
    expect(DDL_CREATE_TAG_INDEX).toMatch(/ON prune_cache_tags \(tag\)/);
  });
});

describe('applyCacheSchema()', () => {
  it('runs the DDL in dependency order', async () => {
    const client = { query: vi.fn().mockResolvedValue({}) };
    await applyCacheSchema(client as unknown as pg.ClientBase);
    expect(client.query.mock.calls.map((call) => call[0])).toEqual([
      DDL_CREATE_CACHE_TABLE,
      DDL_CREATE_TAGS_TABLE,
      DDL_CREATE_TAG_INDEX,
    ]);
  });
});
