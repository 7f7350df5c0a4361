import type { CacheEntry, PrunedValue } from '../types.js';

export type CacheRow = {
  value: PrunedValue;        // pg auto-parses JSONB
  tags: string[] | null;     // array_agg over no rows
};

export function mapCacheRow(row: CacheRow): CacheEntry {
  return {
    value: row.value,
    tags: row.tags ?? [],
  };
}
