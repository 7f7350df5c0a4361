import { createHash } from 'node:crypto';
import type { DefinitionValue } from '../types.js';
import type { RecordIdentity } from '../model/record-model.js';

function hashKey(parts: readonly unknown[]): string {
  return createHash('sha256').update(JSON.stringify(parts)).digest('hex');
}

/**
 * Key for one record pruned with one definition. The definition must already
 * be normalized so that equivalent shorthands share an entry; key order is
 * kept because it decides the order of the output fields.
 */
export function recordCacheKey(kind: string, id: RecordIdentity, definition: DefinitionValue): string {
  return hashKey(['record', kind, id, definition]);
}

export function queryCacheKey(queryKey: string, definition: DefinitionValue): string {
  return hashKey(['query', queryKey, definition]);
}

export function recordTag(prefix: string, id: RecordIdentity): string {
  return `${prefix}${id}`;
}
