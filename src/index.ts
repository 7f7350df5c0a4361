export { TreePruner, pruneData, pruneObject } from './prune/pruner.js';
export { normalizeDefinition } from './definition/normalize.js';
export {
  extractSpecials,
  isTypeSelectorTable,
  DIRECTIVE_PREFIX,
  TYPE_SELECTOR_PREFIX,
} from './definition/specials.js';
export type { ExtractedSpecials } from './definition/specials.js';
export { serializeObject } from './prune/serialize.js';
export { defaultRecordModel, createRecordModel } from './model/record-model.js';
export type { RecordModel, RecordIdentity } from './model/record-model.js';
export type { Serializable, ArrayConvertible, Stringable } from './model/capabilities.js';
export { query } from './query/query-object.js';
export { RecordQuery } from './query/record-query.js';
export { isLazyQuery } from './query/types.js';
export type { LazyQuery, QueryCriteria, SortDirection } from './query/types.js';
export { MemoryPruneCache } from './cache/memory-cache.js';
export { PostgresPruneCache } from './cache/postgres-cache.js';
export type { PostgresCacheConfig } from './cache/postgres-cache.js';
export { NOT_A_RECORD_MESSAGE, isNotARecord } from './types.js';
export type {
  PlainScalar,
  PlainData,
  PrunedValue,
  RichContent,
  PruneDefinition,
  DefinitionNode,
  DefinitionValue,
  DirectivePayload,
  RawDefinition,
  Directives,
  NotARecord,
  CacheEntry,
  PruneCache,
  ErrorStage,
  PrunerConfig,
  Pruner,
} from './types.js';
export { FieldAccessError, CacheError } from './errors.js';
