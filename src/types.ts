import type { LazyQuery } from './query/types.js';
import type { RecordModel } from './model/record-model.js';

export type PlainScalar = string | number | boolean | null;

/** JSON-serializable output of a pruning run. */
export type PlainData = PlainScalar | PlainData[] | { [key: string]: PlainData };

/**
 * A value exempt from pruning that serializes to JSON on its own, such as a
 * Date or a host's rich-text wrapper. Output carries its toJSON() form.
 */
export interface RichContent {
  toJSON(): unknown;
}

/** Output of a pruning run; identical whether computed or read from a cache. */
export type PrunedValue = PlainData;

/** Scalar payload of a directive such as `$limit: 5`. */
export type DirectivePayload = string | number | null;

export interface DefinitionNode {
  [field: string]: DefinitionValue;
}

/** Canonical definition tree produced by normalizeDefinition(). */
export type PruneDefinition = boolean | DefinitionNode;

/** Any value a normalized node may hold under a key. */
export type DefinitionValue = PruneDefinition | DirectivePayload;

/**
 * Anything a caller may pass as a definition: a JSON string, a list of
 * field names, a nested mapping, or a bare scalar.
 */
export type RawDefinition = unknown;

export type Directives = Record<string, unknown>;

export const NOT_A_RECORD_MESSAGE = 'input is not a record';

/** Returned (never thrown) when pruneObject() is given something other than a record. */
export interface NotARecord {
  error: string;
}

export function isNotARecord(value: unknown): value is NotARecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    'error' in value &&
    typeof value.error === 'string'
  );
}

export interface CacheEntry {
  value: PrunedValue;
  tags: string[];
}

/**
 * Tag-invalidated store used by the memoization layer. Implementations
 * must store entries whole: concurrent writers of one key may overwrite
 * each other, but never produce a mix of two entries.
 */
export interface PruneCache {
  get(key: string): Promise<CacheEntry | undefined>;
  set(key: string, entry: CacheEntry): Promise<void>;
  invalidate(tags: readonly string[]): Promise<void>;
}

export type ErrorStage = 'field' | 'cache-read' | 'cache-write';

export interface PrunerConfig {
  model?: RecordModel;
  /** Memoization is disabled when no cache is given. */
  cache?: PruneCache;
  directivePrefix?: string;
  typeSelectorPrefix?: string;
  tagPrefix?: string;
  queryTag?: string;
  /** Nested records deeper than this resolve to null. */
  maxDepth?: number;
  onError?: (stage: ErrorStage, error: unknown) => void;
}

export interface Pruner {
  pruneData(input: unknown, definition: RawDefinition): Promise<(PrunedValue | NotARecord)[]>;
  pruneObject(input: unknown, definition: RawDefinition): Promise<PrunedValue | NotARecord>;
  pruneQuery(query: LazyQuery, definition: RawDefinition): Promise<PrunedValue[]>;
}
