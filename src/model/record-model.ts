import type { RichContent } from '../types.js';
import { FieldAccessError } from '../errors.js';
import { isLazyQuery, type LazyQuery } from '../query/types.js';
import { isRichContent } from './capabilities.js';

export type RecordIdentity = string | number;

/**
 * How the pruner sees the host's object model. Hosts with their own record
 * classes replace individual members via createRecordModel().
 */
export interface RecordModel {
  isRecord(value: unknown): value is object;
  /** Whether `field` is read as a property; other fields get keyed access only. */
  hasField(record: object, field: string): boolean;
  /**
   * Reads a field by property, falling back to keyed access.
   * Throws FieldAccessError when the read itself fails.
   */
  getField(record: object, field: string): unknown;
  identityOf(record: object): RecordIdentity | null;
  /** Discriminator matched against type-selector keys. */
  typeOf(record: object): string | null;
  /** Record class name, part of every record cache key. */
  kindOf(record: object): string;
  isQuery(value: unknown): value is LazyQuery;
  /** Returns the elements of a collection wrapper, or null for anything else. */
  unwrapCollection(value: object): readonly unknown[] | null;
  isRichContent(value: object): value is RichContent;
}

function readProperty(record: object, field: string): unknown {
  try {
    return Reflect.get(record, field);
  } catch (err) {
    throw new FieldAccessError(field, err);
  }
}

function isIterable(value: object): value is Iterable<unknown> {
  return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/** Keyed access for records that expose fields through `get()`, such as Maps. */
export function readKeyed(record: object, field: string): unknown {
  return record instanceof Map ? record.get(field) ?? null : null;
}

/** Field read for identity and type lookups, where a failing getter means "none". */
function peekField(record: object, field: string): unknown {
  try {
    return defaultRecordModel.getField(record, field);
  } catch {
    return null;
  }
}

/**
 * Records are plain objects, class instances and Maps. Identity comes from an
 * `id` field, the type discriminator from a string `type` or `type.handle`.
 */
export const defaultRecordModel: RecordModel = {
  isRecord(value: unknown): value is object {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  },

  hasField(record: object, field: string): boolean {
    return field in record;
  },

  getField(record: object, field: string): unknown {
    if (field in record) {
      const value = readProperty(record, field);
      if (isPresent(value)) return value;
    }
    return readKeyed(record, field);
  },

  identityOf(record: object): RecordIdentity | null {
    const id = peekField(record, 'id');
    if (typeof id === 'string' && id !== '') return id;
    if (typeof id === 'number' && Number.isFinite(id)) return id;
    return null;
  },

  typeOf(record: object): string | null {
    const type = peekField(record, 'type');
    if (typeof type === 'string') return type;
    if (typeof type === 'object' && type !== null && 'handle' in type && typeof type.handle === 'string') {
      return type.handle;
    }
    return null;
  },

  kindOf(record: object): string {
    const ctor: unknown = Reflect.get(record, 'constructor');
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'Object';
  },

  isQuery(value: unknown): value is LazyQuery {
    return isLazyQuery(value);
  },

  unwrapCollection(value: object): readonly unknown[] | null {
    if (value instanceof Set) return [...value];
    if (value instanceof Map || Array.isArray(value)) return null;
    if (isIterable(value)) return Array.from(value);
    return null;
  },

  isRichContent(value: object): value is RichContent {
    return isRichContent(value);
  },
};

/**
 * Default model with selected capabilities replaced by the host's.
 *
 * @example
 * const model = createRecordModel({
 *   identityOf: (record) => (record instanceof Entry ? record.uid : null),
 * });
 */
export function createRecordModel(overrides: Partial<RecordModel>): RecordModel {
  return { ...defaultRecordModel, ...overrides };
}
