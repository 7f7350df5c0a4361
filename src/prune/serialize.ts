import type { PrunedValue } from '../types.js';
import { defaultRecordModel, type RecordModel } from '../model/record-model.js';
import { isArrayConvertible, isSerializable, isStringable } from '../model/capabilities.js';
import { setField } from '../definition/normalize.js';

/**
 * Converts an arbitrary value into output data without a definition.
 * Objects go through serializeObject(); values on their own ancestor chain
 * become null.
 */
export function toPlainValue(
  value: unknown,
  model: RecordModel = defaultRecordModel,
  ancestors: Set<object> = new Set(),
): PrunedValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'bigint') return value.toString();
  // undefined, functions, symbols
  if (typeof value !== 'object' || value === null) return null;
  if (ancestors.has(value)) return null;

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item) => toPlainValue(item, model, ancestors));
    }
    return serializeObject(value, model, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Fallback for objects pruned with a bare `true`. Rich content becomes its
 * `toJSON()` form; other objects try `serialize()`, then
 * `toArray()`, then a custom `toString()`, then the object's own enumerable
 * properties.
 */
export function serializeObject(
  value: object,
  model: RecordModel = defaultRecordModel,
  ancestors: Set<object> = new Set([value]),
): PrunedValue {
  // toJSON() returning the object itself is cut by the ancestor check
  if (model.isRichContent(value)) return toPlainValue(value.toJSON(), model, ancestors);
  // Lazy queries cannot be materialized here
  if (model.isQuery(value)) return null;

  if (isSerializable(value)) return toPlainValue(value.serialize(), model, ancestors);
  if (isArrayConvertible(value)) return toPlainValue(value.toArray(), model, ancestors);

  const elements = model.unwrapCollection(value);
  if (elements !== null) return toPlainValue([...elements], model, ancestors);

  if (isStringable(value)) return value.toString();

  const result: { [key: string]: PrunedValue } = {};
  const entries = value instanceof Map ? [...value.entries()] : Object.entries(value);
  for (const [key, entry] of entries) {
    setField(result, String(key), toPlainValue(entry, model, ancestors));
  }
  return result;
}
