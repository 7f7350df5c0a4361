import type { Directives, ErrorStage, PlainScalar, RichContent } from '../types.js';
import type { LazyQuery } from '../query/types.js';
import { readKeyed, type RecordModel } from '../model/record-model.js';

/** Runtime shape of a field value; drives dispatch in the pruner. */
export type ResolvedValue =
  | { kind: 'scalar'; value: PlainScalar }
  | { kind: 'list'; items: readonly unknown[] }
  | { kind: 'records'; records: readonly object[] }
  | { kind: 'record'; record: object }
  | { kind: 'query'; query: LazyQuery }
  | { kind: 'rich'; value: RichContent }
  | { kind: 'object'; value: object };

export type ErrorReporter = (stage: ErrorStage, error: unknown) => void;

/**
 * Reads a field through the model: property access when the model reports
 * the field, keyed access otherwise. A failed read is reported and treated
 * as an absent field.
 */
export function readField(
  model: RecordModel,
  record: object,
  field: string,
  onError: ErrorReporter,
): unknown {
  try {
    return model.hasField(record, field) ? model.getField(record, field) : readKeyed(record, field);
  } catch (err) {
    onError('field', err);
    return null;
  }
}

/** Chains each directive onto the query as a modifier of the same name. */
export function applyDirectives(query: LazyQuery, directives: Directives): LazyQuery {
  let modified = query;
  for (const [name, arg] of Object.entries(directives)) {
    modified = modified.applyModifier(name, arg);
  }
  return modified;
}

function isIdentifiedRecord(model: RecordModel, value: unknown): value is object {
  return model.isRecord(value) && !model.isQuery(value) && model.identityOf(value) !== null;
}

export function classifyValue(model: RecordModel, value: unknown): ResolvedValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return { kind: 'scalar', value };
  }
  if (typeof value === 'bigint') return { kind: 'scalar', value: value.toString() };
  if (typeof value !== 'object' || value === null) return { kind: 'scalar', value: null };

  if (model.isQuery(value)) return { kind: 'query', query: value };

  const items = Array.isArray(value) ? value : model.unwrapCollection(value);
  if (items !== null) {
    const records: object[] = [];
    for (const item of items) {
      if (!isIdentifiedRecord(model, item)) return { kind: 'list', items };
      records.push(item);
    }
    return records.length > 0 ? { kind: 'records', records } : { kind: 'list', items };
  }

  if (isIdentifiedRecord(model, value)) return { kind: 'record', record: value };
  if (model.isRichContent(value)) return { kind: 'rich', value };
  return { kind: 'object', value };
}

/**
 * Reads and classifies one field of a record. Directives are applied when
 * the value is a lazy query and ignored otherwise.
 */
export function resolveValue(
  model: RecordModel,
  record: object,
  field: string,
  directives: Directives,
  onError: ErrorReporter,
): ResolvedValue {
  const resolved = classifyValue(model, readField(model, record, field, onError));
  if (resolved.kind === 'query') {
    return { kind: 'query', query: applyDirectives(resolved.query, directives) };
  }
  return resolved;
}
