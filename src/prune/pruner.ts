import type {
  DefinitionNode,
  DefinitionValue,
  ErrorStage,
  NotARecord,
  PruneCache,
  PrunedValue,
  Pruner,
  PrunerConfig,
  RawDefinition,
} from '../types.js';
import { NOT_A_RECORD_MESSAGE } from '../types.js';
import type { LazyQuery } from '../query/types.js';
import { defaultRecordModel, type RecordModel } from '../model/record-model.js';
import { isDefinitionNode, normalizeDefinition, setField } from '../definition/normalize.js';
import {
  DIRECTIVE_PREFIX,
  TYPE_SELECTOR_PREFIX,
  extractSpecials,
  isTypeSelectorTable,
} from '../definition/specials.js';
import { queryCacheKey, recordCacheKey, recordTag } from '../cache/keys.js';
import { Memoizer } from './memo.js';
import { applyDirectives, resolveValue, type ErrorReporter, type ResolvedValue } from './resolver.js';
import { serializeObject, toPlainValue } from './serialize.js';

/** Internal: config with defaults applied */
interface ResolvedConfig {
  model: RecordModel;
  cache: PruneCache | null;
  directivePrefix: string;
  typeSelectorPrefix: string;
  tagPrefix: string;
  queryTag: string;
  maxDepth: number;
  onError: (stage: ErrorStage, error: unknown) => void;
}

/** Internal mutable state for one pruning run */
interface PruneContext {
  /** Cache tags of every record touched while computing the current value. */
  tags: Set<string>;
  /** Records on the current path; shared by the whole run. */
  ancestors: Set<object>;
  /** Set when a cycle or the depth limit cut a branch; such results are path-dependent and not cached. */
  truncated: boolean;
}

function newContext(): PruneContext {
  return { tags: new Set(), ancestors: new Set(), truncated: false };
}

function childContext(parent: PruneContext, tags: string[] = []): PruneContext {
  return { tags: new Set(tags), ancestors: parent.ancestors, truncated: false };
}

function mergeContext(parent: PruneContext, child: PruneContext): void {
  for (const tag of child.tags) parent.tags.add(tag);
  if (child.truncated) parent.truncated = true;
}

export class TreePruner implements Pruner {
  private readonly resolved: ResolvedConfig;
  private readonly memo: Memoizer;
  private readonly report: ErrorReporter;

  constructor(config: PrunerConfig = {}) {
    this.resolved = {
      model: config.model ?? defaultRecordModel,
      cache: config.cache ?? null,
      directivePrefix: config.directivePrefix ?? DIRECTIVE_PREFIX,
      typeSelectorPrefix: config.typeSelectorPrefix ?? TYPE_SELECTOR_PREFIX,
      tagPrefix: config.tagPrefix ?? 'record:',
      queryTag: config.queryTag ?? 'prune:query',
      maxDepth: config.maxDepth ?? 64,
      onError: config.onError ?? ((stage, err) => {
        console.error(`[prune] ${stage} failed:`, err);
      }),
    };
    this.report = (stage, err) => {
      try {
        this.resolved.onError(stage, err);
      } catch {
        // onError throws are swallowed
      }
    };
    this.memo = new Memoizer(this.resolved.cache, this.report);
  }

  /**
   * Prunes every element of `input`, preserving order. A non-array or empty
   * input is treated as a single element.
   */
  async pruneData(input: unknown, definition: RawDefinition): Promise<(PrunedValue | NotARecord)[]> {
    const items: readonly unknown[] = Array.isArray(input) && input.length > 0 ? input : [input];
    const node = normalizeDefinition(definition);
    const result: (PrunedValue | NotARecord)[] = [];
    for (const item of items) {
      result.push(await this.pruneNormalized(item, node));
    }
    return result;
  }

  /**
   * Prunes a single record. Returns a NotARecord marker instead of throwing
   * when `input` is not a record; a lazy query is pruned as pruneQuery() would.
   */
  async pruneObject(input: unknown, definition: RawDefinition): Promise<PrunedValue | NotARecord> {
    return this.pruneNormalized(input, normalizeDefinition(definition));
  }

  /**
   * Applies the definition's top-level directives to the query, materializes
   * it and prunes each record with the rest of the definition.
   */
  async pruneQuery(query: LazyQuery, definition: RawDefinition): Promise<PrunedValue[]> {
    return this.pruneQueryNode(query, normalizeDefinition(definition), newContext());
  }

  private async pruneNormalized(input: unknown, node: DefinitionNode): Promise<PrunedValue | NotARecord> {
    const { model } = this.resolved;
    if (model.isQuery(input)) {
      return this.pruneQueryNode(input, node, newContext());
    }
    if (!model.isRecord(input)) {
      return { error: NOT_A_RECORD_MESSAGE };
    }
    // Top-level directives only apply to an enclosing query
    return this.pruneRecord(input, node, newContext());
  }

  private async pruneQueryNode(query: LazyQuery, node: DefinitionNode, ctx: PruneContext): Promise<PrunedValue[]> {
    const { fields, directives } = extractSpecials(node, this.resolved.directivePrefix);
    return this.materialize(applyDirectives(query, directives), fields, ctx);
  }

  /** Runs a query (directives already applied) and prunes its records, memoized per query and definition. */
  private async materialize(query: LazyQuery, definition: DefinitionValue, ctx: PruneContext): Promise<PrunedValue[]> {
    const key = this.memo.enabled ? queryCacheKey(query.cacheKey(), definition) : null;
    if (key !== null) {
      const cached = await this.memo.read(key);
      if (cached !== undefined && Array.isArray(cached.value)) {
        for (const tag of cached.tags) ctx.tags.add(tag);
        return cached.value;
      }
    }

    const records = await query.all();
    const child = childContext(ctx);
    const value = await this.pruneList(records, definition, child);

    if (key !== null && !child.truncated) {
      await this.memo.write(key, { value, tags: [this.resolved.queryTag, ...child.tags] });
    }
    mergeContext(ctx, child);
    return value;
  }

  /**
   * Matrix-style list rule. A definition whose keys are all type selectors
   * (`{ _text: {...}, _image: {...} }`) is a dispatch table on each record's
   * type; records matching no selector are dropped. Any other definition is
   * applied to every element.
   */
  private async pruneList(items: readonly unknown[], definition: DefinitionValue, ctx: PruneContext): Promise<PrunedValue[]> {
    const { model, typeSelectorPrefix } = this.resolved;
    const result: PrunedValue[] = [];

    if (isTypeSelectorTable(definition, typeSelectorPrefix)) {
      const table = Object.entries(definition);
      for (const item of items) {
        if (!model.isRecord(item)) continue;
        const type = model.typeOf(item);
        const match = table.find(([selector]) => selector.slice(typeSelectorPrefix.length) === type);
        if (match === undefined) continue;
        result.push(await this.pruneChild(item, match[1], ctx));
      }
      return result;
    }

    for (const item of items) {
      result.push(model.isRecord(item) ? await this.pruneChild(item, definition, ctx) : toPlainValue(item, model));
    }
    return result;
  }

  /** Recursion guard for nested records: cycles and the depth limit resolve to null. */
  private async pruneChild(record: object, definition: DefinitionValue, ctx: PruneContext): Promise<PrunedValue> {
    if (ctx.ancestors.has(record) || ctx.ancestors.size >= this.resolved.maxDepth) {
      ctx.truncated = true;
      return null;
    }
    return this.pruneRecord(record, definition, ctx);
  }

  private async pruneRecord(record: object, definition: DefinitionValue, ctx: PruneContext): Promise<PrunedValue> {
    const { model, directivePrefix, tagPrefix } = this.resolved;
    const { fields } = extractSpecials(definition, directivePrefix);
    // A bare string on a relation names the one field to keep
    const node = typeof fields === 'string' && fields !== '' ? { [fields]: true } : fields;

    const id = model.identityOf(record);
    if (id !== null) ctx.tags.add(recordTag(tagPrefix, id));

    if (!isDefinitionNode(node)) {
      return serializeObject(record, model);
    }
    if (id === null || !this.memo.enabled) {
      return this.pruneFields(record, node, ctx);
    }

    const key = recordCacheKey(model.kindOf(record), id, node);
    const cached = await this.memo.read(key);
    if (cached !== undefined) {
      for (const tag of cached.tags) ctx.tags.add(tag);
      return cached.value;
    }

    const child = childContext(ctx, [recordTag(tagPrefix, id)]);
    const value = await this.pruneFields(record, node, child);
    if (!child.truncated) {
      await this.memo.write(key, { value, tags: [...child.tags] });
    }
    mergeContext(ctx, child);
    return value;
  }

  private async pruneFields(record: object, node: DefinitionNode, ctx: PruneContext): Promise<PrunedValue> {
    const { model, directivePrefix } = this.resolved;
    const result: { [key: string]: PrunedValue } = {};

    ctx.ancestors.add(record);
    try {
      for (const [field, childDefinition] of Object.entries(node)) {
        // false, null, 0 and '' all omit the field
        if (!childDefinition) continue;
        const { fields, directives } = extractSpecials(childDefinition, directivePrefix);
        const resolved = resolveValue(model, record, field, directives, this.report);
        setField(result, field, await this.dispatch(resolved, fields, ctx));
      }
    } finally {
      ctx.ancestors.delete(record);
    }
    return result;
  }

  private async dispatch(resolved: ResolvedValue, definition: DefinitionValue, ctx: PruneContext): Promise<PrunedValue> {
    switch (resolved.kind) {
      case 'scalar':
        return resolved.value;
      case 'rich':
        return toPlainValue(resolved.value, this.resolved.model);
      case 'list':
        return toPlainValue([...resolved.items], this.resolved.model);
      case 'records':
        return this.pruneList(resolved.records, definition, ctx);
      case 'record':
        return this.pruneChild(resolved.record, definition, ctx);
      case 'query':
        return this.materialize(resolved.query, definition, ctx);
      case 'object':
        return definition === true
          ? serializeObject(resolved.value, this.resolved.model)
          : this.pruneChild(resolved.value, definition, ctx);
    }
  }
}

/** Prunes with a one-off TreePruner; see TreePruner#pruneData. */
export function pruneData(
  input: unknown,
  definition: RawDefinition,
  config?: PrunerConfig,
): Promise<(PrunedValue | NotARecord)[]> {
  return new TreePruner(config).pruneData(input, definition);
}

/** Prunes with a one-off TreePruner; see TreePruner#pruneObject. */
export function pruneObject(
  input: unknown,
  definition: RawDefinition,
  config?: PrunerConfig,
): Promise<PrunedValue | NotARecord> {
  return new TreePruner(config).pruneObject(input, definition);
}
