import type { LazyQuery, QueryCriteria, SortDirection } from './types.js';

const NO_CRITERIA: QueryCriteria = { where: {}, orderBy: null, offset: 0, limit: null };

function readField(record: object, field: string): unknown {
  if (record instanceof Map) return record.get(field);
  return Reflect.get(record, field);
}

let nextInstance = 0;

/**
 * What a cache key knows about the records behind a query: their ids when
 * every record has one, otherwise a token unique to the originating query.
 */
function recordScope(records: readonly object[]): readonly (string | number)[] | string {
  const ids: (string | number)[] = [];
  for (const record of records) {
    const id = readField(record, 'id');
    if (typeof id !== 'string' && !(typeof id === 'number' && Number.isFinite(id))) {
      nextInstance += 1;
      return `instance:${nextInstance}`;
    }
    ids.push(id);
  }
  return ids;
}

function isCount(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isCriteriaObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Orders numbers and dates numerically, everything else by string form.
 * null and undefined sort last regardless of direction.
 */
function compareValues(a: unknown, b: unknown): number {
  const aMissing = a === null || a === undefined;
  const bMissing = b === null || b === undefined;
  if (aMissing || bMissing) return aMissing === bMissing ? 0 : aMissing ? 1 : -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return String(a).localeCompare(String(b));
}

/**
 * Immutable in-memory lazy query over a named source. Every modifier returns
 * a new RecordQuery; existing instances are never mutated and nothing is
 * filtered until all() is awaited.
 *
 * @example
 * query.from('posts', posts)
 *   .where({ status: 'live' })
 *   .orderBy('postedAt', 'desc')
 *   .limit(10)
 */
export class RecordQuery<R extends object = Record<string, unknown>> implements LazyQuery<R> {
  constructor(
    readonly source: string,
    private readonly records: readonly R[],
    readonly criteria: QueryCriteria = NO_CRITERIA,
    private readonly scope: readonly (string | number)[] | string = recordScope(records),
  ) {}

  private with(patch: Partial<QueryCriteria>): RecordQuery<R> {
    return new RecordQuery(this.source, this.records, { ...this.criteria, ...patch }, this.scope);
  }

  /** Adds equality filters; repeated calls accumulate with AND. */
  where(criteria: Readonly<Record<string, unknown>>): RecordQuery<R> {
    return this.with({ where: { ...this.criteria.where, ...criteria } });
  }

  orderBy(field: string, direction: SortDirection = 'asc'): RecordQuery<R> {
    return this.with({ orderBy: { field, direction } });
  }

  offset(count: number): RecordQuery<R> {
    return this.with({ offset: count });
  }

  limit(count: number | null): RecordQuery<R> {
    return this.with({ limit: count });
  }

  /**
   * Directive hook: `limit` and `offset` take a non-negative integer,
   * `orderBy` takes `"field"` or `"field desc"`, `where` takes a mapping.
   */
  applyModifier(name: string, arg: unknown): RecordQuery<R> {
    switch (name) {
      case 'limit':
        return arg === null || isCount(arg) ? this.limit(arg) : this;
      case 'offset':
        return isCount(arg) ? this.offset(arg) : this;
      case 'orderBy': {
        if (typeof arg !== 'string' || arg.trim() === '') return this;
        const [field = '', direction] = arg.trim().split(/\s+/);
        return this.orderBy(field, direction?.toLowerCase() === 'desc' ? 'desc' : 'asc');
      }
      case 'where':
        return isCriteriaObject(arg) ? this.where(arg) : this;
      default:
        return this;
    }
  }

  async all(): Promise<readonly R[]> {
    const { where, orderBy, offset, limit } = this.criteria;
    const filters = Object.entries(where);

    let result = this.records.filter((record) =>
      filters.every(([field, value]) => readField(record, field) === value),
    );

    if (orderBy !== null) {
      const sign = orderBy.direction === 'desc' ? -1 : 1;
      result = [...result].sort((a, b) => {
        const av = readField(a, orderBy.field);
        const bv = readField(b, orderBy.field);
        const missing = av === null || av === undefined || bv === null || bv === undefined;
        // Keep missing values last in both directions
        return missing ? compareValues(av, bv) : sign * compareValues(av, bv);
      });
    }

    const end = limit === null ? undefined : offset + limit;
    return result.slice(offset, end);
  }

  /**
   * Covers the source, the ids of the underlying records and the criteria.
   * Filters are sorted by field name so that the same criteria added in a
   * different order produce the same key.
   */
  cacheKey(): string {
    const { where, orderBy, offset, limit } = this.criteria;
    const sortedWhere = Object.keys(where)
      .sort()
      .map((field) => [field, where[field]]);
    return JSON.stringify({
      source: this.source,
      records: this.scope,
      where: sortedWhere,
      orderBy,
      offset,
      limit,
    });
  }
}
