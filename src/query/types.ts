/**
 * Deferred, modifiable description of a collection of records. Nothing is
 * fetched until all() is called.
 */
export interface LazyQuery<R = unknown> {
  /**
   * Returns a query with the named modifier applied. Unknown names and
   * unusable arguments return the query unchanged.
   */
  applyModifier(name: string, arg: unknown): LazyQuery<R>;
  all(): Promise<readonly R[]>;
  /** Stable description of the query's source and parameters, used in cache keys. */
  cacheKey(): string;
}

export type SortDirection = 'asc' | 'desc';

export interface QueryCriteria {
  /** Equality filters, combined with AND. */
  readonly where: Readonly<Record<string, unknown>>;
  readonly orderBy: { readonly field: string; readonly direction: SortDirection } | null;
  readonly offset: number;
  readonly limit: number | null;
}

export function isLazyQuery(value: unknown): value is LazyQuery {
  return (
    typeof value === 'object' &&
    value !== null &&
    'applyModifier' in value &&
    typeof value.applyModifier === 'function' &&
    'all' in value &&
    typeof value.all === 'function' &&
    'cacheKey' in value &&
    typeof value.cacheKey === 'function'
  );
}
