import { RecordQuery } from './record-query.js';

/**
 * Entry point for building in-memory lazy queries.
 *
 * @example
 * query.from('entries', entries).where({ section: 'news' }).limit(5)
 */
export const query = {
  from<R extends object>(source: string, records: readonly R[]): RecordQuery<R> {
    return new RecordQuery(source, records);
  },
};
