import { config } from '../config/config';

export interface PageResult<T> {
  items: T[];
  hasMore: boolean;
}

/**
 * Process query results into a page
 * Fetches limit + 1 items to determine if there are more pages
 *
 * @param results - Array of results (length should be limit + 1)
 * @param limit - Items per page
 */
export function processPaginatedResults<T>(results: T[], limit: number): PageResult<T> {
  return {
    items: results.slice(0, limit), // Remove the extra item
    hasMore: results.length > limit,
  };
}

/**
 * Calculate SQL LIMIT value
 * Adds 1 to detect if more results exist
 */
export function getSqlLimit(limit: number): number {
  return limit + 1;
}

/**
 * Validate a page size against the configured default
 */
export function getPageSize(customLimit?: number): number {
  if (customLimit === undefined) {
    return config.ledger.overduePageSize;
  }
  if (!Number.isInteger(customLimit) || customLimit <= 0) {
    throw new Error('Invalid limit: must be a positive integer');
  }
  return customLimit;
}

/**
 * Lazily walk a keyset-paginated query.
 *
 * Each call to `[Symbol.asyncIterator]()` starts again from the first page, so
 * the returned sequence can be iterated any number of times. A page shorter
 * than `pageSize` ends the walk.
 *
 * @param fetchPage - Loads up to `limit` rows strictly after `cursor`
 * @param cursorOf - Keyset position of a row
 */
export function keysetIterable<T, C>(
  fetchPage: (cursor: C | null, limit: number) => Promise<T[]>,
  cursorOf: (row: T) => C,
  pageSize: number
): AsyncIterable<T> {
  return {
    async *[Symbol.asyncIterator]() {
      let cursor: C | null = null;

      for (;;) {
        const rows = await fetchPage(cursor, getSqlLimit(pageSize));
        const page = processPaginatedResults(rows, pageSize);

        for (const row of page.items) {
          yield row;
        }

        if (!page.hasMore || page.items.length === 0) {
          return;
        }
        cursor = cursorOf(page.items[page.items.length - 1]);
      }
    },
  };
}

/**
 * Drain an async sequence into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
