import { describe, expect, it, vi } from 'vitest';
import { collect, getPageSize, keysetIterable, processPaginatedResults } from '../pagination.utils';

function pagedSource(values: number[]) {
  return vi.fn(async (cursor: number | null, limit: number) =>
    values.filter((v) => cursor === null || v > cursor).slice(0, limit)
  );
}

describe('pagination utils', () => {
  it('trims the look-ahead row', () => {
    expect(processPaginatedResults([1, 2, 3], 2)).toEqual({ items: [1, 2], hasMore: true });
    expect(processPaginatedResults([1, 2], 2)).toEqual({ items: [1, 2], hasMore: false });
  });

  it('walks every page with the last row as the cursor', async () => {
    const fetchPage = pagedSource([1, 2, 3, 4, 5]);

    const items = await collect(keysetIterable(fetchPage, (v) => v, 2));

    expect(items).toEqual([1, 2, 3, 4, 5]);
    expect(fetchPage.mock.calls).toEqual([
      [null, 3],
      [2, 3],
      [4, 3],
    ]);
  });

  it('stops without an extra query when the last page is exactly full', async () => {
    const fetchPage = pagedSource([1, 2, 3, 4]);

    const items = await collect(keysetIterable(fetchPage, (v) => v, 2));

    expect(items).toEqual([1, 2, 3, 4]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('can stop early without reading further pages', async () => {
    const fetchPage = pagedSource([1, 2, 3, 4, 5]);

    for await (const value of keysetIterable(fetchPage, (v) => v, 2)) {
      if (value === 1) break;
    }

    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('validates a custom page size', () => {
    expect(getPageSize(25)).toBe(25);
    expect(() => getPageSize(0)).toThrow('Invalid limit: must be a positive integer');
  });
});
