import { describe, expect, it, vi } from 'vitest';
import type { Logger } from '../../src/logger.js';
import { paginate, parseNextLink, restartable, type Page } from '../../src/providers/pagination.js';
import { collect } from '../../src/providers/selection.js';

function quietLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    isVerbose: () => false,
    setLevel: vi.fn(),
  };
}

const ORIGIN = 'https://api.example.com';

describe('paginate', () => {
  it('follows cursors until none is left', async () => {
    const pages: Record<string, Page<number>> = {
      [`${ORIGIN}/items`]: { items: [1, 2], next: `${ORIGIN}/items?page=2` },
      [`${ORIGIN}/items?page=2`]: { items: [3] },
    };

    const items = await collect(
      paginate({
        firstUrl: `${ORIGIN}/items`,
        origin: ORIGIN,
        maxPages: 10,
        logger: quietLogger(),
        fetchPage: async (url) => pages[url] ?? { items: [] },
      }),
    );

    expect(items).toEqual([1, 2, 3]);
  });

  it('stops when a cursor repeats', async () => {
    const fetchPage = vi.fn(async (): Promise<Page<number>> => ({ items: [7], next: `${ORIGIN}/items?page=2` }));

    const items = await collect(
      paginate({ firstUrl: `${ORIGIN}/items`, origin: ORIGIN, maxPages: 10, logger: quietLogger(), fetchPage }),
    );

    expect(items).toEqual([7, 7]);
    expect(fetchPage).toHaveBeenCalledTimes(2);
  });

  it('never follows a cursor to another origin', async () => {
    const fetchPage = vi.fn(async (): Promise<Page<number>> => ({ items: [1], next: 'https://elsewhere.example.net/items' }));

    await collect(paginate({ firstUrl: `${ORIGIN}/items`, origin: ORIGIN, maxPages: 10, logger: quietLogger(), fetchPage }));

    expect(fetchPage).toHaveBeenCalledTimes(1);
  });

  it('warns and stops at the page cap', async () => {
    const logger = quietLogger();
    let page = 0;
    const fetchPage = vi.fn(async (): Promise<Page<number>> => {
      page++;
      return { items: [page], next: `${ORIGIN}/items?page=${page + 1}` };
    });

    const items = await collect(paginate({ firstUrl: `${ORIGIN}/items`, origin: ORIGIN, maxPages: 3, logger, fetchPage }));

    expect(items).toEqual([1, 2, 3]);
    expect(logger.warn).toHaveBeenCalledWith('Stopped listing after 3 pages; results may be incomplete');
  });

  it('stops on an empty page even if a cursor is advertised', async () => {
    const fetchPage = vi.fn(async (): Promise<Page<number>> => ({ items: [], next: `${ORIGIN}/items?page=2` }));

    expect(
      await collect(paginate({ firstUrl: `${ORIGIN}/items`, origin: ORIGIN, maxPages: 10, logger: quietLogger(), fetchPage })),
    ).toEqual([]);
    expect(fetchPage).toHaveBeenCalledTimes(1);
  });
});

describe('restartable', () => {
  it('starts a fresh walk for every iteration', async () => {
    let runs = 0;
    const iterable = restartable(async function* () {
      runs++;
      yield runs;
    });

    expect(await collect(iterable)).toEqual([1]);
    expect(await collect(iterable)).toEqual([2]);
  });
});

describe('parseNextLink', () => {
  it('picks the rel="next" target', () => {
    const header =
      '<https://api.example.com/items?page=1>; rel="prev", <https://api.example.com/items?page=3>; rel="next", <https://api.example.com/items?page=9>; rel="last"';

    expect(parseNextLink(header)).toBe('https://api.example.com/items?page=3');
  });

  it('returns undefined without a next link', () => {
    expect(parseNextLink('<https://api.example.com/items?page=1>; rel="first"')).toBeUndefined();
    expect(parseNextLink(null)).toBeUndefined();
  });
});
