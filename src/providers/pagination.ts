import type { Logger } from '../logger.js';

export interface Page<T> {
  items: T[];
  /** Absolute URL of the next page, when the provider advertises one. */
  next?: string;
}

export interface PaginateOptions<T> {
  firstUrl: string;
  /** Pages outside this origin are never requested. */
  origin: string;
  maxPages: number;
  fetchPage: (url: string) => Promise<Page<T>>;
  logger: Logger;
}

/**
 * Walks a paged listing. Stops on a missing cursor, a cursor already
 * visited, an empty page, a cursor on another origin, or the page cap.
 */
export async function* paginate<T>(options: PaginateOptions<T>): AsyncGenerator<T, void, undefined> {
  const seen = new Set<string>();
  let url: string | undefined = options.firstUrl;
  let pages = 0;
  while (url) {
    if (seen.has(url)) {
      options.logger.debug(`pagination cursor repeated (${url}); stopping`);
      return;
    }
    if (originOf(url) !== options.origin) {
      options.logger.debug(`pagination cursor left ${options.origin} (${url}); stopping`);
      return;
    }
    if (pages >= options.maxPages) {
      options.logger.warn(`Stopped listing after ${options.maxPages} pages; results may be incomplete`);
      return;
    }
    seen.add(url);
    pages++;
    const page = await options.fetchPage(url);
    if (page.items.length === 0) return;
    yield* page.items;
    url = page.next;
  }
}

/** Wraps a generator factory so every `for await` starts from scratch. */
export function restartable<T>(factory: () => AsyncGenerator<T, void, undefined>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: () => factory(),
  };
}

/** Extracts the `rel="next"` target of an RFC 8288 Link header. */
export function parseNextLink(header: string | null | undefined): string | undefined {
  if (!header) return undefined;
  for (const part of header.split(',')) {
    const match = /<([^>]*)>\s*;(.*)$/.exec(part.trim());
    if (!match) continue;
    const [, target, params] = match;
    const rel = /\brel\s*=\s*"?([^";]*)"?/i.exec(params ?? '')?.[1] ?? '';
    if (target && rel.toLowerCase().split(/\s+/).includes('next')) {
      return target;
    }
  }
  return undefined;
}

function originOf(url: string): string | undefined {
  try {
    return new URL(url).origin;
  } catch {
    return undefined;
  }
}
