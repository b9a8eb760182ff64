import type { FetchStrategy, Repo, StarSource } from './adapter.js';
import { logger } from '../shared/logger.js';

/**
 * Fetches the whole star list by paging forward from the beginning. Makes no
 * assumption about sort order and always returns the complete list.
 */
export class FullStrategy implements FetchStrategy {
  readonly name = 'full';

  async fetch(source: StarSource, _known: readonly Repo[], signal?: AbortSignal): Promise<Repo[]> {
    const all: Repo[] = [];
    let cursor: string | null = null;

    while (true) {
      signal?.throwIfAborted();
      const page = await source.fetchPage(cursor, 'forward', signal);
      all.push(...page.repos);
      logger.info({ fetched: all.length, total: page.totalCount }, 'Fetched star list page');

      if (!page.pageInfo.hasNextPage || page.pageInfo.endCursor === null) break;
      cursor = page.pageInfo.endCursor;
    }

    return all;
  }
}

/**
 * Fetches only repos starred since the last run by paging backward from the
 * end of the list until a page contains an already known repo.
 *
 * Assumes the list is ordered oldest-starred first, so additions appear at
 * the end. GitHub does not document that order; a periodic full refresh
 * reconciles anything this strategy misses. Falls back to a full fetch when
 * nothing is known yet.
 */
export class IncrementalStrategy implements FetchStrategy {
  readonly name = 'incremental';

  constructor(private readonly full: FetchStrategy = new FullStrategy()) {}

  async fetch(source: StarSource, known: readonly Repo[], signal?: AbortSignal): Promise<Repo[]> {
    if (known.length === 0) {
      logger.info('No known repos, falling back to full fetch');
      return this.full.fetch(source, known, signal);
    }

    const knownNames = new Set(known.map((r) => r.full_name));

    // Pages arrive newest-first; each page is itself in list order.
    const newPages: Repo[][] = [];
    let cursor: string | null = null;

    while (true) {
      signal?.throwIfAborted();
      const page = await source.fetchPage(cursor, 'backward', signal);

      const fresh: Repo[] = [];
      let hitKnown = false;
      for (const repo of page.repos) {
        if (knownNames.has(repo.full_name)) {
          hitKnown = true;
        } else {
          fresh.push(repo);
        }
      }
      if (fresh.length > 0) newPages.push(fresh);

      if (hitKnown || !page.pageInfo.hasPreviousPage || page.pageInfo.startCursor === null) break;
      cursor = page.pageInfo.startCursor;
    }

    if (newPages.length === 0) return [...known];

    const added = newPages.reverse().flat();
    logger.info({ added: added.length }, 'Found new starred repos');
    return [...known, ...added];
  }
}
