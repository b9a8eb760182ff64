import type { Repo } from '../source/adapter.js';
import type { RepoStore } from '../store/types.js';
import type { Summarizer } from './providers.js';
import { AtomicCounter } from '../shared/counter.js';
import { SyncError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_ENRICH_CONCURRENCY = 5;
export const DEFAULT_PROGRESS_EVERY = 10;

export interface EnrichOptions {
  repos: readonly Repo[];
  summarizer: Summarizer;
  store: RepoStore;
  concurrency?: number;
  progressEvery?: number;
  /** Counts repos summarized and stored. */
  counter?: AtomicCounter;
  signal?: AbortSignal;
}

export interface EnrichStats {
  attempted: number;
  succeeded: number;
  failed: number;
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Items still queued when `signal` aborts are never started.
 */
export async function withConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  const queue = [...items];
  const workers: Promise<void>[] = [];

  for (let i = 0; i < Math.min(concurrency, queue.length); i++) {
    workers.push(
      (async () => {
        while (queue.length > 0 && !signal?.aborted) {
          const item = queue.shift();
          if (item !== undefined) {
            await fn(item);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
}

/**
 * Summarize each repo and store the result. A failed summary or write is
 * logged and left for the next run; only cancellation fails the batch.
 */
export async function runEnrichment(options: EnrichOptions): Promise<EnrichStats> {
  const { repos, summarizer, store, signal } = options;
  const concurrency = options.concurrency ?? DEFAULT_ENRICH_CONCURRENCY;
  const progressEvery = options.progressEvery ?? DEFAULT_PROGRESS_EVERY;
  const counter = options.counter ?? new AtomicCounter();
  const total = repos.length;
  const stats: EnrichStats = { attempted: 0, succeeded: 0, failed: 0 };

  await withConcurrency(
    repos,
    concurrency,
    async (repo) => {
      stats.attempted++;

      let result;
      try {
        result = await summarizer.summarize(repo, signal);
      } catch (err) {
        if (signal?.aborted) return;
        stats.failed++;
        logger.warn(
          { repo: repo.full_name, error: err instanceof Error ? err.message : String(err) },
          'Summary failed, will retry next run',
        );
        return;
      }

      try {
        await store.updateEnrichment(repo.full_name, result.summary, result.categories);
      } catch (err) {
        stats.failed++;
        logger.warn(
          { repo: repo.full_name, error: err instanceof Error ? err.message : String(err) },
          'Storing enrichment failed',
        );
        return;
      }

      stats.succeeded++;
      const done = counter.increment();
      if (done % progressEvery === 0 || done === total) {
        logger.info({ done, total }, 'Enrichment progress');
      }
    },
    signal,
  );

  if (signal?.aborted) {
    throw new SyncError('Enrichment cancelled', { ...stats, total });
  }

  logger.info({ ...stats, total }, 'Enrichment complete');
  return stats;
}
