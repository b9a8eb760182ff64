import type { Repo, StarSource } from '../source/adapter.js';
import type { RepoCache } from '../source/cache.js';
import type { RepoStore } from '../store/types.js';
import type { Embedder, Summarizer } from './providers.js';
import { FullStrategy, IncrementalStrategy } from '../source/strategy.js';
import { runEnrichment, DEFAULT_ENRICH_CONCURRENCY, DEFAULT_PROGRESS_EVERY, type EnrichStats } from './enrich.js';
import { runEmbedding, MAX_EMBED_BATCH, type EmbedStats } from './embed.js';
import { AtomicCounter } from '../shared/counter.js';
import { logger } from '../shared/logger.js';

const UPSERT_PROGRESS_EVERY = 50;

export interface SyncDeps {
  source: StarSource;
  cache: RepoCache;
  store: RepoStore;
  summarizer: Summarizer;
  embedder: Embedder;
  concurrency?: number;
  progressEvery?: number;
  batchSize?: number;
}

export interface SyncOptions {
  /** Fetch and store only; no summaries or embeddings. */
  skipEnrich?: boolean;
  /** Re-enrich and re-embed every stored repo. */
  force?: boolean;
  /** Ignore the cache and re-fetch the whole star list. */
  refresh?: boolean;
  signal?: AbortSignal;
}

export type RepoOrigin = 'full' | 'incremental' | 'cache';

export interface ResolvedRepos {
  repos: Repo[];
  origin: RepoOrigin;
  newRepos: number;
}

export interface SyncReport {
  fetched: number;
  origin: RepoOrigin;
  newRepos: number;
  upserted: number;
  enrichment: EnrichStats | null;
  embedding: EmbedStats | null;
  durationMs: number;
}

function writeCacheQuietly(cache: RepoCache, repos: readonly Repo[]): void {
  try {
    cache.write(repos);
  } catch (err) {
    logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Could not update star cache');
  }
}

/**
 * Work out the current repo list: a full fetch on refresh or when nothing is
 * cached, otherwise an incremental fetch on top of the cache.
 */
export async function resolveRepos(
  source: StarSource,
  cache: RepoCache,
  refresh: boolean,
  signal?: AbortSignal,
): Promise<ResolvedRepos> {
  const full = new FullStrategy();
  const cached = refresh ? null : cache.read();

  if (cached && cached.length > 0) {
    logger.info({ cached: cached.length }, 'Checking for new stars');
    let repos: Repo[];
    try {
      repos = await new IncrementalStrategy(full).fetch(source, cached, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        'Incremental fetch failed, using cache as-is',
      );
      return { repos: cached, origin: 'cache', newRepos: 0 };
    }

    const newRepos = repos.length - cached.length;
    if (newRepos > 0) {
      logger.info({ newRepos, total: repos.length }, 'Found new stars');
      writeCacheQuietly(cache, repos);
    } else {
      logger.info({ total: cached.length }, 'Cache is up to date');
    }
    return { repos, origin: 'incremental', newRepos };
  }

  logger.info({ refresh }, 'Fetching full star list');
  const repos = await full.fetch(source, [], signal);
  writeCacheQuietly(cache, repos);
  return { repos, origin: 'full', newRepos: repos.length };
}

/**
 * One synchronization run. Stages run strictly in order; each is idempotent,
 * so a failed or cancelled run is resumed by running again.
 */
export async function runSync(deps: SyncDeps, options: SyncOptions = {}): Promise<SyncReport> {
  const startTime = Date.now();
  const { store } = deps;
  const { signal } = options;
  const force = options.force ?? false;

  await store.initSchema();

  const resolved = await resolveRepos(deps.source, deps.cache, options.refresh ?? false, signal);
  const { repos } = resolved;

  for (const [i, repo] of repos.entries()) {
    signal?.throwIfAborted();
    await store.upsertRepo(repo);
    const done = i + 1;
    if (done % UPSERT_PROGRESS_EVERY === 0 || done === repos.length) {
      logger.info({ done, total: repos.length }, 'Upserted repos');
    }
  }

  let enrichment: EnrichStats | null = null;
  if (options.skipEnrich) {
    logger.info('Skipping enrichment');
  } else {
    const targets = force ? await store.getAll() : await store.getUnenriched();
    if (targets.length === 0) {
      logger.info('All repos already enriched');
    } else {
      logger.info({ count: targets.length }, 'Enriching repos with AI summaries');
      enrichment = await runEnrichment({
        repos: targets,
        summarizer: deps.summarizer,
        store,
        concurrency: deps.concurrency ?? DEFAULT_ENRICH_CONCURRENCY,
        progressEvery: deps.progressEvery ?? DEFAULT_PROGRESS_EVERY,
        counter: new AtomicCounter(),
        signal,
      });
    }
  }

  let embedding: EmbedStats | null = null;
  if (options.skipEnrich) {
    logger.info('Skipping embeddings');
  } else {
    // Embedding text comes from the summary, so unenriched repos never qualify.
    const candidates = force ? await store.getAll() : await store.getNeedingEmbedding();
    const toEmbed = candidates.filter((r) => r.ai_summary !== undefined);
    if (toEmbed.length === 0) {
      logger.info('All repos already have embeddings');
    } else {
      logger.info({ count: toEmbed.length }, 'Generating embeddings');
      embedding = await runEmbedding({
        repos: toEmbed,
        embedder: deps.embedder,
        store,
        batchSize: deps.batchSize ?? MAX_EMBED_BATCH,
        signal,
      });
    }
  }

  const report: SyncReport = {
    fetched: repos.length,
    origin: resolved.origin,
    newRepos: resolved.newRepos,
    upserted: repos.length,
    enrichment,
    embedding,
    durationMs: Date.now() - startTime,
  };
  logger.info(
    { fetched: report.fetched, newRepos: report.newRepos, durationMs: report.durationMs },
    'Sync complete',
  );
  return report;
}
