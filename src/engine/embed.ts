import type { Repo } from '../source/adapter.js';
import type { RepoStore } from '../store/types.js';
import type { Embedder } from './providers.js';
import { EmbeddingError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const MAX_EMBED_BATCH = 256;

export interface EmbedOptions {
  repos: readonly Repo[];
  embedder: Embedder;
  store: RepoStore;
  batchSize?: number;
  signal?: AbortSignal;
}

export interface EmbedStats {
  embedded: number;
  failed: number;
}

export function buildEmbeddingText(repo: Repo): string {
  return `${repo.full_name}: ${repo.ai_summary ?? ''}`;
}

/**
 * Embed `texts` in consecutive batches of at most `batchSize`, one request
 * per batch. The result at position i is the vector for `texts[i]`. Any
 * failed batch fails the whole call.
 */
export async function embedInBatches(
  embedder: Embedder,
  texts: readonly string[],
  batchSize: number = MAX_EMBED_BATCH,
  signal?: AbortSignal,
): Promise<number[][]> {
  if (batchSize < 1) throw new RangeError(`batch size must be positive, got ${batchSize}`);

  const slots: Array<number[] | undefined> = Array.from({ length: texts.length }, () => undefined);

  for (let start = 0; start < texts.length; start += batchSize) {
    signal?.throwIfAborted();
    const batch = texts.slice(start, start + batchSize);
    const end = start + batch.length;

    let results;
    try {
      results = await embedder.embed(batch, signal);
    } catch (err) {
      throw new EmbeddingError(
        `Embedding batch ${start}-${end} failed: ${err instanceof Error ? err.message : String(err)}`,
        { start, end },
      );
    }

    for (const result of results) {
      if (!Number.isInteger(result.index) || result.index < 0 || result.index >= batch.length) {
        throw new EmbeddingError(`Embedding index ${result.index} out of range for batch ${start}-${end}`, {
          start,
          end,
          index: result.index,
        });
      }
      slots[start + result.index] = result.embedding;
    }
    logger.debug({ start, end, total: texts.length }, 'Embedding batch done');
  }

  const vectors: number[][] = [];
  for (let i = 0; i < slots.length; i++) {
    const vector = slots[i];
    if (!vector) throw new EmbeddingError(`No embedding returned for input ${i}`, { index: i });
    vectors.push(vector);
  }
  return vectors;
}

/**
 * Embed each repo's summary text and store the vectors. A failed batch aborts;
 * a failed write is logged and skipped.
 */
export async function runEmbedding(options: EmbedOptions): Promise<EmbedStats> {
  const { repos, embedder, store, signal } = options;
  const vectors = await embedInBatches(embedder, repos.map(buildEmbeddingText), options.batchSize, signal);

  const stats: EmbedStats = { embedded: 0, failed: 0 };
  for (const [i, repo] of repos.entries()) {
    const vector = vectors[i];
    if (!vector) throw new EmbeddingError(`No embedding returned for ${repo.full_name}`, { index: i });
    try {
      await store.updateEmbedding(repo.full_name, vector);
      stats.embedded++;
    } catch (err) {
      stats.failed++;
      logger.warn(
        { repo: repo.full_name, error: err instanceof Error ? err.message : String(err) },
        'Storing embedding failed',
      );
    }
  }

  logger.info({ ...stats, total: repos.length }, 'Embeddings stored');
  return stats;
}
