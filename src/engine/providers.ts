import type { Repo } from '../source/adapter.js';

export interface SummaryResult {
  summary: string;
  categories: string[];
}

/**
 * Produces an AI summary and category tags for a repo.
 */
export interface Summarizer {
  summarize(repo: Repo, signal?: AbortSignal): Promise<SummaryResult>;
}

/**
 * One vector of an embeddings response. `index` is the position of the input
 * text within the request that produced it.
 */
export interface IndexedEmbedding {
  index: number;
  embedding: number[];
}

/**
 * Embeds a batch of texts. Results may arrive in any order; `index` says which
 * input each vector belongs to.
 */
export interface Embedder {
  embed(texts: string[], signal?: AbortSignal): Promise<IndexedEmbedding[]>;
}
