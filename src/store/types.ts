import type { Repo } from '../source/adapter.js';
import type { SearchOptions, SearchRow } from './fields.js';

export interface StoreStats {
  total: number;
  enriched: number;
  embedded: number;
}

/**
 * Durable repo store. Every write is keyed by `full_name` and safe to repeat.
 */
export interface RepoStore {
  initSchema(): Promise<void>;
  /** Insert or merge; fields absent on `repo` keep their stored values. */
  upsertRepo(repo: Repo): Promise<void>;
  getUnenriched(): Promise<Repo[]>;
  getNeedingEmbedding(): Promise<Repo[]>;
  getAll(): Promise<Repo[]>;
  updateEnrichment(fullName: string, summary: string, categories: string[]): Promise<void>;
  updateEmbedding(fullName: string, vector: number[]): Promise<void>;
  search(queryVector: number[], options: SearchOptions): Promise<SearchRow[]>;
  stats(): Promise<StoreStats>;
  categoryBreakdown(): Promise<Map<string, number>>;
}
