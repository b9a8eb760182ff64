import type { RepoStore } from '../store/types.js';
import type { Embedder } from './providers.js';
import {
  DEFAULT_SEARCH_FIELDS,
  DEFAULT_SORT,
  validateLimit,
  validateSearchRequest,
  type SearchField,
  type SearchRow,
  type SortSpec,
} from '../store/fields.js';
import { embedInBatches } from './embed.js';
import { EmbeddingError, ValidationError } from '../shared/errors.js';

export const DEFAULT_SEARCH_LIMIT = 10;

export interface SearchRequest {
  query: string;
  limit?: number;
  fields?: SearchField[];
  sort?: SortSpec[];
}

/**
 * Semantic search: embed the query text and rank stored repos by similarity.
 * Field names and the limit are checked before the query is embedded.
 */
export async function searchRepos(
  embedder: Embedder,
  store: RepoStore,
  request: SearchRequest,
  signal?: AbortSignal,
): Promise<SearchRow[]> {
  const fields = request.fields ?? DEFAULT_SEARCH_FIELDS;
  const sort = request.sort && request.sort.length > 0 ? request.sort : DEFAULT_SORT;
  const limit = request.limit ?? DEFAULT_SEARCH_LIMIT;
  validateSearchRequest({ fields, sort });
  validateLimit(limit);

  const query = request.query.trim();
  if (!query) throw new ValidationError('Search query is empty');

  const [vector] = await embedInBatches(embedder, [query], 1, signal);
  if (!vector) throw new EmbeddingError('Search query produced no embedding');

  return store.search(vector, { limit, fields, sort });
}
