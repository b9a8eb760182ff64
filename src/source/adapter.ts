/**
 * A starred repository as fetched from the star list, plus the enrichment
 * fields this pipeline fills in. `full_name` (`owner/name`) is the identity key.
 */
export interface Repo {
  owner: string;
  name: string;
  full_name: string;
  description?: string;
  url: string;
  homepage_url?: string;
  stars: number;
  language?: string;
  topics: string[];
  readme_excerpt?: string;
  ai_summary?: string;
  ai_categories?: string[];
  embedding?: number[];
  fetched_at?: string;
  enriched_at?: string;
}

export interface PageInfo {
  hasNextPage: boolean;
  endCursor: string | null;
  hasPreviousPage: boolean;
  startCursor: string | null;
}

/**
 * One page of the star list connection.
 */
export interface Page {
  repos: Repo[];
  totalCount: number;
  pageInfo: PageInfo;
}

export type PageDirection = 'forward' | 'backward';

/**
 * Paginated read access to the remote star list. A `null` cursor starts from
 * the beginning (forward) or the end (backward) of the collection.
 */
export interface StarSource {
  fetchPage(cursor: string | null, direction: PageDirection, signal?: AbortSignal): Promise<Page>;
}

/**
 * A way of turning the remote collection plus the previously known repos into
 * the complete current repo list.
 */
export interface FetchStrategy {
  readonly name: string;
  fetch(source: StarSource, known: readonly Repo[], signal?: AbortSignal): Promise<Repo[]>;
}
