import { z } from 'zod';
import type { Config } from '../shared/config.js';
import type { Page, PageDirection, Repo, StarSource } from './adapter.js';
import { SourceError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { requestSignal } from '../shared/http.js';

const GRAPHQL_ENDPOINT = 'https://api.github.com/graphql';
export const README_EXCERPT_CHARS = 3000;

// Supports both forward (first/after) and backward (last/before) Relay
// pagination through nullable variables.
const PAGE_QUERY = `
query($listId: ID!, $first: Int, $after: String, $last: Int, $before: String) {
  node(id: $listId) {
    ... on UserList {
      items(first: $first, after: $after, last: $last, before: $before) {
        totalCount
        pageInfo {
          hasNextPage
          endCursor
          hasPreviousPage
          startCursor
        }
        nodes {
          ... on Repository {
            owner { login }
            name
            description
            url
            homepageUrl
            stargazerCount
            primaryLanguage { name }
            repositoryTopics(first: 20) {
              nodes { topic { name } }
            }
            object(expression: "HEAD:README.md") {
              ... on Blob { text }
            }
          }
        }
      }
    }
  }
}
`;

const RepoNodeSchema = z.object({
  owner: z.object({ login: z.string() }),
  name: z.string(),
  description: z.string().nullish(),
  url: z.string(),
  homepageUrl: z.string().nullish(),
  stargazerCount: z.number().int(),
  primaryLanguage: z.object({ name: z.string() }).nullish(),
  repositoryTopics: z
    .object({ nodes: z.array(z.object({ topic: z.object({ name: z.string() }) })) })
    .nullish(),
  object: z.object({ text: z.string().nullish() }).nullish(),
});

export type RepoNode = z.infer<typeof RepoNodeSchema>;

const StarListResponseSchema = z.object({
  data: z
    .object({
      node: z
        .object({
          items: z.object({
            totalCount: z.number().int(),
            pageInfo: z.object({
              hasNextPage: z.boolean(),
              endCursor: z.string().nullable(),
              hasPreviousPage: z.boolean(),
              startCursor: z.string().nullable(),
            }),
            nodes: z.array(RepoNodeSchema),
          }),
        })
        .nullable(),
    })
    .nullish(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

/**
 * Cut `text` to at most `max` UTF-16 units without splitting a surrogate pair.
 */
export function truncateExcerpt(text: string, max: number): string {
  if (text.length <= max) return text;
  const cut = text.slice(0, max);
  const last = cut.charCodeAt(cut.length - 1);
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

/**
 * Map a GraphQL repository node to a Repo. Empty optional values are left out
 * so that they never overwrite stored data on upsert.
 */
export function nodeToRepo(node: RepoNode): Repo {
  const repo: Repo = {
    owner: node.owner.login,
    name: node.name,
    full_name: `${node.owner.login}/${node.name}`,
    url: node.url,
    stars: node.stargazerCount,
    topics: (node.repositoryTopics?.nodes ?? []).map((t) => t.topic.name),
  };

  if (node.description) repo.description = node.description;
  if (node.homepageUrl) repo.homepage_url = node.homepageUrl;
  if (node.primaryLanguage) repo.language = node.primaryLanguage.name;

  const readme = node.object?.text;
  if (readme) repo.readme_excerpt = truncateExcerpt(readme, README_EXCERPT_CHARS);

  return repo;
}

/**
 * StarSource over a GitHub star list ("UserList") via the GraphQL API.
 */
export class GitHubStarSource implements StarSource {
  private readonly token: string;
  private readonly listId: string;
  private readonly pageSize: number;
  private readonly timeoutMs: number;

  constructor(config: Config['github']) {
    this.token = config.token;
    this.listId = config.star_list_id;
    this.pageSize = config.page_size;
    this.timeoutMs = config.timeout_ms;
  }

  isConfigured(): boolean {
    return this.token.length > 0 && this.listId.length > 0;
  }

  async fetchPage(cursor: string | null, direction: PageDirection, signal?: AbortSignal): Promise<Page> {
    const variables: Record<string, unknown> =
      direction === 'forward'
        ? { listId: this.listId, first: this.pageSize, after: cursor }
        : { listId: this.listId, last: this.pageSize, before: cursor };

    const { signal: reqSignal, isTimeout } = requestSignal(this.timeoutMs, signal);

    let response: Response;
    try {
      response = await fetch(GRAPHQL_ENDPOINT, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.token}`,
        },
        body: JSON.stringify({ query: PAGE_QUERY, variables }),
        signal: reqSignal,
      });
    } catch (err) {
      if (isTimeout()) {
        throw new SourceError(`Star list fetch timed out after ${this.timeoutMs}ms`, {
          listId: this.listId,
          timeout: this.timeoutMs,
        });
      }
      throw new SourceError(
        `Star list fetch failed: ${err instanceof Error ? err.message : String(err)}`,
        { listId: this.listId, direction },
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new SourceError(`GitHub API returned ${response.status}`, {
        status: response.status,
        body: text.slice(0, 500),
      });
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new SourceError('GitHub response is not valid JSON', { listId: this.listId });
    }

    const parsed = StarListResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceError('Unexpected GitHub response shape', { error: parsed.error.message });
    }

    const firstError = parsed.data.errors?.[0];
    if (firstError) {
      throw new SourceError(`GraphQL error: ${firstError.message}`, { listId: this.listId });
    }

    const items = parsed.data.data?.node?.items;
    if (!items) {
      throw new SourceError(`Star list not found: ${this.listId}`, { listId: this.listId });
    }

    logger.debug({ direction, count: items.nodes.length, total: items.totalCount }, 'Star list page fetched');

    return {
      repos: items.nodes.map(nodeToRepo),
      totalCount: items.totalCount,
      pageInfo: items.pageInfo,
    };
  }
}
