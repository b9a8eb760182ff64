import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { GitHubStarSource, nodeToRepo, README_EXCERPT_CHARS, truncateExcerpt, type RepoNode } from '../github.js';
import { ConfigSchema } from '../../shared/config.js';
import { SourceError } from '../../shared/errors.js';

const config = ConfigSchema.parse({
  github: { token: 'test-token', star_list_id: 'UL_test', page_size: 2 },
}).github;

const NODE: RepoNode = {
  owner: { login: 'octo' },
  name: 'alpha',
  description: 'A test repository',
  url: 'https://github.com/octo/alpha',
  homepageUrl: '',
  stargazerCount: 42,
  primaryLanguage: { name: 'TypeScript' },
  repositoryTopics: { nodes: [{ topic: { name: 'cli' } }, { topic: { name: 'search' } }] },
  object: { text: '# Alpha' },
};

function pagePayload(nodes: RepoNode[]) {
  return {
    data: {
      node: {
        items: {
          totalCount: 7,
          pageInfo: { hasNextPage: true, endCursor: 'Y3Vyc29yOjI=', hasPreviousPage: false, startCursor: 'Y3Vyc29yOjE=' },
          nodes,
        },
      },
    },
  };
}

const originalFetch = globalThis.fetch;
let fetchMock: ReturnType<typeof vi.fn>;

function respondWith(body: unknown, status = 200): void {
  fetchMock.mockImplementation(() =>
    Promise.resolve(new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })),
  );
}

beforeEach(() => {
  fetchMock = vi.fn();
  globalThis.fetch = fetchMock;
});

afterEach(() => {
  globalThis.fetch = originalFetch;
  vi.restoreAllMocks();
});

describe('nodeToRepo', () => {
  it('maps a repository node', () => {
    expect(nodeToRepo(NODE)).toEqual({
      owner: 'octo',
      name: 'alpha',
      full_name: 'octo/alpha',
      description: 'A test repository',
      url: 'https://github.com/octo/alpha',
      stars: 42,
      language: 'TypeScript',
      topics: ['cli', 'search'],
      readme_excerpt: '# Alpha',
    });
  });

  it('leaves out missing optional values and defaults topics to empty', () => {
    const repo = nodeToRepo({
      ...NODE,
      description: null,
      homepageUrl: null,
      primaryLanguage: null,
      repositoryTopics: { nodes: [] },
      object: null,
    });

    expect(repo).toEqual({
      owner: 'octo',
      name: 'alpha',
      full_name: 'octo/alpha',
      url: 'https://github.com/octo/alpha',
      stars: 42,
      topics: [],
    });
  });

  it('truncates the README excerpt', () => {
    const repo = nodeToRepo({ ...NODE, object: { text: 'x'.repeat(README_EXCERPT_CHARS + 500) } });
    expect(repo.readme_excerpt).toHaveLength(README_EXCERPT_CHARS);
  });

  it('does not split an emoji at the excerpt boundary', () => {
    const text = 'x'.repeat(README_EXCERPT_CHARS - 1) + '\u{1F600} and more';
    const repo = nodeToRepo({ ...NODE, object: { text } });
    expect(repo.readme_excerpt).toBe('x'.repeat(README_EXCERPT_CHARS - 1));
  });
});

describe('truncateExcerpt', () => {
  it('drops a trailing half surrogate pair', () => {
    expect(truncateExcerpt('ab\u{1F600}', 3)).toBe('ab');
  });

  it('keeps a whole pair that fits', () => {
    expect(truncateExcerpt('a\u{1F600}b', 3)).toBe('a\u{1F600}');
    expect(truncateExcerpt('ab\u{1F600}', 4)).toBe('ab\u{1F600}');
  });
});

describe('GitHubStarSource', () => {
  it('requests forward pages with first/after', async () => {
    respondWith(pagePayload([NODE]));
    const source = new GitHubStarSource(config);

    const page = await source.fetchPage('abc', 'forward');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.github.com/graphql');
    expect(init.headers.Authorization).toBe('Bearer test-token');
    expect(JSON.parse(init.body).variables).toEqual({ listId: 'UL_test', first: 2, after: 'abc' });
    expect(page.totalCount).toBe(7);
    expect(page.pageInfo.endCursor).toBe('Y3Vyc29yOjI=');
    expect(page.repos.map((r) => r.full_name)).toEqual(['octo/alpha']);
  });

  it('requests backward pages with last/before', async () => {
    respondWith(pagePayload([]));
    const source = new GitHubStarSource(config);

    await source.fetchPage(null, 'backward');

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(JSON.parse(init.body).variables).toEqual({ listId: 'UL_test', last: 2, before: null });
  });

  it('throws SourceError on a non-2xx response', async () => {
    respondWith('Bad credentials', 401);
    await expect(new GitHubStarSource(config).fetchPage(null, 'forward')).rejects.toThrow(SourceError);
  });

  it('throws SourceError on GraphQL errors', async () => {
    respondWith({ data: null, errors: [{ message: 'Something went wrong' }] });
    await expect(new GitHubStarSource(config).fetchPage(null, 'forward')).rejects.toThrow(
      'GraphQL error: Something went wrong',
    );
  });

  it('throws SourceError when the list does not exist', async () => {
    respondWith({ data: { node: null } });
    await expect(new GitHubStarSource(config).fetchPage(null, 'forward')).rejects.toThrow(
      'Star list not found: UL_test',
    );
  });

  it('wraps network failures in SourceError', async () => {
    fetchMock.mockRejectedValue(new Error('ECONNRESET'));
    await expect(new GitHubStarSource(config).fetchPage(null, 'forward')).rejects.toThrow(
      'Star list fetch failed: ECONNRESET',
    );
  });

  it('reports whether it is configured', () => {
    expect(new GitHubStarSource(config).isConfigured()).toBe(true);
    expect(new GitHubStarSource({ ...config, token: '' }).isConfigured()).toBe(false);
  });
});
