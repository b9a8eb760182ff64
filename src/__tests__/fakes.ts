import Database from 'better-sqlite3';
import type { Page, PageDirection, Repo, StarSource } from '../source/adapter.js';
import type { RepoCache } from '../source/cache.js';
import type { Embedder, IndexedEmbedding, Summarizer, SummaryResult } from '../engine/providers.js';
import { SqliteRepoStore } from '../store/repoDb.js';

export function makeRepo(fullName: string, overrides: Partial<Repo> = {}): Repo {
  const [owner = '', name = ''] = fullName.split('/');
  return {
    owner,
    name,
    full_name: fullName,
    url: `https://github.com/${fullName}`,
    stars: 0,
    topics: [],
    ...overrides,
  };
}

export function makeRepos(count: number, prefix = 'octo/repo-'): Repo[] {
  return Array.from({ length: count }, (_, i) => makeRepo(`${prefix}${i}`));
}

/**
 * In-memory star list with numeric-offset cursors, ordered oldest first.
 */
export class FakeStarSource implements StarSource {
  readonly calls: Array<{ cursor: string | null; direction: PageDirection }> = [];
  failOn: PageDirection | null = null;

  constructor(
    public repos: Repo[],
    private readonly pageSize: number,
  ) {}

  async fetchPage(cursor: string | null, direction: PageDirection): Promise<Page> {
    this.calls.push({ cursor, direction });
    if (this.failOn === direction) throw new Error(`${direction} fetch failed`);

    const total = this.repos.length;
    let start: number;
    let end: number;
    if (direction === 'forward') {
      start = cursor === null ? 0 : Number(cursor);
      end = Math.min(total, start + this.pageSize);
    } else {
      end = cursor === null ? total : Number(cursor);
      start = Math.max(0, end - this.pageSize);
    }

    return {
      repos: this.repos.slice(start, end),
      totalCount: total,
      pageInfo: {
        hasNextPage: end < total,
        endCursor: String(end),
        hasPreviousPage: start > 0,
        startCursor: String(start),
      },
    };
  }
}

export class FakeSummarizer implements Summarizer {
  readonly seen: string[] = [];
  readonly failFor = new Set<string>();
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly delayMs = 0) {}

  async summarize(repo: Repo): Promise<SummaryResult> {
    this.seen.push(repo.full_name);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.delayMs > 0) await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      if (this.failFor.has(repo.full_name)) throw new Error(`provider refused ${repo.full_name}`);
      return { summary: `Summary of ${repo.full_name}`, categories: ['Developer Tool'] };
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Embeds each text as a one-element vector holding its length, and answers in
 * reverse order to exercise index-based placement.
 */
export class FakeEmbedder implements Embedder {
  readonly batches: string[][] = [];
  failOnBatch: number | null = null;

  constructor(private readonly vectorFor: (text: string) => number[] = (text) => [text.length]) {}

  async embed(texts: string[]): Promise<IndexedEmbedding[]> {
    this.batches.push(texts);
    if (this.failOnBatch === this.batches.length) throw new Error('embedding provider unavailable');
    return texts.map((text, index) => ({ index, embedding: this.vectorFor(text) })).reverse();
  }
}

export class MemoryCache implements RepoCache {
  writes = 0;

  constructor(public snapshot: Repo[] | null = null) {}

  read(): Repo[] | null {
    return this.snapshot ? [...this.snapshot] : null;
  }

  write(repos: readonly Repo[]): void {
    this.writes++;
    this.snapshot = [...repos];
  }
}

export async function openMemoryStore(dimensions?: number): Promise<{ db: Database.Database; store: SqliteRepoStore }> {
  const db = new Database(':memory:');
  const store = new SqliteRepoStore(db, { dimensions });
  await store.initSchema();
  return { db, store };
}
