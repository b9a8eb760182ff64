import { describe, it, expect, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { Repo } from '../../source/adapter.js';
import type { Summarizer, SummaryResult } from '../providers.js';
import { runEnrichment, withConcurrency } from '../enrich.js';
import { AtomicCounter } from '../../shared/counter.js';
import { SyncError } from '../../shared/errors.js';
import { FakeSummarizer, makeRepos, openMemoryStore } from '../../__tests__/fakes.js';

const open: Database.Database[] = [];

async function storeWith(repos: Repo[]) {
  const { db, store } = await openMemoryStore();
  open.push(db);
  for (const repo of repos) await store.upsertRepo(repo);
  return store;
}

afterEach(() => {
  for (const db of open.splice(0)) db.close();
});

describe('withConcurrency', () => {
  it('processes every item with a bounded number in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    await withConcurrency([1, 2, 3, 4, 5, 6, 7], 3, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 2));
      seen.push(n);
      inFlight--;
    });

    expect(peak).toBe(3);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('does nothing for an empty list', async () => {
    let calls = 0;
    await withConcurrency([], 4, async () => {
      calls++;
    });
    expect(calls).toBe(0);
  });
});

describe('runEnrichment', () => {
  it('stores a summary for every repo', async () => {
    const repos = makeRepos(4);
    const store = await storeWith(repos);
    const counter = new AtomicCounter();

    const stats = await runEnrichment({ repos, summarizer: new FakeSummarizer(), store, counter });

    expect(stats).toEqual({ attempted: 4, succeeded: 4, failed: 0 });
    expect(counter.current).toBe(4);
    const [first] = await store.getAll();
    expect(first?.ai_summary).toBe('Summary of octo/repo-0');
    expect(first?.ai_categories).toEqual(['Developer Tool']);
  });

  it('keeps going when one repo fails', async () => {
    const repos = makeRepos(5);
    const store = await storeWith(repos);
    const summarizer = new FakeSummarizer();
    summarizer.failFor.add('octo/repo-2');

    const stats = await runEnrichment({ repos, summarizer, store });

    expect(stats).toEqual({ attempted: 5, succeeded: 4, failed: 1 });
    expect((await store.getUnenriched()).map((r) => r.full_name)).toEqual(['octo/repo-2']);
  });

  it('counts a failed write as a failure', async () => {
    const repos = makeRepos(3);
    const store = await storeWith(repos.slice(0, 2));

    const stats = await runEnrichment({ repos, summarizer: new FakeSummarizer(), store });

    expect(stats).toEqual({ attempted: 3, succeeded: 2, failed: 1 });
  });

  it('never exceeds the concurrency limit', async () => {
    const repos = makeRepos(10);
    const store = await storeWith(repos);
    const summarizer = new FakeSummarizer(5);

    await runEnrichment({ repos, summarizer, store, concurrency: 3 });

    expect(summarizer.seen).toHaveLength(10);
    expect(summarizer.maxInFlight).toBe(3);
  });

  it('stops starting work once cancelled', async () => {
    const repos = makeRepos(5);
    const store = await storeWith(repos);
    const controller = new AbortController();
    const seen: string[] = [];
    const summarizer: Summarizer = {
      async summarize(repo: Repo): Promise<SummaryResult> {
        seen.push(repo.full_name);
        controller.abort();
        return { summary: 'done', categories: [] };
      },
    };

    await expect(
      runEnrichment({ repos, summarizer, store, concurrency: 1, signal: controller.signal }),
    ).rejects.toThrow(SyncError);
    expect(seen).toEqual(['octo/repo-0']);
    expect((await store.getUnenriched()).length).toBe(4);
  });
});
