#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getStarIndexDir, resolvePath } from '../shared/utils.js';
import { ConfigError, StarIndexError } from '../shared/errors.js';
import { initDb, closeDb } from '../db/db.js';
import { SqliteRepoStore } from '../store/repoDb.js';
import { DEFAULT_SEARCH_FIELDS, parseFields, parseLimit, parseSort, toPlainRow, type FieldValue } from '../store/fields.js';
import { GitHubStarSource } from '../source/github.js';
import { StarCache } from '../source/cache.js';
import { LlmClient } from '../llm/client.js';
import { LlmSummarizer } from '../llm/summarize.js';
import { EmbeddingClient } from '../embedding/client.js';
import { runSync } from '../engine/sync.js';
import { searchRepos } from '../engine/search.js';

const program = new Command();

program
  .name('star-index')
  .description('GitHub star list → local store with AI summaries and semantic search')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create the config file and database')
  .action(async () => {
    const configPath = path.join(getStarIndexDir(), 'config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    // withStore applies migrations on open
    await withStore(async () => {
      log('✓ database schema ready');
    });
  });

// === schema ===
program
  .command('schema')
  .description('Initialize or update the database schema')
  .action(async () => {
    await withStore(async () => {
      log('Schema initialized');
    });
  });

// === sync ===
program
  .command('sync')
  .description('Fetch the star list, enrich with AI, store locally')
  .option('--skip-enrich', 'Fetch and store only (no AI calls)', false)
  .option('--force', 'Re-enrich all repos', false)
  .option('--refresh', 'Re-fetch from GitHub (ignores cache)', false)
  .action(async (opts: { skipEnrich: boolean; force: boolean; refresh: boolean }) => {
    await withStore(async (store, config) => {
      const source = new GitHubStarSource(config.github);
      const llm = new LlmClient(config.llm);
      const embedder = new EmbeddingClient(config.embedding);
      if (!source.isConfigured()) {
        throw new ConfigError('github.token and github.star_list_id must be set (or GITHUB_TOKEN and STAR_LIST_ID)');
      }
      if (!opts.skipEnrich && !llm.isConfigured()) {
        throw new ConfigError('llm.api_key must be set (or LLM_API_KEY); use --skip-enrich to fetch only');
      }
      if (!opts.skipEnrich && !embedder.isConfigured()) {
        throw new ConfigError('embedding.api_key must be set (or EMBEDDING_API_KEY); use --skip-enrich to fetch only');
      }

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);

      try {
        const report = await runSync(
          {
            source,
            cache: new StarCache(config.cache.path),
            store,
            summarizer: new LlmSummarizer(llm),
            embedder,
            concurrency: config.enrich.concurrency,
            progressEvery: config.enrich.progress_every,
            batchSize: config.embedding.batch_size,
          },
          {
            skipEnrich: opts.skipEnrich,
            force: opts.force,
            refresh: opts.refresh,
            signal: controller.signal,
          },
        );

        log('\nSync complete:');
        log(`  Repos:      ${report.fetched} (${report.origin})`);
        log(`  New:        ${report.newRepos}`);
        if (report.enrichment) {
          log(`  Enriched:   ${report.enrichment.succeeded}/${report.enrichment.attempted}`);
        }
        if (report.embedding) {
          log(`  Embedded:   ${report.embedding.embedded}`);
        }
        log(`  Duration:   ${report.durationMs}ms`);
      } finally {
        process.off('SIGINT', onSigint);
      }
    });
  });

// === search ===
program
  .command('search <query>')
  .description('Semantic similarity search across repos')
  .option('-k, --k <n>', 'Number of results', '10')
  .option('--json', 'Output as JSON array', false)
  .option('--fields <list>', 'Comma-separated field names', DEFAULT_SEARCH_FIELDS.join(','))
  .option('--sort <list>', 'Comma-separated "field [asc|desc]" clauses', 'score desc')
  .action(async (query: string, opts: { k: string; json: boolean; fields: string; sort: string }) => {
    const fields = parseFields(opts.fields);
    const sort = parseSort(opts.sort);
    const limit = parseLimit(opts.k);

    await withStore(async (store, config) => {
      const embedder = new EmbeddingClient(config.embedding);
      if (!embedder.isConfigured()) {
        throw new ConfigError('embedding.api_key must be set (or EMBEDDING_API_KEY)');
      }
      const rows = await searchRepos(embedder, store, {
        query,
        limit,
        fields,
        sort,
      });

      if (opts.json) {
        log(JSON.stringify(rows.map(toPlainRow), null, 2));
        return;
      }
      if (rows.length === 0) {
        log('No results found');
        return;
      }

      log(`Top ${rows.length} results for "${query}":\n`);
      for (const [i, row] of rows.entries()) {
        const name = text(row.get('full_name'));
        const score = row.get('score');
        const scoreText = score?.kind === 'float' ? score.value.toFixed(3) : '-';
        const stars = row.get('stars');
        const starText = stars?.kind === 'integer' ? `  ★ ${stars.value}` : '';
        log(`${i + 1}. ${name}  (${scoreText})${starText}`);

        const url = text(row.get('url'));
        if (url) log(`   ${url}`);
        const summary = text(row.get('ai_summary'));
        if (summary) log(`   ${summary}`);
        const categories = row.get('ai_categories');
        if (categories?.kind === 'list' && categories.value.length > 0) {
          log(`   Tags: ${categories.value.join(', ')}`);
        }
        log('');
      }
    });
  });

// === stats ===
program
  .command('stats')
  .description('Show repo counts and category breakdown')
  .action(async () => {
    await withStore(async (store) => {
      const stats = await store.stats();
      log(`Total repos:  ${stats.total}`);
      log(`Enriched:     ${stats.enriched}`);
      log(`Embedded:     ${stats.embedded}`);

      const breakdown = [...(await store.categoryBreakdown()).entries()].sort(
        (a, b) => b[1] - a[1] || a[0].localeCompare(b[0]),
      );
      if (breakdown.length > 0) {
        log('\nCategories:');
        for (const [category, count] of breakdown) {
          log(`  ${category.padEnd(20)} ${String(count).padStart(4)}`);
        }
      }
    });
  });

function text(value: FieldValue | undefined): string {
  return value?.kind === 'text' ? value.value : '';
}

// === Helper to open the store for one command ===
async function withStore(fn: (store: SqliteRepoStore, config: Config) => Promise<void>): Promise<void> {
  const config = await loadConfig();
  const db = initDb(resolvePath(config.db.path));
  try {
    const store = new SqliteRepoStore(db, { dimensions: config.embedding.dimensions });
    await store.initSchema();
    await fn(store, config);
  } finally {
    closeDb();
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  if (err instanceof StarIndexError) {
    log(`Error [${err.code}]: ${err.message}`);
  } else {
    log(`Error: ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exitCode = 1;
});
