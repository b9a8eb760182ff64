import type Database from 'better-sqlite3';
import type { Repo } from '../source/adapter.js';
import type { RepoStore, StoreStats } from './types.js';
import {
  DEFAULT_SORT,
  SEARCH_FIELDS,
  validateLimit,
  validateSearchRequest,
  type FieldKind,
  type FieldValue,
  type SearchField,
  type SearchOptions,
  type SearchRow,
} from './fields.js';
import { registerSimilarityFunction } from './similarity.js';
import { runMigrations } from '../db/migrate.js';
import { DbError, StarIndexError } from '../shared/errors.js';
import { nowISO } from '../shared/utils.js';

/**
 * Database row shape for the repos table. List and vector columns hold JSON text.
 */
interface RepoRow {
  full_name: string;
  owner: string;
  name: string;
  description: string | null;
  url: string;
  homepage_url: string | null;
  stars: number;
  language: string | null;
  topics: string;
  readme_excerpt: string | null;
  ai_summary: string | null;
  ai_categories: string | null;
  embedding: string | null;
  fetched_at: string;
  enriched_at: string | null;
}

function parseJsonArray(raw: string | null): unknown[] | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function parseStringList(raw: string | null): string[] | null {
  const arr = parseJsonArray(raw);
  return arr ? arr.filter((v): v is string => typeof v === 'string') : null;
}

function parseNumberList(raw: string | null): number[] | null {
  const arr = parseJsonArray(raw);
  return arr ? arr.filter((v): v is number => typeof v === 'number') : null;
}

function rowToRepo(row: RepoRow): Repo {
  const repo: Repo = {
    owner: row.owner,
    name: row.name,
    full_name: row.full_name,
    url: row.url,
    stars: row.stars,
    topics: parseStringList(row.topics) ?? [],
    fetched_at: row.fetched_at,
  };
  if (row.description !== null) repo.description = row.description;
  if (row.homepage_url !== null) repo.homepage_url = row.homepage_url;
  if (row.language !== null) repo.language = row.language;
  if (row.readme_excerpt !== null) repo.readme_excerpt = row.readme_excerpt;
  if (row.ai_summary !== null) repo.ai_summary = row.ai_summary;
  const categories = parseStringList(row.ai_categories);
  if (categories !== null) repo.ai_categories = categories;
  const embedding = parseNumberList(row.embedding);
  if (embedding !== null) repo.embedding = embedding;
  if (row.enriched_at !== null) repo.enriched_at = row.enriched_at;
  return repo;
}

function toFieldValue(kind: FieldKind, raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return { kind: 'absent' };
  switch (kind) {
    case 'text':
      return typeof raw === 'string' ? { kind: 'text', value: raw } : { kind: 'absent' };
    case 'integer':
      return typeof raw === 'number' ? { kind: 'integer', value: Math.trunc(raw) } : { kind: 'absent' };
    case 'float':
      return typeof raw === 'number' ? { kind: 'float', value: raw } : { kind: 'absent' };
    case 'list': {
      const list = typeof raw === 'string' ? parseStringList(raw) : null;
      return list ? { kind: 'list', value: list } : { kind: 'absent' };
    }
  }
}

// Optional columns only overwrite when the incoming value is present.
const UPSERT_SQL = `
  INSERT INTO repos (
    full_name, owner, name, description, url, homepage_url, stars, language, topics,
    readme_excerpt, ai_summary, ai_categories, embedding, fetched_at, enriched_at
  ) VALUES (
    @full_name, @owner, @name, @description, @url, @homepage_url, @stars, @language, @topics,
    @readme_excerpt, @ai_summary, @ai_categories, @embedding, @fetched_at, @enriched_at
  )
  ON CONFLICT(full_name) DO UPDATE SET
    owner = excluded.owner,
    name = excluded.name,
    description = COALESCE(excluded.description, repos.description),
    url = excluded.url,
    homepage_url = COALESCE(excluded.homepage_url, repos.homepage_url),
    stars = excluded.stars,
    language = COALESCE(excluded.language, repos.language),
    topics = excluded.topics,
    readme_excerpt = COALESCE(excluded.readme_excerpt, repos.readme_excerpt),
    ai_summary = COALESCE(excluded.ai_summary, repos.ai_summary),
    ai_categories = COALESCE(excluded.ai_categories, repos.ai_categories),
    embedding = COALESCE(excluded.embedding, repos.embedding),
    fetched_at = excluded.fetched_at,
    enriched_at = COALESCE(excluded.enriched_at, repos.enriched_at)
`;

export interface SqliteRepoStoreOptions {
  /** Required length of every stored embedding. Unchecked when omitted. */
  dimensions?: number;
}

/**
 * RepoStore over a better-sqlite3 connection. Similarity is computed inside
 * SQLite through the registered `cosine_similarity` function as a full scan.
 */
export class SqliteRepoStore implements RepoStore {
  private readonly dimensions: number | undefined;

  constructor(
    private readonly db: Database.Database,
    options: SqliteRepoStoreOptions = {},
  ) {
    this.dimensions = options.dimensions;
    registerSimilarityFunction(db);
  }

  async initSchema(): Promise<void> {
    runMigrations(this.db);
  }

  async upsertRepo(repo: Repo): Promise<void> {
    this.guard('upsert repo', { full_name: repo.full_name }, () => {
      this.db.prepare(UPSERT_SQL).run({
        full_name: repo.full_name,
        owner: repo.owner,
        name: repo.name,
        description: repo.description ?? null,
        url: repo.url,
        homepage_url: repo.homepage_url ?? null,
        stars: repo.stars,
        language: repo.language ?? null,
        topics: JSON.stringify(repo.topics),
        readme_excerpt: repo.readme_excerpt ?? null,
        ai_summary: repo.ai_summary ?? null,
        ai_categories: repo.ai_categories ? JSON.stringify(repo.ai_categories) : null,
        embedding: repo.embedding ? JSON.stringify(repo.embedding) : null,
        fetched_at: nowISO(),
        enriched_at: repo.enriched_at ?? null,
      });
    });
  }

  async getUnenriched(): Promise<Repo[]> {
    return this.selectRepos('WHERE ai_summary IS NULL');
  }

  async getNeedingEmbedding(): Promise<Repo[]> {
    return this.selectRepos('WHERE ai_summary IS NOT NULL AND embedding IS NULL');
  }

  async getAll(): Promise<Repo[]> {
    return this.selectRepos('');
  }

  async updateEnrichment(fullName: string, summary: string, categories: string[]): Promise<void> {
    const changes = this.guard('update enrichment', { full_name: fullName }, () =>
      this.db
        .prepare('UPDATE repos SET ai_summary = ?, ai_categories = ?, enriched_at = ? WHERE full_name = ?')
        .run(summary, JSON.stringify(categories), nowISO(), fullName).changes,
    );
    if (changes === 0) throw new DbError(`Repo not found: ${fullName}`, { full_name: fullName });
  }

  async updateEmbedding(fullName: string, vector: number[]): Promise<void> {
    if (this.dimensions !== undefined && vector.length !== this.dimensions) {
      throw new DbError(`Embedding for ${fullName} has ${vector.length} dimensions, expected ${this.dimensions}`, {
        full_name: fullName,
      });
    }
    const changes = this.guard('update embedding', { full_name: fullName }, () =>
      this.db
        .prepare('UPDATE repos SET embedding = ? WHERE full_name = ?')
        .run(JSON.stringify(vector), fullName).changes,
    );
    if (changes === 0) throw new DbError(`Repo not found: ${fullName}`, { full_name: fullName });
  }

  async search(queryVector: number[], options: SearchOptions): Promise<SearchRow[]> {
    validateSearchRequest(options);
    validateLimit(options.limit);

    const sort = options.sort && options.sort.length > 0 ? options.sort : DEFAULT_SORT;
    const columns = options.fields.filter((f) => f !== 'score');
    const select = ['cosine_similarity(embedding, @query) AS score', ...columns].join(', ');
    const order = sort.map((s) => `${s.field} ${s.direction === 'desc' ? 'DESC' : 'ASC'}`).join(', ');
    const sql = `SELECT ${select} FROM repos WHERE embedding IS NOT NULL ORDER BY ${order} LIMIT @limit`;

    const rows = this.guard('search', { limit: options.limit }, () =>
      this.db.prepare(sql).all({ query: JSON.stringify(queryVector), limit: options.limit }),
    ) as Array<Record<string, unknown>>;

    const rowFields: SearchField[] = options.fields.includes('score')
      ? options.fields
      : [...options.fields, 'score'];

    return rows.map((row) => {
      const out: SearchRow = new Map();
      for (const field of rowFields) {
        out.set(field, toFieldValue(SEARCH_FIELDS[field], row[field]));
      }
      return out;
    });
  }

  async stats(): Promise<StoreStats> {
    const row = this.guard('stats', {}, () =>
      this.db
        .prepare(
          `SELECT
             COUNT(*) AS total,
             COALESCE(SUM(CASE WHEN ai_summary IS NOT NULL THEN 1 ELSE 0 END), 0) AS enriched,
             COALESCE(SUM(CASE WHEN embedding IS NOT NULL THEN 1 ELSE 0 END), 0) AS embedded
           FROM repos`,
        )
        .get(),
    ) as StoreStats;
    return { total: row.total, enriched: row.enriched, embedded: row.embedded };
  }

  async categoryBreakdown(): Promise<Map<string, number>> {
    const rows = this.guard('category breakdown', {}, () =>
      this.db.prepare('SELECT ai_categories FROM repos WHERE ai_categories IS NOT NULL').all(),
    ) as Array<{ ai_categories: string }>;

    const counts = new Map<string, number>();
    for (const row of rows) {
      for (const category of parseStringList(row.ai_categories) ?? []) {
        counts.set(category, (counts.get(category) ?? 0) + 1);
      }
    }
    return counts;
  }

  private selectRepos(where: string): Repo[] {
    const rows = this.guard('select repos', {}, () =>
      this.db.prepare(`SELECT * FROM repos ${where} ORDER BY rowid`).all(),
    ) as RepoRow[];
    return rows.map(rowToRepo);
  }

  private guard<T>(op: string, details: Record<string, unknown>, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof StarIndexError) throw err;
      throw new DbError(`Failed to ${op}: ${err instanceof Error ? err.message : String(err)}`, details);
    }
  }
}
