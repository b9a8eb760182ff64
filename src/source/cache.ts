import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Repo } from './adapter.js';
import { CacheError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';

const CachedRepoSchema = z.object({
  owner: z.string(),
  name: z.string(),
  full_name: z.string(),
  description: z.string().optional(),
  url: z.string(),
  homepage_url: z.string().optional(),
  stars: z.number().int(),
  language: z.string().optional(),
  topics: z.array(z.string()).default([]),
  readme_excerpt: z.string().optional(),
});

const SnapshotSchema = z.array(CachedRepoSchema);

/**
 * Snapshot of the last complete star list. `read` returns null when there is
 * no usable snapshot; `write` replaces it wholesale.
 */
export interface RepoCache {
  read(): Repo[] | null;
  write(repos: readonly Repo[]): void;
}

/**
 * File-backed snapshot of the last complete star list fetch.
 */
export class StarCache implements RepoCache {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolvePath(filePath);
  }

  /**
   * Returns the cached repos, or null when there is no usable snapshot.
   */
  read(): Repo[] | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch {
      logger.debug({ path: this.filePath }, 'No star cache found');
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn(
        { path: this.filePath, error: err instanceof Error ? err.message : String(err) },
        'Star cache is not valid JSON, ignoring',
      );
      return null;
    }

    const parsed = SnapshotSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn({ path: this.filePath, error: parsed.error.message }, 'Star cache has unexpected shape, ignoring');
      return null;
    }
    return parsed.data;
  }

  /**
   * Replace the snapshot. Writes to a sibling temp file first so a crash never
   * leaves a half-written snapshot behind.
   */
  write(repos: readonly Repo[]): void {
    const snapshot = repos.map(toSnapshotEntry);
    const tmpPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tmpPath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf-8');
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      throw new CacheError(`Failed to write star cache: ${err instanceof Error ? err.message : String(err)}`, {
        path: this.filePath,
      });
    }
  }
}

// Only source fields go in the snapshot; enrichment lives in the store.
function toSnapshotEntry(repo: Repo): z.infer<typeof CachedRepoSchema> {
  return {
    owner: repo.owner,
    name: repo.name,
    full_name: repo.full_name,
    description: repo.description,
    url: repo.url,
    homepage_url: repo.homepage_url,
    stars: repo.stars,
    language: repo.language,
    topics: repo.topics,
    readme_excerpt: repo.readme_excerpt,
  };
}
